/**
 * Rule configuration: validation of the JSON document and conversion into a
 * {@link RuleSet}.
 *
 * A broken rule never aborts the load. It is reported as a {@link RuleLoadIssue}
 * and the remaining rules of the same list are still built.
 */

import { z } from 'zod';
import { ConfigError, createRule } from './rule.js';
import type { FilterRule, RuleConfig, RuleSet } from '../types/index.js';

// ── Schemas ──────────────────────────────────────────────────────────────────

export const RuleSpecSchema = z.object({
  pattern: z.string(),
  match_type: z.string().optional(),
  case_sensitive: z.boolean().optional(),
  description: z.string().optional(),
});

/**
 * Top-level document. The lists are validated loosely here so that one bad
 * entry does not reject the whole file; entries are checked one by one.
 */
export const RuleConfigSchema = z
  .object({
    ignore_list: z.array(z.unknown()).optional(),
    allow_list: z.array(z.unknown()).optional(),
  })
  .passthrough();

// ── Load result ──────────────────────────────────────────────────────────────

export type RuleListName = 'ignore_list' | 'allow_list';

/** A rule entry that was skipped during loading. */
export interface RuleLoadIssue {
  list: RuleListName;
  /** 0-based position within the list. */
  index: number;
  /** The offending pattern, when the entry had one. */
  pattern?: string;
  message: string;
}

export interface RuleLoadResult {
  ruleSet: RuleSet;
  issues: RuleLoadIssue[];
}

function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${where}${issue.message}`;
    })
    .join('; ');
}

function loadRuleList(
  list: RuleListName,
  entries: readonly unknown[],
  issues: RuleLoadIssue[],
): FilterRule[] {
  const rules: FilterRule[] = [];

  entries.forEach((entry, index) => {
    const parsed = RuleSpecSchema.safeParse(entry);
    if (!parsed.success) {
      issues.push({ list, index, message: describeZodError(parsed.error) });
      return;
    }

    const spec = parsed.data;
    try {
      rules.push(
        createRule({
          pattern: spec.pattern,
          matchType: spec.match_type,
          caseSensitive: spec.case_sensitive,
          description: spec.description,
        }),
      );
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      issues.push({ list, index, pattern: spec.pattern, message: error.message });
    }
  });

  return rules;
}

/**
 * Build a rule set from configuration data of unknown shape.
 *
 * @throws {ConfigError} when the document itself is not a rule configuration
 *   (for example an array or a string). Individual rules never throw.
 */
export function loadRuleSet(data: unknown): RuleLoadResult {
  const parsed = RuleConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid rule configuration: ${describeZodError(parsed.error)}`,
      '',
    );
  }

  const issues: RuleLoadIssue[] = [];
  const keepRules = loadRuleList('ignore_list', parsed.data.ignore_list ?? [], issues);
  const removeRules = loadRuleList('allow_list', parsed.data.allow_list ?? [], issues);

  return { ruleSet: { keepRules, removeRules }, issues };
}

// ── Built-in documents ───────────────────────────────────────────────────────

/** Rules used when no configuration file exists yet. */
export const DEFAULT_RULE_CONFIG: RuleConfig = {
  ignore_list: [
    { pattern: 'git commit', match_type: 'starts_with', case_sensitive: false, description: 'Keep all git commits' },
    { pattern: 'vim', match_type: 'starts_with', case_sensitive: false, description: 'Keep vim commands' },
    { pattern: 'cd ', match_type: 'starts_with', case_sensitive: false, description: 'Keep directory changes' },
    { pattern: 'npm', match_type: 'starts_with', case_sensitive: false, description: 'Keep npm commands' },
  ],
  allow_list: [
    {
      pattern: 'error: failed to commit transaction',
      match_type: 'contains',
      case_sensitive: false,
      description: 'Remove pacman error messages',
    },
    {
      pattern: 'checking.*keyring.*100%',
      match_type: 'regex',
      case_sensitive: false,
      description: 'Remove pacman progress messages',
    },
    {
      pattern: 'exists in filesystem',
      match_type: 'contains',
      case_sensitive: false,
      description: 'Remove filesystem conflict messages',
    },
    { pattern: '^\\s*$', match_type: 'regex', case_sensitive: false, description: 'Remove empty commands' },
    {
      pattern: 'Errors occurred, no packages were upgraded',
      match_type: 'contains',
      case_sensitive: false,
      description: 'Remove pacman error summaries',
    },
  ],
};

/** Annotated example written by `--create-config`. */
export const SAMPLE_RULE_CONFIG: RuleConfig & {
  description: string;
  match_types: string[];
} = {
  description: 'zsh-tidy rule configuration',
  match_types: [
    'exact - Match the entire command exactly',
    'contains - Command contains the pattern anywhere',
    'starts_with - Command starts with the pattern',
    'ends_with - Command ends with the pattern',
    'regex - Use regular expression matching',
  ],
  ignore_list: [
    { pattern: 'git commit', match_type: 'starts_with', case_sensitive: false, description: 'Keep all git commit commands' },
    { pattern: 'vim', match_type: 'starts_with', case_sensitive: false, description: 'Keep vim/editor commands' },
    { pattern: 'cd ', match_type: 'starts_with', case_sensitive: false, description: 'Keep directory navigation' },
    { pattern: 'npm|yarn|pnpm', match_type: 'regex', case_sensitive: false, description: 'Keep package manager commands' },
    { pattern: 'docker', match_type: 'contains', case_sensitive: false, description: 'Keep docker commands' },
    { pattern: 'sudo systemctl', match_type: 'starts_with', case_sensitive: false, description: 'Keep system service commands' },
  ],
  allow_list: [
    {
      pattern: 'error: failed to commit transaction',
      match_type: 'contains',
      case_sensitive: false,
      description: 'Remove pacman transaction errors',
    },
    {
      pattern: 'checking.*keyring.*100%',
      match_type: 'regex',
      case_sensitive: false,
      description: 'Remove pacman progress indicators',
    },
    {
      pattern: 'exists in filesystem',
      match_type: 'contains',
      case_sensitive: false,
      description: 'Remove filesystem conflict messages',
    },
    { pattern: '^\\s*$', match_type: 'regex', case_sensitive: false, description: 'Remove empty/whitespace-only commands' },
    {
      pattern: 'Errors occurred, no packages were upgraded',
      match_type: 'exact',
      case_sensitive: false,
      description: 'Remove pacman error summaries',
    },
    { pattern: '^clear$|^cls$', match_type: 'regex', case_sensitive: false, description: 'Remove screen clearing commands' },
    {
      pattern: '^ls$|^ll$|^la$',
      match_type: 'regex',
      case_sensitive: false,
      description: 'Remove bare listing commands (ls with arguments is kept)',
    },
  ],
};
