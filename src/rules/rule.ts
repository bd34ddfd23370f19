/**
 * Filter rules: one pattern + match mode that answers yes/no for a command.
 *
 * Rules are built once from configuration and never change afterwards.
 * Construction is where everything can go wrong (unknown mode, bad regex);
 * matching itself never throws.
 */

import { MATCH_MODES } from '../types/index.js';
import type { FilterRule, MatchMode } from '../types/index.js';

// ── Errors ───────────────────────────────────────────────────────────────────

/** Thrown when a rule cannot be constructed from its configuration. */
export class ConfigError extends Error {
  readonly pattern: string;
  readonly matchType?: string;

  constructor(message: string, pattern: string, matchType?: string) {
    super(message);
    this.name = 'ConfigError';
    this.pattern = pattern;
    this.matchType = matchType;
  }
}

// ── Construction ─────────────────────────────────────────────────────────────

export interface CreateRuleInput {
  pattern: string;
  matchType?: string;
  caseSensitive?: boolean;
  description?: string;
}

function isMatchMode(value: string): value is MatchMode {
  return MATCH_MODES.some((mode) => mode === value);
}

/**
 * Build a rule. `matchType` is case-insensitive and defaults to `contains`.
 *
 * @throws {ConfigError} for an unknown match type or a regex that does not compile.
 */
export function createRule(input: CreateRuleInput): FilterRule {
  const { pattern, caseSensitive = false, description } = input;
  const rawMode = (input.matchType ?? 'contains').trim().toLowerCase();

  if (!isMatchMode(rawMode)) {
    throw new ConfigError(
      `Unknown match type '${input.matchType}' for pattern '${pattern}' (expected one of: ${MATCH_MODES.join(', ')})`,
      pattern,
      input.matchType,
    );
  }

  if (rawMode !== 'regex') {
    return { pattern, matchMode: rawMode, caseSensitive, description };
  }

  let regex: RegExp;
  try {
    regex = new RegExp(pattern, caseSensitive ? '' : 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Invalid regex pattern '${pattern}': ${reason}`,
      pattern,
      input.matchType,
    );
  }

  return { pattern, matchMode: 'regex', regex, caseSensitive, description };
}

// ── Matching ─────────────────────────────────────────────────────────────────

/**
 * Test a command against a rule.
 *
 * Non-regex modes lower-case both sides unless the rule is case-sensitive.
 * Regex rules search the original text; case folding is carried by the `i`
 * flag chosen at construction.
 */
export function ruleMatches(rule: FilterRule, text: string): boolean {
  if (rule.matchMode === 'regex') {
    return rule.regex.test(text);
  }

  const haystack = rule.caseSensitive ? text : text.toLowerCase();
  const needle = rule.caseSensitive ? rule.pattern : rule.pattern.toLowerCase();

  switch (rule.matchMode) {
    case 'exact':
      return haystack === needle;
    case 'contains':
      return haystack.includes(needle);
    case 'starts_with':
      return haystack.startsWith(needle);
    case 'ends_with':
      return haystack.endsWith(needle);
  }
}

/** Return the first rule in `rules` that matches `text`, or `undefined`. */
export function findMatchingRule(
  rules: readonly FilterRule[],
  text: string,
): FilterRule | undefined {
  return rules.find((rule) => ruleMatches(rule, text));
}

/** Human-readable label for log output. */
export function describeRule(rule: FilterRule): string {
  return rule.description ?? `${rule.matchMode} '${rule.pattern}'`;
}
