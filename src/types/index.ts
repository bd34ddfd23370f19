/**
 * Shared type definitions for zsh-tidy.
 */

// ── Rules ────────────────────────────────────────────────────────────────────

/** How a rule's pattern is compared against a command. */
export type MatchMode = 'exact' | 'contains' | 'starts_with' | 'ends_with' | 'regex';

/** All supported match modes, in the order they are documented. */
export const MATCH_MODES: readonly MatchMode[] = [
  'exact',
  'contains',
  'starts_with',
  'ends_with',
  'regex',
];

/** A rule as it appears in the JSON configuration file. */
export interface RuleSpec {
  pattern: string;
  /** One of {@link MatchMode}, compared case-insensitively. Defaults to `contains`. */
  match_type?: string;
  case_sensitive?: boolean;
  description?: string;
}

/** Shape of the configuration document (`ignore_list` keeps, `allow_list` removes). */
export interface RuleConfig {
  ignore_list?: RuleSpec[];
  allow_list?: RuleSpec[];
}

interface RuleBase {
  readonly pattern: string;
  readonly caseSensitive: boolean;
  readonly description?: string;
}

/** A constructed, immutable filter rule. Regex rules carry their compiled expression. */
export type FilterRule =
  | (RuleBase & { readonly matchMode: Exclude<MatchMode, 'regex'> })
  | (RuleBase & { readonly matchMode: 'regex'; readonly regex: RegExp });

/**
 * The two ordered rule lists consulted for every entry.
 *
 * `removeRules` (the config's allow list) always wins over `keepRules`
 * (the config's ignore list).
 */
export interface RuleSet {
  keepRules: FilterRule[];
  removeRules: FilterRule[];
}

// ── History ──────────────────────────────────────────────────────────────────

/** One logical zsh extended_history record. */
export interface HistoryEntry {
  /** Opaque `<start>:<elapsed>` token, kept verbatim. */
  timestamp: string;
  /** Raw command text; continuation lines are joined with `\n`. */
  command: string;
  /** 1-based physical line on which the entry started. */
  lineNumber: number;
}

// ── Decisions ────────────────────────────────────────────────────────────────

/** Why an entry was kept or dropped. */
export type DecisionReason =
  | 'empty'
  | 'allow-rule-match'
  | 'ignore-rule-match'
  | 'too-long'
  | 'repetitive-pattern'
  | 'duplicate'
  | 'kept'
  | 'malformed';

export interface Decision {
  keep: boolean;
  reason: DecisionReason;
}

// ── Statistics ───────────────────────────────────────────────────────────────

export interface CleaningStats {
  totalLines: number;
  validEntries: number;
  duplicatesRemoved: number;
  tooLongRemoved: number;
  malformedRemoved: number;
  ignoredKept: number;
  allowedRemoved: number;
  patternRemoved: number;
  finalEntries: number;
}

/** Output of one pipeline run. */
export interface CleaningResult {
  /** Kept entries in input order, formatted as `: <timestamp>;<command>`. */
  entries: string[];
  stats: CleaningStats;
}

// ── CLI ──────────────────────────────────────────────────────────────────────

export type OutputFormat = 'table' | 'json';

/** Options for the `clean` command. */
export interface CleanOptions {
  /** Override path to the history file (`--file`). */
  file?: string;
  /** Maximum trimmed command length (`--max-length`). */
  maxLength?: number;
  /** Rule configuration file (`--config`). */
  config?: string;
  verbose?: boolean;
  dryRun?: boolean;
  /** Skip the confirmation prompt. */
  yes?: boolean;
  format?: OutputFormat;
}

/** What the `clean` command did. */
export interface CleanOutcome {
  historyFile: string;
  /** `false` when the user declined the confirmation prompt. */
  applied: boolean;
  dryRun: boolean;
  stats: CleaningStats | null;
  backupFile: string | null;
}
