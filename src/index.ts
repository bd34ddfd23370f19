/**
 * Library entry point: the cleaning core without the CLI.
 */

export { createRule, ruleMatches, findMatchingRule, ConfigError } from './rules/rule.js';
export type { CreateRuleInput } from './rules/rule.js';
export { loadRuleSet, DEFAULT_RULE_CONFIG, SAMPLE_RULE_CONFIG } from './rules/config.js';
export type { RuleLoadIssue, RuleLoadResult } from './rules/config.js';
export {
  groupHistoryLines,
  parseEntryBlob,
  formatEntry,
  parseZshHistory,
  isEntryStart,
} from './parsers/zsh.js';
export type { ScannedLine } from './parsers/zsh.js';
export { splitHistoryLines, normalizeCommand } from './parsers/common.js';
export { decideEntry } from './analyzers/decision.js';
export type { DecisionContext, EntryDecision } from './analyzers/decision.js';
export { DedupTracker } from './analyzers/dedup.js';
export { findNoisePattern, isNoise } from './analyzers/noise.js';
export { cleanHistory, renderHistory, DEFAULT_MAX_LENGTH } from './pipeline/clean.js';
export type { CleanPipelineOptions } from './pipeline/clean.js';
export * from './types/index.js';
