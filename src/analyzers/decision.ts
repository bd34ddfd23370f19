/**
 * Keep-or-drop decision for a single history entry.
 *
 * Checks run in a fixed order and the first one that applies wins:
 *
 *  1. empty after trimming            → drop (`empty`)
 *  2. a remove rule (allow list)      → drop (`allow-rule-match`)
 *  3. a keep rule (ignore list)       → keep (`ignore-rule-match`), skipping 4–6
 *  4. longer than `maxLength`         → drop (`too-long`)
 *  5. matches a noise signature       → drop (`repetitive-pattern`)
 *  6. normalized form already seen    → drop (`duplicate`), otherwise keep
 *
 * The function only reads the dedup state. Recording a kept command is the
 * caller's job (see the cleaning pipeline).
 */

import { findMatchingRule } from '../rules/rule.js';
import { findNoisePattern } from './noise.js';
import { charLength } from '../utils/strings.js';
import type { Decision, FilterRule, HistoryEntry, RuleSet } from '../types/index.js';
import type { DedupTracker } from './dedup.js';

export interface DecisionContext {
  rules: RuleSet;
  /** Longest trimmed command that is still kept, in characters. */
  maxLength: number;
  seen: Pick<DedupTracker, 'has'>;
}

/** A decision plus what triggered it, for logging. */
export interface EntryDecision extends Decision {
  /** The rule that matched, for the two rule-driven reasons. */
  rule?: FilterRule;
  /** Name of the noise signature, for `repetitive-pattern`. */
  noisePattern?: string;
}

export function decideEntry(
  entry: Pick<HistoryEntry, 'command'>,
  context: DecisionContext,
): EntryDecision {
  const command = entry.command.trim();

  if (command.length === 0) {
    return { keep: false, reason: 'empty' };
  }

  const removeRule = findMatchingRule(context.rules.removeRules, command);
  if (removeRule) {
    return { keep: false, reason: 'allow-rule-match', rule: removeRule };
  }

  const keepRule = findMatchingRule(context.rules.keepRules, command);
  if (keepRule) {
    return { keep: true, reason: 'ignore-rule-match', rule: keepRule };
  }

  if (charLength(command) > context.maxLength) {
    return { keep: false, reason: 'too-long' };
  }

  const noisePattern = findNoisePattern(command);
  if (noisePattern) {
    return { keep: false, reason: 'repetitive-pattern', noisePattern };
  }

  if (context.seen.has(command)) {
    return { keep: false, reason: 'duplicate' };
  }

  return { keep: true, reason: 'kept' };
}
