/**
 * The cleaning pipeline.
 *
 * Flow (one linear pass, nothing is revisited):
 *   physical lines → entry blobs → HistoryEntry → decision → kept list + stats
 *
 * Every run owns its own dedup state and counters, so the function can be
 * called repeatedly without any reset.
 */

import { DedupTracker } from '../analyzers/dedup.js';
import { decideEntry } from '../analyzers/decision.js';
import { formatEntry, groupHistoryLines, parseEntryBlob } from '../parsers/zsh.js';
import { describeRule } from '../rules/rule.js';
import { charLength, previewCommand } from '../utils/strings.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { EntryDecision } from '../analyzers/decision.js';
import type { CleaningResult, CleaningStats, RuleSet } from '../types/index.js';

/** Default for `--max-length`. */
export const DEFAULT_MAX_LENGTH = 500;

export interface CleanPipelineOptions {
  rules: RuleSet;
  maxLength?: number;
  /** Receives one debug line per removal, orphan and malformed entry. */
  logger?: Pick<Logger, 'debug'>;
}

export function createEmptyStats(): CleaningStats {
  return {
    totalLines: 0,
    validEntries: 0,
    duplicatesRemoved: 0,
    tooLongRemoved: 0,
    malformedRemoved: 0,
    ignoredKept: 0,
    allowedRemoved: 0,
    patternRemoved: 0,
    finalEntries: 0,
  };
}

function countDecision(stats: CleaningStats, decision: EntryDecision): void {
  switch (decision.reason) {
    case 'allow-rule-match':
      stats.allowedRemoved++;
      break;
    case 'ignore-rule-match':
      stats.ignoredKept++;
      break;
    case 'too-long':
      stats.tooLongRemoved++;
      break;
    case 'empty':
    case 'repetitive-pattern':
      stats.patternRemoved++;
      break;
    case 'duplicate':
      stats.duplicatesRemoved++;
      break;
    case 'malformed':
      stats.malformedRemoved++;
      break;
    case 'kept':
      break;
  }
}

function describeDecision(decision: EntryDecision, command: string): string {
  const preview = previewCommand(command);
  switch (decision.reason) {
    case 'allow-rule-match':
      return `Removed by allow rule (${decision.rule ? describeRule(decision.rule) : 'rule'}): ${preview}`;
    case 'ignore-rule-match':
      return `Kept by ignore rule (${decision.rule ? describeRule(decision.rule) : 'rule'}): ${preview}`;
    case 'too-long':
      return `Removed long command (${charLength(command.trim())} chars): ${preview}`;
    case 'repetitive-pattern':
      return `Removed command (repetitive pattern: ${decision.noisePattern ?? 'unknown'}): ${preview}`;
    case 'duplicate':
      return `Duplicate removed: ${preview}`;
    case 'empty':
      return 'Removed empty command';
    case 'malformed':
      return `Malformed entry: ${preview}`;
    case 'kept':
      return `Kept: ${preview}`;
  }
}

/**
 * Clean a sequence of history lines.
 *
 * @param lines   - Physical lines (see `splitHistoryLines`).
 * @param options - Rule set, length limit and optional logger.
 * @returns Kept entries in input order and the run's statistics.
 */
export function cleanHistory(
  lines: Iterable<string>,
  options: CleanPipelineOptions,
): CleaningResult {
  const { rules, maxLength = DEFAULT_MAX_LENGTH, logger = silentLogger } = options;

  const stats = createEmptyStats();
  const seen = new DedupTracker();
  const entries: string[] = [];

  // Physical lines are counted as the scanner pulls them.
  function* counted(source: Iterable<string>): Generator<string> {
    for (const line of source) {
      stats.totalLines++;
      yield line;
    }
  }

  for (const item of groupHistoryLines(counted(lines))) {
    if (item.kind === 'orphan') {
      stats.malformedRemoved++;
      logger.debug(`Warning: Orphaned line at ${item.lineNumber}: ${previewCommand(item.line)}`);
      continue;
    }

    const entry = parseEntryBlob(item.blob, item.lineNumber);
    if (!entry) {
      countDecision(stats, { keep: false, reason: 'malformed' });
      logger.debug(describeDecision({ keep: false, reason: 'malformed' }, item.blob));
      continue;
    }

    stats.validEntries++;

    const decision = decideEntry(entry, { rules, maxLength, seen });
    countDecision(stats, decision);

    if (!decision.keep) {
      logger.debug(describeDecision(decision, entry.command));
      continue;
    }

    if (decision.reason === 'ignore-rule-match') {
      logger.debug(describeDecision(decision, entry.command));
    }

    seen.add(entry.command.trim());
    entries.push(formatEntry(entry));
  }

  stats.finalEntries = entries.length;
  return { entries, stats };
}

/** Join kept entries into file content: one entry per line, trailing newline. */
export function renderHistory(entries: readonly string[]): string {
  return entries.map((entry) => `${entry}\n`).join('');
}
