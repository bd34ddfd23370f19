/**
 * Table formatter for cleaning statistics.
 *
 * Uses chalk for colours, boxen for the bordered box.
 */

import chalk from 'chalk';
import boxen from 'boxen';
import type { CleaningStats } from '../types/index.js';

/**
 * Percentage of physical lines that did not survive, or `null` for an empty file.
 */
export function sizeReductionPercent(stats: CleaningStats): number | null {
  if (stats.totalLines === 0) return null;
  return ((stats.totalLines - stats.finalEntries) / stats.totalLines) * 100;
}

/** Label/value rows, in display order. */
export function statsRows(stats: CleaningStats): Array<[string, string]> {
  const rows: Array<[string, string]> = [
    ['Total lines processed:', stats.totalLines.toLocaleString('en-US')],
    ['Valid entries found:', stats.validEntries.toLocaleString('en-US')],
    ['Kept by ignore rules:', stats.ignoredKept.toLocaleString('en-US')],
    ['Removed by allow rules:', stats.allowedRemoved.toLocaleString('en-US')],
    ['Duplicates removed:', stats.duplicatesRemoved.toLocaleString('en-US')],
    ['Too long commands removed:', stats.tooLongRemoved.toLocaleString('en-US')],
    [
      'Pattern/malformed removed:',
      (stats.patternRemoved + stats.malformedRemoved).toLocaleString('en-US'),
    ],
    ['Final entries kept:', stats.finalEntries.toLocaleString('en-US')],
  ];

  const reduction = sizeReductionPercent(stats);
  if (reduction !== null) {
    rows.push(['Size reduction:', `${reduction.toFixed(1)}%`]);
  }
  return rows;
}

/**
 * Format cleaning statistics as a styled terminal box.
 *
 * @param stats      - Counters from one pipeline run.
 * @param backupFile - Backup written before the history file was replaced.
 * @returns A multi-line string ready for `console.log`.
 */
export function formatStatsTable(
  stats: CleaningStats,
  backupFile?: string | null,
): string {
  const title = chalk.bold.cyan('ZSH HISTORY CLEANING STATISTICS');
  const divider = chalk.dim('─'.repeat(50));

  const body = statsRows(stats)
    .map(([label, value]) => `${chalk.bold(label.padEnd(27))}${value}`)
    .join('\n');

  const footer = backupFile
    ? `\n\n${chalk.bold('Backup saved as:'.padEnd(27))}${backupFile}`
    : '';

  return boxen(`${title}\n${divider}\n${body}${footer}`, {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
  });
}
