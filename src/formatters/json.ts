/**
 * JSON formatter for cleaning statistics.
 *
 * Serialises the counters to pretty-printed JSON for piping
 * or downstream consumption by other tools.
 */

import { sizeReductionPercent } from './table.js';
import type { CleaningStats } from '../types/index.js';

/**
 * Format cleaning statistics as pretty-printed JSON.
 *
 * @returns A JSON string (2-space indented) with `sizeReductionPercent`
 *   and `backupFile` added next to the raw counters.
 */
export function formatStatsJson(
  stats: CleaningStats,
  backupFile: string | null = null,
): string {
  return JSON.stringify(
    {
      ...stats,
      sizeReductionPercent: sizeReductionPercent(stats),
      backupFile,
    },
    null,
    2,
  );
}
