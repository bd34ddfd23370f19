/**
 * Duplicate tracking for a single cleaning run.
 */

import { normalizeCommand } from '../parsers/common.js';

/** Normalized commands already kept during one run. */
export class DedupTracker {
  private readonly seen = new Set<string>();

  /** `true` if a command with the same normalized form was already kept. */
  has(command: string): boolean {
    return this.seen.has(normalizeCommand(command));
  }

  /**
   * Record a kept command. Commands kept by an ignore rule are recorded too,
   * so later plain copies of them are still caught as duplicates.
   *
   * @returns The normalized key that was stored.
   */
  add(command: string): string {
    const key = normalizeCommand(command);
    this.seen.add(key);
    return key;
  }

  get size(): number {
    return this.seen.size;
  }
}
