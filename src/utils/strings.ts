/**
 * Shared string utility helpers.
 */

/** Length in characters (code points), not UTF-16 units. */
export function charLength(text: string): number {
  return [...text].length;
}

/**
 * One-line preview of a command for log output: the first 50 characters
 * followed by `...`, with embedded newlines shown as `⏎`.
 */
export function previewCommand(command: string, max = 50): string {
  return [...command].slice(0, max).join('').replace(/\r?\n/g, '⏎') + '...';
}
