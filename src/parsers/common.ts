/**
 * Text helpers shared by the history parser and the dedup tracker.
 */

/**
 * Split raw file content into physical lines.
 *
 * A trailing `\r` is dropped from every line (Windows line endings), and the
 * empty segment after a final newline is not counted as a line.
 */
export function splitHistoryLines(content: string): string[] {
  if (content === '') return [];

  const lines = content.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (content.endsWith('\n')) lines.pop();
  return lines;
}

/**
 * Compute the duplicate-detection key for a command.
 *
 * 1. Backslash-newline continuations become a single space.
 * 2. Whitespace runs collapse to one space; the ends are trimmed.
 * 3. A trailing lone backslash is removed.
 *
 * The result is only ever used as a set key, never written back.
 */
export function normalizeCommand(command: string): string {
  return command
    .replace(/\\[^\S\n]*\n\s*/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\\\s*$/, '')
    .trim();
}
