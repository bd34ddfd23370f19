/**
 * Zsh extended_history parser.
 *
 * Format
 * ──────
 *   : <start>:<elapsed>;<command>
 *
 * A command may span several physical lines. Any line that does not look
 * like the start of a new record belongs to the record above it and is
 * joined with `\n`. Lines seen before the first record are orphans.
 *
 * Pipeline
 * ────────
 * 1. {@link groupHistoryLines} — physical lines → entry blobs / orphans
 * 2. {@link parseEntryBlob}    — blob → HistoryEntry (or null if malformed)
 * 3. {@link formatEntry}       — HistoryEntry → output line
 */

import type { HistoryEntry } from '../types/index.js';

/** Matched against the first line of a blob; dot-all so odd separators stay inside the command. */
const ENTRY_START_RE = /^: (\d+:\d+);(.*)$/s;

// ─── Grouping ─────────────────────────────────────────────────────────────────

/** One item produced while scanning physical lines. */
export type ScannedLine =
  | {
      kind: 'entry';
      /** The start line plus any continuation lines, joined with `\n`. */
      blob: string;
      /** 1-based line number of the start line. */
      lineNumber: number;
    }
  | {
      kind: 'orphan';
      line: string;
      lineNumber: number;
    };

/** The record currently being assembled. */
interface EntryAccumulator {
  lines: string[];
  lineNumber: number;
}

/**
 * Returns `true` when a physical line opens a new record.
 *
 * This is deliberately looser than {@link ENTRY_START_RE}: a line such as
 * `: oops;ls` opens a record that later fails to parse and is counted as
 * malformed together with its continuation lines.
 */
export function isEntryStart(line: string): boolean {
  return line.startsWith(': ') && line.includes(':') && line.includes(';');
}

function flush(acc: EntryAccumulator): ScannedLine {
  return { kind: 'entry', blob: acc.lines.join('\n'), lineNumber: acc.lineNumber };
}

/**
 * Group physical lines into entry blobs, in input order.
 *
 * Lazy and single-pass: each blob is yielded as soon as the next record
 * starts (or the input ends).
 */
export function* groupHistoryLines(lines: Iterable<string>): Generator<ScannedLine> {
  let current: EntryAccumulator | null = null;
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;

    if (isEntryStart(line)) {
      if (current) yield flush(current);
      current = { lines: [line], lineNumber };
      continue;
    }

    if (current) {
      current.lines.push(line);
    } else {
      yield { kind: 'orphan', line, lineNumber };
    }
  }

  if (current) yield flush(current);
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

/**
 * Parse an entry blob. The grammar is checked against the first line only;
 * the remaining lines are appended to the command with `\n`.
 *
 * @returns The entry, or `null` when the first line is not `: <d>:<d>;...`.
 */
export function parseEntryBlob(blob: string, lineNumber = 1): HistoryEntry | null {
  const newline = blob.indexOf('\n');
  const firstLine = newline === -1 ? blob : blob.slice(0, newline);
  const rest = newline === -1 ? '' : blob.slice(newline);

  const match = ENTRY_START_RE.exec(firstLine);
  if (!match) return null;

  return {
    timestamp: match[1],
    command: match[2] + rest,
    lineNumber,
  };
}

/** Render an entry in the same wire shape it was read from. */
export function formatEntry(entry: Pick<HistoryEntry, 'timestamp' | 'command'>): string {
  return `: ${entry.timestamp};${entry.command}`;
}

/**
 * Convenience: parse every well-formed entry of a history text.
 * Orphans and malformed blobs are skipped.
 */
export function parseZshHistory(lines: Iterable<string>): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const item of groupHistoryLines(lines)) {
    if (item.kind !== 'entry') continue;
    const entry = parseEntryBlob(item.blob, item.lineNumber);
    if (entry) entries.push(entry);
  }
  return entries;
}
