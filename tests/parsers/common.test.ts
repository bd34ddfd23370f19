import { describe, it, expect } from 'vitest';
import { normalizeCommand, splitHistoryLines } from '../../src/parsers/common.js';

// ── splitHistoryLines ───────────────────────────────────────────────────────

describe('splitHistoryLines', () => {
  it('returns no lines for empty content', () => {
    expect(splitHistoryLines('')).toEqual([]);
  });

  it('does not count the segment after a final newline', () => {
    expect(splitHistoryLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('keeps the last line when there is no final newline', () => {
    expect(splitHistoryLines('a\nb')).toEqual(['a', 'b']);
  });

  it('keeps blank lines in the middle', () => {
    expect(splitHistoryLines('a\n\nb\n')).toEqual(['a', '', 'b']);
    expect(splitHistoryLines('\n')).toEqual(['']);
  });

  it('strips Windows line endings', () => {
    expect(splitHistoryLines('a\r\nb\r\n')).toEqual(['a', 'b']);
  });
});

// ── normalizeCommand ────────────────────────────────────────────────────────

describe('normalizeCommand', () => {
  it('collapses whitespace runs and trims', () => {
    expect(normalizeCommand('  echo   hi  ')).toBe('echo hi');
    expect(normalizeCommand('ls\t-la')).toBe('ls -la');
  });

  it('removes backslash-newline continuations', () => {
    expect(normalizeCommand('echo a \\\n  b')).toBe('echo a b');
    expect(normalizeCommand('docker run \\\n  -p 80:80 \\\n  nginx')).toBe('docker run -p 80:80 nginx');
  });

  it('makes a continued command equal to its one-line form', () => {
    expect(normalizeCommand('make \\\nbuild')).toBe(normalizeCommand('make build'));
  });

  it('removes a trailing lone backslash', () => {
    expect(normalizeCommand('echo hi \\')).toBe('echo hi');
    expect(normalizeCommand('echo hi\\')).toBe('echo hi');
  });

  it('keeps backslashes in the middle of a line', () => {
    expect(normalizeCommand('printf "a\\tb"')).toBe('printf "a\\tb"');
  });

  it('is stable when applied twice', () => {
    const once = normalizeCommand('  git   commit \\\n -m  "x" \\');
    expect(normalizeCommand(once)).toBe(once);
  });
});
