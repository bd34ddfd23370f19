import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';

// ── Mock ora to suppress spinner output ──────────────────────────────────────

vi.mock('ora', () => ({
  default: () => {
    const spinner = {
      start: vi.fn().mockReturnThis(),
      succeed: vi.fn().mockReturnThis(),
      fail: vi.fn().mockReturnThis(),
      warn: vi.fn().mockReturnThis(),
      stop: vi.fn().mockReturnThis(),
      text: '',
    };
    return new Proxy(spinner, {
      set(target, prop, value) {
        if (prop === 'text') {
          (target as Record<string, unknown>).text = value;
          return true;
        }
        return Reflect.set(target, prop, value);
      },
    });
  },
}));

// ── Import after mocks ──────────────────────────────────────────────────────

import { isAffirmative, runClean } from '../../src/commands/clean.js';

// ── Fixture setup ────────────────────────────────────────────────────────────

const TEST_DIR = path.join(os.tmpdir(), 'zsh-tidy-clean-command-test');
const HISTORY_FILE = path.join(TEST_DIR, '.zsh_history');
const CONFIG_FILE = path.join(TEST_DIR, 'config.json');
const HISTORY = ': 1:0;echo hi\n: 2:0;echo hi\n: 3:0;git status\n';

function loggedLines(spy: ReturnType<typeof vi.spyOn>): string[] {
  return spy.mock.calls.map((args) => String(args[0]));
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe('isAffirmative', () => {
  it('accepts y and yes in any case', () => {
    expect(isAffirmative('y')).toBe(true);
    expect(isAffirmative(' YES ')).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isAffirmative('')).toBe(false);
    expect(isAffirmative('n')).toBe(false);
    expect(isAffirmative('yep')).toBe(false);
  });
});

describe('runClean', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(async () => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi
      .spyOn(process, 'exit')
      .mockImplementation(((code?: number) => {
        throw new Error(`process.exit(${code})`);
      }) as never);

    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.writeFile(HISTORY_FILE, HISTORY, 'utf-8');
    await fs.writeFile(CONFIG_FILE, JSON.stringify({ ignore_list: [], allow_list: [] }), 'utf-8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  // ── Apply ───────────────────────────────────────────────────────────────

  it('rewrites the history file and keeps a backup', async () => {
    const outcome = await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });

    expect(outcome.applied).toBe(true);
    expect(outcome.backupFile).toBe(`${HISTORY_FILE}.backup`);
    expect(outcome.stats).toMatchObject({ totalLines: 3, duplicatesRemoved: 1, finalEntries: 2 });
    expect(await fs.readFile(HISTORY_FILE, 'utf-8')).toBe(': 1:0;echo hi\n: 3:0;git status\n');
    expect(await fs.readFile(`${HISTORY_FILE}.backup`, 'utf-8')).toBe(HISTORY);
  });

  it('prints the summary, statistics and reload hint', async () => {
    await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });

    const output = loggedLines(logSpy).join('\n');
    expect(output).toContain(`History file: ${HISTORY_FILE}`);
    expect(output).toContain('Max command length: 500');
    expect(output).toContain('Ignore rules loaded: 0');
    expect(output).toContain('ZSH HISTORY CLEANING STATISTICS');
    expect(output).toContain("fc -R");
  });

  it('applies the length limit', async () => {
    await fs.writeFile(HISTORY_FILE, ': 1:0;echo ' + 'x'.repeat(20) + '\n', 'utf-8');

    const outcome = await runClean({
      file: HISTORY_FILE,
      config: CONFIG_FILE,
      yes: true,
      maxLength: 10,
    });

    expect(outcome.stats?.tooLongRemoved).toBe(1);
    expect(await fs.readFile(HISTORY_FILE, 'utf-8')).toBe('');
  });

  it('prints JSON statistics including the backup path', async () => {
    await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true, format: 'json' });

    const lines = loggedLines(logSpy);
    expect(lines.some((line) => line.includes('ZSH History Cleaner'))).toBe(false);
    const json = lines.find((line) => line.startsWith('{'));
    expect(json).toBeDefined();
    const parsed = JSON.parse(json ?? '{}');
    expect(parsed.finalEntries).toBe(2);
    expect(parsed.backupFile).toBe(`${HISTORY_FILE}.backup`);
  });

  // ── Dry run ─────────────────────────────────────────────────────────────

  it('does not touch the file on a dry run', async () => {
    const prompt = vi.fn();
    const outcome = await runClean(
      { file: HISTORY_FILE, config: CONFIG_FILE, dryRun: true },
      { prompt },
    );

    expect(outcome).toMatchObject({ applied: false, dryRun: true, backupFile: null });
    expect(outcome.stats?.duplicatesRemoved).toBe(1);
    expect(prompt).not.toHaveBeenCalled();
    expect(await fs.readFile(HISTORY_FILE, 'utf-8')).toBe(HISTORY);
    await expect(fs.access(`${HISTORY_FILE}.backup`)).rejects.toThrow();

    const output = loggedLines(logSpy);
    expect(output[0]).toContain('DRY RUN MODE - No changes will be made');
    expect(output).toContain('\nDRY RUN: No changes were made to the history file');
  });

  // ── Confirmation ────────────────────────────────────────────────────────

  it('stops when the user declines', async () => {
    const prompt = vi.fn().mockResolvedValue('n');
    const outcome = await runClean({ file: HISTORY_FILE, config: CONFIG_FILE }, { prompt });

    expect(prompt).toHaveBeenCalledWith('Do you want to proceed? [y/N]: ');
    expect(outcome).toMatchObject({ applied: false, stats: null, backupFile: null });
    expect(logSpy).toHaveBeenCalledWith('Operation cancelled.');
    expect(await fs.readFile(HISTORY_FILE, 'utf-8')).toBe(HISTORY);
  });

  it('proceeds when the user agrees', async () => {
    const prompt = vi.fn().mockResolvedValue(' Yes ');
    const outcome = await runClean({ file: HISTORY_FILE, config: CONFIG_FILE }, { prompt });

    expect(outcome.applied).toBe(true);
    expect(await fs.readFile(HISTORY_FILE, 'utf-8')).toBe(': 1:0;echo hi\n: 3:0;git status\n');
  });

  // ── Verbose ─────────────────────────────────────────────────────────────

  it('logs each removal when verbose', async () => {
    await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true, verbose: true });

    const output = loggedLines(logSpy);
    expect(output.some((line) => line.includes('Duplicate removed: echo hi...'))).toBe(true);
    expect(output.some((line) => line.includes('Loaded 0 ignore rules and 0 allow rules'))).toBe(true);
  });

  // ── Errors ──────────────────────────────────────────────────────────────

  it('exits with an error when the history file is missing', async () => {
    await expect(
      runClean({ file: path.join(TEST_DIR, 'missing'), config: CONFIG_FILE, yes: true }),
    ).rejects.toThrow(/process\.exit/);

    expect(exitSpy).toHaveBeenCalledWith(1);
    const errors = loggedLines(errorSpy).join('\n');
    expect(errors).toContain('History file does not exist');
  });
});
