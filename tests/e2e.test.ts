/**
 * End-to-end run of the clean command against the fixture history, using
 * the built-in default rules written to a temporary config file.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = path.resolve(__dirname, 'fixtures');

// ── Mock ora to suppress spinner output ──────────────────────────────────────

vi.mock('ora', () => ({
  default: () => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  }),
}));

import { runClean } from '../src/commands/clean.js';
import { DEFAULT_RULE_CONFIG } from '../src/rules/config.js';

const TEST_DIR = path.join(os.tmpdir(), 'zsh-tidy-e2e-test');
const HISTORY_FILE = path.join(TEST_DIR, '.zsh_history');
const CONFIG_FILE = path.join(TEST_DIR, 'config.json');

const EXPECTED_HISTORY = [
  ': 1700000000:0;git status',
  ': 1700000005:0;ls -la',
  ': 1700000015:0;git commit -m "first"',
  ': 1700000020:0;git commit -m "first"',
  ': 1700000025:0;docker run \\',
  '  -p 8080:80 \\',
  '  nginx:latest',
  ': 1700000035:0;echo   hello',
  ': 1700000055:0;npm test',
  ': 1700000060:0;cd ~/projects',
  '',
].join('\n');

describe('E2E: clean the fixture history', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.copyFile(path.join(FIXTURES_DIR, 'sample_zsh_history.txt'), HISTORY_FILE);
    await fs.writeFile(CONFIG_FILE, JSON.stringify(DEFAULT_RULE_CONFIG), 'utf-8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it('writes exactly the surviving entries', async () => {
    await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });

    expect(await fs.readFile(HISTORY_FILE, 'utf-8')).toBe(EXPECTED_HISTORY);
  });

  it('reports every counter', async () => {
    const outcome = await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });

    expect(outcome.stats).toEqual({
      totalLines: 17,
      validEntries: 13,
      duplicatesRemoved: 2,
      tooLongRemoved: 0,
      malformedRemoved: 2,
      ignoredKept: 4,
      allowedRemoved: 1,
      patternRemoved: 2,
      finalEntries: 8,
    });
  });

  it('keeps the original next to the cleaned file', async () => {
    const original = await fs.readFile(HISTORY_FILE, 'utf-8');
    const outcome = await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });

    expect(outcome.backupFile).toBe(`${HISTORY_FILE}.backup`);
    expect(await fs.readFile(`${HISTORY_FILE}.backup`, 'utf-8')).toBe(original);
  });

  it('prints the size reduction in the statistics table', async () => {
    await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });

    const output = logSpy.mock.calls.map((args) => String(args[0])).join('\n');
    expect(output).toContain('52.9%');
  });

  it('reaches the same result on a second pass', async () => {
    await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });
    const second = await runClean({ file: HISTORY_FILE, config: CONFIG_FILE, yes: true });

    expect(second.stats).toMatchObject({ totalLines: 10, validEntries: 8, finalEntries: 8 });
    expect(await fs.readFile(HISTORY_FILE, 'utf-8')).toBe(EXPECTED_HISTORY);
  });
});
