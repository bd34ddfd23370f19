/**
 * Safe file read/write/backup utilities.
 *
 * Used by the `clean` command to read the history file, write the cleaned
 * result, and keep a backup that can be restored if writing fails.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

// ── Constants ────────────────────────────────────────────────────────────────

/** Default config directory: ~/.config/zsh-tidy */
const CONFIG_DIR = path.join(os.homedir(), '.config', 'zsh-tidy');

/** Rule configuration file name. */
const CONFIG_FILE = 'config.json';

// ── Directory helpers ────────────────────────────────────────────────────────

/**
 * Ensure a directory exists, creating it (and parents) if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Get the full path to the default rule configuration file.
 */
export function getDefaultConfigPath(): string {
  return path.join(CONFIG_DIR, CONFIG_FILE);
}

// ── Read helpers ─────────────────────────────────────────────────────────────

/**
 * Read a file's contents as UTF-8 text.
 * Returns `null` if the file does not exist; other errors propagate.
 */
export async function readFileIfExists(
  filePath: string,
): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

// ── Write helpers ────────────────────────────────────────────────────────────

/**
 * Write text content to a file, creating parent directories as needed.
 */
export async function writeFileSafe(
  filePath: string,
  content: string,
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Write a JSON-serialisable value to a file (pretty-printed).
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown,
): Promise<void> {
  const json = JSON.stringify(data, null, 2) + '\n';
  await writeFileSafe(filePath, json);
}

// ── Backup helpers ───────────────────────────────────────────────────────────

/** `2026-10-18T09:30:05.123Z` → `2026-10-18_09-30-05` */
export function formatBackupTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/[:.]/g, '-')
    .replace('T', '_')
    .slice(0, 19);
}

/**
 * Create a backup of a file if it exists.
 *
 * Backup naming: `<filename>.backup` (simple) or
 * `<filename>.<timestamp>.backup` if a backup already exists.
 *
 * @returns The backup file path, or `null` if the original didn't exist.
 */
export async function createBackup(
  filePath: string,
  now: Date = new Date(),
): Promise<string | null> {
  if (!(await fileExists(filePath))) return null;

  const simpleBackupPath = `${filePath}.backup`;
  const finalBackupPath = (await fileExists(simpleBackupPath))
    ? `${filePath}.${formatBackupTimestamp(now)}.backup`
    : simpleBackupPath;

  await fs.copyFile(filePath, finalBackupPath);
  return finalBackupPath;
}

/**
 * Copy a backup back over the original file.
 *
 * @throws If the backup is missing or the copy fails.
 */
export async function restoreBackup(
  backupPath: string,
  filePath: string,
): Promise<void> {
  await fs.copyFile(backupPath, filePath);
}

// ── File existence ───────────────────────────────────────────────────────────

/**
 * Check whether a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
