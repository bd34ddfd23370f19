/**
 * Zsh history file path resolution.
 *
 * Order: --file override, then $HISTFILE, then ~/.zsh_history.
 */

import path from 'node:path';
import os from 'node:os';

/** Return value for getHistoryPath() — carries both the resolved path and its source. */
export interface HistoryPathResult {
  /** Absolute path to the history file. */
  filePath: string;
  /** How the path was determined. */
  source: 'override' | 'env' | 'default';
}

/**
 * Resolve the zsh history file path.
 *
 * @param override - A user-supplied --file value. Takes priority over everything.
 * @param env      - Environment to read `HISTFILE` from.
 */
export function getHistoryPath(
  override?: string,
  env: NodeJS.ProcessEnv = process.env,
): HistoryPathResult {
  if (override) {
    return { filePath: path.resolve(override), source: 'override' };
  }

  const envPath = env.HISTFILE;
  if (envPath) {
    return { filePath: path.resolve(envPath), source: 'env' };
  }

  return {
    filePath: path.join(os.homedir(), '.zsh_history'),
    source: 'default',
  };
}
