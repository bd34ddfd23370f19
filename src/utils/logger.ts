/**
 * Console logger.
 *
 * `debug` output is only printed in verbose mode and is prefixed with the
 * wall-clock time, e.g. `[14:03:27] Loaded ignore rule: Keep vim commands`.
 */

import chalk from 'chalk';

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Clock used for debug prefixes (injectable for tests). */
  now?: () => Date;
}

/** `HH:MM:SS` in local time. */
export function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join(':');
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, now = () => new Date() } = options;

  return {
    debug(message) {
      if (!verbose) return;
      console.log(chalk.dim(`[${formatClock(now())}] ${message}`));
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.error(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
