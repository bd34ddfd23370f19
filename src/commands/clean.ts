/**
 * `zsh-tidy` clean command implementation.
 *
 * Orchestrates: history path resolution → rule loading → confirmation →
 * backup → cleaning pipeline → write → formatted statistics.
 *
 * If writing the cleaned file fails, the backup is copied back before the
 * command exits.
 */

import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { getHistoryPath } from '../utils/history-paths.js';
import {
  createBackup,
  fileExists,
  readFileIfExists,
  restoreBackup,
  writeFileSafe,
} from '../utils/file-operations.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { loadRuleConfigFile } from '../rules/config-file.js';
import { splitHistoryLines } from '../parsers/common.js';
import { DEFAULT_MAX_LENGTH, cleanHistory, renderHistory } from '../pipeline/clean.js';
import { formatStatsTable } from '../formatters/table.js';
import { formatStatsJson } from '../formatters/json.js';
import type { CleanOptions, CleanOutcome, CleaningStats } from '../types/index.js';

// ── Confirmation ─────────────────────────────────────────────────────────────

export type ConfirmPrompt = (question: string) => Promise<string>;

/** Ask a question on the terminal and resolve with the raw answer. */
export async function askQuestion(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

/** `y` or `yes`, any case, surrounding whitespace ignored. */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export interface CleanDependencies {
  /** Replaces the interactive prompt (tests, scripted use). */
  prompt?: ConfirmPrompt;
  /** Clock for backup names. */
  now?: () => Date;
}

// ── Output ───────────────────────────────────────────────────────────────────

function printStats(
  logger: Logger,
  stats: CleaningStats,
  format: CleanOptions['format'],
  backupFile: string | null,
): void {
  if (format === 'json') {
    logger.info(formatStatsJson(stats, backupFile));
  } else {
    logger.info(formatStatsTable(stats, backupFile));
  }
}

// ── Public entry point ───────────────────────────────────────────────────────

/**
 * Run the clean command.
 *
 * @param options - CLI options parsed by Commander.
 * @param deps    - Injectable prompt and clock.
 * @returns What was done; `applied` is false for a dry run or a declined prompt.
 */
export async function runClean(
  options: CleanOptions,
  deps: CleanDependencies = {},
): Promise<CleanOutcome> {
  const { prompt = askQuestion, now = () => new Date() } = deps;
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
  const format = options.format ?? 'table';
  const dryRun = options.dryRun ?? false;
  const logger = createLogger({ verbose: options.verbose });

  const { filePath, source } = getHistoryPath(options.file);
  const outcome: CleanOutcome = {
    historyFile: filePath,
    applied: false,
    dryRun,
    stats: null,
    backupFile: null,
  };

  let spinner: Ora | null = null;
  let backupFile: string | null = null;

  try {
    // 1 ── Load rules ────────────────────────────────────────────────────────
    const { ruleSet } = await loadRuleConfigFile(options.config, logger);

    // 2 ── Verify history file ───────────────────────────────────────────────
    if (!(await fileExists(filePath))) {
      logger.error(`History file does not exist: ${filePath}`);
      if (source === 'default') {
        logger.warn('\nTip: Use --file <path> to specify a custom history file location.');
      }
      process.exit(1);
    }

    // 3 ── Summary / confirmation ────────────────────────────────────────────
    if (format !== 'json') {
      if (dryRun) {
        logger.info(chalk.yellow('DRY RUN MODE - No changes will be made'));
      }
      logger.info(chalk.bold('ZSH History Cleaner'));
      logger.info(`History file: ${filePath}`);
      logger.info(`Max command length: ${maxLength}`);
      logger.info(`Ignore rules loaded: ${ruleSet.keepRules.length}`);
      logger.info(`Allow rules loaded: ${ruleSet.removeRules.length}`);
    }

    if (!dryRun && !options.yes) {
      logger.info('\nThis will clean your ZSH history file.');
      logger.info('A backup will be created automatically.');
      const answer = await prompt('Do you want to proceed? [y/N]: ');
      if (!isAffirmative(answer)) {
        logger.info('Operation cancelled.');
        return outcome;
      }
    }

    spinner = ora({ text: 'Reading history…', isEnabled: !options.verbose }).start();

    // 4 ── Backup ────────────────────────────────────────────────────────────
    if (!dryRun) {
      spinner.text = 'Creating backup…';
      backupFile = await createBackup(filePath, now());
      outcome.backupFile = backupFile;
      if (backupFile) logger.debug(`Created backup: ${backupFile}`);
    }

    // 5 ── Clean ─────────────────────────────────────────────────────────────
    spinner.text = `Reading history from ${filePath}…`;
    const content = await readFileIfExists(filePath);
    if (content === null) {
      throw new Error(`History file disappeared while cleaning: ${filePath}`);
    }

    spinner.text = 'Cleaning history entries…';
    const { entries, stats } = cleanHistory(splitHistoryLines(content), {
      rules: ruleSet,
      maxLength,
      logger,
    });
    outcome.stats = stats;

    // 6 ── Write ─────────────────────────────────────────────────────────────
    if (dryRun) {
      spinner.succeed('Dry run complete');
      printStats(logger, stats, format, null);
      if (format !== 'json') {
        logger.info('\nDRY RUN: No changes were made to the history file');
      }
      return outcome;
    }

    spinner.text = `Writing cleaned history to ${filePath}…`;
    await writeFileSafe(filePath, renderHistory(entries));
    outcome.applied = true;
    spinner.succeed('Cleaned history written successfully');

    printStats(logger, stats, format, backupFile);
    if (format !== 'json') {
      logger.info(chalk.green('\nZSH history cleaned successfully!'));
      logger.info(
        chalk.cyan("You may need to restart your shell or run 'fc -R' to reload the history."),
      );
    }

    return outcome;
  } catch (error) {
    spinner?.fail('Cleaning failed');
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`\nError: ${message}`);

    if (backupFile && !outcome.applied) {
      try {
        await restoreBackup(backupFile, filePath);
        logger.warn(`Restored history from backup: ${backupFile}`);
      } catch (restoreError) {
        const restoreMessage =
          restoreError instanceof Error ? restoreError.message : String(restoreError);
        logger.error(`Failed to restore from backup: ${restoreMessage}`);
      }
    }

    process.exit(1);
  }
}
