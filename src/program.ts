/**
 * Commander program definition for the `zsh-tidy` binary.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { runClean } from './commands/clean.js';
import { runCreateConfig } from './commands/create-config.js';
import { DEFAULT_MAX_LENGTH } from './pipeline/clean.js';
import type { CleanOptions, OutputFormat } from './types/index.js';

interface CliOptions {
  file?: string;
  maxLength: number;
  config?: string;
  verbose?: boolean;
  dryRun?: boolean;
  yes?: boolean;
  format: OutputFormat;
  createConfig?: string;
}

/** Commander argument parser for `--max-length`. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('zsh-tidy')
    .description(
      'Clean zsh history by removing duplicates, overly long commands and captured terminal noise, with configurable keep/remove rules',
    )
    .version('0.1.0')
    .option('-f, --file <path>', 'path to zsh history file (default: $HISTFILE or ~/.zsh_history)')
    .option('-l, --max-length <n>', 'maximum command length to keep', parsePositiveInt, DEFAULT_MAX_LENGTH)
    .option('-c, --config <path>', 'configuration file with ignore/allow rules')
    .option('-v, --verbose', 'enable verbose output')
    .option('-n, --dry-run', 'show what would be done without making changes')
    .option('-y, --yes', 'do not ask for confirmation')
    .addOption(
      new Option('--format <format>', 'statistics output format')
        .choices(['table', 'json'])
        .default('table'),
    )
    .option('--create-config <path>', 'create a sample configuration file and exit')
    .addHelpText(
      'after',
      `
Match types:
  exact       - Match entire command exactly
  contains    - Command contains pattern anywhere
  starts_with - Command starts with pattern
  ends_with   - Command ends with pattern
  regex       - Use regular expression matching`,
    )
    .action(async (opts: CliOptions) => {
      if (opts.createConfig) {
        await runCreateConfig(opts.createConfig);
        return;
      }

      const options: CleanOptions = {
        file: opts.file,
        maxLength: opts.maxLength,
        config: opts.config,
        verbose: opts.verbose,
        dryRun: opts.dryRun,
        yes: opts.yes,
        format: opts.format,
      };
      await runClean(options);
    });

  return program;
}
