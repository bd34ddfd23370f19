/**
 * `zsh-tidy --create-config <path>` implementation.
 */

import path from 'node:path';
import chalk from 'chalk';
import { writeSampleConfig } from '../rules/config-file.js';
import { createLogger } from '../utils/logger.js';

/**
 * Write the annotated sample configuration and tell the user where it went.
 *
 * @returns The absolute path that was written.
 */
export async function runCreateConfig(configPath: string): Promise<string> {
  const target = path.resolve(configPath);
  const logger = createLogger();

  try {
    await writeSampleConfig(target);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`\nError: could not write ${target}: ${message}`);
    process.exit(1);
  }

  logger.info(chalk.green(`Sample configuration created at: ${target}`));
  logger.info('Edit this file to customize your ignore and allow rules.');
  return target;
}
