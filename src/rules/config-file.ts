/**
 * Reading and writing the rule configuration file.
 *
 * - Missing file   → built-in defaults, and the defaults are written there.
 * - Unreadable, invalid JSON or wrong shape → built-in defaults, with a warning.
 * - Bad individual rules → skipped, each one logged.
 */

import {
  DEFAULT_RULE_CONFIG,
  SAMPLE_RULE_CONFIG,
  loadRuleSet,
} from './config.js';
import { describeRule } from './rule.js';
import {
  getDefaultConfigPath,
  readFileIfExists,
  writeJsonFile,
} from '../utils/file-operations.js';
import { silentLogger } from '../utils/logger.js';
import type { RuleLoadIssue, RuleLoadResult } from './config.js';
import type { Logger } from '../utils/logger.js';

export interface LoadedRuleConfig extends RuleLoadResult {
  configPath: string;
  /** Where the rules came from. */
  source: 'file' | 'defaults';
}

function loadDefaults(): RuleLoadResult {
  return loadRuleSet(DEFAULT_RULE_CONFIG);
}

function formatIssue(issue: RuleLoadIssue): string {
  const list = issue.list === 'ignore_list' ? 'ignore' : 'allow';
  return `Error loading ${list} rule #${issue.index + 1}: ${issue.message}`;
}

function parseJson(content: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(content);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

async function tryLoadFile(
  configPath: string,
  logger: Pick<Logger, 'debug' | 'warn'>,
): Promise<Omit<LoadedRuleConfig, 'configPath'>> {
  let content: string | null;
  try {
    content = await readFileIfExists(configPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Error loading config file, using defaults: ${message}`);
    return { ...loadDefaults(), source: 'defaults' };
  }

  if (content === null) {
    try {
      await writeJsonFile(configPath, DEFAULT_RULE_CONFIG);
      logger.debug(`Created default config file: ${configPath}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Could not create config file: ${message}`);
    }
    return { ...loadDefaults(), source: 'defaults' };
  }

  const parsed = parseJson(content);
  if (!parsed.ok) {
    logger.warn(`Error loading config file, using defaults: ${parsed.error}`);
    return { ...loadDefaults(), source: 'defaults' };
  }

  try {
    const result = loadRuleSet(parsed.value);
    logger.debug(`Loaded configuration from: ${configPath}`);
    return { ...result, source: 'file' };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Error loading config file, using defaults: ${message}`);
    return { ...loadDefaults(), source: 'defaults' };
  }
}

/**
 * Load the rule configuration.
 *
 * @param configPath - Explicit `--config` path; defaults to ~/.config/zsh-tidy/config.json.
 * @param logger     - Receives per-rule debug lines and load warnings.
 */
export async function loadRuleConfigFile(
  configPath: string = getDefaultConfigPath(),
  logger: Pick<Logger, 'debug' | 'warn'> = silentLogger,
): Promise<LoadedRuleConfig> {
  const loaded = await tryLoadFile(configPath, logger);

  for (const issue of loaded.issues) {
    logger.warn(formatIssue(issue));
  }
  for (const rule of loaded.ruleSet.keepRules) {
    logger.debug(`Loaded ignore rule: ${describeRule(rule)}`);
  }
  for (const rule of loaded.ruleSet.removeRules) {
    logger.debug(`Loaded allow rule: ${describeRule(rule)}`);
  }
  logger.debug(
    `Loaded ${loaded.ruleSet.keepRules.length} ignore rules and ${loaded.ruleSet.removeRules.length} allow rules`,
  );

  return { ...loaded, configPath };
}

/** Write the annotated sample configuration to `configPath`. */
export async function writeSampleConfig(configPath: string): Promise<void> {
  await writeJsonFile(configPath, SAMPLE_RULE_CONFIG);
}
