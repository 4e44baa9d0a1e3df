/**
 * Application configuration
 *
 * Reads the global config.toml and any workspace-local .tinct/config.toml
 * files, merges them (nearest directory wins) and validates the result.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  ConfigError,
  configFile,
  type Env,
  ErrorCode,
  errorMessage,
  findLocalConfigDirs,
  LOG_LEVEL_NAMES,
  type Logger,
  mergeTomlTables,
  type TomlTable
} from '@tinct/core';
import { parseToml } from '@tinct/loader';
import { z } from 'zod';

export const AppConfigSchema = z
  .object({
    icons: z.string().min(1).optional().default('default').describe('Icon flavor name'),
    theme: z.string().min(1).optional().default('default').describe('Theme name'),
    'true-color': z
      .boolean()
      .optional()
      .describe('Force true-color output on or off; detected from COLORTERM when unset'),
    'log-level': z.enum(LOG_LEVEL_NAMES).optional().describe('Log level for diagnostics')
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type LoadedConfig = {
  config: AppConfig;
  /** Files that contributed, lowest precedence first */
  sources: string[];
};

export type LoadConfigOptions = {
  env?: Env;
  cwd?: string;
  logger?: Logger;
};

function readConfigFile(path: string): TomlTable {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(ErrorCode.E_CONFIG_PARSE, path, `Cannot read ${path}: ${errorMessage(error)}`, {
      cause: error
    });
  }
  try {
    return parseToml(text);
  } catch (error) {
    throw new ConfigError(
      ErrorCode.E_CONFIG_PARSE,
      path,
      `Invalid TOML in configuration file ${path}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Load and validate the configuration
 *
 * @throws ConfigError when a file cannot be parsed or the merged result is invalid
 */
export function loadAppConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const candidates = [
    configFile(env),
    ...findLocalConfigDirs(options.cwd)
      .reverse()
      .map((dir) => join(dir, CONFIG_FILE_NAME))
  ];

  const sources: string[] = [];
  let merged: TomlTable = {};
  for (const path of candidates) {
    if (!existsSync(path)) {
      continue;
    }
    options.logger?.debug({ path }, 'Loading configuration');
    merged = mergeTomlTables(merged, readConfigFile(path), 3);
    sources.push(path);
  }

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const where = sources.at(-1) ?? configFile(env);
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(ErrorCode.E_CONFIG_INVALID, where, `Invalid configuration: ${details}`, {
      data: { sources }
    });
  }

  return { config: parsed.data, sources };
}

/**
 * Whether the terminal renders 24-bit color
 */
export function detectTrueColor(config: AppConfig, env: Env = process.env): boolean {
  if (config['true-color'] !== undefined) {
    return config['true-color'];
  }
  const colorterm = env.COLORTERM?.toLowerCase();
  return colorterm === 'truecolor' || colorterm === '24bit';
}
