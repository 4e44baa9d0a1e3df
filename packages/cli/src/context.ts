/**
 * Per-invocation wiring: logger, configuration, built-in data and loaders
 */

import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import type { ChalkInstance } from 'chalk';
import {
  configDir,
  createLogger,
  type Env,
  type Logger,
  loggerOptionsFromEnv,
  isLogLevel,
  type LogLevel,
  runtimeDir
} from '@tinct/core';
import { IconLoader, loadBuiltinIcons } from '@tinct/icons';
import { loadBuiltinThemes, ThemeLoader } from '@tinct/theme';
import { type AppConfig, detectTrueColor, loadAppConfig } from './config.js';
import { createTerminalChalk } from './render.js';

const SHIPPED_RUNTIME_DIR = fileURLToPath(new URL('../runtime', import.meta.url));

export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

export type CliContext = {
  config: AppConfig;
  configSources: string[];
  env: Env;
  logger: Logger;
  icons: IconLoader;
  themes: ThemeLoader;
  supportsTrueColor: boolean;
  chalk: ChalkInstance;
  print: (line: string) => void;
};

function flagLevel(globals: GlobalOptions): LogLevel | undefined {
  if (globals.quiet) {
    return 'error';
  }
  return globals.verbose ? 'debug' : undefined;
}

/**
 * Logger writing to stderr, so command output on stdout stays clean
 */
export function createStderrLogger(env: Env, level?: LogLevel): Logger {
  return createLogger({
    ...loggerOptionsFromEnv(env, level),
    prefix: '[tinct]',
    output: (line) => console.error(line)
  });
}

/**
 * Build the context for one CLI run
 *
 * Log level: --quiet / --verbose, then TINCT_LOG_LEVEL, then the config file.
 */
export function createContext(
  globals: GlobalOptions,
  env: Env = process.env,
  cwd: string = process.cwd()
): CliContext {
  const bootstrap = createStderrLogger(env, flagLevel(globals));
  const { config, sources } = loadAppConfig({ env, cwd, logger: bootstrap });

  const envLevel = env.TINCT_LOG_LEVEL;
  const level = flagLevel(globals) ?? (isLogLevel(envLevel) ? envLevel : config['log-level']);
  const logger = createStderrLogger(env, level);

  const userDir = configDir(env);
  const defaultDir = runtimeDir(SHIPPED_RUNTIME_DIR, env);
  logger.debug({ userDir, defaultDir }, 'Flavor directories');

  const supportsTrueColor = detectTrueColor(config, env);

  return {
    config,
    configSources: sources,
    env,
    logger,
    icons: new IconLoader({
      userDir: join(userDir, 'icons'),
      defaultDir: join(defaultDir, 'icons'),
      builtins: loadBuiltinIcons(),
      logger: logger.child?.('icons') ?? logger
    }),
    themes: new ThemeLoader({
      userDir: join(userDir, 'themes'),
      defaultDir: join(defaultDir, 'themes'),
      builtins: loadBuiltinThemes(),
      logger: logger.child?.('themes') ?? logger
    }),
    supportsTrueColor,
    chalk: createTerminalChalk(supportsTrueColor),
    print: (line) => console.log(line)
  };
}
