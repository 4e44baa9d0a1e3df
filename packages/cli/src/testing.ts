/**
 * In-memory CLI context for command tests
 */

import { Chalk } from 'chalk';
import { createLogger } from '@tinct/core';
import { IconLoader } from '@tinct/icons';
import { createBuiltinRegistry } from '@tinct/loader';
import { ThemeLoader } from '@tinct/theme';
import type { AppConfig } from './config.js';
import type { CliContext } from './context.js';

export const TEST_CONFIG_DIR = '/home/user/.config/tinct';
export const TEST_RUNTIME_DIR = '/opt/tinct/runtime';

const BUILTIN_ICONS = [
  '[mime-type]',
  'rs = { icon = "r", color = "#dea584" }',
  'md = { icon = "m" }',
  '[diagnostic]',
  'error = { icon = "e" }',
  'warning = { icon = "w" }',
  'info = { icon = "i" }',
  'hint = { icon = "h" }',
  '[symbol-kind]',
  'file = { icon = "f" }'
].join('\n');

const BUILTIN_THEME = [
  'error = "red"',
  'warning = "yellow"',
  'info = { fg = "blue", modifiers = ["bold"] }',
  'hint = "cyan"'
].join('\n');

export type TestContext = {
  ctx: CliContext;
  output: string[];
  logs: string[];
};

export type TestContextOptions = {
  config?: Partial<AppConfig>;
  configSources?: string[];
  supportsTrueColor?: boolean;
};

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const output: string[] = [];
  const logs: string[] = [];
  const logger = createLogger({ level: 'warn', output: (line) => logs.push(line) });
  const supportsTrueColor = options.supportsTrueColor ?? false;

  const ctx: CliContext = {
    config: { icons: 'default', theme: 'default', ...options.config },
    configSources: options.configSources ?? [],
    env: { TINCT_CONFIG_DIR: TEST_CONFIG_DIR },
    logger,
    icons: new IconLoader({
      userDir: `${TEST_CONFIG_DIR}/icons`,
      defaultDir: `${TEST_RUNTIME_DIR}/icons`,
      builtins: createBuiltinRegistry({ default: BUILTIN_ICONS }),
      logger
    }),
    themes: new ThemeLoader({
      userDir: `${TEST_CONFIG_DIR}/themes`,
      defaultDir: `${TEST_RUNTIME_DIR}/themes`,
      builtins: createBuiltinRegistry({ default: BUILTIN_THEME }),
      logger
    }),
    supportsTrueColor,
    chalk: new Chalk({ level: supportsTrueColor ? 3 : 0 }),
    print: (line) => output.push(line)
  };

  return { ctx, output, logs };
}
