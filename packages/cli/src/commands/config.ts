/**
 * Config command - Inspect tinct configuration
 */

import type { Command } from 'commander';
import { configFile, getDisplayPath } from '@tinct/core';
import type { CliContext } from '../context.js';

export function setupConfigCommand(program: Command, getContext: () => CliContext): void {
  const config = program.command('config').description('Inspect tinct configuration');

  config
    .command('show')
    .description('Show the effective configuration')
    .action(() => {
      const ctx = getContext();
      if (ctx.configSources.length === 0) {
        ctx.print('No configuration files found; using defaults');
      } else {
        ctx.print('Configuration files:');
        for (const source of ctx.configSources) {
          ctx.print(`  ${getDisplayPath(source)}`);
        }
      }
      ctx.print(JSON.stringify({ ...ctx.config, 'true-color': ctx.supportsTrueColor }, null, 2));
    });

  config
    .command('path')
    .description('Print the path of the global configuration file')
    .action(() => {
      const ctx = getContext();
      ctx.print(configFile(ctx.env));
    });
}
