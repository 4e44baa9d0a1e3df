/**
 * Themes command - List and show themes
 */

import type { Command } from 'commander';
import type { CliContext } from '../context.js';
import { describeStyle, formatFlavorList, formatRows, paint } from '../render.js';

export function setupThemesCommand(program: Command, getContext: () => CliContext): void {
  const themes = program.command('themes').description('Inspect themes');

  themes
    .command('list')
    .description('List available themes')
    .action(() => {
      const ctx = getContext();
      for (const line of formatFlavorList(ctx.themes.loader, ctx.themes.names(), ctx.config.theme)) {
        ctx.print(line);
      }
    });

  themes
    .command('show [name]')
    .description('Show the scopes of a theme (defaults to the configured one)')
    .action((name: string | undefined) => {
      const ctx = getContext();
      const theme = ctx.themes.load(name ?? ctx.config.theme);
      const rows = theme
        .scopes()
        .map((scope): [string, string] => [
          scope,
          paint(ctx.chalk, theme.get(scope), describeStyle(theme.get(scope)))
        ]);

      ctx.print(`Theme: ${theme.name}`);
      ctx.print('');
      for (const line of formatRows(rows)) {
        ctx.print(line);
      }
    });
}
