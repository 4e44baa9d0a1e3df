/**
 * Icons command - List, show and query icon flavors
 */

import type { Command } from 'commander';
import {
  DIAGNOSTIC_SEVERITIES,
  type Icon,
  type IconFlavor,
  iconForPath
} from '@tinct/icons';
import type { CliContext } from '../context.js';
import { formatFlavorList, formatRows, renderIcon } from '../render.js';

type FlavorOptions = {
  theme?: string;
  trueColor: boolean;
};

type LookupOptions = FlavorOptions & {
  flavor?: string;
};

function loadFlavor(ctx: CliContext, name: string, options: FlavorOptions): IconFlavor {
  const theme = ctx.themes.load(options.theme ?? ctx.config.theme);
  return ctx.icons.materialize(name, theme, options.trueColor && ctx.supportsTrueColor);
}

function iconRows(ctx: CliContext, table: Readonly<Record<string, Icon>>): Array<[string, string]> {
  return Object.keys(table)
    .sort()
    .flatMap((key): Array<[string, string]> => {
      const icon = table[key];
      return icon ? [[key, renderIcon(ctx.chalk, icon)]] : [];
    });
}

export function formatIconFlavor(ctx: CliContext, flavor: IconFlavor): string[] {
  const diagnostics = DIAGNOSTIC_SEVERITIES.map((severity): [string, string] => [
    severity,
    renderIcon(ctx.chalk, flavor.diagnostic[severity])
  ]);

  return [
    `Icon flavor: ${flavor.name}`,
    '',
    'Diagnostics',
    ...formatRows(diagnostics),
    '',
    'Mime types',
    ...formatRows(iconRows(ctx, flavor.mimeType)),
    '',
    'Symbol kinds',
    ...formatRows(iconRows(ctx, flavor.symbolKind))
  ];
}

export function setupIconsCommand(program: Command, getContext: () => CliContext): void {
  const icons = program.command('icons').description('Inspect icon flavors');

  icons
    .command('list')
    .description('List available icon flavors')
    .action(() => {
      const ctx = getContext();
      for (const line of formatFlavorList(ctx.icons.loader, ctx.icons.names(), ctx.config.icons)) {
        ctx.print(line);
      }
    });

  icons
    .command('show [name]')
    .description('Show the icons of a flavor (defaults to the configured one)')
    .option('-t, --theme <theme>', 'theme used for derived colors')
    .option('--no-true-color', 'drop 24-bit colors')
    .action((name: string | undefined, options: FlavorOptions) => {
      const ctx = getContext();
      const flavor = loadFlavor(ctx, name ?? ctx.config.icons, options);
      for (const line of formatIconFlavor(ctx, flavor)) {
        ctx.print(line);
      }
    });

  icons
    .command('lookup <paths...>')
    .description('Print the icon used for each path')
    .option('-f, --flavor <name>', 'icon flavor to use')
    .option('-t, --theme <theme>', 'theme used for derived colors')
    .option('--no-true-color', 'drop 24-bit colors')
    .action((paths: string[], options: LookupOptions) => {
      const ctx = getContext();
      const flavor = loadFlavor(ctx, options.flavor ?? ctx.config.icons, options);
      for (const path of paths) {
        const icon = iconForPath(flavor, path);
        ctx.print(`${path}: ${icon ? renderIcon(ctx.chalk, icon) : 'no icon'}`);
      }
    });
}
