/**
 * Command tree of the tinct CLI
 */

import { Command } from 'commander';
import { setupConfigCommand } from './commands/config.js';
import { setupIconsCommand } from './commands/icons.js';
import { setupThemesCommand } from './commands/themes.js';
import { type CliContext, createContext, type GlobalOptions } from './context.js';

export type ProgramOptions = {
  version: string;
  createContext?: (globals: GlobalOptions) => CliContext;
};

export function createProgram(options: ProgramOptions): Command {
  const program = new Command();

  program
    .name('tinct')
    .description('Icon flavors and themes for terminal tools')
    .version(options.version)
    .option('-v, --verbose', 'verbose output')
    .option('-q, --quiet', 'quiet output');

  const factory = options.createContext ?? ((globals: GlobalOptions) => createContext(globals));
  let context: CliContext | undefined;
  // Built lazily so global options are parsed first
  const getContext = (): CliContext => {
    context ??= factory(program.opts<GlobalOptions>());
    return context;
  };

  setupIconsCommand(program, getContext);
  setupThemesCommand(program, getContext);
  setupConfigCommand(program, getContext);

  return program;
}
