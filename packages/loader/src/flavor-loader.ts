/**
 * Loader contract shared by every flavor family (icons, themes)
 */

import { join } from 'node:path';
import { existsSync } from 'node:fs';
import { createSilentLogger, type Logger, mergeTomlTables } from '@tinct/core';
import {
  type BuiltinRegistry,
  FLAVOR_EXTENSION,
  type FlavorDocument,
  parseFlavorDocument
} from './document.js';

export interface FlavorLoader {
  /** Family name used in log messages, e.g. "icons" */
  readonly kind: string;
  readonly userDir: string;
  readonly defaultDir: string;
  readonly logger: Logger;

  /**
   * Path of the document for `name`. The user directory wins when it has the
   * file, unless `restrictToBuiltin` is set.
   */
  locate(name: string, restrictToBuiltin: boolean): string;

  parse(text: string, name: string, path: string): FlavorDocument;

  /** Merge a child document onto its parent; the child wins */
  merge(parent: FlavorDocument, child: FlavorDocument): FlavorDocument;

  builtin(name: string): Readonly<FlavorDocument> | undefined;

  builtinNames(): string[];
}

export type TomlFlavorLoaderOptions = {
  kind: string;
  userDir: string;
  defaultDir: string;
  builtins?: BuiltinRegistry;
  logger?: Logger;
  /** Depth passed to the structural merge when no custom merge is given */
  mergeDepth?: number;
  merge?: (parent: FlavorDocument, child: FlavorDocument) => FlavorDocument;
};

/**
 * Create a loader for `<dir>/<name>.toml` documents
 */
export function createTomlFlavorLoader(options: TomlFlavorLoaderOptions): FlavorLoader {
  const builtins: BuiltinRegistry = options.builtins ?? new Map();
  const mergeDepth = options.mergeDepth ?? 3;
  const logger = options.logger ?? createSilentLogger();

  return {
    kind: options.kind,
    userDir: options.userDir,
    defaultDir: options.defaultDir,
    logger,
    locate(name, restrictToBuiltin) {
      const filename = `${name}${FLAVOR_EXTENSION}`;
      const userPath = join(options.userDir, filename);
      if (!restrictToBuiltin && existsSync(userPath)) {
        return userPath;
      }
      return join(options.defaultDir, filename);
    },
    parse: parseFlavorDocument,
    merge:
      options.merge ?? ((parent, child) => mergeTomlTables(parent, child, mergeDepth)),
    builtin: (name) => builtins.get(name),
    builtinNames: () => [...builtins.keys()]
  };
}
