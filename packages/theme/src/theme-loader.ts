/**
 * Theme flavor family
 */

import {
  createSilentLogger,
  isTomlTable,
  type Logger,
  mergeTomlTables,
  mergeTomlValues
} from '@tinct/core';
import {
  type BuiltinRegistry,
  createTomlFlavorLoader,
  type FlavorDocument,
  type FlavorLoader,
  listFlavorNames,
  resolveFlavor
} from '@tinct/loader';
import { buildTheme, PALETTE_KEY, type Theme } from './theme.js';

export const DEFAULT_THEME = 'default';

/**
 * Merge a child theme onto its parent
 *
 * A scope set in the child replaces the parent's entry for that scope as a
 * whole; palettes merge entry by entry.
 */
export function mergeThemes(parent: FlavorDocument, child: FlavorDocument): FlavorDocument {
  const merged = mergeTomlTables(parent, child, 1);
  const parentPalette = parent[PALETTE_KEY];
  const childPalette = child[PALETTE_KEY];

  if (isTomlTable(parentPalette) && isTomlTable(childPalette)) {
    return { ...merged, [PALETTE_KEY]: mergeTomlValues(parentPalette, childPalette, 2) };
  }
  return merged;
}

export type ThemeLoaderOptions = {
  userDir: string;
  defaultDir: string;
  builtins: BuiltinRegistry;
  logger?: Logger;
};

export class ThemeLoader {
  readonly loader: FlavorLoader;
  private readonly logger: Logger;

  constructor(options: ThemeLoaderOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.loader = createTomlFlavorLoader({
      kind: 'themes',
      userDir: options.userDir,
      defaultDir: options.defaultDir,
      builtins: options.builtins,
      logger: this.logger,
      merge: mergeThemes
    });
  }

  /**
   * @throws FlavorError when the theme or one of its ancestors cannot be loaded
   */
  load(name: string): Theme {
    return buildTheme(name, resolveFlavor(this.loader, name), this.logger);
  }

  default(): Theme {
    return this.load(DEFAULT_THEME);
  }

  names(): string[] {
    return listFlavorNames(this.loader);
  }
}
