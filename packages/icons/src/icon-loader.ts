/**
 * Icon flavor family
 */

import {
  createSilentLogger,
  ErrorCode,
  errorMessage,
  isFlavorError,
  type Logger,
  TinctError
} from '@tinct/core';
import {
  type BuiltinRegistry,
  createTomlFlavorLoader,
  type FlavorLoader,
  listFlavorNames,
  resolveFlavor
} from '@tinct/loader';
import type { StyleProvider } from '@tinct/theme';
import type { IconFlavor } from './icon.js';
import { materializeIconFlavor } from './materialize.js';

export const DEFAULT_ICONS = 'default';

/**
 * Depth of the structural merge between a flavor and its parent: the
 * top-level sections, their entries, and the fields of one entry
 */
export const ICONS_MERGE_DEPTH = 3;

export type IconLoaderOptions = {
  userDir: string;
  defaultDir: string;
  builtins: BuiltinRegistry;
  logger?: Logger;
};

export class IconLoader {
  readonly loader: FlavorLoader;
  private readonly logger: Logger;

  constructor(options: IconLoaderOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.loader = createTomlFlavorLoader({
      kind: 'icons',
      userDir: options.userDir,
      defaultDir: options.defaultDir,
      builtins: options.builtins,
      logger: this.logger,
      mergeDepth: ICONS_MERGE_DEPTH
    });
  }

  /**
   * Resolve and materialize the icon flavor `name`
   *
   * A flavor whose merged document does not fit the icon schema is replaced
   * by the built-in flavor, with a warning.
   *
   * @throws FlavorError of kind 'not_found', 'parse', 'schema' or 'cycle'
   */
  materialize(name: string, theme: StyleProvider, supportsTrueColor: boolean): IconFlavor {
    const document = resolveFlavor(this.loader, name);
    try {
      return materializeIconFlavor(name, document, {
        theme,
        supportsTrueColor,
        logger: this.logger
      });
    } catch (error) {
      if (!isFlavorError(error, 'conversion')) {
        throw error;
      }
      this.logger.warn(
        { flavor: name, reason: errorMessage(error) },
        `Falling back to the "${DEFAULT_ICONS}" icon flavor`
      );
      return this.default(theme, supportsTrueColor);
    }
  }

  /**
   * The built-in icon flavor
   */
  default(theme: StyleProvider, supportsTrueColor: boolean): IconFlavor {
    const document = this.loader.builtin(DEFAULT_ICONS);
    if (!document) {
      throw new TinctError(
        ErrorCode.E_INTERNAL,
        `Built-in icon flavor "${DEFAULT_ICONS}" is not registered`
      );
    }
    return materializeIconFlavor(DEFAULT_ICONS, document, {
      theme,
      supportsTrueColor,
      logger: this.logger
    });
  }

  names(): string[] {
    return listFlavorNames(this.loader);
  }
}
