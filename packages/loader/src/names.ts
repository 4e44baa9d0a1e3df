/**
 * Flavor discovery
 */

import { readdirSync } from 'node:fs';
import { errorMessage, type Logger } from '@tinct/core';
import { FLAVOR_EXTENSION } from './document.js';
import type { FlavorLoader } from './flavor-loader.js';

/**
 * Names of the TOML documents in a directory
 *
 * A missing or unreadable directory has no flavors.
 */
export function tomlNamesInDir(dir: string, logger?: Logger): string[] {
  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch (error) {
    logger?.debug({ dir, reason: errorMessage(error) }, 'Skipping flavor directory');
    return [];
  }

  return entries
    .filter((entry) => entry.endsWith(FLAVOR_EXTENSION))
    .map((entry) => entry.slice(0, -FLAVOR_EXTENSION.length))
    .filter((name) => name.length > 0);
}

/**
 * Every flavor name available to a loader: user dir, default dir and
 * built-ins, deduplicated and sorted
 */
export function listFlavorNames(loader: FlavorLoader): string[] {
  const names = new Set([
    ...tomlNamesInDir(loader.userDir, loader.logger),
    ...tomlNamesInDir(loader.defaultDir, loader.logger),
    ...loader.builtinNames()
  ]);
  return [...names].sort();
}
