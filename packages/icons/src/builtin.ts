import { readFileSync } from 'node:fs';
import { createBuiltinRegistry, type BuiltinRegistry } from '@tinct/loader';
import { DEFAULT_ICONS } from './icon-loader.js';

const DEFAULT_ICONS_URL = new URL('../data/default.toml', import.meta.url);

/**
 * Read the icon flavors shipped inside this package. Call once at startup
 * and hand the registry to IconLoader.
 */
export function loadBuiltinIcons(): BuiltinRegistry {
  return createBuiltinRegistry({
    [DEFAULT_ICONS]: readFileSync(DEFAULT_ICONS_URL, 'utf-8')
  });
}
