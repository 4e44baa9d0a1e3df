import { readFileSync } from 'node:fs';
import { createBuiltinRegistry, type BuiltinRegistry } from '@tinct/loader';
import { DEFAULT_THEME } from './theme-loader.js';

const DEFAULT_THEME_URL = new URL('../data/default.toml', import.meta.url);

/**
 * Read the themes shipped inside this package. Call once at startup.
 */
export function loadBuiltinThemes(): BuiltinRegistry {
  return createBuiltinRegistry({
    [DEFAULT_THEME]: readFileSync(DEFAULT_THEME_URL, 'utf-8')
  });
}
