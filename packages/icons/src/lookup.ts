import { basename, extname } from 'node:path';
import type { Icon, IconFlavor } from './icon.js';

/**
 * Key used to find a path's icon
 *
 * The last extension without its dot, or the whole file name when there is
 * none. Dotfiles such as `.bashrc` have no extension, so they match by name.
 */
export function lookupKey(path: string): string {
  const file = basename(path);
  const ext = extname(file);
  return ext.length > 1 ? ext.slice(1) : file;
}

function own(table: Readonly<Record<string, Icon>>, key: string): Icon | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/**
 * Icon for a file path: its mime-type entry, else the generic file symbol,
 * else undefined
 */
export function iconForPath(flavor: IconFlavor, path: string): Icon | undefined {
  return own(flavor.mimeType, lookupKey(path)) ?? own(flavor.symbolKind, 'file');
}
