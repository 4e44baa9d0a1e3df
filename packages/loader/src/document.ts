/**
 * Flavor documents and their TOML text form
 */

import { parse } from '@iarna/toml';
import { deepFreeze, FlavorErrors, isTomlTable, type TomlTable, toTomlValue } from '@tinct/core';

export const FLAVOR_EXTENSION = '.toml';

/**
 * Key naming the parent flavor of a document
 */
export const INHERITS_KEY = 'inherits';

export type FlavorDocument = TomlTable;

/**
 * Flavors compiled into the program, keyed by reserved name
 */
export type BuiltinRegistry = ReadonlyMap<string, Readonly<FlavorDocument>>;

/**
 * Parse TOML text into a table
 *
 * @throws Error from the TOML parser, or when the result holds values
 * outside the TOML shape
 */
export function parseToml(text: string): TomlTable {
  const document = toTomlValue(parse(text));
  if (!isTomlTable(document)) {
    throw new Error('document is not a TOML table');
  }
  return document;
}

/**
 * Parse TOML text into a flavor document
 *
 * @throws FlavorError of kind 'parse'
 */
export function parseFlavorDocument(text: string, flavor: string, path: string): FlavorDocument {
  try {
    return parseToml(text);
  } catch (error) {
    throw FlavorErrors.parse(flavor, path, error);
  }
}

/**
 * Build a frozen registry from TOML sources
 *
 * Built-in text that fails to parse is a packaging bug, so errors propagate.
 */
export function createBuiltinRegistry(sources: Record<string, string>): BuiltinRegistry {
  const registry = new Map<string, Readonly<FlavorDocument>>();
  for (const [name, text] of Object.entries(sources)) {
    registry.set(name, deepFreeze(parseFlavorDocument(text, name, `<builtin:${name}>`)));
  }
  return registry;
}
