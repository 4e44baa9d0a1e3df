/**
 * Flavor resolution with inheritance
 */

import { existsSync, readFileSync } from 'node:fs';
import { FlavorErrors, isFlavorError, type FlavorError, type Result, tryCatch } from '@tinct/core';
import { type FlavorDocument, INHERITS_KEY } from './document.js';
import type { FlavorLoader } from './flavor-loader.js';

/**
 * Load `name` and every ancestor it inherits from, merged child-over-parent
 *
 * `baseName` is the flavor the caller asked for. When an ancestor inherits
 * from `baseName`, that lookup skips the user directory, so a user override
 * may inherit from the built-in flavor of the same name. Any other repeat of
 * a document path in one chain is a cycle.
 *
 * @throws FlavorError of kind 'not_found', 'parse', 'schema' or 'cycle'
 */
export function resolveFlavor(
  loader: FlavorLoader,
  name: string,
  baseName: string = name,
  restrictToBuiltin = false
): FlavorDocument {
  return resolveChain(loader, name, baseName, restrictToBuiltin, []);
}

/**
 * resolveFlavor with the failure returned as a value
 */
export function tryResolveFlavor(
  loader: FlavorLoader,
  name: string
): Result<FlavorDocument, FlavorError> {
  return tryCatch(
    () => resolveFlavor(loader, name),
    (error) => {
      if (isFlavorError(error)) {
        return error;
      }
      throw error;
    }
  );
}

function resolveChain(
  loader: FlavorLoader,
  name: string,
  baseName: string,
  restrictToBuiltin: boolean,
  chain: string[]
): FlavorDocument {
  // Built-ins never touch the filesystem
  const builtin = loader.builtin(name);
  if (builtin) {
    loader.logger.trace({ name }, `Using built-in ${loader.kind} flavor`);
    return builtin;
  }

  const path = loader.locate(name, restrictToBuiltin);
  if (chain.includes(path)) {
    throw FlavorErrors.cycle(baseName, [...chain, path]);
  }

  const document = loader.parse(readDocument(name, path), name, path);
  const inherits = document[INHERITS_KEY];
  if (inherits === undefined) {
    return document;
  }
  if (typeof inherits !== 'string') {
    throw FlavorErrors.inheritsNotString(name, inherits);
  }

  loader.logger.debug({ name, inherits, path }, `Resolving parent ${loader.kind} flavor`);
  const parent = resolveChain(loader, inherits, baseName, inherits === baseName, [
    ...chain,
    path
  ]);

  return loader.merge(parent, document);
}

function readDocument(name: string, path: string): string {
  if (!existsSync(path)) {
    throw FlavorErrors.notFound(name, path);
  }
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw FlavorErrors.notFound(name, path, error);
  }
}
