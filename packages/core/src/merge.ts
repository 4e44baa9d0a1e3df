/**
 * Depth-limited structural merge for TOML documents
 */

import { isTomlSequence, isTomlTable, type TomlTable, type TomlValue } from './toml-value.js';

function nameOf(value: TomlValue): string | undefined {
  if (!isTomlTable(value)) {
    return undefined;
  }
  const name = value.name;
  return typeof name === 'string' ? name : undefined;
}

/**
 * Merge `right` onto `left`
 *
 * Merge rules, while `depth` > 0:
 * - Tables: union of keys; keys present on both sides merge at `depth - 1`
 * - Arrays: elements of `right` whose `name` matches an element of `left`
 *   merge into it in place; the rest are appended in order
 * - Anything else: `right` wins
 *
 * At depth 0 tables and arrays are replaced by `right` as a whole, so nested
 * positional data such as argument lists is never spliced. Inputs are not
 * mutated.
 */
export function mergeTomlValues(left: TomlValue, right: TomlValue, depth: number): TomlValue {
  if (isTomlSequence(left) && isTomlSequence(right)) {
    return depth > 0 ? mergeSequences(left, right, depth) : right;
  }

  if (isTomlTable(left) && isTomlTable(right)) {
    return depth > 0 ? mergeTables(left, right, depth) : right;
  }

  return right;
}

/**
 * Table-typed form of mergeTomlValues for whole documents
 */
export function mergeTomlTables(left: TomlTable, right: TomlTable, depth: number): TomlTable {
  return depth > 0 ? mergeTables(left, right, depth) : right;
}

function mergeTables(left: TomlTable, right: TomlTable, depth: number): TomlTable {
  const result = new Map(Object.entries(left));

  for (const [key, rvalue] of Object.entries(right)) {
    const lvalue = result.get(key);
    result.set(key, lvalue === undefined ? rvalue : mergeTomlValues(lvalue, rvalue, depth - 1));
  }

  return Object.fromEntries(result);
}

function mergeSequences(left: TomlValue[], right: TomlValue[], depth: number): TomlValue[] {
  const result = [...left];

  for (const rvalue of right) {
    const rname = nameOf(rvalue);
    const index = rname === undefined ? -1 : result.findIndex((item) => nameOf(item) === rname);
    const lvalue = index === -1 ? undefined : result[index];

    if (lvalue === undefined) {
      result.push(rvalue);
    } else {
      result[index] = mergeTomlValues(lvalue, rvalue, depth - 1);
    }
  }

  return result;
}
