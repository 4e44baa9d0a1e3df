/**
 * TOML-shaped values as produced by the document parser
 */

// Integers beyond the safe range come back from the parser as bigint
export type TomlScalar = string | number | bigint | boolean | Date;

export type TomlTable = { [key: string]: TomlValue };

export type TomlValue = TomlScalar | TomlValue[] | TomlTable;

export function isTomlTable(value: unknown): value is TomlTable {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Reflect.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

export function isTomlSequence(value: TomlValue): value is TomlValue[] {
  return Array.isArray(value);
}

/**
 * Narrow parser output into a TomlValue
 *
 * Returns undefined for anything that is not string, number, bigint, boolean,
 * Date, array or plain object, at any depth.
 */
export function toTomlValue(value: unknown): TomlValue | undefined {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    const items: TomlValue[] = [];
    for (const item of value) {
      const converted = toTomlValue(item);
      if (converted === undefined) {
        return undefined;
      }
      items.push(converted);
    }
    return items;
  }
  if (isTomlTable(value)) {
    const entries: Array<[string, TomlValue]> = [];
    for (const [key, item] of Object.entries(value)) {
      const converted = toTomlValue(item);
      if (converted === undefined) {
        return undefined;
      }
      entries.push([key, converted]);
    }
    // fromEntries defines keys such as "__proto__" as own entries
    return Object.fromEntries(entries);
  }
  return undefined;
}

/**
 * Recursively freeze a value so it can be shared between callers
 */
export function deepFreeze<T extends TomlValue>(value: T): Readonly<T> {
  if (isTomlSequence(value)) {
    value.forEach((item) => deepFreeze(item));
  } else if (isTomlTable(value)) {
    Object.values(value).forEach((item) => deepFreeze(item));
  }
  return Object.freeze(value);
}
