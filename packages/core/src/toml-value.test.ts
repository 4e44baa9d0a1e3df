import { describe, expect, it } from 'vitest';
import { deepFreeze, isTomlTable, toTomlValue } from './toml-value.js';

describe('isTomlTable', () => {
  it('accepts plain objects only', () => {
    expect(isTomlTable({ a: 1 })).toBe(true);
    expect(isTomlTable(Object.create(null))).toBe(true);
    expect(isTomlTable([])).toBe(false);
    expect(isTomlTable(null)).toBe(false);
    expect(isTomlTable(new Date(0))).toBe(false);
    expect(isTomlTable('table')).toBe(false);
  });
});

describe('toTomlValue', () => {
  it('keeps scalars, arrays and tables', () => {
    const date = new Date(0);
    expect(toTomlValue({ a: [1, 'x', true, date], b: { c: 1.5 } })).toEqual({
      a: [1, 'x', true, date],
      b: { c: 1.5 }
    });
  });

  it('keeps nan, infinities and bigint integers', () => {
    expect(toTomlValue(Number.NaN)).toBeNaN();
    expect(toTomlValue(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
    expect(toTomlValue({ big: 2n ** 63n - 1n })).toEqual({ big: 9223372036854775807n });
  });

  it('keeps "__proto__" as an own key', () => {
    const table = toTomlValue(Object.fromEntries([['__proto__', { icon: 'x' }], ['rs', 1]]));

    expect(isTomlTable(table)).toBe(true);
    expect(Object.getPrototypeOf(table)).toBe(Object.prototype);
    expect(Object.keys(table ?? {})).toEqual(['__proto__', 'rs']);
    expect(Object.getOwnPropertyDescriptor(table, '__proto__')?.value).toEqual({ icon: 'x' });
  });

  it('rejects values outside the TOML shape', () => {
    expect(toTomlValue(undefined)).toBeUndefined();
    expect(toTomlValue(null)).toBeUndefined();
    expect(toTomlValue({ a: { b: null } })).toBeUndefined();
    expect(toTomlValue([1, () => 1])).toBeUndefined();
  });
});

describe('deepFreeze', () => {
  it('freezes nested tables and arrays', () => {
    const value = deepFreeze({ a: { b: [{ c: 1 }] } });

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
    expect(Object.isFrozen(value.a.b[0])).toBe(true);
  });
});
