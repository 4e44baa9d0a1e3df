import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  ErrorCode,
  errorMessage,
  FlavorError,
  FlavorErrors,
  isFlavorError,
  TinctError
} from './errors.js';

describe('ErrorCode', () => {
  it('has unique codes following the E_ naming convention', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
    for (const code of codes) {
      expect(code).toMatch(/^E_[A-Z]+(_[A-Z]+)*$/);
    }
  });
});

describe('FlavorError', () => {
  it('maps each kind to its code', () => {
    expect(new FlavorError('not_found', 'x', 'm').code).toBe('E_FLAVOR_NOT_FOUND');
    expect(new FlavorError('parse', 'x', 'm').code).toBe('E_FLAVOR_PARSE');
    expect(new FlavorError('schema', 'x', 'm').code).toBe('E_FLAVOR_SCHEMA');
    expect(new FlavorError('cycle', 'x', 'm').code).toBe('E_FLAVOR_CYCLE');
    expect(new FlavorError('conversion', 'x', 'm').code).toBe('E_FLAVOR_CONVERSION');
  });

  it('is a TinctError and an Error', () => {
    const error = FlavorErrors.notFound('mono', '/icons/mono.toml');

    expect(error).toBeInstanceOf(TinctError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('FlavorError');
    expect(error.flavor).toBe('mono');
    expect(error.message).toBe('Flavor "mono" not found at /icons/mono.toml');
    expect(error.data).toEqual({ path: '/icons/mono.toml' });
  });

  it('keeps the cause', () => {
    const cause = new Error('unexpected character');
    const error = FlavorErrors.parse('mono', '/icons/mono.toml', cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      'Failed to parse flavor "mono" (/icons/mono.toml): unexpected character'
    );
  });

  it('describes inheritance cycles', () => {
    expect(FlavorErrors.cycle('a', ['/u/a.toml', '/u/b.toml', '/u/a.toml']).message).toBe(
      'Circular inheritance detected for flavor "a": /u/a.toml -> /u/b.toml -> /u/a.toml'
    );
  });

  it('describes a non-string inherits value', () => {
    expect(FlavorErrors.inheritsNotString('a', 3).message).toBe(
      "Flavor \"a\": expected 'inherits' to be a string, got 3"
    );
    expect(FlavorErrors.inheritsNotString('a', 10n).message).toBe(
      "Flavor \"a\": expected 'inherits' to be a string, got 10"
    );
  });
});

describe('isFlavorError', () => {
  it('narrows by kind', () => {
    const error = FlavorErrors.cycle('a', []);

    expect(isFlavorError(error)).toBe(true);
    expect(isFlavorError(error, 'cycle')).toBe(true);
    expect(isFlavorError(error, 'parse')).toBe(false);
    expect(isFlavorError(new ConfigError(ErrorCode.E_CONFIG_PARSE, '/c', 'bad'))).toBe(false);
  });
});

describe('errorMessage', () => {
  it('extracts messages from unknown values', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(42)).toBe('42');
  });
});
