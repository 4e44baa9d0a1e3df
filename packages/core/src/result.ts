/**
 * Result type for callers that want errors as values
 */

import type { TinctError } from './errors.js';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E = TinctError> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = TinctError> = Ok<T> | Err<E>;

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

export const ok = <T>(value: T): Ok<T> => ({
  ok: true,
  value
});

export const err = <E = TinctError>(error: E): Err<E> => ({
  ok: false,
  error
});

/**
 * Run fn and capture a thrown value through errorMapper
 */
export const tryCatch = <T, E>(fn: () => T, errorMapper: (error: unknown) => E): Result<T, E> => {
  try {
    return ok(fn());
  } catch (error) {
    return err(errorMapper(error));
  }
};
