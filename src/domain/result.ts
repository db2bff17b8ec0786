import type { AppError } from './errors.js';

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };

/**
 * Outcome of a port or use-case call. Failures carry a typed error
 * instead of being thrown, so callers have to look at `ok` first.
 */
export type Result<T, E extends AppError = AppError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
