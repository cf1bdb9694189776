/***
 * Result — Explicit success/failure values for fallible buffer operations.
 *
 * Buffer operations never throw for conditions a caller can act on
 * (bad index, overflow, failed allocation). They return a Result and
 * leave the buffer exactly as it was on failure. Throwing is reserved
 * for violated internal invariants (see type_primitives/assertions).
 *
 ***/

import { BufferError, type BUFFER_ERROR } from "./error";

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E = BufferError> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = BufferError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/** Shared success value for operations that produce nothing. */
export const OK: Ok<void> = Object.freeze({ ok: true, value: undefined });

export function err(
  category: BUFFER_ERROR,
  message?: string,
  context?: Record<string, unknown>,
): Err<BufferError> {
  return { ok: false, error: new BufferError(category, message, context) };
}

export function is_ok<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function is_err<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/** Return the success value, or throw the carried error. */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}

export function unwrap_or<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

export function map_result<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}
