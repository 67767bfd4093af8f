/**
 * @fileoverview Explicit success/failure return type.
 * @module @bullion/contracts/result
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Result of an operation that can fail without throwing.
 *
 * @example
 * ```typescript
 * const result = validateBarSeries(bars);
 * if (!result.ok) {
 *   logger.warn('Rejected bars', { reason: result.error.message });
 *   return;
 * }
 * useSeries(result.value);
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
