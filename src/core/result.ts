/**
 * @fileoverview Result type for explicit error handling
 *
 * Used where a failure is recoverable and must not escape as an exception
 * (directory listings during scoring, parse attempts while loading weights).
 */

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Wrap a sync function in a Result
 */
export function safeSync<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
