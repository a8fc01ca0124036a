/**
 * Result type for expected failures
 *
 * A page that cannot be fetched is an outcome the governor handles, not an
 * exception; collaborators return it as the `error` side of a Result.
 *
 * @module
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
