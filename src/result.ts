/**
 * Result
 *
 * Discriminated success/failure value returned by pure parsing and
 * validation functions instead of throwing.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Return the value or throw the carried error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error
  return result.value
}
