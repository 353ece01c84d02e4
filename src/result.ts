/**
 * Result Type
 *
 * Discriminated union for operations whose failure is an expected outcome
 * (parse failures, missing records, lost-update races) rather than a bug.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

/** Unwrap or throw the carried error. Intended for call sites that have already validated. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}
