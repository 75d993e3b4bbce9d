/**
 * Result Type for Functional Error Handling
 *
 * Per-item outcomes (a user that is skipped, a policy line that is rejected)
 * are expected failures and are modelled as values rather than exceptions.
 *
 * @module
 */

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Partitions an array of Results into Ok values and Err values
 */
export function partition<T, E>(results: Result<T, E>[]): { oks: T[]; errs: E[] } {
  const oks: T[] = [];
  const errs: E[] = [];
  for (const result of results) {
    if (result.ok) {
      oks.push(result.value);
    } else {
      errs.push(result.error);
    }
  }
  return { oks, errs };
}
