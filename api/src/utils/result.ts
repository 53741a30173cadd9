/**
 * Result Type
 * @module utils/result
 *
 * Recoverable failures (a differ handed a scalar root, a missing baseline
 * file, an unknown engine name) are returned as values. Thrown exceptions
 * are caught where a collaborator can throw and converted here.
 *
 * @example
 * ```typescript
 * const events = differ.diff(baseline, current, 'name');
 * if (isErr(events)) {
 *   return events;
 * }
 * classifier.summarize(events.value);
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors and Guards
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Value of an Ok result. Throws the carried error otherwise, so only
 * call this where failure is a bug.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Run a promise-returning call and capture a rejection as an Err,
 * converted by `onError`.
 */
export async function tryCatch<T, E>(
  fn: () => Promise<T>,
  onError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(onError(error));
  }
}
