// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either success (Ok) or failure (Err). Used where a failure is an expected
 * outcome the caller branches on, such as decoding a response body.
 *
 * @example
 * ```typescript
 * const parsed = decodeRecord(EmailValidationSchema, body, 'email validation');
 * if (!parsed.ok) {
 *   throw parsed.error;
 * }
 * return parsed.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Unwrap the value from an Ok Result, or throw the Err's error as-is.
 */
export function unwrapOrThrow<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Wrap a throwing function in a Result.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
