/**
 * Result Type
 *
 * Explicit success/failure values for steps that must not throw, such as
 * running a single detector or compiling a user-supplied pattern.
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Run a function that might throw and capture the outcome.
 *
 * @example
 * ```ts
 * const compiled = tryCatchSync(() => new RegExp(userPattern));
 * if (!compiled.ok) {
 *   logger.warn("Ignoring invalid pattern", { error: compiled.error.message });
 * }
 * ```
 */
export function tryCatchSync<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
