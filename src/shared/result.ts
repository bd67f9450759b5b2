/**
 * Result — success or typed failure, as a value
 * Layer: Shared
 *
 * Stage outcomes that the caller is expected to branch on (provider said
 * "no", body was not JSON, key is missing) travel as a Result instead of an
 * exception. Thrown errors are left for bugs and HTTP-layer problems, which
 * the global error handler owns.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
