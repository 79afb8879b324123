/**
 * Generic Result type for expected failures.
 * Throw only for programmer errors; return Result for operational errors.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

export function mapError<T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> {
  return result.ok ? result : err(fn(result.error));
}

/**
 * Chains a Result-returning step. The step only runs on success;
 * the first failure is carried through unchanged.
 */
export function bindResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>,
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Runs `fn` and converts a thrown exception into an error value.
 */
export function tryCatch<T, E>(
  fn: () => T,
  onThrow: (cause: unknown) => E,
): Result<T, E> {
  try {
    return ok(fn());
  } catch (cause: unknown) {
    return err(onThrow(cause));
  }
}

export function resultOrElse<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/**
 * Renders a Result as `Ok(<value>)` or `Error(<error>)`.
 */
export function formatResult<T, E>(
  result: Result<T, E>,
  formatValue: (value: T) => string = String,
  formatError: (error: E) => string = String,
): string {
  return result.ok
    ? `Ok(${formatValue(result.value)})`
    : `Error(${formatError(result.error)})`;
}
