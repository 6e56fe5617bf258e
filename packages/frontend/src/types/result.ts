/**
 * Result type for recoverable failures
 *
 * Parsing, value access and extraction hand back a Result instead of
 * throwing, so a caller can render a placeholder and keep going.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => (result.ok ? result : error(fn(result.error)));

/**
 * Try the fallback only when the first result failed.
 */
export const orElse = <T, E>(
  result: Result<T, E>,
  fallback: (error: E) => Result<T, E>
): Result<T, E> => (result.ok ? result : fallback(result.error));

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  result.ok ? result.value : defaultValue;

/**
 * Run a function that may throw and capture the throw as an error value.
 */
export const attempt = <T, E>(
  fn: () => T,
  onThrow: (thrown: unknown) => E
): Result<T, E> => {
  try {
    return ok(fn());
  } catch (thrown) {
    return error(onThrow(thrown));
  }
};

/**
 * Collect a list of results; the first error wins.
 */
export const collect = <T, E>(
  results: readonly Result<T, E>[]
): Result<readonly T[], E> => {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
};
