/**
 * Result type for operations whose failure is an expected outcome
 * (dispatch resolution, config loading) rather than a programming error.
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
 * Return the value, or throw the carried error.
 * Only meaningful when the error side is already an Error instance.
 */
export const unwrapOrThrow = <T, E extends Error>(result: Result<T, E>): T => {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
};
