/**
 * Outcome of an operation that reports failure as a value instead of
 * throwing.
 *
 * @example
 * ```typescript
 * const result = await requestToken(endpoint, body, options);
 * if (result.ok) {
 *   store(result.value.access_token);
 * } else {
 *   log(result.error.kind); // 'transport' | 'protocol'
 * }
 * ```
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});
