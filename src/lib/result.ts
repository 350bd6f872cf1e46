/**
 * @fileoverview Result type for failures the caller may shrug off.
 *
 * Cache mutations return `Result<T, CacheWarning>` instead of throwing:
 * a failed write never fails the request, but the caller can still see
 * it and branch (e.g. skip the reverse mapping when the list was not
 * written).
 *
 * @example
 * ```typescript
 * const written = await recommendationCache.setInitial(userId, orders)
 * if (!written.ok) {
 *   logger.warn("Initial recommendations not cached", { ...written.error })
 * }
 *
 * const users = unwrapOr(map(cascade, (c) => c.affectedUsers), [])
 * ```
 *
 * @module lib/result
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/** Transform the success value; a failure passes through. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback
}

/**
 * Await `fn`, turning a rejection into `Err(toError(cause))`.
 */
export async function attemptAsync<T, E>(
  fn: () => Promise<T>,
  toError: (cause: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (cause) {
    return Err(toError(cause))
  }
}
