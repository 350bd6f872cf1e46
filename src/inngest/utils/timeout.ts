// src/inngest/utils/timeout.ts
/**
 * @fileoverview Soft Step Timeouts
 *
 * The function-level `timeouts.finish` is the hard limit; a soft limit
 * inside a step fails early with a {@link RetriableError} so the retry
 * policy gets a chance before the hard limit cancels the run.
 *
 * @module inngest/utils/timeout
 */

import { RetriableError } from "./errors"

/**
 * Race `work` against `ms`. The timer is cleared whichever settles first;
 * the work itself is not cancelled.
 */
export async function withSoftTimeout<T>(
  work: Promise<T>,
  ms: number,
  operation: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new RetriableError(`${operation} exceeded ${ms}ms`, { timeoutMs: ms }))
    }, ms)
  })

  try {
    return await Promise.race([work, timeout])
  } finally {
    clearTimeout(timer)
  }
}
