// src/inngest/utils/concurrency.ts
/**
 * @fileoverview Concurrency Configuration for Inngest Functions
 *
 * Concurrency limits, retry counts and timeouts shared by the function
 * definitions.
 *
 * @module inngest/utils/concurrency
 */

/**
 * Concurrency limits. `key` isolates runs per user so one user's pool
 * build never waits on another's.
 *
 * @example
 * inngest.createFunction(
 *   { id: "preload-pagination-pool", concurrency: CONCURRENCY.poolPreload },
 *   { event: "recommendations/pool.preload-requested" },
 *   async ({ event, step }) => { ... }
 * )
 */
export const CONCURRENCY = {
  /** One pool build per user at a time */
  poolPreload: { limit: 1, key: "event.data.userId" },

  /** Index rebuilds and event replays are global singletons */
  sync: { limit: 1 },
} as const

export const RETRY_CONFIG = {
  /** Pool builds and cache cleanup */
  default: { retries: 3 },

  /** Scheduled syncs; the next tick covers what a failed run missed */
  scheduled: { retries: 2 },

  none: { retries: 0 },
} as const

/**
 * Function-level hard limits and the soft limits applied inside steps.
 */
export const STEP_TIMEOUTS = {
  poolPreload: { finish: "240s", softMs: 180_000 },
} as const
