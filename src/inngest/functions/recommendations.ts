/**
 * @fileoverview Recommendation Background Functions
 *
 * - `preload-pagination-pool` builds a user's pagination pool and tracks
 *   the task status the request path recorded as `pending`.
 * - `cleanup-user-cache` clears every per-user tier.
 *
 * Step bodies are exported separately so they can run against
 * in-process services.
 *
 * @module inngest/functions/recommendations
 */

import { inngest } from "../client"
import {
  parseEventData,
  poolPreloadRequestedPayload,
  userCacheCleanupRequestedPayload,
  type PoolPreloadRequestedPayload,
} from "../types"
import { CONCURRENCY, RETRY_CONFIG, STEP_TIMEOUTS } from "../utils/concurrency"
import { RetriableError, wrapWithErrorHandling } from "../utils/errors"
import { withSoftTimeout } from "../utils/timeout"
import { getServices, type Services } from "@/lib/services"
import type { PoolBuildResult } from "@/lib/recommendation/pool"
import { logger } from "@/lib/logger"

/** Fails the step before the hard limit so a retry can still run */
export const POOL_SOFT_TIMEOUT_MS = STEP_TIMEOUTS.poolPreload.softMs

/**
 * Mark the task processing, build the pool and mark it completed. A
 * failed build throws so Inngest retries it; the task is marked failed
 * only once retries run out.
 */
export async function runPoolPreload(
  services: Pick<Services, "cache" | "pools">,
  payload: PoolPreloadRequestedPayload
): Promise<PoolBuildResult> {
  const { userId, poolSize, taskId } = payload

  if (taskId) {
    await services.cache.setTaskStatus(userId, taskId, "processing")
  }

  const result = await withSoftTimeout(
    services.pools.preload(userId, poolSize),
    POOL_SOFT_TIMEOUT_MS,
    "Pool preload"
  )

  if (result.status === "failed") {
    throw new RetriableError(result.error ?? "Pool build failed", { userId })
  }

  if (taskId) {
    await services.cache.setTaskStatus(userId, taskId, "completed", {
      status: result.status,
      poolSize: result.poolSize,
      generationMs: result.generationMs,
    })
  }
  return result
}

/**
 * Build a user's pagination pool.
 */
export const preloadPaginationPool = inngest.createFunction(
  {
    id: "preload-pagination-pool",
    name: "Recommendations: Preload Pagination Pool",
    concurrency: CONCURRENCY.poolPreload,
    retries: RETRY_CONFIG.default.retries,
    timeouts: { finish: STEP_TIMEOUTS.poolPreload.finish },
    onFailure: async ({ event, error }) => {
      const parsed = poolPreloadRequestedPayload.safeParse(event.data.event.data)
      if (!parsed.success || !parsed.data.taskId) return
      const { userId, taskId } = parsed.data
      logger.error("Pool preload gave up", { userId, taskId, error: error.message })
      await getServices().cache.setTaskStatus(userId, taskId, "failed", { error: error.message })
    },
  },
  { event: "recommendations/pool.preload-requested" },
  async ({ event, step }) => {
    const payload = await wrapWithErrorHandling("Pool preload", async () =>
      parseEventData(poolPreloadRequestedPayload, event.data)
    )

    return step.run("build-pool", () => runPoolPreload(getServices(), payload))
  }
)

/**
 * Clear every cached tier for one user.
 */
export const cleanupUserCache = inngest.createFunction(
  {
    id: "cleanup-user-cache",
    name: "Recommendations: Cleanup User Cache",
    retries: RETRY_CONFIG.default.retries,
  },
  { event: "recommendations/user-cache.cleanup-requested" },
  async ({ event, step }) => {
    const { userId } = await wrapWithErrorHandling("User cache cleanup", async () =>
      parseEventData(userCacheCleanupRequestedPayload, event.data)
    )

    return step.run("invalidate-user", async () => {
      const result = await getServices().cache.invalidateUser(userId)
      if (!result.ok) {
        throw new RetriableError(result.error.message, { userId, key: result.error.key })
      }
      return { userId, deleted: result.value }
    })
  }
)
