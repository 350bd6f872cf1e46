/**
 * @fileoverview Background Task Queue
 *
 * Engines enqueue background work through {@link TaskQueue} and never see
 * Inngest directly. Enqueueing is fire-and-forget: callers await only the
 * event send.
 *
 * @module lib/tasks
 */

import { randomUUID } from "crypto"
import type { InngestClient } from "../inngest/client"
import type { RecommendationCache } from "./cache/recommendation-cache"
import { errorMessage } from "./errors"
import { logger } from "./logger"

export interface TaskQueue {
  /**
   * Request a pagination-pool build. Resolves to the task id whose status
   * is tracked in the cache, or `null` when the request was not sent.
   */
  enqueuePoolPreload(userId: string, poolSize: number): Promise<string | null>
  enqueueCacheCleanup(userId: string): Promise<boolean>
}

/**
 * Sends Inngest events. The task is recorded as `pending` before the send
 * so the worker's `processing` write always moves it forward.
 */
export class InngestTaskQueue implements TaskQueue {
  constructor(
    private readonly client: Pick<InngestClient, "send">,
    private readonly cache: RecommendationCache
  ) {}

  async enqueuePoolPreload(userId: string, poolSize: number): Promise<string | null> {
    const taskId = randomUUID()
    await this.cache.setTaskStatus(userId, taskId, "pending")

    try {
      await this.client.send({
        name: "recommendations/pool.preload-requested",
        data: { userId, poolSize, taskId },
      })
      logger.info("Pool preload enqueued", { userId, poolSize, taskId })
      return taskId
    } catch (error) {
      logger.error("Pool preload not enqueued", { userId, error: errorMessage(error) })
      await this.cache.setTaskStatus(userId, taskId, "failed", { error: errorMessage(error) })
      return null
    }
  }

  async enqueueCacheCleanup(userId: string): Promise<boolean> {
    try {
      await this.client.send({
        name: "recommendations/user-cache.cleanup-requested",
        data: { userId },
      })
      return true
    } catch (error) {
      logger.error("Cache cleanup not enqueued", { userId, error: errorMessage(error) })
      return false
    }
  }
}
