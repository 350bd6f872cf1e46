/**
 * @fileoverview Recommendation Updater
 *
 * Turns processed sync events into per-user refreshes: a newly open order
 * affects the users already holding orders similar to it, a removed order
 * affects the users whose lists held it.
 *
 * @module lib/recommendation/update
 */

import type { RecommendationCache } from "../cache/recommendation-cache"
import { errorMessage } from "../errors"
import { logger } from "../logger"
import { orderKey } from "../orders/helpers"
import { WAIT_RECEIVE, type Order } from "../orders/types"
import type { ProcessedEvent } from "../sync/sync-engine"
import type { TaskQueue } from "../tasks"
import type { VectorStore } from "../vector-store/vector-store"
import { DEFAULT_POOL_SIZE } from "./engine"

const NEIGHBOURS = 20

export interface UpdateStats {
  totalUsers: number
  successCount: number
  failedCount: number
  successUsers: string[]
  failedUsers: string[]
}

export interface EventUpdateResult {
  eventsProcessed: number
  affectedUsers: string[]
  updateStats: UpdateStats
}

export interface RecommendationUpdaterDeps {
  vectorStore: VectorStore
  cache: RecommendationCache
  tasks: TaskQueue
}

export class RecommendationUpdater {
  private readonly vectorStore: VectorStore
  private readonly cache: RecommendationCache
  private readonly tasks: TaskQueue

  constructor(deps: RecommendationUpdaterDeps) {
    this.vectorStore = deps.vectorStore
    this.cache = deps.cache
    this.tasks = deps.tasks
  }

  /**
   * Users holding any of the order's nearest open neighbours.
   */
  async getAffectedUsersForOrder(order: Pick<Order, "title" | "content">): Promise<string[]> {
    const neighbours = await this.vectorStore.search(order, NEIGHBOURS, { state: WAIT_RECEIVE })
    const users = new Set<string>()
    for (const neighbour of neighbours) {
      const key = orderKey(neighbour)
      if (!key) continue
      for (const user of await this.cache.getOrderAffectedUsers(key)) {
        users.add(user)
      }
    }
    return [...users]
  }

  /**
   * Invalidate each user and enqueue a fresh pool. A user counts as
   * updated once the pool request is sent.
   */
  async updateAffectedUsers(users: Iterable<string>): Promise<UpdateStats> {
    const stats: UpdateStats = {
      totalUsers: 0,
      successCount: 0,
      failedCount: 0,
      successUsers: [],
      failedUsers: [],
    }

    for (const userId of users) {
      stats.totalUsers++
      try {
        await this.cache.invalidateUser(userId)
        const taskId = await this.tasks.enqueuePoolPreload(userId, DEFAULT_POOL_SIZE)
        if (taskId === null) {
          stats.failedUsers.push(userId)
        } else {
          stats.successUsers.push(userId)
        }
      } catch (error) {
        logger.error("User refresh failed", { userId, error: errorMessage(error) })
        stats.failedUsers.push(userId)
      }
    }

    stats.successCount = stats.successUsers.length
    stats.failedCount = stats.failedUsers.length
    logger.info("Affected users refreshed", {
      total: stats.totalUsers,
      succeeded: stats.successCount,
      failed: stats.failedCount,
    })
    return stats
  }

  /**
   * Users affected by processed events, each once. Removal events carry
   * the users captured before their cascade.
   */
  async collectAffectedUsers(events: ProcessedEvent[]): Promise<string[]> {
    const users = new Set<string>()
    for (const processed of events) {
      if (processed.action === "insert" && processed.order) {
        for (const user of await this.getAffectedUsersForOrder(processed.order)) users.add(user)
      } else if (processed.action === "remove") {
        for (const user of processed.affectedUsers) users.add(user)
      }
    }
    return [...users]
  }

  async processEvents(events: ProcessedEvent[]): Promise<EventUpdateResult> {
    const affectedUsers = await this.collectAffectedUsers(events)
    const updateStats = await this.updateAffectedUsers(affectedUsers)
    return { eventsProcessed: events.length, affectedUsers, updateStats }
  }
}
