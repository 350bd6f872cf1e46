/**
 * @fileoverview Recommendation Cache
 *
 * Multi-tier per-user recommendation cache plus the bidirectional
 * user ↔ order mapping used to cascade invalidation when an order leaves
 * the market.
 *
 * ## Tiers
 *
 * | Tier             | Key                                   | TTL    |
 * |------------------|---------------------------------------|--------|
 * | initial          | `business_rec:rec:initial:v2.0.0:{u}` | 30 min |
 * | final            | `business_rec:rec:final:v2.0.0:{u}`   | 2 h    |
 * | task status      | `business_rec:task:v2.0.0:{u}:{task}` | 10 min |
 * | user list        | `business_rec:user_rec:v2.0.0:{u}`    | 1 h    |
 * | reverse map      | `business_rec:order_users:v2.0.0:{o}` | 1 h    |
 *
 * ## Failure policy
 *
 * Cache failures never fail a request. Mutations return
 * `Result<T, CacheWarning>` and log the warning here, so call sites only
 * branch when the outcome changes what they do next. Reads log and report
 * a miss.
 *
 * The user list is last-writer-wins and the reverse map only ever grows
 * between cascades; there are no multi-key transactions.
 *
 * @module lib/cache/recommendation-cache
 */

import { z } from "zod"
import { errorMessage } from "../errors"
import { logger } from "../logger"
import { orderSchema, type Order } from "../orders/types"
import { Err, Ok, attemptAsync, type Result } from "../result"
import {
  CACHE_VERSION,
  CacheCategory,
  CacheTTL,
  buildKey,
  categoryPattern,
  normalPoolKey,
  poolKey,
  promotionalPoolKey,
  scrollKey,
  userOrdersKey,
  viewedKey,
} from "./keys"
import type { CacheStore } from "./store"

// =============================================================================
// Types
// =============================================================================

/**
 * A non-fatal cache failure.
 */
export interface CacheWarning {
  operation: string
  key?: string
  message: string
}

export type CacheResult<T> = Result<T, CacheWarning>

export const TASK_STATES = [
  "pending",
  "processing",
  "completed",
  "failed",
  "completed_with_fallback",
] as const

export type TaskState = (typeof TASK_STATES)[number]

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set([
  "completed",
  "failed",
  "completed_with_fallback",
])

const STATE_RANK: Record<TaskState, number> = {
  pending: 0,
  processing: 1,
  completed: 2,
  failed: 2,
  completed_with_fallback: 2,
}

export const taskStatusSchema = z.object({
  taskId: z.string(),
  status: z.enum(TASK_STATES),
  result: z.record(z.string(), z.unknown()).optional(),
  /** Epoch seconds */
  updatedAt: z.number(),
})

export type TaskStatus = z.infer<typeof taskStatusSchema>

/**
 * Whether a task may move from `from` to `to`. Terminal states accept
 * only an identical rewrite.
 */
export function canTransition(from: TaskState, to: TaskState): boolean {
  if (from === to) return true
  if (TERMINAL_STATES.has(from)) return false
  return STATE_RANK[to] > STATE_RANK[from]
}

export type EnvelopeType =
  | "initial_recommendations"
  | "final_recommendations"
  | "platform_orders"
  | "cold_start"

const envelopeSchema = z.object({
  data: z.array(orderSchema),
  metadata: z.object({
    cachedAt: z.number(),
    count: z.number(),
    version: z.string(),
    type: z.string(),
  }),
})

export type CacheEnvelope = z.infer<typeof envelopeSchema>

/**
 * Anything carrying an order identity under one of its historical names.
 */
export interface OrderIdentity {
  id?: string | number | null
  order_id?: string | number | null
  backend_order_code?: string | number | null
  taskNumber?: string | null
}

export interface CascadeResult {
  affectedUsers: string[]
  failedUsers: string[]
}

const stringListSchema = z.array(z.union([z.string(), z.number()]).transform(String))

const SLIM_TITLE = 100
const SLIM_CONTENT = 200

/** Initial-tier payloads drop long text; full text lives in the index */
export function slimOrder(order: Order): Order {
  return {
    ...order,
    title: order.title.slice(0, SLIM_TITLE),
    content: order.content.slice(0, SLIM_CONTENT),
  }
}

/**
 * Access-frequency scaled TTL.
 */
export function adaptiveTtl(accessCount: number, baseTtl: number = CacheTTL.DEFAULT): number {
  if (accessCount > 100) return baseTtl * 3
  if (accessCount > 50) return baseTtl * 2
  if (accessCount > 10) return baseTtl
  return Math.floor(baseTtl / 2)
}

function firstOrderId(order: OrderIdentity): string | null {
  for (const candidate of [
    order.id,
    order.order_id,
    order.backend_order_code,
    order.taskNumber,
  ]) {
    if (candidate !== undefined && candidate !== null && candidate !== "") {
      return String(candidate)
    }
  }
  return null
}

const nowSeconds = () => Math.floor(Date.now() / 1000)

// =============================================================================
// Cache
// =============================================================================

export class RecommendationCache {
  constructor(private readonly store: CacheStore) {}

  // ---------------------------------------------------------------------------
  // Keys
  // ---------------------------------------------------------------------------

  readonly keys = {
    initial: (userId: string) => buildKey(CacheCategory.INITIAL_REC, userId),
    final: (userId: string) => buildKey(CacheCategory.FINAL_REC, userId),
    task: (userId: string, taskId: string) =>
      buildKey(CacheCategory.TASK_STATUS, userId, { suffix: taskId }),
    userList: (userId: string) => buildKey(CacheCategory.USER_REC, userId),
    reverse: (orderId: string) => buildKey(CacheCategory.ORDER_USERS, orderId),
    orderRec: (orderId: string) => buildKey(CacheCategory.ORDER_REC, orderId),
    platformOrders: () => buildKey(CacheCategory.PLATFORM_ORDERS, "global"),
    coldStart: (role: string) => buildKey(CacheCategory.COLD_START, role),
  }

  // ---------------------------------------------------------------------------
  // Initial / final tiers
  // ---------------------------------------------------------------------------

  async setInitial(userId: string, orders: Order[]): Promise<CacheResult<number>> {
    return this.writeEnvelope(
      "setInitial",
      this.keys.initial(userId),
      orders.map(slimOrder),
      "initial_recommendations",
      CacheTTL.INITIAL
    )
  }

  async getInitial(userId: string): Promise<Order[] | null> {
    return this.readEnvelope(this.keys.initial(userId))
  }

  async setFinal(userId: string, orders: Order[]): Promise<CacheResult<number>> {
    return this.writeEnvelope(
      "setFinal",
      this.keys.final(userId),
      orders,
      "final_recommendations",
      CacheTTL.FINAL
    )
  }

  async getFinal(userId: string): Promise<Order[] | null> {
    return this.readEnvelope(this.keys.final(userId))
  }

  async setPlatformOrders(
    orders: Order[],
    ttl: number = CacheTTL.PLATFORM_ORDERS
  ): Promise<CacheResult<number>> {
    return this.writeEnvelope(
      "setPlatformOrders",
      this.keys.platformOrders(),
      orders.map(slimOrder),
      "platform_orders",
      ttl
    )
  }

  async getPlatformOrders(): Promise<Order[] | null> {
    return this.readEnvelope(this.keys.platformOrders())
  }

  async setColdStart(
    role: string,
    orders: Order[],
    ttl: number = CacheTTL.COLD_START
  ): Promise<CacheResult<number>> {
    return this.writeEnvelope("setColdStart", this.keys.coldStart(role), orders, "cold_start", ttl)
  }

  async getColdStart(role: string): Promise<Order[] | null> {
    return this.readEnvelope(this.keys.coldStart(role))
  }

  // ---------------------------------------------------------------------------
  // Task status
  // ---------------------------------------------------------------------------

  /**
   * Record a task's status. Backward transitions are rejected and leave
   * the stored status unchanged.
   */
  async setTaskStatus(
    userId: string,
    taskId: string,
    status: TaskState,
    result?: Record<string, unknown>
  ): Promise<CacheResult<TaskStatus>> {
    const key = this.keys.task(userId, taskId)
    const current = await this.getTaskStatus(userId, taskId)

    if (current && !canTransition(current.status, status)) {
      return this.warn({
        operation: "setTaskStatus",
        key,
        message: `Rejected transition ${current.status} -> ${status}`,
      })
    }

    const next: TaskStatus = {
      taskId,
      status,
      ...(result && { result }),
      updatedAt: nowSeconds(),
    }
    return this.attempt("setTaskStatus", key, async () => {
      await this.store.set(key, JSON.stringify(next), CacheTTL.TASK_STATUS)
      return next
    })
  }

  async getTaskStatus(userId: string, taskId: string): Promise<TaskStatus | null> {
    const parsed = await this.readJson(this.keys.task(userId, taskId))
    const status = taskStatusSchema.safeParse(parsed)
    return status.success ? status.data : null
  }

  /**
   * Ids of this user's tasks still pending or processing.
   */
  async getActiveTaskIds(userId: string): Promise<string[]> {
    try {
      const keys = await this.store.keys(categoryPattern(CacheCategory.TASK_STATUS, userId))
      const active: string[] = []
      for (const key of keys) {
        const status = taskStatusSchema.safeParse(await this.readJson(key))
        if (
          status.success &&
          (status.data.status === "pending" || status.data.status === "processing")
        ) {
          active.push(status.data.taskId)
        }
      }
      return active
    } catch (error) {
      logger.warn("Active task lookup failed", { userId, error: errorMessage(error) })
      return []
    }
  }

  // ---------------------------------------------------------------------------
  // Invalidation
  // ---------------------------------------------------------------------------

  /**
   * Delete every per-user tier. Every key is attempted; the error names
   * the keys or patterns that could not be deleted.
   */
  async invalidateUser(userId: string): Promise<CacheResult<number>> {
    const exactKeys = [
      this.keys.initial(userId),
      this.keys.final(userId),
      poolKey(userId),
      scrollKey(userId),
      viewedKey(userId),
      normalPoolKey(userId),
      promotionalPoolKey(userId),
      userOrdersKey(userId),
    ]
    const patterns = [
      categoryPattern(CacheCategory.TASK_STATUS, userId),
      categoryPattern(CacheCategory.USER_PROFILE, userId),
    ]

    let deleted = 0
    const leftBehind: string[] = []
    let lastError = ""

    for (const key of exactKeys) {
      try {
        deleted += await this.store.del(key)
      } catch (error) {
        leftBehind.push(key)
        lastError = errorMessage(error)
      }
    }

    for (const pattern of patterns) {
      try {
        const matched = await this.store.keys(pattern)
        if (matched.length > 0) deleted += await this.store.del(...matched)
      } catch (error) {
        leftBehind.push(pattern)
        lastError = errorMessage(error)
      }
    }

    if (leftBehind.length > 0) {
      return this.warn({
        operation: "invalidateUser",
        key: leftBehind.join(","),
        message: lastError,
      })
    }

    logger.info("User cache invalidated", { userId, deleted })
    return Ok(deleted)
  }

  /**
   * Delete every initial, final and task-status entry for all users.
   */
  async invalidateAll(): Promise<CacheResult<number>> {
    return this.deletePatterns("invalidateAll", [
      categoryPattern(CacheCategory.INITIAL_REC),
      categoryPattern(CacheCategory.FINAL_REC),
      categoryPattern(CacheCategory.TASK_STATUS),
    ])
  }

  /**
   * Delete every user list and reverse-map entry.
   */
  async clearAllRecommendations(): Promise<CacheResult<number>> {
    return this.deletePatterns("clearAllRecommendations", [
      categoryPattern(CacheCategory.USER_REC),
      categoryPattern(CacheCategory.ORDER_USERS),
    ])
  }

  // ---------------------------------------------------------------------------
  // Bidirectional mapping
  // ---------------------------------------------------------------------------

  /**
   * Overwrite the user's list and add the user to each order's reverse
   * entry. Reverse entries for orders no longer in the list are left in
   * place; cascades tolerate users who no longer hold the order.
   */
  async setRecommendationWithReverseMapping(
    userId: string,
    orders: OrderIdentity[]
  ): Promise<CacheResult<number>> {
    const orderIds = orders.map(firstOrderId).filter((id): id is string => id !== null)
    const userKey = this.keys.userList(userId)

    if (orderIds.length === 0) {
      return this.warn({
        operation: "setRecommendationWithReverseMapping",
        key: userKey,
        message: "No order ids in recommendation list",
      })
    }

    const listWritten = await this.attempt("setUserList", userKey, () =>
      this.store.set(userKey, JSON.stringify(orderIds), CacheTTL.USER_REC)
    )
    if (!listWritten.ok) return listWritten

    const failed: string[] = []
    for (const orderId of orderIds) {
      const reverseKey = this.keys.reverse(orderId)
      try {
        const existing = await this.readStringList(reverseKey, true)
        if (existing === null) {
          await this.store.set(reverseKey, JSON.stringify([userId]), CacheTTL.ORDER_USERS)
        } else if (!existing.includes(userId)) {
          await this.store.set(
            reverseKey,
            JSON.stringify([...existing, userId]),
            CacheTTL.ORDER_USERS
          )
        }
      } catch {
        failed.push(reverseKey)
      }
    }

    if (failed.length > 0) {
      return this.warn({
        operation: "setRecommendationWithReverseMapping",
        key: failed.join(","),
        message: `Reverse mapping failed for ${failed.length} of ${orderIds.length} orders`,
      })
    }

    logger.info("Reverse mapping written", { userId, orders: orderIds.length })
    return Ok(orderIds.length)
  }

  async getUserRecommendations(userId: string): Promise<string[] | null> {
    try {
      return await this.readStringList(this.keys.userList(userId), true)
    } catch (error) {
      logger.warn("User list read failed", { userId, error: errorMessage(error) })
      return null
    }
  }

  async getOrderAffectedUsers(orderId: string): Promise<string[]> {
    try {
      return (await this.readStringList(this.keys.reverse(orderId), true)) ?? []
    } catch (error) {
      logger.warn("Reverse lookup failed", { orderId, error: errorMessage(error) })
      return []
    }
  }

  /**
   * Remove an order from every user that lists it, then drop its reverse
   * entry. Per-user failures are collected and the cascade continues.
   */
  async removeOrderFromAllRecommendations(orderId: string): Promise<CacheResult<CascadeResult>> {
    const reverseKey = this.keys.reverse(orderId)

    let users: string[]
    try {
      users = (await this.readStringList(reverseKey, true)) ?? []
    } catch (error) {
      return this.warn({
        operation: "removeOrderFromAllRecommendations",
        key: reverseKey,
        message: errorMessage(error),
      })
    }

    const failedUsers: string[] = []
    for (const userId of users) {
      const removed = await this.removeFromUserList(userId, orderId)
      if (!removed.ok) failedUsers.push(userId)
    }

    const dropped = await this.attempt("removeOrderFromAllRecommendations", reverseKey, () =>
      this.store.del(reverseKey)
    )
    if (!dropped.ok) return dropped

    logger.info("Order removed from recommendations", {
      orderId,
      affectedUsers: users.length,
      failedUsers: failedUsers.length,
    })
    return Ok({ affectedUsers: users, failedUsers })
  }

  /**
   * Idempotent single-user removal; also drops the user from the order's
   * reverse entry. `Ok(true)` when the user's list changed.
   */
  async removeOrderFromUserRecommendations(
    userId: string,
    orderId: string
  ): Promise<CacheResult<boolean>> {
    const removed = await this.removeFromUserList(userId, orderId)
    if (!removed.ok) return removed

    const reverseKey = this.keys.reverse(orderId)
    const pruned = await this.attempt("pruneReverseEntry", reverseKey, async () => {
      const users = await this.readStringList(reverseKey, true)
      if (users === null || !users.includes(userId)) return
      const remaining = users.filter((u) => u !== userId)
      if (remaining.length === 0) {
        await this.store.del(reverseKey)
      } else {
        await this.store.set(reverseKey, JSON.stringify(remaining), CacheTTL.ORDER_USERS)
      }
    })
    if (!pruned.ok) return pruned

    return removed
  }

  /**
   * Delete the order's reverse entry and its per-order recommendation cache.
   */
  async clearOrderMapping(orderId: string): Promise<CacheResult<number>> {
    const keys = [this.keys.reverse(orderId), this.keys.orderRec(orderId)]
    return this.attempt("clearOrderMapping", keys.join(","), () => this.store.del(...keys))
  }

  // ---------------------------------------------------------------------------
  // Generic data (unprefixed keys)
  // ---------------------------------------------------------------------------

  async getData<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    const parsed = schema.safeParse(await this.readJson(key))
    return parsed.success ? parsed.data : null
  }

  async setData(
    key: string,
    value: unknown,
    ttl: number = CacheTTL.DEFAULT
  ): Promise<CacheResult<void>> {
    return this.attempt("setData", key, () => this.store.set(key, JSON.stringify(value), ttl))
  }

  async deleteData(key: string): Promise<CacheResult<number>> {
    return this.attempt("deleteData", key, () => this.store.del(key))
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  /**
   * Key count per category.
   */
  async getStatistics(): Promise<Record<CacheCategory, number>> {
    const stats: Partial<Record<CacheCategory, number>> = {}
    for (const category of Object.values(CacheCategory)) {
      try {
        stats[category] = (await this.store.keys(categoryPattern(category))).length
      } catch (error) {
        logger.warn("Cache statistics unavailable", { category, error: errorMessage(error) })
        stats[category] = 0
      }
    }
    return {
      "rec:initial": stats["rec:initial"] ?? 0,
      "rec:final": stats["rec:final"] ?? 0,
      task: stats.task ?? 0,
      "user:profile": stats["user:profile"] ?? 0,
      "platform:orders": stats["platform:orders"] ?? 0,
      "cold:start": stats["cold:start"] ?? 0,
      user_rec: stats.user_rec ?? 0,
      order_users: stats.order_users ?? 0,
      order_rec: stats.order_rec ?? 0,
      embedding: stats.embedding ?? 0,
    }
  }

  async ping(): Promise<boolean> {
    try {
      return await this.store.ping()
    } catch (error) {
      logger.error("Cache ping failed", { error: errorMessage(error) })
      return false
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private warn(warning: CacheWarning): Result<never, CacheWarning> {
    logger.warn("Cache operation failed", { ...warning })
    return Err(warning)
  }

  private async attempt<T>(
    operation: string,
    key: string,
    fn: () => Promise<T>
  ): Promise<CacheResult<T>> {
    const result = await attemptAsync(fn, (error) => ({
      operation,
      key,
      message: errorMessage(error),
    }))
    if (!result.ok) logger.warn("Cache operation failed", { ...result.error })
    return result
  }

  private async removeFromUserList(userId: string, orderId: string): Promise<CacheResult<boolean>> {
    const userKey = this.keys.userList(userId)
    return this.attempt("removeOrderFromUserList", userKey, async () => {
      const ids = await this.readStringList(userKey, true)
      if (ids === null || !ids.includes(orderId)) return false
      await this.store.set(
        userKey,
        JSON.stringify(ids.filter((id) => id !== orderId)),
        CacheTTL.USER_REC
      )
      return true
    })
  }

  /**
   * Parse a stored JSON list of ids. With `rethrow`, store errors propagate
   * so mutations can report them; corrupt values read as absent.
   */
  private async readStringList(key: string, rethrow: boolean): Promise<string[] | null> {
    const parsed = stringListSchema.safeParse(await this.readJson(key, rethrow))
    return parsed.success ? parsed.data : null
  }

  private async readJson(key: string, rethrow = false): Promise<unknown> {
    let raw: string | null
    try {
      raw = await this.store.get(key)
    } catch (error) {
      if (rethrow) throw error
      logger.warn("Cache read failed, treating as miss", { key, error: errorMessage(error) })
      return null
    }
    if (raw === null) return null
    try {
      return JSON.parse(raw)
    } catch {
      logger.warn("Discarding unparseable cache value", { key })
      return null
    }
  }

  private async writeEnvelope(
    operation: string,
    key: string,
    data: Order[],
    type: EnvelopeType,
    ttl: number
  ): Promise<CacheResult<number>> {
    const envelope: CacheEnvelope = {
      data,
      metadata: { cachedAt: nowSeconds(), count: data.length, version: CACHE_VERSION, type },
    }
    return this.attempt(operation, key, async () => {
      await this.store.set(key, JSON.stringify(envelope), ttl)
      return data.length
    })
  }

  /**
   * Read an envelope; a version mismatch deletes the entry and reads as a miss.
   */
  private async readEnvelope(key: string): Promise<Order[] | null> {
    const raw = await this.readJson(key)
    if (raw === null) return null

    const envelope = envelopeSchema.safeParse(raw)
    if (envelope.success && envelope.data.metadata.version === CACHE_VERSION) {
      return envelope.data.data
    }

    logger.info("Discarding stale cache envelope", { key })
    await this.deleteData(key)
    return null
  }

  private async deletePatterns(operation: string, patterns: string[]): Promise<CacheResult<number>> {
    return this.attempt(operation, patterns.join(","), async () => {
      let deleted = 0
      for (const pattern of patterns) {
        const keys = await this.store.keys(pattern)
        if (keys.length > 0) deleted += await this.store.del(...keys)
      }
      logger.info("Cache patterns cleared", { operation, deleted })
      return deleted
    })
  }
}
