/**
 * @fileoverview Recommendation Engine
 *
 * Request-path recommendations. A new order gets similarity results
 * cached as the initial tier right away; the larger pagination pool is
 * built in the background through the {@link TaskQueue}.
 *
 * Every step past validation degrades instead of failing: a search error
 * yields no candidates, a cache error is logged and the flow continues.
 *
 * @module lib/recommendation/engine
 */

import { z } from "zod"
import type { BackendApi } from "../backend/client"
import type { EmbeddingCache, EmbeddingCacheStats } from "../cache/embedding-cache"
import {
  CacheTTL,
  normalPoolKey,
  promotionalPoolKey,
  userOrdersKey,
} from "../cache/keys"
import type { RecommendationCache } from "../cache/recommendation-cache"
import { errorMessage } from "../errors"
import { logger } from "../logger"
import {
  dedupeOrders,
  shuffle,
  sortByCreateTimeDesc,
  sortByPriority,
  type RandomSource,
} from "../orders/helpers"
import { validateOrder } from "../orders/normalize"
import { buildOrderText } from "../orders/text"
import { WAIT_RECEIVE, orderSchema, type Order } from "../orders/types"
import type { TaskQueue } from "../tasks"
import type { OrderFilters } from "../vector-store/types"
import type { VectorStore } from "../vector-store/vector-store"

// =============================================================================
// Limits
// =============================================================================

export const DEFAULT_POOL_SIZE = 150

const NEW_ORDER_SEARCH_K = 30
const INITIAL_LIMIT = 20
const HISTORY_SEARCH_K = 50
const HISTORY_QUERIES = 3
const OWN_ORDERS_SHOWN = 2
const COLD_START_POOL = 100
const FINAL_LIMIT = 100
const PROMOTIONAL_FALLBACK = 10

const OPEN: OrderFilters = { state: WAIT_RECEIVE }

const orderListSchema = z.array(orderSchema)

// =============================================================================
// Types
// =============================================================================

export interface RecommendationEngineDeps {
  vectorStore: VectorStore
  cache: RecommendationCache
  embeddings: EmbeddingCache
  backend: BackendApi
  tasks: TaskQueue
  random?: RandomSource
}

export interface Recommendations {
  userOrders: Order[]
  orders: Order[]
  type: "cold_start_simple" | "vector_only"
}

export type AsyncRecommendationType =
  | "final"
  | "initial"
  | "cold_start_simple"
  | "vector_only_initial"

export interface AsyncRecommendations {
  orders: Order[]
  /** Pool preload task, when one was enqueued */
  taskId: string | null
  isCached: boolean
  type: AsyncRecommendationType
}

export interface SplitPools {
  normal: Order[]
  promotional: Order[]
  normalCount: number
  promotionalCount: number
}

export interface DeleteOrderResult {
  /** Users whose lists were cleaned */
  affectedUsers: number
}

/** Filters accepted by {@link RecommendationEngine.recommendOrders} */
export type RecommendFilters = Pick<
  OrderFilters,
  "industryName" | "amountMin" | "amountMax" | "createdAtStart" | "createdAtEnd"
>

export interface RecommendOptions {
  /** 1-based */
  page?: number
  pageSize?: number
  filters?: RecommendFilters
  /** Case-insensitive match on title or content */
  search?: string
  siteId?: string
  /** Skip the final tier and rebuild */
  refresh?: boolean
}

export interface RecommendationPage {
  orders: Order[]
  total: number
  page: number
  pageSize: number
  isCached: boolean
  type: "cached" | "generated"
}

// =============================================================================
// Engine
// =============================================================================

export class RecommendationEngine {
  private readonly vectorStore: VectorStore
  private readonly cache: RecommendationCache
  private readonly embeddings: EmbeddingCache
  private readonly backend: BackendApi
  private readonly tasks: TaskQueue
  private readonly random: RandomSource

  constructor(deps: RecommendationEngineDeps) {
    this.vectorStore = deps.vectorStore
    this.cache = deps.cache
    this.embeddings = deps.embeddings
    this.backend = deps.backend
    this.tasks = deps.tasks
    this.random = deps.random ?? Math.random
  }

  // ---------------------------------------------------------------------------
  // New orders
  // ---------------------------------------------------------------------------

  /**
   * Fast path for a freshly posted order. The order itself is not indexed;
   * it enters the index through the sync engine once the backend logs it.
   *
   * @throws {ValidationError} when required fields are empty
   */
  async processNewOrder(order: Order): Promise<boolean> {
    validateOrder(order)
    const userId = order.userId

    let similar = await this.vectorStore.search(order, NEW_ORDER_SEARCH_K, OPEN)
    if (order.siteId) {
      similar = similar.filter((match) => match.siteId === order.siteId)
      if (similar.length === 0) {
        logger.warn("No similar orders on the order's site", { userId, siteId: order.siteId })
      }
    }

    await this.cache.invalidateUser(userId)

    if (similar.length > 0) {
      const initial = similar.slice(0, INITIAL_LIMIT).map(({ distance: _distance, ...rest }) => rest)
      await this.cache.setInitial(userId, initial)
      await this.cache.setRecommendationWithReverseMapping(userId, initial)
    }

    const taskId = await this.tasks.enqueuePoolPreload(userId, DEFAULT_POOL_SIZE)
    logger.info("New order processed", {
      userId,
      orderId: String(order.id || order.taskNumber),
      initial: Math.min(similar.length, INITIAL_LIMIT),
      taskId: taskId ?? "",
    })
    return true
  }

  // ---------------------------------------------------------------------------
  // Recommendations
  // ---------------------------------------------------------------------------

  /**
   * The user's orders from the backend, newest first. Non-empty histories
   * are cached for an hour; backend failures read as no history.
   */
  async getUserOrders(userId: string): Promise<Order[]> {
    const key = userOrdersKey(userId)
    const cached = await this.cache.getData(key, orderListSchema)
    if (cached) return cached

    let orders: Order[]
    try {
      orders = sortByCreateTimeDesc(await this.backend.getUserOrders(userId))
    } catch (error) {
      logger.error("User orders unavailable", { userId, error: errorMessage(error) })
      return []
    }

    if (orders.length > 0) {
      await this.cache.setData(key, orders, CacheTTL.USER_ORDERS)
    }
    return orders
  }

  /**
   * Synchronous recommendations around the user's latest order, with the
   * user's own latest orders pinned ahead of the matches.
   */
  async getRecommendations(userId: string, n = 5): Promise<Recommendations> {
    const userOrders = await this.getUserOrders(userId)
    if (userOrders.length === 0) {
      return { userOrders, orders: await this.coldStartPool(n), type: "cold_start_simple" }
    }

    const [latest] = userOrders
    const matches = latest ? await this.vectorStore.search(latest, HISTORY_SEARCH_K, OPEN) : []

    const seen = new Set<string>()
    const unique: Order[] = []
    for (const { distance: _distance, ...match } of matches) {
      const key = `${match.userId}_${match.taskNumber || match.id}`
      if (seen.has(key)) continue
      seen.add(key)
      unique.push(match)
      if (unique.length >= n) break
    }

    const orders = sortByPriority(this.pinOwnOrders(userOrders, unique).slice(0, n))
    return { userOrders, orders, type: "vector_only" }
  }

  /**
   * Cached tiers first (final, then initial); otherwise a fresh initial
   * list is computed and stored, and a pool build is enqueued for users
   * with history.
   */
  async getRecommendationsAsync(userId: string, n = 5): Promise<AsyncRecommendations> {
    const final = await this.cache.getFinal(userId)
    if (final && final.length > 0) {
      return { orders: final.slice(0, n), taskId: null, isCached: true, type: "final" }
    }

    const initial = await this.cache.getInitial(userId)
    if (initial && initial.length > 0) {
      return { orders: initial.slice(0, n), taskId: null, isCached: true, type: "initial" }
    }

    const userOrders = await this.getUserOrders(userId)
    if (userOrders.length === 0) {
      const orders = await this.coldStartPool(n)
      await this.cache.setInitial(userId, orders)
      return { orders, taskId: null, isCached: false, type: "cold_start_simple" }
    }

    const candidates = await this.searchAroundHistory(userOrders, OPEN)
    const orders = sortByPriority(this.pinOwnOrders(userOrders, candidates).slice(0, n))
    await this.cache.setInitial(userId, orders)

    const taskId = await this.tasks.enqueuePoolPreload(userId, DEFAULT_POOL_SIZE)
    return { orders, taskId, isCached: false, type: "vector_only_initial" }
  }

  /**
   * Filtered, paginated recommendations. The full list is stored as the
   * final tier; the page is cut from it after search text and amount
   * filters.
   */
  async recommendOrders(userId: string, options: RecommendOptions = {}): Promise<RecommendationPage> {
    const page = Math.max(1, options.page ?? 1)
    const pageSize = Math.max(1, options.pageSize ?? 10)
    const filters: OrderFilters = { ...options.filters, ...OPEN }
    if (options.siteId) filters.siteId = options.siteId

    if (!options.refresh) {
      const cached = await this.cache.getFinal(userId)
      if (cached && cached.length > 0) {
        return {
          orders: paginate(narrow(cached, filters, options.search), page, pageSize),
          total: cached.length,
          page,
          pageSize,
          isCached: true,
          type: "cached",
        }
      }
    }

    const userOrders = await this.getUserOrders(userId)
    let results: Order[]
    if (userOrders.length > 0) {
      const candidates = await this.searchAroundHistory(userOrders, filters)
      results = this.pinOwnOrders(userOrders, candidates).slice(0, FINAL_LIMIT)
    } else {
      results = shuffle(await this.vectorStore.getByFilter(filters, COLD_START_POOL), this.random)
    }

    if (options.siteId) {
      results = results.filter((order) => order.siteId === options.siteId)
    }

    await this.cache.setFinal(userId, results)
    if (results.length > 0) {
      await this.cache.setRecommendationWithReverseMapping(userId, results)
    }

    return {
      orders: sortByPriority(paginate(narrow(results, filters, options.search), page, pageSize)),
      total: results.length,
      page,
      pageSize,
      isCached: false,
      type: "generated",
    }
  }

  // ---------------------------------------------------------------------------
  // Pools
  // ---------------------------------------------------------------------------

  /**
   * Partition a pool on `promotion` and cache both parts. An empty
   * promotional part is refilled from the index.
   */
  async splitPools(orders: Order[], userId: string): Promise<SplitPools> {
    const normal = orders.filter((order) => !order.promotion)
    let promotional = orders.filter((order) => order.promotion)

    await this.cache.setData(normalPoolKey(userId), normal, CacheTTL.SPLIT_POOL)

    if (promotional.length === 0) {
      promotional = await this.getPromotionalFallback(PROMOTIONAL_FALLBACK)
      if (promotional.length === 0) {
        logger.warn("No promotional orders available", { userId })
      }
    }

    await this.cache.setData(promotionalPoolKey(userId), promotional, CacheTTL.SPLIT_POOL)

    return {
      normal,
      promotional,
      normalCount: normal.length,
      promotionalCount: promotional.length,
    }
  }

  /**
   * Random open promotional orders, drawn from three times `limit`.
   */
  async getPromotionalFallback(limit = PROMOTIONAL_FALLBACK): Promise<Order[]> {
    const candidates = await this.vectorStore.getByFilter(
      { promotion: true, state: WAIT_RECEIVE },
      limit * 3
    )
    return shuffle(candidates, this.random).slice(0, limit)
  }

  /**
   * Newest open orders posted by other users.
   */
  async getPopularOrders(userId: string, n: number): Promise<Order[]> {
    const open = await this.vectorStore.getByFilter(OPEN, n * 2)
    return sortByCreateTimeDesc(open.filter((order) => order.userId !== userId)).slice(0, n)
  }

  async getRandomOrders(userId: string, n: number): Promise<Order[]> {
    const open = await this.vectorStore.getByFilter(OPEN, n * 3)
    return shuffle(
      open.filter((order) => order.userId !== userId),
      this.random
    ).slice(0, n)
  }

  // ---------------------------------------------------------------------------
  // Deletion
  // ---------------------------------------------------------------------------

  /**
   * Cascade an order out of every user list, the reverse map, the
   * embedding cache and the index. `userId` is cleaned even when the
   * reverse map does not name it.
   */
  async deleteOrder(orderId: string | number, userId?: string): Promise<DeleteOrderResult> {
    const code = String(orderId)
    const users = new Set(await this.cache.getOrderAffectedUsers(code))
    if (userId) users.add(userId)

    for (const user of users) {
      await this.cache.removeOrderFromUserRecommendations(user, code)
    }
    await this.cache.clearOrderMapping(code)

    const stored = await this.vectorStore.getById(code)
    if (stored) {
      await this.embeddings.invalidate(buildOrderText(stored))
    }
    await this.vectorStore.remove(code)

    logger.info("Order deleted", { orderId: code, affectedUsers: users.size })
    return { affectedUsers: users.size }
  }

  async getCacheStats(): Promise<EmbeddingCacheStats> {
    return this.embeddings.stats()
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async coldStartPool(n: number): Promise<Order[]> {
    const pool = await this.vectorStore.getByFilter(OPEN, COLD_START_POOL)
    return shuffle(pool, this.random).slice(0, n)
  }

  /**
   * Matches around each of the latest orders, deduped in query order.
   */
  private async searchAroundHistory(userOrders: Order[], filters: OrderFilters): Promise<Order[]> {
    const candidates: Order[] = []
    for (const order of userOrders.slice(0, HISTORY_QUERIES)) {
      const matches = await this.vectorStore.search(order, HISTORY_SEARCH_K, filters)
      candidates.push(...matches.map(({ distance: _distance, ...rest }) => rest))
    }
    return dedupeOrders(candidates)
  }

  private pinOwnOrders(userOrders: Order[], candidates: Order[]): Order[] {
    return dedupeOrders([...userOrders.slice(0, OWN_ORDERS_SHOWN), ...candidates])
  }
}

// =============================================================================
// List helpers
// =============================================================================

function narrow(orders: Order[], filters: OrderFilters, search?: string): Order[] {
  let result = orders
  const needle = search?.trim().toLowerCase()
  if (needle) {
    result = result.filter(
      (order) =>
        order.title.toLowerCase().includes(needle) || order.content.toLowerCase().includes(needle)
    )
  }
  const { amountMin, amountMax } = filters
  if (amountMin !== undefined) result = result.filter((order) => order.fullAmount >= amountMin)
  if (amountMax !== undefined) result = result.filter((order) => order.fullAmount <= amountMax)
  return result
}

function paginate<T>(items: T[], page: number, pageSize: number): T[] {
  const start = (page - 1) * pageSize
  return items.slice(start, start + pageSize)
}
