/**
 * @fileoverview Pagination Pool Builder
 *
 * Builds the per-user pool that pagination and infinite scroll read
 * from. Runs inside the `preload-pagination-pool` Inngest function.
 *
 * Users with history get a mix of similarity, popular and random orders;
 * cold-start users get popular and random only.
 *
 * @module lib/recommendation/pool
 */

import { CacheTTL, poolKey, scrollKey } from "../cache/keys"
import type { RecommendationCache } from "../cache/recommendation-cache"
import { errorMessage } from "../errors"
import { logger } from "../logger"
import { dedupeOrders } from "../orders/helpers"
import { WAIT_RECEIVE, type Order } from "../orders/types"
import type { VectorStore } from "../vector-store/vector-store"
import { DEFAULT_POOL_SIZE, type RecommendationEngine } from "./engine"

/** Share of the pool per strategy */
export const POOL_RATIOS = {
  withHistory: { similarity: 0.5, popular: 0.25, trending: 0.15, random: 0.1 },
  coldStart: { popular: 0.7, random: 0.3 },
} as const

/** Orders the similarity strategy searches around */
const SIMILARITY_SEEDS = 2

export type PoolStatus = "success" | "empty" | "failed"

export interface PoolBuildResult {
  status: PoolStatus
  userId: string
  poolSize: number
  generationMs: number
  cacheKeys?: string[]
  error?: string
}

/** Value stored under the infinite-scroll key */
export interface ScrollState {
  recommendations: Order[]
  /** Epoch seconds */
  lastRefresh: number
  seenIds: string[]
}

export interface PoolBuilderDeps {
  engine: RecommendationEngine
  vectorStore: VectorStore
  cache: RecommendationCache
  /** Epoch milliseconds */
  now?: () => number
}

export class PoolBuilder {
  private readonly engine: RecommendationEngine
  private readonly vectorStore: VectorStore
  private readonly cache: RecommendationCache
  private readonly now: () => number

  constructor(deps: PoolBuilderDeps) {
    this.engine = deps.engine
    this.vectorStore = deps.vectorStore
    this.cache = deps.cache
    this.now = deps.now ?? Date.now
  }

  /**
   * Build and cache the user's pool. Never throws; failures come back as
   * `status: "failed"`.
   */
  async preload(userId: string, size: number = DEFAULT_POOL_SIZE): Promise<PoolBuildResult> {
    const startedAt = this.now()
    const elapsed = () => this.now() - startedAt

    try {
      const candidates = await this.collect(userId, size)
      const pool = dedupeOrders(candidates).slice(0, size)

      if (pool.length === 0) {
        logger.warn("Pool empty, nothing to recommend", { userId })
        return { status: "empty", userId, poolSize: 0, generationMs: elapsed() }
      }

      const scroll: ScrollState = {
        recommendations: pool,
        lastRefresh: Math.floor(this.now() / 1000),
        seenIds: [],
      }
      const cacheKeys = [poolKey(userId), scrollKey(userId)]
      await this.cache.setData(poolKey(userId), pool, CacheTTL.POOL)
      await this.cache.setData(scrollKey(userId), scroll, CacheTTL.SCROLL)
      await this.cache.setRecommendationWithReverseMapping(userId, pool)

      logger.info("Pool built", { userId, poolSize: pool.length, generationMs: elapsed() })
      return { status: "success", userId, poolSize: pool.length, generationMs: elapsed(), cacheKeys }
    } catch (error) {
      logger.error("Pool build failed", { userId, error: errorMessage(error) })
      return {
        status: "failed",
        userId,
        poolSize: 0,
        generationMs: elapsed(),
        error: errorMessage(error),
      }
    }
  }

  /**
   * Strategy output in priority order, before dedupe.
   */
  async collect(userId: string, size: number): Promise<Order[]> {
    const history = await this.engine.getUserOrders(userId)

    if (history.length === 0) {
      const { popular, random } = POOL_RATIOS.coldStart
      return [
        ...(await this.engine.getPopularOrders(userId, Math.floor(size * popular))),
        ...(await this.engine.getRandomOrders(userId, Math.floor(size * random))),
      ]
    }

    const ratios = POOL_RATIOS.withHistory
    const perSeed = Math.floor(Math.floor(size * ratios.similarity) / 2)
    const orders: Order[] = []

    for (const seed of history.slice(0, SIMILARITY_SEEDS)) {
      const matches = await this.vectorStore.search(seed, perSeed, { state: WAIT_RECEIVE })
      for (const { distance: _distance, ...match } of matches) {
        if (match.userId !== userId) orders.push(match)
      }
    }

    orders.push(...(await this.engine.getPopularOrders(userId, Math.floor(size * ratios.popular))))
    orders.push(...(await this.engine.getPopularOrders(userId, Math.floor(size * ratios.trending))))
    orders.push(...(await this.engine.getRandomOrders(userId, Math.floor(size * ratios.random))))
    return orders
  }
}
