/**
 * @fileoverview Embedding Cache
 *
 * Content-addressed cache in front of the embedding model. The key is the
 * md5 of the exact text, so identical order text always reuses one vector
 * across processes. Entries live 24 hours.
 *
 * The cache never fails a request: an unreachable store is treated as a
 * miss, and a failed write only logs.
 *
 * @module lib/cache/embedding-cache
 */

import type { EmbeddingModel } from "../embeddings"
import { errorMessage } from "../errors"
import { logger } from "../logger"
import { buildOrderText } from "../orders/text"
import type { Order } from "../orders/types"
import { CacheCategory, CacheTTL, categoryPattern, embeddingKey } from "./keys"
import type { CacheStore } from "./store"

/**
 * Embedding cache statistics.
 */
export interface EmbeddingCacheStats {
  totalKeys: number
  totalSizeMB: number
  avgSizePerKeyKB: number
}

export interface EmbeddingCacheOptions {
  /** When false every call goes to the model */
  enabled?: boolean
}

const EMPTY_STATS: EmbeddingCacheStats = { totalKeys: 0, totalSizeMB: 0, avgSizePerKeyKB: 0 }

const round2 = (value: number) => Math.round(value * 100) / 100

export class EmbeddingCache {
  private readonly enabled: boolean

  constructor(
    private readonly store: CacheStore,
    private readonly model: EmbeddingModel,
    options: EmbeddingCacheOptions = {}
  ) {
    this.enabled = options.enabled ?? true
  }

  get dimensions(): number {
    return this.model.dimensions
  }

  /**
   * Vector for `text`, from cache when present.
   */
  async get(text: string): Promise<number[]> {
    if (!this.enabled) {
      return this.model.embed(text)
    }

    const key = embeddingKey(text)
    const cached = await this.read(key)
    if (cached) {
      return cached
    }

    const embedding = await this.model.embed(text)
    try {
      await this.store.set(key, JSON.stringify(embedding), CacheTTL.EMBEDDING)
    } catch (error) {
      logger.warn("Embedding not cached", { key, error: errorMessage(error) })
    }
    return embedding
  }

  /** Embed an order's composite title/content text */
  async forOrder(order: Pick<Order, "title" | "content">): Promise<number[]> {
    return this.get(buildOrderText(order))
  }

  /**
   * Delete the cached vector for `text`. Returns whether a key was removed.
   */
  async invalidate(text: string): Promise<boolean> {
    try {
      return (await this.store.del(embeddingKey(text))) > 0
    } catch (error) {
      logger.warn("Embedding cache invalidation failed", { error: errorMessage(error) })
      return false
    }
  }

  /**
   * Size of the embedding namespace. Zero keys, or a store that cannot be
   * read, yields all zeros.
   */
  async stats(): Promise<EmbeddingCacheStats> {
    try {
      const keys = await this.store.keys(categoryPattern(CacheCategory.EMBEDDING))
      if (keys.length === 0) {
        return { ...EMPTY_STATS }
      }

      let totalBytes = 0
      for (const key of keys) {
        totalBytes += await this.store.byteSize(key)
      }

      return {
        totalKeys: keys.length,
        totalSizeMB: round2(totalBytes / (1024 * 1024)),
        avgSizePerKeyKB: round2(totalBytes / keys.length / 1024),
      }
    } catch (error) {
      logger.warn("Embedding cache statistics unavailable", { error: errorMessage(error) })
      return { ...EMPTY_STATS }
    }
  }

  private async read(key: string): Promise<number[] | null> {
    try {
      const raw = await this.store.get(key)
      if (raw === null) return null
      const parsed: unknown = JSON.parse(raw)
      return Array.isArray(parsed) && parsed.every((v) => typeof v === "number")
        ? parsed
        : null
    } catch (error) {
      logger.warn("Embedding cache read failed, treating as miss", {
        key,
        error: errorMessage(error),
      })
      return null
    }
  }
}
