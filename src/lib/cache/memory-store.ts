/**
 * @fileoverview In-Process Cache Store
 *
 * LRU-backed {@link CacheStore} used by tests and by deployments that run
 * without Upstash. Entries carry their own TTL; keys without one live until
 * evicted.
 *
 * @module lib/cache/memory-store
 */

import { LRUCache } from "lru-cache"
import type { CacheStore } from "./store"

export interface MemoryCacheStoreOptions {
  /** Max entries before LRU eviction (default 50,000) */
  max?: number
}

/**
 * Translate a Redis glob into an anchored RegExp.
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("")
    .map((char) => {
      if (char === "*") return ".*"
      if (char === "?") return "."
      return char.replace(/[.+^${}()|[\]\\]/g, "\\$&")
    })
    .join("")
  return new RegExp(`^${source}$`)
}

export class MemoryCacheStore implements CacheStore {
  private readonly cache: LRUCache<string, string>

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.cache = new LRUCache<string, string>({
      max: options.max ?? 50_000,
      // Remaining TTL is read against the live clock, never above what was set
      ttlResolution: 0,
    })
  }

  async get(key: string): Promise<string | null> {
    return this.cache.get(key) ?? null
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.cache.set(
      key,
      value,
      ttlSeconds !== undefined ? { ttl: ttlSeconds * 1000 } : undefined
    )
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0
    for (const key of keys) {
      if (this.cache.has(key)) removed++
      this.cache.delete(key)
    }
    return removed
  }

  async keys(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern)
    return [...this.cache.keys()].filter(
      (key) => matcher.test(key) && this.cache.has(key)
    )
  }

  async ttl(key: string): Promise<number> {
    if (!this.cache.has(key)) return -2
    const remaining = this.cache.getRemainingTTL(key)
    return Number.isFinite(remaining) ? Math.ceil(remaining / 1000) : -1
  }

  async byteSize(key: string): Promise<number> {
    const value = this.cache.get(key)
    return value === undefined ? 0 : Buffer.byteLength(value, "utf8")
  }

  async ping(): Promise<boolean> {
    return true
  }

  /** Drop everything (tests) */
  clear(): void {
    this.cache.clear()
  }
}
