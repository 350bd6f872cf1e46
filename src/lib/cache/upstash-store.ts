/**
 * @fileoverview Upstash Redis Cache Store
 *
 * Serverless-compatible {@link CacheStore} over the Upstash REST API
 * (Vercel KV env naming). The client auto-deserializes JSON, so reads
 * re-stringify non-string payloads to keep the store contract string-only.
 *
 * @module lib/cache/upstash-store
 */

import { Redis } from "@upstash/redis"
import type { CacheStore } from "./store"

/**
 * The subset of the Upstash client this adapter calls.
 */
export interface RedisCommands {
  get(key: string): Promise<unknown>
  set(key: string, value: string, opts?: { ex: number }): Promise<unknown>
  del(...keys: string[]): Promise<number>
  scan(
    cursor: string | number,
    opts: { match: string; count: number }
  ): Promise<[string | number, string[]]>
  ttl(key: string): Promise<number>
  strlen(key: string): Promise<number>
  ping(): Promise<string>
}

const SCAN_BATCH = 500

export class UpstashCacheStore implements CacheStore {
  constructor(private readonly redis: RedisCommands) {}

  static fromCredentials(credentials: { url: string; token: string }): UpstashCacheStore {
    return new UpstashCacheStore(new Redis(credentials))
  }

  async get(key: string): Promise<string | null> {
    const cached = await this.redis.get(key)
    if (cached === null || cached === undefined) return null
    return typeof cached === "string" ? cached : JSON.stringify(cached)
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined) {
      await this.redis.set(key, value, { ex: ttlSeconds })
    } else {
      await this.redis.set(key, value)
    }
  }

  async del(...keys: string[]): Promise<number> {
    if (keys.length === 0) return 0
    return this.redis.del(...keys)
  }

  async keys(pattern: string): Promise<string[]> {
    const found: string[] = []
    let cursor: string | number = 0
    do {
      const [next, batch] = await this.redis.scan(cursor, {
        match: pattern,
        count: SCAN_BATCH,
      })
      found.push(...batch)
      cursor = next
    } while (String(cursor) !== "0")
    return [...new Set(found)]
  }

  async ttl(key: string): Promise<number> {
    return this.redis.ttl(key)
  }

  async byteSize(key: string): Promise<number> {
    return this.redis.strlen(key)
  }

  async ping(): Promise<boolean> {
    return (await this.redis.ping()) === "PONG"
  }
}
