/**
 * @fileoverview Cache Key Layout and TTLs
 *
 * Every namespaced key is
 * `business_rec:<category>:v2.0.0:<id>[:<suffix>][:<paramHash>]`.
 * Bumping {@link CACHE_VERSION} orphans every existing entry, which is the
 * intended way to roll out a change in payload or text composition.
 *
 * The unprefixed per-user keys at the bottom are shared with other
 * consumers of the same Redis and keep their literal names.
 *
 * @module lib/cache/keys
 */

import { createHash } from "crypto"

export const CACHE_PREFIX = "business_rec"
export const CACHE_VERSION = "v2.0.0"

export const CacheCategory = {
  INITIAL_REC: "rec:initial",
  FINAL_REC: "rec:final",
  TASK_STATUS: "task",
  USER_PROFILE: "user:profile",
  PLATFORM_ORDERS: "platform:orders",
  COLD_START: "cold:start",
  USER_REC: "user_rec",
  ORDER_USERS: "order_users",
  ORDER_REC: "order_rec",
  EMBEDDING: "embedding",
} as const

export type CacheCategory = (typeof CacheCategory)[keyof typeof CacheCategory]

/** TTLs in seconds */
export const CacheTTL = {
  EMBEDDING: 86_400,
  INITIAL: 1_800,
  FINAL: 7_200,
  TASK_STATUS: 600,
  USER_REC: 3_600,
  ORDER_USERS: 3_600,
  PLATFORM_ORDERS: 3_600,
  COLD_START: 1_800,
  SYNC_STATUS: 86_400,
  POOL: 3_600,
  SCROLL: 7_200,
  SPLIT_POOL: 3_600,
  USER_ORDERS: 3_600,
  DEFAULT: 3_600,
} as const

/**
 * md5 of the params' JSON with keys sorted at every level, first 8 hex chars.
 */
export function paramHash(params: Record<string, unknown>): string {
  return createHash("md5").update(stableStringify(params)).digest("hex").slice(0, 8)
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`
  }
  return JSON.stringify(value) ?? "null"
}

export function buildKey(
  category: CacheCategory,
  id: string,
  options: { suffix?: string; params?: Record<string, unknown> } = {}
): string {
  let key = `${CACHE_PREFIX}:${category}:${CACHE_VERSION}:${id}`
  if (options.suffix) key = `${key}:${options.suffix}`
  if (options.params && Object.keys(options.params).length > 0) {
    key = `${key}:${paramHash(options.params)}`
  }
  return key
}

/** Glob over every key of a category, optionally narrowed to one id */
export function categoryPattern(category: CacheCategory, id?: string): string {
  const base = `${CACHE_PREFIX}:${category}:${CACHE_VERSION}`
  return id === undefined ? `${base}:*` : `${base}:${id}:*`
}

export const embeddingKey = (text: string): string =>
  buildKey(CacheCategory.EMBEDDING, createHash("md5").update(text, "utf8").digest("hex"))

export const SYNC_STATUS_KEY = `${CACHE_PREFIX}:sync:status`

// Unprefixed per-user keys
export const poolKey = (userId: string) => `paginated_recommendations_${userId}`
export const scrollKey = (userId: string) => `infinite_scroll_${userId}`
export const viewedKey = (userId: string) => `viewed_orders_${userId}`
export const normalPoolKey = (userId: string) => `normal_recommendations_${userId}`
export const promotionalPoolKey = (userId: string) => `promotional_recommendations_${userId}`
export const userOrdersKey = (userId: string) => `user_orders:${userId}`
