/**
 * @fileoverview Cache Store Interface
 *
 * Minimal key/value surface shared by the Upstash Redis adapter and the
 * in-process LRU store. Values are opaque strings; callers own
 * serialization. TTLs are in seconds.
 *
 * @module lib/cache/store
 */

export interface CacheStore {
  get(key: string): Promise<string | null>
  /** Omit `ttlSeconds` to store without expiry */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>
  /** Returns the number of keys that existed */
  del(...keys: string[]): Promise<number>
  /** Glob match (`*`, `?`) over live keys */
  keys(pattern: string): Promise<string[]>
  /** Remaining seconds; -1 without expiry, -2 when absent (Redis semantics) */
  ttl(key: string): Promise<number>
  /** UTF-8 byte length of the stored value, 0 when absent */
  byteSize(key: string): Promise<number>
  ping(): Promise<boolean>
}
