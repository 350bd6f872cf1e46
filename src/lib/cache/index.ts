/**
 * @fileoverview Cache Barrel Export
 *
 * @module lib/cache
 */

export type { CacheStore } from "./store"
export { MemoryCacheStore, globToRegExp } from "./memory-store"
export { UpstashCacheStore, type RedisCommands } from "./upstash-store"
export {
  EmbeddingCache,
  type EmbeddingCacheOptions,
  type EmbeddingCacheStats,
} from "./embedding-cache"
export {
  RecommendationCache,
  TASK_STATES,
  adaptiveTtl,
  canTransition,
  slimOrder,
  taskStatusSchema,
  type CacheEnvelope,
  type CacheResult,
  type CacheWarning,
  type CascadeResult,
  type EnvelopeType,
  type OrderIdentity,
  type TaskState,
  type TaskStatus,
} from "./recommendation-cache"
export * from "./keys"
