/**
 * @fileoverview Service Composition Root
 *
 * Builds every long-lived collaborator once and wires them explicitly.
 * Engines never construct their own dependencies; tests call
 * {@link createServices} with in-process overrides.
 *
 * Only the Inngest functions and the HTTP server reach the process-wide
 * instance through {@link getServices}.
 *
 * @module lib/services
 */

import { createDatabase } from "@/db/client"
import { inngest } from "@/inngest/client"
import { BackendClient, type BackendApi } from "./backend/client"
import { EmbeddingCache } from "./cache/embedding-cache"
import { MemoryCacheStore } from "./cache/memory-store"
import { RecommendationCache } from "./cache/recommendation-cache"
import type { CacheStore } from "./cache/store"
import { UpstashCacheStore } from "./cache/upstash-store"
import { loadConfig, type AppConfig } from "./config"
import { VoyageAIClient, type EmbeddingModel } from "./embeddings"
import { logger } from "./logger"
import type { RandomSource } from "./orders/helpers"
import { RecommendationEngine } from "./recommendation/engine"
import { PoolBuilder } from "./recommendation/pool"
import { RecommendationUpdater } from "./recommendation/update"
import { SyncEngine } from "./sync/sync-engine"
import { InngestTaskQueue, type TaskQueue } from "./tasks"
import { PgOrderIndex } from "./vector-store/pg-order-index"
import type { OrderIndex } from "./vector-store/types"
import { VectorStore } from "./vector-store/vector-store"

export interface Services {
  config: AppConfig
  store: CacheStore
  cache: RecommendationCache
  embeddings: EmbeddingCache
  vectorStore: VectorStore
  backend: BackendApi
  tasks: TaskQueue
  engine: RecommendationEngine
  pools: PoolBuilder
  updater: RecommendationUpdater
  sync: SyncEngine
}

/**
 * Replaceable infrastructure. Anything omitted is built from config.
 */
export interface ServiceOverrides {
  store?: CacheStore
  model?: EmbeddingModel
  index?: OrderIndex
  backend?: BackendApi
  tasks?: TaskQueue
  random?: RandomSource
  /** Epoch milliseconds */
  now?: () => number
}

function createStore(config: AppConfig): CacheStore {
  if (config.redis) {
    return UpstashCacheStore.fromCredentials(config.redis)
  }
  logger.warn("KV_REST_API_URL not set, using the in-process cache")
  return new MemoryCacheStore()
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const store = overrides.store ?? createStore(config)
  const cache = new RecommendationCache(store)
  const embeddings = new EmbeddingCache(
    store,
    overrides.model ?? new VoyageAIClient(config.voyageApiKey),
    { enabled: config.embeddingCacheEnabled }
  )
  const index = overrides.index ?? new PgOrderIndex(createDatabase(config.databaseUrl))
  const vectorStore = new VectorStore(index, embeddings)
  const backend =
    overrides.backend ??
    new BackendClient({
      baseUrl: config.backend.baseUrl,
      timeoutMs: config.backend.timeoutMs,
      poll: {
        limit: config.sync.eventBatchLimit,
        maxAttempts: config.sync.maxAttempts,
        maxConsecutiveMisses: config.sync.maxConsecutiveMisses,
      },
    })
  const tasks = overrides.tasks ?? new InngestTaskQueue(inngest, cache)

  const engine = new RecommendationEngine({
    vectorStore,
    cache,
    embeddings,
    backend,
    tasks,
    random: overrides.random,
  })

  return {
    config,
    store,
    cache,
    embeddings,
    vectorStore,
    backend,
    tasks,
    engine,
    pools: new PoolBuilder({ engine, vectorStore, cache, now: overrides.now }),
    updater: new RecommendationUpdater({ vectorStore, cache, tasks }),
    sync: new SyncEngine({ backend, vectorStore, cache, store, now: overrides.now }),
  }
}

let services: Services | null = null

/**
 * Process-wide services, built from `process.env` on first use.
 *
 * @throws {ConfigError} when the environment is invalid
 */
export function getServices(): Services {
  if (!services) {
    services = createServices(loadConfig())
  }
  return services
}

/** Install a prebuilt instance, or clear it with `null` */
export function setServices(instance: Services | null): void {
  services = instance
}

export function resetServices(): void {
  services = null
}
