/**
 * @fileoverview Runtime Configuration
 *
 * Parses `process.env` once at startup into a typed configuration object.
 * Missing secrets or malformed values raise {@link ConfigError}, which the
 * entry point treats as fatal.
 *
 * TTLs and cache key shapes are domain constants (see `lib/cache/keys`),
 * not configuration; only deployment endpoints, credentials and the event
 * polling bounds live here.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ConfigError } from "./errors"

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),

    /** Voyage AI key for order embeddings */
    VOYAGE_API_KEY: z.string().min(1, "VOYAGE_API_KEY is required"),
    /** PostgreSQL + pgvector connection string */
    DATABASE_URL: z.string().url(),

    /** Upstash Redis REST endpoint (Vercel KV naming) */
    KV_REST_API_URL: z.string().url().optional(),
    KV_REST_API_TOKEN: z.string().min(1).optional(),

    /** Order backend of record */
    BACKEND_API_URL: z.string().url(),
    BACKEND_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    /** Event polling bounds */
    SYNC_MAX_ATTEMPTS: z.coerce.number().int().positive().default(1000),
    SYNC_MAX_CONSECUTIVE_MISSES: z.coerce.number().int().positive().default(50),
    SYNC_EVENT_BATCH_LIMIT: z.coerce.number().int().positive().default(100),

    EMBEDDING_CACHE_ENABLED: booleanFlag.default(true),

    SENTRY_DSN: z.string().url().optional(),
  })
  .refine(
    (env) => (env.KV_REST_API_URL === undefined) === (env.KV_REST_API_TOKEN === undefined),
    {
      message: "KV_REST_API_URL and KV_REST_API_TOKEN must be set together",
      path: ["KV_REST_API_TOKEN"],
    }
  )

export type Env = z.infer<typeof envSchema>

export interface AppConfig {
  env: Env["NODE_ENV"]
  port: number
  voyageApiKey: string
  databaseUrl: string
  redis: { url: string; token: string } | null
  backend: { baseUrl: string; timeoutMs: number }
  sync: {
    maxAttempts: number
    maxConsecutiveMisses: number
    eventBatchLimit: number
  }
  embeddingCacheEnabled: boolean
  sentryDsn?: string
}

/**
 * Parse and validate configuration from an environment record.
 *
 * @throws {ConfigError} with one detail per invalid variable
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  // Empty strings from .env files mean "unset"
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  )

  const parsed = envSchema.safeParse(cleaned)
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid environment configuration",
      parsed.error.issues.map((issue) => ({
        field: issue.path.map(String).join("."),
        message: issue.message,
      }))
    )
  }

  const env = parsed.data
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    voyageApiKey: env.VOYAGE_API_KEY,
    databaseUrl: env.DATABASE_URL,
    redis:
      env.KV_REST_API_URL && env.KV_REST_API_TOKEN
        ? { url: env.KV_REST_API_URL, token: env.KV_REST_API_TOKEN }
        : null,
    backend: {
      baseUrl: env.BACKEND_API_URL.replace(/\/+$/, ""),
      timeoutMs: env.BACKEND_API_TIMEOUT_MS,
    },
    sync: {
      maxAttempts: env.SYNC_MAX_ATTEMPTS,
      maxConsecutiveMisses: env.SYNC_MAX_CONSECUTIVE_MISSES,
      eventBatchLimit: env.SYNC_EVENT_BATCH_LIMIT,
    },
    embeddingCacheEnabled: env.EMBEDDING_CACHE_ENABLED,
    sentryDsn: env.SENTRY_DSN,
  }
}
