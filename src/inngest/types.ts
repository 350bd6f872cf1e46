/**
 * @fileoverview Inngest Event Type Definitions
 *
 * Event schemas for the background recommendation workflows.
 * Events follow the naming convention: `recommendations/<subject>.<action>`
 *
 * All events are validated at runtime using Zod schemas before processing.
 *
 * @module inngest/types
 */

import { z } from "zod"
import { ValidationError } from "@/lib/errors"
import { DEFAULT_POOL_SIZE } from "@/lib/recommendation/engine"

/**
 * Pool preload request - builds the user's pagination pool.
 * Sent by ProcessNewOrder, the async recommendation path and the
 * rolling recalculation.
 */
export const poolPreloadRequestedPayload = z.object({
  userId: z.string().min(1),
  poolSize: z.number().int().positive().default(DEFAULT_POOL_SIZE),
  /** Task status key suffix; the caller has already recorded `pending` */
  taskId: z.string().optional(),
})

/**
 * User cache cleanup request - clears every per-user tier.
 */
export const userCacheCleanupRequestedPayload = z.object({
  userId: z.string().min(1),
})

/**
 * All Inngest event types for the recommender.
 */
export type InngestEvents = {
  "recommendations/pool.preload-requested": {
    data: z.input<typeof poolPreloadRequestedPayload>
  }
  "recommendations/user-cache.cleanup-requested": {
    data: z.infer<typeof userCacheCleanupRequestedPayload>
  }
}

export type PoolPreloadRequestedPayload = z.infer<typeof poolPreloadRequestedPayload>
export type UserCacheCleanupRequestedPayload = z.infer<typeof userCacheCleanupRequestedPayload>

/**
 * Map of event names to their Zod schemas for runtime validation.
 */
export const eventSchemas = {
  "recommendations/pool.preload-requested": poolPreloadRequestedPayload,
  "recommendations/user-cache.cleanup-requested": userCacheCleanupRequestedPayload,
} as const

/**
 * Validate event data against its schema.
 *
 * @throws {ValidationError} with one detail per zod issue; Inngest
 * wrappers treat it as permanent
 */
export function parseEventData<S extends z.ZodType>(schema: S, data: unknown): z.output<S> {
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  return parsed.data
}
