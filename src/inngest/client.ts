/**
 * @fileoverview Inngest Client Configuration
 *
 * Singleton Inngest client for the order recommender. All background
 * workflows are created using this client.
 *
 * @module inngest/client
 * @see {@link https://www.inngest.com/docs/reference/client/create}
 */

import { Inngest, EventSchemas } from "inngest"
import type { InngestEvents } from "./types"

/**
 * @example
 * ```typescript
 * import { inngest } from "@/inngest/client"
 * import { userCacheCleanupRequestedPayload } from "@/inngest/types"
 *
 * export const cleanup = inngest.createFunction(
 *   { id: "cleanup-user-cache" },
 *   { event: "recommendations/user-cache.cleanup-requested" },
 *   async ({ event, step }) => {
 *     const { userId } = userCacheCleanupRequestedPayload.parse(event.data)
 *     await step.run("invalidate", () => getServices().cache.invalidateUser(userId))
 *   }
 * )
 * ```
 */
export const inngest = new Inngest({
  id: "order-recommender",
  schemas: new EventSchemas().fromRecord<InngestEvents>(),
})

/**
 * Type helper for Inngest function context.
 */
export type InngestClient = typeof inngest
