/**
 * @fileoverview Canonical Order Shape
 *
 * The only order shape the recommendation core sees. Backend records with
 * aliased field names are converted once at the boundary by `toOrder`.
 *
 * @module lib/orders/types
 */

import { z } from "zod"

/** The only state that may be present in the vector index */
export const WAIT_RECEIVE = "WaitReceive"

/** Field length limits applied before indexing */
export const FIELD_LIMITS = {
  industryName: 100,
  title: 500,
  content: 2000,
} as const

export const orderSchema = z.object({
  /** Numeric backend id when known; may be empty for taskNumber-only orders */
  id: z.union([z.string(), z.number()]),
  taskNumber: z.string(),
  userId: z.string(),
  industryName: z.string(),
  title: z.string(),
  content: z.string(),
  fullAmount: z.number(),
  /** Backend state; only {@link WAIT_RECEIVE} orders are indexed */
  state: z.string(),
  createTime: z.string(),
  updateTime: z.string(),
  siteId: z.string(),
  /** Shown in the promotional pool */
  promotion: z.boolean(),
  priority: z.number(),
})

export type Order = z.infer<typeof orderSchema>

/** A search hit; smaller distance is closer */
export type ScoredOrder = Order & { distance: number }

export function isWaitReceive(order: Pick<Order, "state">): boolean {
  return order.state === WAIT_RECEIVE
}
