import type { Order } from "./types"

/**
 * Composite text embedded for an order. Only title and content carry
 * meaning for similarity; everything else is filterable metadata.
 *
 * Changing this composition changes every embedding cache key, so it must
 * ship with a `CACHE_VERSION` bump.
 */
export function buildOrderText(order: Pick<Order, "title" | "content">): string {
  const parts: string[] = []
  if (order.title) parts.push(`标题: ${order.title}`)
  if (order.content) parts.push(`内容: ${order.content}`)
  return parts.join("\n")
}
