/**
 * @fileoverview Order List Helpers
 *
 * Pure list operations shared by the engine, pool builder and updater.
 *
 * @module lib/orders/helpers
 */

import type { Order } from "./types"

/** Source of uniform [0, 1) values; injectable for deterministic tests */
export type RandomSource = () => number

/**
 * Identity used for dedupe and reverse lookups: numeric id, else taskNumber.
 */
export function orderKey(order: Pick<Order, "id" | "taskNumber">): string {
  return String(order.id || order.taskNumber)
}

/**
 * Keep the first occurrence of each {@link orderKey}. Orders with neither
 * id nor taskNumber are kept as-is.
 */
export function dedupeOrders<T extends Pick<Order, "id" | "taskNumber">>(orders: T[]): T[] {
  const seen = new Set<string>()
  const unique: T[] = []
  for (const order of orders) {
    const key = orderKey(order)
    if (key) {
      if (seen.has(key)) continue
      seen.add(key)
    }
    unique.push(order)
  }
  return unique
}

/**
 * Stable descending sort by priority; does not mutate the input.
 */
export function sortByPriority<T extends Pick<Order, "priority">>(orders: T[]): T[] {
  return orders
    .map((order, index) => ({ order, index }))
    .sort((a, b) => b.order.priority - a.order.priority || a.index - b.index)
    .map(({ order }) => order)
}

/**
 * Fisher-Yates shuffle into a new array.
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const copy = [...items]
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    ;[copy[i], copy[j]] = [copy[j], copy[i]]
  }
  return copy
}

/**
 * Integer id when the value is all digits and fits a safe integer,
 * otherwise null.
 */
export function toNumericId(value: string | number | null | undefined): number | null {
  if (typeof value === "number") return Number.isSafeInteger(value) ? value : null
  if (typeof value !== "string") return null
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) return null
  const id = Number.parseInt(trimmed, 10)
  return Number.isSafeInteger(id) ? id : null
}

/** Latest first by `createTime` (string compare on ISO-like timestamps) */
export function sortByCreateTimeDesc<T extends Pick<Order, "createTime">>(orders: T[]): T[] {
  return [...orders].sort((a, b) =>
    a.createTime < b.createTime ? 1 : a.createTime > b.createTime ? -1 : 0
  )
}
