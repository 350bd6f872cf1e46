/**
 * @fileoverview Order Index Contract
 *
 * {@link OrderIndex} is the raw storage behind `VectorStore`: rows already
 * validated, truncated and embedded. Production uses pgvector through
 * drizzle (`PgOrderIndex`); tests use an in-process index.
 *
 * @module lib/vector-store/types
 */

import type { Order, ScoredOrder } from "../orders/types"

/**
 * Exact-match and range filters. Every field is optional; omitted fields
 * do not constrain the result.
 */
export interface OrderFilters {
  /** Numeric id, or taskNumber when the value is not all digits */
  id?: string | number
  taskNumber?: string
  state?: string
  industryName?: string
  siteId?: string
  promotion?: boolean
  userId?: string
  amountMin?: number
  amountMax?: number
  /** Inclusive bounds compared against `createTime` as strings */
  createdAtStart?: string
  createdAtEnd?: string
}

/** An order ready to store, with its embedding */
export interface IndexedOrder extends Order {
  embedding: number[]
}

export interface OrderIndex {
  insert(rows: IndexedOrder[]): Promise<void>
  /** Returns the number of rows removed */
  deleteById(id: number): Promise<number>
  deleteByTaskNumber(taskNumber: string): Promise<number>
  deleteAll(): Promise<void>
  /** Nearest first by cosine distance */
  knn(vector: number[], filters: OrderFilters, k: number): Promise<ScoredOrder[]>
  query(filters: OrderFilters, limit: number): Promise<Order[]>
  count(): Promise<number>
}
