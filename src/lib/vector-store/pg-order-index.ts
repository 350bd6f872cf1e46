/**
 * @fileoverview pgvector Order Index
 *
 * {@link OrderIndex} over the `orders` table. KNN uses pgvector's cosine
 * distance (`<=>`), accelerated by the HNSW index from the migration;
 * metadata filters are plain WHERE clauses evaluated alongside it.
 *
 * | Distance | Meaning    |
 * |----------|------------|
 * | 0.0      | identical  |
 * | 1.0      | orthogonal |
 * | 2.0      | opposite   |
 *
 * @module lib/vector-store/pg-order-index
 */

import { and, asc, cosineDistance, count, eq, gte, lte, type SQL } from "drizzle-orm"
import type { Database } from "@/db/client"
import { orders, type OrderRow } from "@/db/schema"
import { toNumericId } from "../orders/helpers"
import type { Order, ScoredOrder } from "../orders/types"
import type { IndexedOrder, OrderFilters, OrderIndex } from "./types"

const orderColumns = {
  orderId: orders.orderId,
  taskNumber: orders.taskNumber,
  userId: orders.userId,
  industryName: orders.industryName,
  title: orders.title,
  content: orders.content,
  fullAmount: orders.fullAmount,
  state: orders.state,
  createTime: orders.createTime,
  updateTime: orders.updateTime,
  siteId: orders.siteId,
  promotion: orders.promotion,
  priority: orders.priority,
}

type OrderColumnsRow = Omit<OrderRow, "rowId" | "embedding" | "indexedAt">

function toOrder(row: OrderColumnsRow): Order {
  const { orderId, ...rest } = row
  return { ...rest, id: orderId ?? "" }
}

/**
 * WHERE conditions for {@link OrderFilters}.
 */
export function buildConditions(filters: OrderFilters): SQL[] {
  const conditions: SQL[] = []

  if (filters.id !== undefined && filters.id !== "") {
    const numericId = toNumericId(filters.id)
    conditions.push(
      numericId !== null
        ? eq(orders.orderId, numericId)
        : eq(orders.taskNumber, String(filters.id))
    )
  }
  if (filters.taskNumber !== undefined) conditions.push(eq(orders.taskNumber, filters.taskNumber))
  if (filters.state !== undefined) conditions.push(eq(orders.state, filters.state))
  if (filters.industryName !== undefined) {
    conditions.push(eq(orders.industryName, filters.industryName))
  }
  if (filters.siteId !== undefined) conditions.push(eq(orders.siteId, filters.siteId))
  if (filters.promotion !== undefined) conditions.push(eq(orders.promotion, filters.promotion))
  if (filters.userId !== undefined) conditions.push(eq(orders.userId, filters.userId))
  if (filters.amountMin !== undefined) conditions.push(gte(orders.fullAmount, filters.amountMin))
  if (filters.amountMax !== undefined) conditions.push(lte(orders.fullAmount, filters.amountMax))
  if (filters.createdAtStart !== undefined) {
    conditions.push(gte(orders.createTime, filters.createdAtStart))
  }
  if (filters.createdAtEnd !== undefined) {
    conditions.push(lte(orders.createTime, filters.createdAtEnd))
  }

  return conditions
}

export class PgOrderIndex implements OrderIndex {
  constructor(private readonly db: Database) {}

  async insert(rows: IndexedOrder[]): Promise<void> {
    if (rows.length === 0) return
    await this.db.insert(orders).values(
      rows.map((row) => ({
        orderId: toNumericId(row.id),
        taskNumber: row.taskNumber,
        userId: row.userId,
        industryName: row.industryName,
        title: row.title,
        content: row.content,
        fullAmount: row.fullAmount,
        state: row.state,
        createTime: row.createTime,
        updateTime: row.updateTime,
        siteId: row.siteId,
        promotion: row.promotion,
        priority: row.priority,
        embedding: row.embedding,
      }))
    )
  }

  async deleteById(id: number): Promise<number> {
    const deleted = await this.db
      .delete(orders)
      .where(eq(orders.orderId, id))
      .returning({ rowId: orders.rowId })
    return deleted.length
  }

  async deleteByTaskNumber(taskNumber: string): Promise<number> {
    const deleted = await this.db
      .delete(orders)
      .where(eq(orders.taskNumber, taskNumber))
      .returning({ rowId: orders.rowId })
    return deleted.length
  }

  async deleteAll(): Promise<void> {
    await this.db.delete(orders)
  }

  async knn(vector: number[], filters: OrderFilters, k: number): Promise<ScoredOrder[]> {
    const distance = cosineDistance(orders.embedding, vector).mapWith(Number)

    const rows = await this.db
      .select({ ...orderColumns, distance })
      .from(orders)
      .where(and(...buildConditions(filters)))
      .orderBy(asc(distance))
      .limit(k)

    return rows.map(({ distance: d, ...row }) => ({ ...toOrder(row), distance: d }))
  }

  async query(filters: OrderFilters, limit: number): Promise<Order[]> {
    const rows = await this.db
      .select(orderColumns)
      .from(orders)
      .where(and(...buildConditions(filters)))
      .orderBy(asc(orders.rowId))
      .limit(limit)

    return rows.map(toOrder)
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(orders)
    return row?.value ?? 0
  }
}
