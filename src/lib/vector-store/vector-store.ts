/**
 * @fileoverview Vector Store
 *
 * One embedded row per open order. The invariant maintained by callers
 * (sync engine, engine cascades) is that an order is indexed iff its state
 * is `WaitReceive`; this class only enforces row validity.
 *
 * Only {@link VectorStore.upsert} surfaces errors. Reads degrade to empty
 * results and `remove` reports failure through its return value.
 *
 * @module lib/vector-store/vector-store
 */

import type { EmbeddingCache } from "../cache/embedding-cache"
import { VectorStoreError, errorMessage, isAppError } from "../errors"
import { logger } from "../logger"
import { toNumericId } from "../orders/helpers"
import { missingFields } from "../orders/normalize"
import { FIELD_LIMITS, type Order, type ScoredOrder } from "../orders/types"
import type { IndexedOrder, OrderFilters, OrderIndex } from "./types"

export interface UpsertResult {
  inserted: number
  skipped: number
}

/**
 * Storage form of an order: text fields truncated, the id an integer or
 * empty. A non-numeric id becomes the taskNumber when none is set, so
 * `remove` can still find the row.
 */
export function prepareOrder(order: Order): Order {
  const numericId = toNumericId(order.id)
  return {
    ...order,
    id: numericId ?? "",
    taskNumber: order.taskNumber || (numericId === null ? String(order.id) : ""),
    industryName: order.industryName.slice(0, FIELD_LIMITS.industryName),
    title: order.title.slice(0, FIELD_LIMITS.title),
    content: order.content.slice(0, FIELD_LIMITS.content),
    siteId: String(order.siteId),
  }
}

export class VectorStore {
  constructor(
    private readonly index: OrderIndex,
    private readonly embeddings: EmbeddingCache
  ) {}

  /**
   * Insert or replace orders. Invalid rows are skipped and logged.
   *
   * @throws {VectorStoreError} when embedding or the index write fails
   */
  async upsert(orders: Order[]): Promise<UpsertResult> {
    const rows: IndexedOrder[] = []
    let skipped = 0

    try {
      for (const order of orders) {
        const missing = missingFields(order)
        if (missing.length > 0) {
          skipped++
          logger.warn("Skipping invalid order", {
            orderId: String(order.id || order.taskNumber),
            missing: missing.join(","),
          })
          continue
        }
        const prepared = prepareOrder(order)
        rows.push({ ...prepared, embedding: await this.embeddings.forOrder(prepared) })
      }

      for (const row of rows) {
        await this.deleteExisting(row)
      }
      if (rows.length > 0) {
        await this.index.insert(rows)
      }
    } catch (error) {
      if (error instanceof VectorStoreError) throw error
      throw new VectorStoreError(`Upsert failed: ${errorMessage(error)}`, [
        {
          message: errorMessage(error),
          code: isAppError(error) ? error.code : undefined,
        },
      ])
    }

    logger.info("Orders upserted", { inserted: rows.length, skipped })
    return { inserted: rows.length, skipped }
  }

  /**
   * KNN around the query order's text, restricted by `filters`.
   */
  async search(
    query: Pick<Order, "title" | "content">,
    k: number,
    filters: OrderFilters = {}
  ): Promise<ScoredOrder[]> {
    try {
      const vector = await this.embeddings.forOrder(query)
      return await this.index.knn(vector, filters, k)
    } catch (error) {
      logger.warn("Vector search failed", { k, error: errorMessage(error) })
      return []
    }
  }

  /**
   * Idempotent delete. `true` when the delete ran, even if nothing matched.
   */
  async remove(orderId: string | number): Promise<boolean> {
    try {
      const numericId = toNumericId(orderId)
      const removed =
        numericId !== null
          ? await this.index.deleteById(numericId)
          : await this.index.deleteByTaskNumber(String(orderId))
      logger.info("Order removed from index", { orderId: String(orderId), removed })
      return true
    } catch (error) {
      logger.warn("Order removal failed", {
        orderId: String(orderId),
        error: errorMessage(error),
      })
      return false
    }
  }

  async getByFilter(filters: OrderFilters, limit = 100): Promise<Order[]> {
    try {
      return await this.index.query(filters, limit)
    } catch (error) {
      logger.warn("Filtered order query failed", { error: errorMessage(error) })
      return []
    }
  }

  async getById(id: string | number): Promise<Order | null> {
    const [order] = await this.getByFilter({ id }, 1)
    return order ?? null
  }

  /** Delete then insert under the given id */
  async update(id: string | number, order: Order): Promise<boolean> {
    await this.remove(id)
    const { inserted } = await this.upsert([{ ...order, id }])
    return inserted === 1
  }

  async clear(): Promise<void> {
    try {
      await this.index.deleteAll()
    } catch (error) {
      throw new VectorStoreError(`Clear failed: ${errorMessage(error)}`)
    }
  }

  async count(): Promise<number> {
    return this.index.count()
  }

  private async deleteExisting(row: Order): Promise<void> {
    const numericId = toNumericId(row.id)
    if (numericId !== null) {
      await this.index.deleteById(numericId)
    } else if (row.taskNumber) {
      await this.index.deleteByTaskNumber(row.taskNumber)
    }
  }
}
