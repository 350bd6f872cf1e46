/**
 * @fileoverview Sync Engine
 *
 * Keeps the order index aligned with the backend of record. A full sync
 * rebuilds the index from the order listing; incremental syncs replay the
 * operation log from a cursor and apply {@link decideTransition}.
 *
 * Removing an order always cascades through the recommendation cache
 * first, so no user list keeps pointing at an order the index no longer
 * holds.
 *
 * @module lib/sync/sync-engine
 */

import { z } from "zod"
import type { BackendApi, PollOutcome } from "../backend/client"
import {
  OrderEventType,
  extractOrderId,
  parseEventTime,
  type OrderEvent,
} from "../backend/events"
import { CacheTTL, SYNC_STATUS_KEY } from "../cache/keys"
import type { RecommendationCache } from "../cache/recommendation-cache"
import type { CacheStore } from "../cache/store"
import { NotFoundError, ValidationError, errorMessage } from "../errors"
import { logger } from "../logger"
import { toNumericId } from "../orders/helpers"
import { missingFields, toOrder } from "../orders/normalize"
import { WAIT_RECEIVE, isWaitReceive, type Order } from "../orders/types"
import { map, unwrapOr } from "../result"
import type { VectorStore } from "../vector-store/vector-store"
import { decideTransition, type SyncAction } from "./transitions"

export const syncCursorSchema = z.object({
  lastEventId: z.number(),
  /** Epoch seconds */
  lastSyncTimestamp: z.number().nullable(),
  totalOrders: z.number(),
  /** ISO timestamp */
  lastSyncTime: z.string().nullable(),
})

export type SyncCursor = z.infer<typeof syncCursorSchema>

export const EMPTY_CURSOR: SyncCursor = {
  lastEventId: 0,
  lastSyncTimestamp: null,
  totalOrders: 0,
  lastSyncTime: null,
}

export interface ProcessedEvent {
  event: OrderEvent
  action: SyncAction
  /** Order id or taskNumber the action applied to */
  orderCode: string | null
  /** The order written to the index, for inserts */
  order?: Order
  /** Users whose lists held the order before removal */
  affectedUsers: string[]
}

export interface SyncEventsResult {
  processed: ProcessedEvent[]
  failed: OrderEvent[]
  outcome: PollOutcome
}

export interface SyncEngineDeps {
  backend: BackendApi
  vectorStore: VectorStore
  cache: RecommendationCache
  /** Holds the sync cursor */
  store: CacheStore
  /** Epoch milliseconds */
  now?: () => number
}

const FORCED_REMOVALS: ReadonlySet<string> = new Set([
  OrderEventType.DELETED,
  OrderEventType.COMPLETED,
])

/**
 * Whether an event is past the cursor: by id when numeric, otherwise by
 * operation time. Everything is new to an empty cursor.
 */
export function isNewEvent(event: Pick<OrderEvent, "id" | "operationTime">, cursor: SyncCursor) {
  if (cursor.lastEventId === 0) return true
  const id = toNumericId(event.id)
  if (id !== null) return id > cursor.lastEventId
  return parseEventTime(event.operationTime) > (cursor.lastSyncTimestamp ?? 0)
}

export class SyncEngine {
  private readonly backend: BackendApi
  private readonly vectorStore: VectorStore
  private readonly cache: RecommendationCache
  private readonly store: CacheStore
  private readonly now: () => number

  constructor(deps: SyncEngineDeps) {
    this.backend = deps.backend
    this.vectorStore = deps.vectorStore
    this.cache = deps.cache
    this.store = deps.store
    this.now = deps.now ?? Date.now
  }

  // ---------------------------------------------------------------------------
  // Cursor
  // ---------------------------------------------------------------------------

  async getStatus(): Promise<SyncCursor> {
    try {
      const raw = await this.store.get(SYNC_STATUS_KEY)
      if (raw === null) return { ...EMPTY_CURSOR }
      const parsed = syncCursorSchema.safeParse(JSON.parse(raw))
      return parsed.success ? parsed.data : { ...EMPTY_CURSOR }
    } catch (error) {
      logger.warn("Sync cursor unreadable, starting from zero", { error: errorMessage(error) })
      return { ...EMPTY_CURSOR }
    }
  }

  private async writeCursor(cursor: SyncCursor): Promise<void> {
    try {
      await this.store.set(SYNC_STATUS_KEY, JSON.stringify(cursor), CacheTTL.SYNC_STATUS)
    } catch (error) {
      logger.warn("Sync cursor not saved", { error: errorMessage(error) })
    }
  }

  private stamp(): Pick<SyncCursor, "lastSyncTimestamp" | "lastSyncTime"> {
    const ms = this.now()
    return { lastSyncTimestamp: Math.floor(ms / 1000), lastSyncTime: new Date(ms).toISOString() }
  }

  // ---------------------------------------------------------------------------
  // Full sync
  // ---------------------------------------------------------------------------

  /**
   * Rebuild the index from the full listing and reset every
   * recommendation cache. Returns `false` without touching anything when
   * the backend is unhealthy or has no orders.
   */
  async syncAll(): Promise<boolean> {
    if (!(await this.backend.healthCheck())) {
      logger.error("Full sync skipped: backend unhealthy")
      return false
    }

    const orders = await this.backend.getAllOrders()
    if (orders.length === 0) {
      logger.warn("Full sync skipped: backend returned no orders")
      return false
    }

    const open = orders.filter(isWaitReceive)
    try {
      await this.vectorStore.clear()
      const { inserted, skipped } = await this.vectorStore.upsert(open)
      logger.info("Full sync indexed orders", { total: orders.length, inserted, skipped })
    } catch (error) {
      logger.error("Full sync failed", { error: errorMessage(error) })
      return false
    }

    await this.writeCursor({ lastEventId: 0, totalOrders: orders.length, ...this.stamp() })
    await this.cache.clearAllRecommendations()
    await this.cache.invalidateAll()
    return true
  }

  /**
   * Run a full sync when the index is empty. `true` when the index holds
   * orders afterwards.
   */
  async ensureSeeded(): Promise<boolean> {
    try {
      if ((await this.vectorStore.count()) > 0) return true
    } catch (error) {
      logger.error("Order index unavailable", { error: errorMessage(error) })
      return false
    }
    logger.info("Order index empty, running full sync")
    return this.syncAll()
  }

  // ---------------------------------------------------------------------------
  // Incremental sync
  // ---------------------------------------------------------------------------

  /**
   * Replay operation-log events after the cursor. The cursor advances to
   * the highest new event id once at least one event was processed.
   */
  async syncEvents(): Promise<SyncEventsResult> {
    const cursor = await this.getStatus()
    const startId = cursor.lastEventId > 0 ? cursor.lastEventId + 1 : 1
    const outcome = await this.backend.pollOrderEvents(startId)

    const fresh = outcome.events.filter((event) => isNewEvent(event, cursor))
    const processed: ProcessedEvent[] = []
    const failed: OrderEvent[] = []

    for (const event of fresh) {
      try {
        processed.push(await this.processEvent(event))
      } catch (error) {
        failed.push(event)
        logger.error("Order event failed", {
          eventId: String(event.id),
          error: errorMessage(error),
        })
      }
    }

    if (processed.length > 0) {
      const highest = fresh.reduce(
        (max, event) => Math.max(max, toNumericId(event.id) ?? 0),
        cursor.lastEventId
      )
      await this.writeCursor({ ...cursor, lastEventId: highest, ...this.stamp() })
    }

    logger.info("Incremental sync finished", {
      reason: outcome.reason,
      polled: outcome.events.length,
      processed: processed.length,
      failed: failed.length,
    })
    return { processed, failed, outcome }
  }

  /**
   * Poll and keep events whose ids fall within `[start, end]`.
   */
  async getEventsInRange(start: number, end: number): Promise<OrderEvent[]> {
    if (end < start) return []
    const span = end - start + 1
    const { events } = await this.backend.pollOrderEvents(start, {
      limit: span,
      maxAttempts: span,
    })
    return events.filter((event) => {
      const id = toNumericId(event.id)
      return id !== null && id >= start && id <= end
    })
  }

  /**
   * Apply one event to the index.
   *
   * @throws when an insert cannot resolve a valid order
   */
  async processEvent(event: OrderEvent): Promise<ProcessedEvent> {
    const snapshotState = typeof event.order.state === "string" ? event.order.state : null
    let action = decideTransition(event.oldState, event.newState ?? snapshotState)
    if (action === "noop" && FORCED_REMOVALS.has(event.eventType)) {
      action = "remove"
    }

    const orderId = extractOrderId(event)
    const orderCode = orderId !== null ? String(orderId) : event.taskNumber || null

    switch (action) {
      case "insert": {
        const order = await this.resolveOpenOrder(event, orderId)
        if (!isWaitReceive(order)) {
          logger.info("Order already left WaitReceive, not indexing", {
            orderCode: orderCode ?? "",
            state: order.state,
          })
          return { event, action: "noop", orderCode, affectedUsers: [] }
        }
        const { inserted } = await this.vectorStore.upsert([order])
        if (inserted === 0) {
          throw ValidationError.missingFields(missingFields(order))
        }
        return { event, action, orderCode, order, affectedUsers: [] }
      }
      case "remove": {
        const affectedUsers = orderCode ? (await this.removeOrder(orderCode)).affectedUsers : []
        return { event, action, orderCode, affectedUsers }
      }
      default:
        return { event, action, orderCode, affectedUsers: [] }
    }
  }

  // ---------------------------------------------------------------------------
  // Removal
  // ---------------------------------------------------------------------------

  /**
   * Cascade an order out of every user list, then out of the index.
   * Idempotent; an empty code is a no-op returning `false`.
   */
  async forceRemove(orderCode: string | number): Promise<boolean> {
    const code = String(orderCode).trim()
    if (!code) return false
    return (await this.removeOrder(code)).removed
  }

  private async removeOrder(code: string): Promise<{ removed: boolean; affectedUsers: string[] }> {
    const cascade = await this.cache.removeOrderFromAllRecommendations(code)
    const affectedUsers = unwrapOr(
      map(cascade, (removed) => removed.affectedUsers),
      []
    )
    const removed = await this.vectorStore.remove(code)
    logger.info("Order force-removed", { orderCode: code, removed, users: affectedUsers.length })
    return { removed, affectedUsers }
  }

  /**
   * The current backend order, falling back to the event's snapshot.
   */
  private async resolveOpenOrder(event: OrderEvent, orderId: number | null): Promise<Order> {
    const fetched = orderId !== null ? await this.backend.getOrderById(orderId) : null
    if (fetched) return fetched

    const snapshot: Order = { ...toOrder(event.order), state: WAIT_RECEIVE }
    if (!snapshot.taskNumber) snapshot.taskNumber = event.taskNumber
    const missing = missingFields(snapshot)
    if (missing.length > 0) {
      if (orderId === null) {
        throw ValidationError.missingFields(missing)
      }
      throw new NotFoundError(`Order ${orderId} not found in backend`)
    }
    return snapshot
  }
}
