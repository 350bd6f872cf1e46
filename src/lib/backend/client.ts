/**
 * @fileoverview Order Backend Client
 *
 * HTTP client for the order system of record. Two endpoints are used:
 *
 * - `GET /open/busy/task/list?id=` pages of orders after an id
 * - `GET /open/busy/task/operation/log?id=` a single operation-log entry
 *
 * Both answer `{code, msg?, data}` with `code == 200` on success. Raw
 * records are normalized into canonical orders at this boundary.
 *
 * @module lib/backend/client
 */

import { z } from "zod"
import { BackendUnavailableError, errorMessage } from "../errors"
import { logger } from "../logger"
import { toNumericId } from "../orders/helpers"
import { isRecord, toOrder } from "../orders/normalize"
import type { Order } from "../orders/types"
import {
  hasOrderSnapshot,
  operationLogSchema,
  toOrderEvent,
  type OrderEvent,
} from "./events"

// =============================================================================
// Types
// =============================================================================

export type PollStopReason = "endOfStream" | "attemptLimit" | "limitReached"

/**
 * Result of walking the operation log.
 */
export interface PollOutcome {
  reason: PollStopReason
  /** Deduped by id, sorted by `operationTime` */
  events: OrderEvent[]
  /** Last log id requested; `startId - 1` when nothing was polled */
  lastPolledId: number
}

export interface PollOptions {
  limit?: number
  maxAttempts?: number
  maxConsecutiveMisses?: number
}

/**
 * The backend operations the core consumes.
 */
export interface BackendApi {
  listOrders(sinceId: number): Promise<Order[]>
  getAllOrders(): Promise<Order[]>
  pollOrderEvents(startId: number, options?: PollOptions): Promise<PollOutcome>
  getOrderById(id: number): Promise<Order | null>
  getUserOrders(userId: string): Promise<Order[]>
  healthCheck(): Promise<boolean>
}

export interface BackendClientOptions {
  baseUrl: string
  timeoutMs?: number
  poll?: PollOptions
}

const USER_AGENT = "order-recommender-sync/2.0.0"
const HEALTH_TIMEOUT_MS = 5_000
const MAX_ORDERS = 10_000
const EXCLUDED_USER_STATES: ReadonlySet<string> = new Set(["Delete", "OffShelf"])

const DEFAULT_POLL = {
  limit: 100,
  maxAttempts: 1000,
  maxConsecutiveMisses: 50,
} satisfies Required<PollOptions>

const envelopeSchema = z.object({
  code: z.union([z.number(), z.string()]).optional(),
  msg: z.string().nullish(),
  data: z.unknown(),
})

type Envelope = z.infer<typeof envelopeSchema>

const isSuccess = (envelope: Envelope) => Number(envelope.code) === 200

// =============================================================================
// Client
// =============================================================================

export class BackendClient implements BackendApi {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly poll: Required<PollOptions>

  constructor(options: BackendClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "")
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.poll = { ...DEFAULT_POLL, ...options.poll }
  }

  /**
   * One page of orders with ids after `sinceId`.
   *
   * @throws {BackendUnavailableError} on transport, HTTP or `code` failure
   */
  async listOrders(sinceId: number): Promise<Order[]> {
    const envelope = await this.request("/open/busy/task/list", sinceId)
    if (!isSuccess(envelope)) {
      throw new BackendUnavailableError(
        `Order list failed: ${envelope.msg ?? `code ${String(envelope.code)}`}`
      )
    }
    return toRecords(envelope.data).map(toOrder)
  }

  /**
   * Every order, following the last id of each page. Stops on an empty
   * page, a non-increasing id, a failed page or {@link MAX_ORDERS}.
   */
  async getAllOrders(): Promise<Order[]> {
    const all: Order[] = []
    let cursor = 0

    while (all.length < MAX_ORDERS) {
      let page: Order[]
      try {
        page = await this.listOrders(cursor)
      } catch (error) {
        logger.warn("Order pagination stopped on error", {
          cursor,
          collected: all.length,
          error: errorMessage(error),
        })
        break
      }
      if (page.length === 0) break

      all.push(...page)
      const last = page[page.length - 1]
      const nextId = last ? toNumericId(last.id) : null
      if (nextId === null || nextId <= cursor) break
      cursor = nextId
    }

    logger.info("Fetched all orders", { count: all.length })
    return all.slice(0, MAX_ORDERS)
  }

  /**
   * Walk log ids upward from `startId`. A miss is any id that yields no
   * new event with an order snapshot; a hit resets the miss counter.
   */
  async pollOrderEvents(startId: number, options: PollOptions = {}): Promise<PollOutcome> {
    const { limit, maxAttempts, maxConsecutiveMisses } = { ...this.poll, ...options }
    const events = new Map<string, OrderEvent>()
    let misses = 0
    let lastPolledId = startId - 1
    let reason: PollStopReason = "attemptLimit"

    for (let walked = 0; walked < maxAttempts; walked++) {
      lastPolledId = startId + walked
      const found = await this.pollOne(lastPolledId, events)
      misses = found ? 0 : misses + 1

      if (misses >= maxConsecutiveMisses) {
        reason = "endOfStream"
        break
      }
      if (events.size >= limit) {
        reason = "limitReached"
        break
      }
    }

    const sorted = [...events.values()].sort((a, b) =>
      a.operationTime < b.operationTime ? -1 : a.operationTime > b.operationTime ? 1 : 0
    )
    logger.info("Polled order events", { startId, lastPolledId, reason, events: sorted.length })
    return { reason, events: sorted, lastPolledId }
  }

  /**
   * Current order by id: the page at `id`, then pages starting a little
   * before it, then the full listing.
   */
  async getOrderById(id: number): Promise<Order | null> {
    const matches = (order: Order) => toNumericId(order.id) === id

    const direct = await this.findInPage(id, matches)
    if (direct) return direct

    for (const start of [0, id - 100, id - 50, id - 10]) {
      if (start < 0) continue
      const found = await this.findInPage(start, matches)
      if (found) return found
    }

    const found = (await this.getAllOrders()).find(matches) ?? null
    if (!found) {
      logger.warn("Order not found in backend", { orderId: id })
    }
    return found
  }

  /**
   * The user's orders, excluding deleted and off-shelf ones.
   */
  async getUserOrders(userId: string): Promise<Order[]> {
    const orders = await this.getAllOrders()
    return orders.filter(
      (order) => order.userId === userId && !EXCLUDED_USER_STATES.has(order.state)
    )
  }

  /**
   * Healthy when the list endpoint answers a body with `code` and `data`.
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(this.url("/open/busy/task/list", 1), {
        headers: this.headers(),
        signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS),
      })
      if (!response.ok) {
        logger.error("Backend health check failed", { status: response.status })
        return false
      }
      const body: unknown = await response.json()
      const healthy = isRecord(body) && body.code !== undefined && body.code !== null && "data" in body
      if (!healthy) {
        logger.warn("Backend health check returned an unexpected body")
      }
      return healthy
    } catch (error) {
      logger.error("Backend health check failed", { error: errorMessage(error) })
      return false
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private url(path: string, id: number): string {
    return `${this.baseUrl}${path}?id=${encodeURIComponent(String(id))}`
  }

  private headers(): Record<string, string> {
    return { "Content-Type": "application/json", "User-Agent": USER_AGENT }
  }

  private async request(path: string, id: number): Promise<Envelope> {
    let response: Response
    try {
      response = await fetch(this.url(path, id), {
        headers: this.headers(),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      throw new BackendUnavailableError(`Backend request failed: ${errorMessage(error)}`)
    }

    if (!response.ok) {
      throw new BackendUnavailableError(
        `Backend responded ${response.status} for ${path}`,
        response.status
      )
    }

    const parsed = envelopeSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new BackendUnavailableError(`Unexpected response shape from ${path}`)
    }
    return parsed.data
  }

  private async findInPage(
    start: number,
    matches: (order: Order) => boolean
  ): Promise<Order | null> {
    try {
      return (await this.listOrders(start)).find(matches) ?? null
    } catch (error) {
      logger.debug("Order page lookup failed", { start, error: errorMessage(error) })
      return null
    }
  }

  /**
   * Request one log id and add its new events. `true` on a hit.
   */
  private async pollOne(id: number, events: Map<string, OrderEvent>): Promise<boolean> {
    let envelope: Envelope
    try {
      envelope = await this.request("/open/busy/task/operation/log", id)
    } catch (error) {
      logger.debug("Event poll miss", { id, error: errorMessage(error) })
      return false
    }
    if (!isSuccess(envelope)) return false

    let added = false
    for (const item of toRecords(envelope.data)) {
      const log = operationLogSchema.safeParse(item)
      if (!log.success) continue
      const key = String(log.data.id)
      if (!key || events.has(key) || !hasOrderSnapshot(log.data.extraData)) continue
      events.set(key, toOrderEvent(log.data))
      added = true
    }
    return added
  }
}

/** `data` arrives as a list or a single object */
function toRecords(data: unknown): Record<string, unknown>[] {
  if (Array.isArray(data)) return data.filter(isRecord)
  return isRecord(data) && Object.keys(data).length > 0 ? [data] : []
}
