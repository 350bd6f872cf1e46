/**
 * @fileoverview Order Operation Events
 *
 * The backend exposes its order state changes as an operation log. Each
 * log entry carries the order snapshot as `extraData` (JSON string or
 * object) plus the old and new state.
 *
 * @module lib/backend/events
 */

import { z } from "zod"
import { isRecord, parseExtraData } from "../orders/normalize"

export const OrderEventType = {
  CREATED: "order_created",
  UPDATED: "order_updated",
  COMPLETED: "order_completed",
  DELETED: "order_deleted",
} as const

export type OrderEventType = (typeof OrderEventType)[keyof typeof OrderEventType]

const OPERATION_TYPES: Record<string, OrderEventType> = {
  Create: OrderEventType.CREATED,
  UpdateState: OrderEventType.UPDATED,
  Finish: OrderEventType.COMPLETED,
  Delete: OrderEventType.DELETED,
  OffShelf: OrderEventType.DELETED,
  OnShelf: OrderEventType.CREATED,
}

export function mapOperationType(operationType: string): OrderEventType {
  return OPERATION_TYPES[operationType] ?? OrderEventType.UPDATED
}

const idSchema = z.union([z.string(), z.number()])
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)))

export const operationLogSchema = z.object({
  id: idSchema,
  taskNumber: optionalText,
  operationType: optionalText,
  operationTime: optionalText,
  extraData: z.unknown().optional(),
  userId: optionalText,
  oldState: optionalText,
  newState: optionalText,
  operatorId: optionalText,
  remark: optionalText,
})

export type OperationLog = z.infer<typeof operationLogSchema>

export interface OrderEvent {
  /** Log entry id; the sync cursor walks these */
  id: string | number
  eventType: OrderEventType
  operationType: string
  operationTime: string
  taskNumber: string
  oldState: string | null
  newState: string | null
  /** Parsed `extraData` snapshot, `{}` when absent */
  order: Record<string, unknown>
  extraData: unknown
}

/** `extraData` present and not the backend's `(Null)` marker */
export function hasOrderSnapshot(extraData: unknown): boolean {
  if (isRecord(extraData)) return Object.keys(extraData).length > 0
  if (typeof extraData !== "string") return false
  const trimmed = extraData.trim()
  return trimmed !== "" && trimmed !== "(Null)"
}

export function toOrderEvent(log: OperationLog): OrderEvent {
  const operationType = log.operationType ?? ""
  return {
    id: log.id,
    eventType: mapOperationType(operationType),
    operationType,
    operationTime: log.operationTime ?? "",
    taskNumber: log.taskNumber ?? "",
    oldState: log.oldState,
    newState: log.newState,
    order: parseExtraData(log.extraData),
    extraData: log.extraData,
  }
}

const DIGITS = /^\d+$/

function digitId(value: unknown): number | null {
  if (typeof value === "number") return Number.isSafeInteger(value) && value > 0 ? value : null
  if (typeof value === "string" && DIGITS.test(value)) {
    const id = Number.parseInt(value, 10)
    return Number.isSafeInteger(id) && id > 0 ? id : null
  }
  return null
}

/**
 * Backend order id referenced by an event: the snapshot's `id`, then the
 * raw `extraData` id, then a digit run of 4+ characters in `taskNumber`.
 */
export function extractOrderId(
  event: Pick<OrderEvent, "order" | "extraData" | "taskNumber">
): number | null {
  const fromSnapshot = digitId(event.order.id)
  if (fromSnapshot !== null) return fromSnapshot

  const fromExtra = digitId(parseExtraData(event.extraData).id)
  if (fromExtra !== null) return fromExtra

  const match = /\d+/.exec(event.taskNumber)
  if (match && match[0].length > 3) {
    const id = Number.parseInt(match[0], 10)
    return Number.isSafeInteger(id) ? id : null
  }
  return null
}

const LOCAL_DATETIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T/
const NUMERIC = /^\d+(\.\d+)?$/

/**
 * Epoch seconds for an event time: `YYYY-MM-DD HH:mm:ss` in local time,
 * then ISO 8601, then a numeric string. Anything else is `now`.
 */
export function parseEventTime(value: string, now: () => number = Date.now): number {
  const trimmed = value.trim()

  const local = LOCAL_DATETIME.exec(trimmed)
  if (local) {
    const [, y, mo, d, h, mi, s] = local.map(Number)
    const date = new Date(y, mo - 1, d, h, mi, s)
    if (!Number.isNaN(date.getTime())) return Math.floor(date.getTime() / 1000)
  }

  if (ISO_DATETIME.test(trimmed)) {
    const ms = Date.parse(trimmed)
    if (!Number.isNaN(ms)) return Math.floor(ms / 1000)
  }

  if (NUMERIC.test(trimmed)) {
    return Math.floor(Number(trimmed))
  }

  return Math.floor(now() / 1000)
}
