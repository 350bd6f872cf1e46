/**
 * @fileoverview Order Backend Barrel Export
 *
 * @module lib/backend
 */

export {
  BackendClient,
  type BackendApi,
  type BackendClientOptions,
  type PollOptions,
  type PollOutcome,
  type PollStopReason,
} from "./client"
export {
  OrderEventType,
  extractOrderId,
  hasOrderSnapshot,
  mapOperationType,
  operationLogSchema,
  parseEventTime,
  toOrderEvent,
  type OperationLog,
  type OrderEvent,
} from "./events"
