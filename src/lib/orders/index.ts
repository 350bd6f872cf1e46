/**
 * @fileoverview Orders Barrel Export
 *
 * @module lib/orders
 */

export {
  orderSchema,
  isWaitReceive,
  WAIT_RECEIVE,
  FIELD_LIMITS,
  type Order,
  type ScoredOrder,
} from "./types"
export {
  toOrder,
  validateOrder,
  missingFields,
  normalizeFieldName,
  parseExtraData,
  isRecord,
} from "./normalize"
export { buildOrderText } from "./text"
export {
  orderKey,
  dedupeOrders,
  sortByPriority,
  sortByCreateTimeDesc,
  shuffle,
  toNumericId,
  type RandomSource,
} from "./helpers"
