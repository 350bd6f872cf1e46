/**
 * @fileoverview Vector Store Barrel Export
 *
 * @module lib/vector-store
 */

export { VectorStore, prepareOrder, type UpsertResult } from "./vector-store"
export { PgOrderIndex, buildConditions } from "./pg-order-index"
export { matchesFilters } from "./filters"
export type { OrderIndex, OrderFilters, IndexedOrder } from "./types"
