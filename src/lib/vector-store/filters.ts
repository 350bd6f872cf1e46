import { toNumericId } from "../orders/helpers"
import type { Order } from "../orders/types"
import type { OrderFilters } from "./types"

/**
 * In-memory evaluation of {@link OrderFilters}, with the same semantics as
 * the SQL built by `PgOrderIndex`.
 */
export function matchesFilters(order: Order, filters: OrderFilters): boolean {
  if (filters.id !== undefined && filters.id !== "") {
    const numericId = toNumericId(filters.id)
    if (numericId !== null) {
      if (toNumericId(order.id) !== numericId) return false
    } else if (order.taskNumber !== String(filters.id)) {
      return false
    }
  }
  if (filters.taskNumber !== undefined && order.taskNumber !== filters.taskNumber) return false
  if (filters.state !== undefined && order.state !== filters.state) return false
  if (filters.industryName !== undefined && order.industryName !== filters.industryName) {
    return false
  }
  if (filters.siteId !== undefined && order.siteId !== filters.siteId) return false
  if (filters.promotion !== undefined && order.promotion !== filters.promotion) return false
  if (filters.userId !== undefined && order.userId !== filters.userId) return false
  if (filters.amountMin !== undefined && order.fullAmount < filters.amountMin) return false
  if (filters.amountMax !== undefined && order.fullAmount > filters.amountMax) return false
  if (filters.createdAtStart !== undefined && order.createTime < filters.createdAtStart) {
    return false
  }
  if (filters.createdAtEnd !== undefined && order.createTime > filters.createdAtEnd) {
    return false
  }
  return true
}
