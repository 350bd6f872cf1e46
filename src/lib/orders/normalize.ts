/**
 * @fileoverview Boundary Normalization
 *
 * Converts raw backend records (camelCase, snake_case or legacy names, with
 * an optional `extraData` JSON overlay) into canonical {@link Order}s.
 *
 * @module lib/orders/normalize
 */

import aliases from "./field-aliases.json"
import { ValidationError } from "../errors"
import type { Order } from "./types"

type CanonicalField = keyof typeof aliases

const aliasLookup: Map<string, CanonicalField> = (() => {
  const lookup = new Map<string, CanonicalField>()
  for (const field of Object.keys(aliases)) {
    if (!isCanonicalField(field)) continue
    for (const alias of aliases[field]) {
      lookup.set(alias.toLowerCase().trim(), field)
    }
  }
  return lookup
})()

function isCanonicalField(field: string): field is CanonicalField {
  return Object.prototype.hasOwnProperty.call(aliases, field)
}

/**
 * Canonical name for a raw field, or the lowercased name when unknown.
 */
export function normalizeFieldName(field: string): string {
  const key = field.toLowerCase().trim()
  return aliasLookup.get(key) ?? key
}

/**
 * Parse `extraData`, which arrives as a JSON string or an object.
 * Unparseable payloads and the backend's `(Null)` marker yield `{}`.
 */
export function parseExtraData(extraData: unknown): Record<string, unknown> {
  if (isRecord(extraData)) return extraData
  if (typeof extraData !== "string") return {}
  const trimmed = extraData.trim()
  if (!trimmed || trimmed === "(Null)") return {}
  try {
    const parsed: unknown = JSON.parse(trimmed)
    return isRecord(parsed) ? parsed : {}
  } catch {
    return {}
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function asString(value: unknown, fallback: string): string {
  if (value === null || value === undefined) return fallback
  return typeof value === "string" ? value : String(value)
}

function asNumber(value: unknown, fallback: number): number {
  const parsed = typeof value === "number" ? value : Number(value)
  return value === null || value === undefined || value === "" || Number.isNaN(parsed)
    ? fallback
    : parsed
}

function asBoolean(value: unknown): boolean {
  if (typeof value === "string") return value === "true" || value === "1"
  return Boolean(value)
}

/**
 * Convert a raw backend record into a canonical order.
 *
 * `extraData` wins over top-level fields. Aliases resolve to the first
 * canonical field they match; the first non-null alias value is kept.
 */
export function toOrder(record: Record<string, unknown>): Order {
  const merged = { ...record, ...parseExtraData(record.extraData) }

  const fields: Partial<Record<CanonicalField, unknown>> = {}
  for (const [rawKey, value] of Object.entries(merged)) {
    const canonical = aliasLookup.get(rawKey.toLowerCase().trim())
    if (!canonical || value === null || value === undefined) continue
    if (fields[canonical] === undefined) fields[canonical] = value
  }

  const id = fields.id
  return {
    id: typeof id === "number" || typeof id === "string" ? id : "",
    taskNumber: asString(fields.taskNumber, ""),
    userId: asString(fields.userId, ""),
    industryName: asString(fields.industryName, "N/A"),
    title: asString(fields.title, ""),
    content: asString(fields.content, ""),
    fullAmount: asNumber(fields.fullAmount, 0),
    state: asString(fields.state, "N/A"),
    createTime: asString(fields.createTime, "2024-01-01"),
    updateTime: asString(fields.updateTime, "2024-01-01"),
    siteId: asString(fields.siteId, "default"),
    promotion: asBoolean(fields.promotion),
    priority: asNumber(fields.priority, 0),
  }
}

const REQUIRED_FIELDS = ["userId", "title"] as const

/**
 * Names of required fields that are empty.
 */
export function missingFields(order: Partial<Pick<Order, "userId" | "title">>): string[] {
  return REQUIRED_FIELDS.filter((field) => !order[field])
}

/**
 * @throws {ValidationError} listing every empty required field
 */
export function validateOrder(order: Partial<Pick<Order, "userId" | "title">>): void {
  const missing = missingFields(order)
  if (missing.length > 0) {
    throw ValidationError.missingFields(missing)
  }
}
