import { describe, it, expect } from "vitest"
import {
  extractOrderId,
  hasOrderSnapshot,
  mapOperationType,
  operationLogSchema,
  parseEventTime,
  toOrderEvent,
} from "./events"

describe("mapOperationType", () => {
  it.each([
    ["Create", "order_created"],
    ["UpdateState", "order_updated"],
    ["Finish", "order_completed"],
    ["Delete", "order_deleted"],
    ["OffShelf", "order_deleted"],
    ["OnShelf", "order_created"],
    ["Reassign", "order_updated"],
  ])("maps %s to %s", (operationType, eventType) => {
    expect(mapOperationType(operationType)).toBe(eventType)
  })
})

describe("hasOrderSnapshot", () => {
  it("rejects empty and (Null) payloads", () => {
    expect(hasOrderSnapshot("")).toBe(false)
    expect(hasOrderSnapshot("(Null)")).toBe(false)
    expect(hasOrderSnapshot(null)).toBe(false)
    expect(hasOrderSnapshot({})).toBe(false)
  })

  it("accepts JSON strings and objects", () => {
    expect(hasOrderSnapshot('{"id":1}')).toBe(true)
    expect(hasOrderSnapshot({ id: 1 })).toBe(true)
  })
})

describe("toOrderEvent", () => {
  it("parses the snapshot and maps the operation", () => {
    const log = operationLogSchema.parse({
      id: 12,
      taskNumber: "T-12",
      operationType: "Finish",
      operationTime: "2024-06-01 10:00:00",
      extraData: '{"id":501,"title":"Logo"}',
      oldState: "WaitReceive",
      newState: "Completed",
    })

    expect(toOrderEvent(log)).toEqual({
      id: 12,
      eventType: "order_completed",
      operationType: "Finish",
      operationTime: "2024-06-01 10:00:00",
      taskNumber: "T-12",
      oldState: "WaitReceive",
      newState: "Completed",
      order: { id: 501, title: "Logo" },
      extraData: '{"id":501,"title":"Logo"}',
    })
  })

  it("fills absent fields with null or empty strings", () => {
    const event = toOrderEvent(operationLogSchema.parse({ id: "x" }))

    expect(event.oldState).toBeNull()
    expect(event.newState).toBeNull()
    expect(event.taskNumber).toBe("")
    expect(event.order).toEqual({})
  })
})

describe("extractOrderId", () => {
  it("prefers the snapshot id", () => {
    expect(extractOrderId({ order: { id: "501" }, extraData: "", taskNumber: "T-9999" })).toBe(
      501
    )
  })

  it("falls back to the raw extraData id", () => {
    expect(extractOrderId({ order: {}, extraData: '{"id":77}', taskNumber: "" })).toBe(77)
  })

  it("takes a digit run longer than three characters from taskNumber", () => {
    expect(extractOrderId({ order: {}, extraData: null, taskNumber: "ORD-20240601" })).toBe(
      20240601
    )
    expect(extractOrderId({ order: {}, extraData: null, taskNumber: "ORD-123" })).toBeNull()
  })

  it("returns null for digit runs too long to be exact", () => {
    expect(
      extractOrderId({ order: {}, extraData: null, taskNumber: "ORD-12345678901234567" })
    ).toBeNull()
    expect(
      extractOrderId({ order: { id: "12345678901234567" }, extraData: null, taskNumber: "" })
    ).toBeNull()
  })

  it("ignores non-digit ids", () => {
    expect(extractOrderId({ order: { id: "abc" }, extraData: null, taskNumber: "" })).toBeNull()
  })
})

describe("parseEventTime", () => {
  const now = () => 1_700_000_000_500

  it("reads YYYY-MM-DD HH:mm:ss as local time", () => {
    expect(parseEventTime("2024-01-02 03:04:05", now)).toBe(
      Math.floor(new Date(2024, 0, 2, 3, 4, 5).getTime() / 1000)
    )
  })

  it("reads ISO 8601", () => {
    expect(parseEventTime("2024-01-02T03:04:05Z", now)).toBe(1704164645)
  })

  it("reads numeric strings as epoch seconds", () => {
    expect(parseEventTime("1700000000.9", now)).toBe(1700000000)
  })

  it("falls back to now", () => {
    expect(parseEventTime("yesterday", now)).toBe(1700000000)
  })
})
