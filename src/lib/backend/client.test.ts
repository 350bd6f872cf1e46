import { describe, it, expect, vi, afterEach } from "vitest"
import { BackendUnavailableError } from "@/lib/errors"
import { BackendClient } from "./client"

const BASE_URL = "http://backend.test"
const LIST = "/open/busy/task/list"
const LOG = "/open/busy/task/operation/log"

type Route = (path: string, id: number) => unknown

function jsonResponse(body: unknown, status = 200) {
  return { ok: status < 400, status, json: async () => body } as Response
}

/**
 * Answer every fetch through `route`; a number return is an HTTP status.
 */
function routeFetch(route: Route) {
  return vi.spyOn(global, "fetch").mockImplementation(async (input) => {
    const url = new URL(input instanceof Request ? input.url : String(input))
    const result = route(url.pathname, Number(url.searchParams.get("id")))
    return typeof result === "number" ? jsonResponse({}, result) : jsonResponse(result)
  })
}

function rawOrder(id: number, overrides: Record<string, unknown> = {}) {
  return {
    id,
    taskNumber: `T-${id}`,
    userId: 9,
    title: `Order ${id}`,
    state: "WaitReceive",
    ...overrides,
  }
}

function logEntry(id: number, overrides: Record<string, unknown> = {}) {
  return {
    id,
    taskNumber: `T-${id}`,
    operationType: "UpdateState",
    operationTime: `2024-06-01 10:00:${String(id).padStart(2, "0")}`,
    extraData: JSON.stringify({ id: 100 + id }),
    oldState: "WaitReceive",
    newState: "Accepted",
    ...overrides,
  }
}

describe("BackendClient", () => {
  const client = new BackendClient({ baseUrl: `${BASE_URL}/`, timeoutMs: 1000 })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe("listOrders", () => {
    it("normalizes records and sends the sync headers", async () => {
      const fetchSpy = routeFetch(() => ({ code: 200, data: [rawOrder(1)] }))

      const [order] = await client.listOrders(0)

      expect(order).toMatchObject({ id: 1, userId: "9", title: "Order 1", siteId: "default" })
      expect(fetchSpy).toHaveBeenCalledWith(
        "http://backend.test/open/busy/task/list?id=0",
        expect.objectContaining({
          headers: {
            "Content-Type": "application/json",
            "User-Agent": "order-recommender-sync/2.0.0",
          },
        })
      )
    })

    it("throws BackendUnavailableError for a non-200 code", async () => {
      routeFetch(() => ({ code: 500, msg: "boom", data: null }))
      await expect(client.listOrders(0)).rejects.toThrow("Order list failed: boom")
    })

    it("throws BackendUnavailableError for HTTP errors", async () => {
      routeFetch(() => 502)
      await expect(client.listOrders(0)).rejects.toBeInstanceOf(BackendUnavailableError)
    })
  })

  describe("getAllOrders", () => {
    it("follows the last id of each page until an empty page", async () => {
      const fetchSpy = routeFetch((_, id) => {
        if (id === 0) return { code: 200, data: [rawOrder(1), rawOrder(2)] }
        if (id === 2) return { code: 200, data: [rawOrder(3)] }
        return { code: 200, data: [] }
      })

      const orders = await client.getAllOrders()

      expect(orders.map((o) => o.id)).toEqual([1, 2, 3])
      expect(fetchSpy).toHaveBeenCalledTimes(3)
    })

    it("stops when the last id does not increase", async () => {
      const fetchSpy = routeFetch(() => ({ code: 200, data: [rawOrder(5)] }))

      const orders = await client.getAllOrders()

      expect(orders).toHaveLength(2)
      expect(fetchSpy).toHaveBeenCalledTimes(2)
    })

    it("keeps what it collected when a page fails", async () => {
      routeFetch((_, id) => (id === 0 ? { code: 200, data: [rawOrder(1)] } : 503))
      expect((await client.getAllOrders()).map((o) => o.id)).toEqual([1])
    })
  })

  describe("pollOrderEvents", () => {
    it("stops at the end of the stream after consecutive misses", async () => {
      const fetchSpy = routeFetch((_, id) =>
        id <= 3 ? { code: 200, data: logEntry(id) } : { code: 200, data: null }
      )

      const outcome = await client.pollOrderEvents(1, { maxConsecutiveMisses: 2 })

      expect(outcome.reason).toBe("endOfStream")
      expect(outcome.events.map((e) => e.id)).toEqual([1, 2, 3])
      expect(outcome.lastPolledId).toBe(5)
      expect(fetchSpy).toHaveBeenCalledWith(`${BASE_URL}${LOG}?id=1`, expect.anything())
    })

    it("stops after collecting the limit", async () => {
      routeFetch((_, id) => ({ code: 200, data: [logEntry(id)] }))

      const outcome = await client.pollOrderEvents(10, { limit: 2 })

      expect(outcome).toMatchObject({ reason: "limitReached", lastPolledId: 11 })
      expect(outcome.events).toHaveLength(2)
    })

    it("stops after walking the attempt limit", async () => {
      routeFetch((_, id) => (id % 2 === 0 ? { code: 200, data: logEntry(id) } : 500))

      const outcome = await client.pollOrderEvents(1, { maxAttempts: 4 })

      expect(outcome).toMatchObject({ reason: "attemptLimit", lastPolledId: 4 })
      expect(outcome.events.map((e) => e.id)).toEqual([2, 4])
    })

    it("treats duplicates and (Null) snapshots as misses", async () => {
      routeFetch((_, id) => {
        if (id === 1) return { code: 200, data: [logEntry(1)] }
        if (id === 2) return { code: 200, data: [logEntry(1)] }
        return { code: 200, data: [logEntry(id, { extraData: "(Null)" })] }
      })

      const outcome = await client.pollOrderEvents(1, { maxConsecutiveMisses: 3 })

      expect(outcome.events.map((e) => e.id)).toEqual([1])
      expect(outcome.lastPolledId).toBe(4)
    })

    it("sorts events by operation time", async () => {
      routeFetch((_, id) => {
        if (id === 1) {
          return { code: 200, data: logEntry(1, { operationTime: "2024-06-02 00:00:00" }) }
        }
        if (id === 2) {
          return { code: 200, data: logEntry(2, { operationTime: "2024-06-01 00:00:00" }) }
        }
        return { code: 200, data: [] }
      })

      const outcome = await client.pollOrderEvents(1, { maxConsecutiveMisses: 1 })

      expect(outcome.events.map((e) => e.id)).toEqual([2, 1])
    })
  })

  describe("getOrderById", () => {
    it("returns the order from the direct page", async () => {
      const fetchSpy = routeFetch(() => ({ code: 200, data: [rawOrder(42)] }))

      expect((await client.getOrderById(42))?.title).toBe("Order 42")
      expect(fetchSpy).toHaveBeenCalledTimes(1)
    })

    it("tries earlier pages, skipping negative starts", async () => {
      const fetchSpy = routeFetch((_, id) =>
        id === 20 ? { code: 200, data: [rawOrder(30)] } : { code: 200, data: [] }
      )

      expect((await client.getOrderById(30))?.id).toBe(30)
      expect(fetchSpy.mock.calls.map(([url]) => String(url))).toEqual([
        `${BASE_URL}${LIST}?id=30`,
        `${BASE_URL}${LIST}?id=0`,
        `${BASE_URL}${LIST}?id=20`,
      ])
    })

    it("returns null when every strategy misses", async () => {
      routeFetch(() => ({ code: 200, data: [] }))
      expect(await client.getOrderById(7)).toBeNull()
    })
  })

  it("getUserOrders excludes deleted and off-shelf orders", async () => {
    routeFetch((_, id) =>
      id === 0
        ? {
            code: 200,
            data: [
              rawOrder(1),
              rawOrder(2, { state: "Delete" }),
              rawOrder(3, { state: "OffShelf" }),
              rawOrder(4, { userId: 8 }),
            ],
          }
        : { code: 200, data: [] }
    )

    expect((await client.getUserOrders("9")).map((o) => o.id)).toEqual([1])
  })

  describe("healthCheck", () => {
    it("is healthy when the body has code and data", async () => {
      routeFetch(() => ({ code: 200, data: [] }))
      expect(await client.healthCheck()).toBe(true)
    })

    it("is unhealthy on a body without data", async () => {
      routeFetch(() => ({ code: 200 }))
      expect(await client.healthCheck()).toBe(false)
    })

    it("is unhealthy when the request fails", async () => {
      vi.spyOn(global, "fetch").mockRejectedValueOnce(new Error("ECONNREFUSED"))
      expect(await client.healthCheck()).toBe(false)
    })
  })
})
