import { describe, it, expect, beforeEach, vi } from "vitest"
import { z } from "zod"
import { createTestOrder } from "@/test/factories"
import { poolKey, viewedKey } from "./keys"
import { MemoryCacheStore } from "./memory-store"
import { RecommendationCache, adaptiveTtl, canTransition } from "./recommendation-cache"

describe("canTransition", () => {
  it("moves forward only", () => {
    expect(canTransition("pending", "processing")).toBe(true)
    expect(canTransition("processing", "completed")).toBe(true)
    expect(canTransition("pending", "completed_with_fallback")).toBe(true)
    expect(canTransition("processing", "pending")).toBe(false)
  })

  it("treats completed, failed and fallback as terminal", () => {
    expect(canTransition("completed", "failed")).toBe(false)
    expect(canTransition("failed", "processing")).toBe(false)
    expect(canTransition("completed", "completed")).toBe(true)
  })
})

describe("adaptiveTtl", () => {
  it("scales the base TTL by access count", () => {
    expect(adaptiveTtl(150, 1000)).toBe(3000)
    expect(adaptiveTtl(75, 1000)).toBe(2000)
    expect(adaptiveTtl(20, 1000)).toBe(1000)
    expect(adaptiveTtl(3, 1001)).toBe(500)
  })
})

describe("RecommendationCache", () => {
  let store: MemoryCacheStore
  let cache: RecommendationCache

  beforeEach(() => {
    store = new MemoryCacheStore()
    cache = new RecommendationCache(store)
  })

  describe("initial and final tiers", () => {
    it("uses a 30 minute TTL for initial and 2 hours for final", async () => {
      await cache.setInitial("u1", [createTestOrder()])
      await cache.setFinal("u1", [createTestOrder()])

      expect(await store.ttl("business_rec:rec:initial:v2.0.0:u1")).toBe(1800)
      expect(await store.ttl("business_rec:rec:final:v2.0.0:u1")).toBe(7200)
    })

    it("slims initial payloads but keeps final ones whole", async () => {
      const order = createTestOrder({ title: "t".repeat(150), content: "c".repeat(300) })

      await cache.setInitial("u1", [order])
      await cache.setFinal("u1", [order])

      const [initial] = (await cache.getInitial("u1")) ?? []
      const [final] = (await cache.getFinal("u1")) ?? []
      expect(initial?.title).toHaveLength(100)
      expect(initial?.content).toHaveLength(200)
      expect(final?.content).toHaveLength(300)
    })

    it("wraps data in a versioned envelope", async () => {
      await cache.setFinal("u1", [createTestOrder(), createTestOrder()])

      const raw = JSON.parse((await store.get("business_rec:rec:final:v2.0.0:u1")) ?? "null")
      expect(raw.metadata).toMatchObject({
        count: 2,
        version: "v2.0.0",
        type: "final_recommendations",
      })
    })

    it("discards envelopes from another version", async () => {
      const key = "business_rec:rec:final:v2.0.0:u1"
      await store.set(
        key,
        JSON.stringify({
          data: [],
          metadata: { cachedAt: 0, count: 0, version: "v1.0.0", type: "final_recommendations" },
        })
      )

      expect(await cache.getFinal("u1")).toBeNull()
      expect(await store.get(key)).toBeNull()
    })

    it("reads an unreachable store as a miss", async () => {
      vi.spyOn(store, "get").mockRejectedValueOnce(new Error("ECONNREFUSED"))
      expect(await cache.getInitial("u1")).toBeNull()
    })

    it("reports a failed write as a warning", async () => {
      vi.spyOn(store, "set").mockRejectedValueOnce(new Error("READONLY"))

      const result = await cache.setFinal("u1", [])

      expect(result).toEqual({
        ok: false,
        error: {
          operation: "setFinal",
          key: "business_rec:rec:final:v2.0.0:u1",
          message: "READONLY",
        },
      })
    })
  })

  describe("task status", () => {
    it("stores status under the user's task key for 10 minutes", async () => {
      await cache.setTaskStatus("u1", "task-1", "pending")

      expect(await store.ttl("business_rec:task:v2.0.0:u1:task-1")).toBe(600)
      expect(await cache.getTaskStatus("u1", "task-1")).toMatchObject({
        taskId: "task-1",
        status: "pending",
      })
    })

    it("rejects backward transitions and keeps the stored status", async () => {
      await cache.setTaskStatus("u1", "task-1", "completed", { count: 3 })

      const result = await cache.setTaskStatus("u1", "task-1", "processing")

      expect(result.ok).toBe(false)
      expect(await cache.getTaskStatus("u1", "task-1")).toMatchObject({
        status: "completed",
        result: { count: 3 },
      })
    })

    it("lists only pending and processing tasks as active", async () => {
      await cache.setTaskStatus("u1", "a", "pending")
      await cache.setTaskStatus("u1", "b", "processing")
      await cache.setTaskStatus("u1", "c", "failed")
      await cache.setTaskStatus("u2", "d", "pending")

      expect((await cache.getActiveTaskIds("u1")).sort()).toEqual(["a", "b"])
    })
  })

  describe("invalidateUser", () => {
    it("deletes every per-user tier and nothing of other users", async () => {
      await cache.setInitial("u1", [createTestOrder()])
      await cache.setFinal("u1", [createTestOrder()])
      await cache.setTaskStatus("u1", "t1", "pending")
      await cache.setData(poolKey("u1"), [])
      await cache.setData(viewedKey("u1"), ["1"])
      await cache.setFinal("u2", [createTestOrder()])

      const result = await cache.invalidateUser("u1")

      expect(result).toEqual({ ok: true, value: 5 })
      expect(await store.keys("*")).toEqual(["business_rec:rec:final:v2.0.0:u2"])
    })

    it("attempts every key and names the ones it could not delete", async () => {
      await cache.setFinal("u1", [createTestOrder()])
      const del = store.del.bind(store)
      vi.spyOn(store, "del").mockImplementation(async (...keys) => {
        if (keys.includes("business_rec:rec:initial:v2.0.0:u1")) throw new Error("timeout")
        return del(...keys)
      })

      const result = await cache.invalidateUser("u1")

      expect(result).toEqual({
        ok: false,
        error: {
          operation: "invalidateUser",
          key: "business_rec:rec:initial:v2.0.0:u1",
          message: "timeout",
        },
      })
      expect(await cache.getFinal("u1")).toBeNull()
    })
  })

  it("invalidateAll clears initial, final and task entries for everyone", async () => {
    await cache.setInitial("u1", [])
    await cache.setFinal("u2", [])
    await cache.setTaskStatus("u3", "t", "pending")
    await cache.setRecommendationWithReverseMapping("u1", [{ id: 1 }])

    expect(await cache.invalidateAll()).toEqual({ ok: true, value: 3 })
    expect(await cache.getUserRecommendations("u1")).toEqual(["1"])
  })

  describe("reverse mapping", () => {
    it("merges users into each order's reverse entry", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }, { id: 2 }])
      await cache.setRecommendationWithReverseMapping("userB", [{ id: 2 }, { id: 3 }])

      expect(await cache.getOrderAffectedUsers("1")).toEqual(["userA"])
      expect(await cache.getOrderAffectedUsers("2")).toEqual(["userA", "userB"])
      expect(await cache.getOrderAffectedUsers("3")).toEqual(["userB"])
      expect(await store.ttl("business_rec:order_users:v2.0.0:2")).toBe(3600)
    })

    it("does not duplicate a user on rewrite", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }])
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }])

      expect(await cache.getOrderAffectedUsers("1")).toEqual(["userA"])
    })

    it("takes the id from order_id or backend_order_code", async () => {
      await cache.setRecommendationWithReverseMapping("u1", [
        { order_id: "A" },
        { backend_order_code: 9 },
        { id: "" },
      ])

      expect(await cache.getUserRecommendations("u1")).toEqual(["A", "9"])
    })

    it("falls back to the taskNumber for orders without an id", async () => {
      await cache.setRecommendationWithReverseMapping("u1", [{ id: "", taskNumber: "ORD-abc" }])

      expect(await cache.getUserRecommendations("u1")).toEqual(["ORD-abc"])
      expect(await cache.getOrderAffectedUsers("ORD-abc")).toEqual(["u1"])
    })

    it("rejects a list with no order ids", async () => {
      const result = await cache.setRecommendationWithReverseMapping("u1", [{ id: "" }])

      expect(result.ok).toBe(false)
      expect(await cache.getUserRecommendations("u1")).toBeNull()
    })

    it("keeps reverse entries for orders dropped from a rewritten list", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }])
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 2 }])

      expect(await cache.getOrderAffectedUsers("1")).toEqual(["userA"])
    })
  })

  describe("removeOrderFromAllRecommendations", () => {
    it("removes the order from every affected user and drops the reverse entry", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }, { id: 2 }])
      await cache.setRecommendationWithReverseMapping("userB", [{ id: 2 }, { id: 3 }])

      const result = await cache.removeOrderFromAllRecommendations("2")

      expect(result).toEqual({
        ok: true,
        value: { affectedUsers: ["userA", "userB"], failedUsers: [] },
      })
      expect(await cache.getUserRecommendations("userA")).toEqual(["1"])
      expect(await cache.getUserRecommendations("userB")).toEqual(["3"])
      expect(await store.get("business_rec:order_users:v2.0.0:2")).toBeNull()
    })

    it("succeeds with no affected users", async () => {
      expect(await cache.removeOrderFromAllRecommendations("404")).toEqual({
        ok: true,
        value: { affectedUsers: [], failedUsers: [] },
      })
    })

    it("tolerates users whose list no longer holds the order", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }])
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 5 }])

      await cache.removeOrderFromAllRecommendations("1")

      expect(await cache.getUserRecommendations("userA")).toEqual(["5"])
    })

    it("collects users whose list could not be rewritten", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 2 }])
      await cache.setRecommendationWithReverseMapping("userB", [{ id: 2 }])
      const set = store.set.bind(store)
      vi.spyOn(store, "set").mockImplementation(async (key, value, ttl) => {
        if (key === "business_rec:user_rec:v2.0.0:userA") throw new Error("timeout")
        return set(key, value, ttl)
      })

      const result = await cache.removeOrderFromAllRecommendations("2")

      expect(result).toEqual({
        ok: true,
        value: { affectedUsers: ["userA", "userB"], failedUsers: ["userA"] },
      })
    })
  })

  describe("removeOrderFromUserRecommendations", () => {
    it("removes one user's entry in both directions", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }, { id: 2 }])
      await cache.setRecommendationWithReverseMapping("userB", [{ id: 1 }])

      expect(await cache.removeOrderFromUserRecommendations("userA", "1")).toEqual({
        ok: true,
        value: true,
      })
      expect(await cache.getUserRecommendations("userA")).toEqual(["2"])
      expect(await cache.getOrderAffectedUsers("1")).toEqual(["userB"])
    })

    it("is idempotent", async () => {
      await cache.setRecommendationWithReverseMapping("userA", [{ id: 1 }])

      await cache.removeOrderFromUserRecommendations("userA", "1")
      const second = await cache.removeOrderFromUserRecommendations("userA", "1")

      expect(second).toEqual({ ok: true, value: false })
      expect(await store.get("business_rec:order_users:v2.0.0:1")).toBeNull()
    })
  })

  it("clearOrderMapping deletes the reverse and per-order entries", async () => {
    await cache.setRecommendationWithReverseMapping("u1", [{ id: 8 }])
    await store.set("business_rec:order_rec:v2.0.0:8", "[]")

    expect(await cache.clearOrderMapping("8")).toEqual({ ok: true, value: 2 })
  })

  it("clearAllRecommendations drops both directions of the mapping", async () => {
    await cache.setRecommendationWithReverseMapping("u1", [{ id: 1 }, { id: 2 }])
    await cache.setFinal("u1", [])

    expect(await cache.clearAllRecommendations()).toEqual({ ok: true, value: 3 })
    expect(await store.keys("*")).toEqual(["business_rec:rec:final:v2.0.0:u1"])
  })

  describe("platform and cold-start caches", () => {
    it("stores platform orders slimmed under the global key", async () => {
      await cache.setPlatformOrders([createTestOrder({ content: "c".repeat(250) })])

      const [order] = (await cache.getPlatformOrders()) ?? []
      expect(order?.content).toHaveLength(200)
      expect(await store.ttl("business_rec:platform:orders:v2.0.0:global")).toBe(3600)
    })

    it("stores cold-start orders per role", async () => {
      await cache.setColdStart("designer", [createTestOrder({ title: "Poster" })])

      expect((await cache.getColdStart("designer"))?.map((o) => o.title)).toEqual(["Poster"])
      expect(await cache.getColdStart("developer")).toBeNull()
      expect(await store.ttl("business_rec:cold:start:v2.0.0:designer")).toBe(1800)
    })
  })

  describe("generic data", () => {
    it("round-trips validated values with a one hour default TTL", async () => {
      await cache.setData("viewed_orders_u1", ["1", "2"])

      expect(await cache.getData("viewed_orders_u1", z.array(z.string()))).toEqual(["1", "2"])
      expect(await store.ttl("viewed_orders_u1")).toBe(3600)
    })

    it("reads values failing the schema as absent", async () => {
      await cache.setData("k", { not: "a list" })
      expect(await cache.getData("k", z.array(z.string()))).toBeNull()
    })
  })

  it("counts keys per category", async () => {
    await cache.setInitial("u1", [])
    await cache.setInitial("u2", [])
    await cache.setRecommendationWithReverseMapping("u1", [{ id: 1 }])

    const stats = await cache.getStatistics()

    expect(stats["rec:initial"]).toBe(2)
    expect(stats.user_rec).toBe(1)
    expect(stats.order_users).toBe(1)
    expect(stats.embedding).toBe(0)
  })

  it("pings the store", async () => {
    expect(await cache.ping()).toBe(true)
    vi.spyOn(store, "ping").mockRejectedValueOnce(new Error("down"))
    expect(await cache.ping()).toBe(false)
  })
})
