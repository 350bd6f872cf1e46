import { describe, it, expect, beforeEach } from "vitest"
import { EmbeddingCache } from "@/lib/cache/embedding-cache"
import { MemoryCacheStore } from "@/lib/cache/memory-store"
import { VectorStoreError } from "@/lib/errors"
import { createTestOrder } from "@/test/factories"
import { FakeEmbeddingModel, MemoryOrderIndex } from "@/test/fakes"
import { VectorStore, prepareOrder } from "./vector-store"

describe("prepareOrder", () => {
  it("truncates text fields to their column limits", () => {
    const prepared = prepareOrder(
      createTestOrder({
        industryName: "i".repeat(150),
        title: "t".repeat(600),
        content: "c".repeat(2500),
      })
    )

    expect(prepared.industryName).toHaveLength(100)
    expect(prepared.title).toHaveLength(500)
    expect(prepared.content).toHaveLength(2000)
  })

  it("parses numeric string ids", () => {
    expect(prepareOrder(createTestOrder({ id: "42" })).id).toBe(42)
  })

  it("moves a non-numeric id into an empty taskNumber", () => {
    const prepared = prepareOrder(createTestOrder({ id: "ABC-1", taskNumber: "" }))
    expect(prepared.id).toBe("")
    expect(prepared.taskNumber).toBe("ABC-1")
  })
})

describe("VectorStore", () => {
  let index: MemoryOrderIndex
  let model: FakeEmbeddingModel
  let store: VectorStore

  beforeEach(() => {
    index = new MemoryOrderIndex()
    model = new FakeEmbeddingModel(4)
    store = new VectorStore(index, new EmbeddingCache(new MemoryCacheStore(), model))
  })

  describe("upsert", () => {
    it("skips rows missing userId or title", async () => {
      const result = await store.upsert([
        createTestOrder({ id: 1 }),
        createTestOrder({ id: 2, userId: "" }),
        createTestOrder({ id: 3, title: "" }),
      ])

      expect(result).toEqual({ inserted: 1, skipped: 2 })
      expect(index.ids()).toEqual([1])
    })

    it("replaces an existing row with the same id", async () => {
      await store.upsert([createTestOrder({ id: 7, title: "First" })])
      await store.upsert([createTestOrder({ id: 7, title: "Second" })])

      expect(index.rows).toHaveLength(1)
      expect(index.rows[0]?.title).toBe("Second")
    })

    it("embeds the truncated text", async () => {
      await store.upsert([createTestOrder({ title: "t".repeat(600), content: "" })])
      expect(model.calls).toEqual([`标题: ${"t".repeat(500)}`])
    })

    it("wraps index failures in VectorStoreError", async () => {
      index.failing = true
      await expect(store.upsert([createTestOrder()])).rejects.toBeInstanceOf(VectorStoreError)
    })

    it("does not touch the index for an empty batch", async () => {
      index.failing = true
      await expect(store.upsert([])).resolves.toEqual({ inserted: 0, skipped: 0 })
    })
  })

  describe("search", () => {
    it("returns nearest orders first", async () => {
      model.register("标题: logo", [1, 0, 0, 0])
      model.register("标题: website", [0, 1, 0, 0])
      model.register("标题: logo design", [0.9, 0.1, 0, 0])
      await store.upsert([
        createTestOrder({ id: 1, title: "logo", content: "" }),
        createTestOrder({ id: 2, title: "website", content: "" }),
      ])

      const results = await store.search({ title: "logo design", content: "" }, 2)

      expect(results.map((r) => r.id)).toEqual([1, 2])
      expect(results[0]?.distance).toBeLessThan(results[1]?.distance ?? 0)
    })

    it("applies filters", async () => {
      await store.upsert([
        createTestOrder({ id: 1, userId: "owner-1" }),
        createTestOrder({ id: 2, userId: "owner-2" }),
      ])

      const results = await store.search({ title: "Order", content: "" }, 5, {
        userId: "owner-2",
      })

      expect(results.map((r) => r.id)).toEqual([2])
    })

    it("returns an empty list when the index fails", async () => {
      index.failing = true
      await expect(store.search({ title: "x", content: "" }, 5)).resolves.toEqual([])
    })
  })

  describe("remove", () => {
    it("is idempotent", async () => {
      await store.upsert([createTestOrder({ id: 5 })])

      expect(await store.remove(5)).toBe(true)
      expect(await store.remove("5")).toBe(true)
      expect(index.rows).toEqual([])
    })

    it("removes by taskNumber for non-numeric ids", async () => {
      await store.upsert([createTestOrder({ id: "", taskNumber: "ABC-9" })])

      expect(await store.remove("ABC-9")).toBe(true)
      expect(index.rows).toEqual([])
    })

    it("reports false when the index fails", async () => {
      index.failing = true
      expect(await store.remove(5)).toBe(false)
    })
  })

  it("looks up a single order by id", async () => {
    await store.upsert([createTestOrder({ id: 11, title: "Eleven" })])

    expect((await store.getById(11))?.title).toBe("Eleven")
    expect(await store.getById(12)).toBeNull()
  })

  it("updates an order in place", async () => {
    await store.upsert([createTestOrder({ id: 3, title: "Old" })])

    expect(await store.update(3, createTestOrder({ title: "New" }))).toBe(true)
    expect(index.rows.map((r) => [r.id, r.title])).toEqual([[3, "New"]])
  })

  it("throws VectorStoreError when clearing fails", async () => {
    index.failing = true
    await expect(store.clear()).rejects.toBeInstanceOf(VectorStoreError)
  })
})
