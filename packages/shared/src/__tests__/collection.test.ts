import { randomUUID } from "node:crypto"

import { beforeEach, describe, expect, it, vi } from "vitest"

import { type PointStore, QdrantMemoryCollection } from "../memory/collection.js"
import { cosineSimilarity, normalizeScore } from "../memory/embedding.js"
import { StorageError, ValidationError } from "../memory/errors.js"
import { attributeMemory } from "../memory/record.js"
import type { MemoryRecord } from "../memory/types.js"
import { TracingLogger } from "../tracing/logger.js"
import { InMemoryPointStore, KeywordEmbedding } from "../testing/index.js"

// ──────────────────────────────────────────────────
// Fixtures
// ──────────────────────────────────────────────────

const VOCABULARY = ["name", "jay", "tea", "garden", "daughter", "mary"]
const logger = new TracingLogger({ level: "error" })

function makeRecord(overrides: Partial<MemoryRecord> = {}): MemoryRecord {
  return {
    ...attributeMemory(
      { content: "user's name is Jay", level: "LTM", category: "BIO_INFO", type: "name", topics: [] },
      { userId: "Jay Hanks", source: "QUERY" },
    ),
    ...overrides,
  }
}

let store: InMemoryPointStore
let embedding: KeywordEmbedding
let collection: QdrantMemoryCollection

beforeEach(() => {
  store = new InMemoryPointStore()
  embedding = new KeywordEmbedding(VOCABULARY)
  collection = new QdrantMemoryCollection(store, "memories", embedding, logger)
})

// ──────────────────────────────────────────────────
// Embedding helpers
// ──────────────────────────────────────────────────

describe("cosineSimilarity", () => {
  it("is 1 for parallel vectors and 0 for orthogonal ones", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1)
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
  })

  it("is 0 for mismatched lengths or zero vectors", () => {
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0)
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
  })
})

describe("normalizeScore", () => {
  it("clamps into [0, 1]", () => {
    expect(normalizeScore(-0.3)).toBe(0)
    expect(normalizeScore(1.0000002)).toBe(1)
    expect(normalizeScore(0.42)).toBe(0.42)
    expect(normalizeScore(Number.NaN)).toBe(0)
  })
})

describe("KeywordEmbedding", () => {
  it("counts vocabulary words and ignores the rest", async () => {
    expect(await embedding.embed("What is my NAME? name!")).toEqual([2, 0, 0, 0, 0, 0])
    expect(embedding.dimensions).toBe(6)
  })
})

// ──────────────────────────────────────────────────
// add
// ──────────────────────────────────────────────────

describe("QdrantMemoryCollection.add", () => {
  it("stores one point keyed by the record id", async () => {
    const record = makeRecord()
    const upsert = vi.spyOn(store, "upsert")

    await expect(collection.add(record)).resolves.toBe(record.id)

    expect(store.count("memories")).toBe(1)
    expect(upsert).toHaveBeenCalledWith("memories", {
      wait: true,
      points: [
        {
          id: record.id,
          vector: [1, 1, 0, 0, 0, 0],
          payload: {
            content: "user's name is Jay",
            level: "LTM",
            category: "BIO_INFO",
            type: "name",
            topics: [],
            userId: "Jay Hanks",
            source: "QUERY",
            createdAt: record.createdAt,
          },
        },
      ],
    })
  })

  it("rejects an invalid record without touching the store", async () => {
    const upsert = vi.spyOn(store, "upsert")
    const embed = vi.spyOn(embedding, "embed")

    await expect(collection.add(makeRecord({ content: "" }))).rejects.toBeInstanceOf(ValidationError)
    expect(upsert).not.toHaveBeenCalled()
    expect(embed).not.toHaveBeenCalled()
  })

  it("does not restrict the level", async () => {
    const record = makeRecord({ level: "STM" })
    await expect(collection.add(record)).resolves.toBe(record.id)
  })

  it("reports an embedding failure as a StorageError", async () => {
    vi.spyOn(embedding, "embed").mockRejectedValueOnce(new Error("model offline"))

    await expect(collection.add(makeRecord())).rejects.toThrow(
      new StorageError('Embedding failed for "memories": model offline'),
    )
    expect(store.count("memories")).toBe(0)
  })

  it("rejects vectors of the wrong width", async () => {
    vi.spyOn(embedding, "embed").mockResolvedValueOnce([1, 0])

    const err = await collection.add(makeRecord()).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(StorageError)
    expect(err).toHaveProperty(
      "message",
      'Embedding returned 2 dimensions, collection "memories" expects 6',
    )
  })

  it("wraps store write failures", async () => {
    vi.spyOn(store, "upsert").mockRejectedValueOnce(
      Object.assign(new Error("Service Unavailable"), { status: 503 }),
    )
    const record = makeRecord()

    const err = await collection.add(record).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(StorageError)
    expect(err).toMatchObject({
      message: `Failed to store memory ${record.id} in "memories": Service Unavailable`,
      retryable: true,
    })
  })

  it("honours an aborted signal before writing", async () => {
    const upsert = vi.spyOn(store, "upsert")
    const controller = new AbortController()
    controller.abort()

    await expect(collection.add(makeRecord(), { signal: controller.signal })).rejects.toBeInstanceOf(
      StorageError,
    )
    expect(upsert).not.toHaveBeenCalled()
  })
})

// ──────────────────────────────────────────────────
// search
// ──────────────────────────────────────────────────

describe("QdrantMemoryCollection.search", () => {
  it("returns nothing for an empty collection", async () => {
    await expect(collection.search("what is my name?")).resolves.toEqual([])
  })

  it("returns matches with metadata, highest score first", async () => {
    const name = makeRecord()
    const tea = makeRecord({
      id: "0b7e7a57-8f3c-4c52-9a8e-2f4a1c9d3b10",
      content: "tea with Mary every Sunday",
      type: "ritual",
      category: "PREFERENCES",
    })
    await collection.add(tea)
    await collection.add(name)

    const matches = await collection.search("my name is jay")

    expect(matches.map((m) => m.id)).toEqual([name.id, tea.id])
    expect(matches[0]?.score).toBeCloseTo(1)
    expect(matches[1]?.score).toBe(0)
    expect(matches[0]?.content).toBe("user's name is Jay")
    expect(matches[0]?.metadata).toEqual({
      content: "user's name is Jay",
      level: "LTM",
      category: "BIO_INFO",
      type: "name",
      topics: [],
      userId: "Jay Hanks",
      source: "QUERY",
      createdAt: name.createdAt,
    })
  })

  it("scores a partial match by cosine similarity", async () => {
    await collection.add(makeRecord())
    const [match] = await collection.search("what is my name?")
    expect(match?.score).toBeCloseTo(Math.SQRT1_2)
  })

  it("limits results to topK, defaulting to 10", async () => {
    for (let i = 0; i < 12; i++) {
      await collection.add(makeRecord({ id: randomUUID() }))
    }
    const search = vi.spyOn(store, "search")

    expect(await collection.search("name")).toHaveLength(10)
    expect(await collection.search("name", { topK: 3 })).toHaveLength(3)
    expect(search.mock.calls.map((call) => call[1].limit)).toEqual([10, 3])
  })

  it.each([0, -1, 2.5])("rejects topK %s", async (topK) => {
    await expect(collection.search("name", { topK })).rejects.toBeInstanceOf(ValidationError)
  })

  it("pushes filters and threshold down to the store", async () => {
    const search = vi.spyOn(store, "search")

    await collection.search("name", {
      filter: { userId: "Jay Hanks", category: "BIO_INFO" },
      scoreThreshold: 0.6,
    })

    expect(search).toHaveBeenCalledWith("memories", {
      vector: [1, 0, 0, 0, 0, 0],
      limit: 10,
      filter: {
        must: [
          { key: "userId", match: { value: "Jay Hanks" } },
          { key: "category", match: { value: "BIO_INFO" } },
        ],
      },
      score_threshold: 0.6,
      with_payload: true,
    })
  })

  it("omits the filter when none is given", async () => {
    const search = vi.spyOn(store, "search")
    await collection.search("name")
    expect(search.mock.calls[0]?.[1].filter).toBeUndefined()
  })

  it("does not push a threshold of zero or below down to the store", async () => {
    const search = vi.spyOn(store, "search")

    await collection.search("name", { scoreThreshold: 0 })
    await collection.search("name", { scoreThreshold: -0.5 })

    expect(search.mock.calls.map((call) => call[1].score_threshold)).toEqual([undefined, undefined])
  })

  it("fails on a malformed stored payload", async () => {
    await store.upsert("memories", {
      wait: true,
      points: [{ id: "p-1", vector: [1, 0, 0, 0, 0, 0], payload: { text: "legacy" } }],
    })

    await expect(collection.search("name")).rejects.toThrow(
      new StorageError('Malformed payload on point p-1 in "memories"'),
    )
  })

  it("clamps scores and re-sorts what the store returns", async () => {
    const { id: _id, ...stored } = makeRecord()
    const client: PointStore = {
      upsert: async () => ({}),
      search: async () => [
        { id: "a", score: 0.2, payload: stored },
        { id: 7, score: 1.0000003, payload: stored },
      ],
    }
    const custom = new QdrantMemoryCollection(client, "memories", embedding, logger)

    const matches = await custom.search("name")
    expect(matches.map((m) => [m.id, m.score])).toEqual([
      ["7", 1],
      ["a", 0.2],
    ])
  })

  it("wraps store read failures", async () => {
    vi.spyOn(store, "search").mockRejectedValueOnce(
      Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }),
    )

    await expect(collection.search("name")).rejects.toMatchObject({
      name: "StorageError",
      message: 'Search failed in "memories": connect ECONNREFUSED',
      retryable: true,
    })
  })
})
