import { TracingLogger } from "../tracing/logger.js"
import { addSpanEvent, MemoryAttributes, withSpan } from "../tracing/spans.js"
import { type EmbeddingFunction, normalizeScore } from "./embedding.js"
import { StorageError, toStorageError, ValidationError } from "./errors.js"
import { validateMemoryRecord } from "./record.js"
import { StoredPayloadSchema } from "./schemas.js"
import type { MemoryMatch, MemoryMetadata, MemoryRecord } from "./types.js"

export const DEFAULT_TOP_K = 10

/** Payload fields that carry a keyword index and can be matched exactly. */
export type FilterableField = "userId" | "category" | "level" | "source" | "type"

export const INDEXED_FIELDS: readonly FilterableField[] = ["userId", "category", "level"]

export interface SearchOptions {
  /** Maximum matches to return (default 10). */
  topK?: number
  /** Exact-match payload filter, pushed down into the store query. */
  filter?: Partial<Record<FilterableField, string>>
  /**
   * Drop matches scoring below this. Pushed down to the store only when
   * positive: the store compares raw cosine (-1..1) while returned scores are
   * clamped to [0, 1], and the two orders agree only above zero.
   */
  scoreThreshold?: number
  signal?: AbortSignal
}

/**
 * A named, additive-only namespace of embedded memories. Handles are safe to
 * share between concurrent callers: nothing is cached per call.
 */
export interface MemoryCollection {
  readonly name: string
  readonly embedding: EmbeddingFunction
  /** Embed and store one record; resolves to the stored point id. */
  add(record: MemoryRecord, options?: { signal?: AbortSignal }): Promise<string>
  /** Nearest neighbours of `query`, highest score first. */
  search(query: string, options?: SearchOptions): Promise<MemoryMatch[]>
}

// ──────────────────────────────────────────────────
// Point store: the slice of QdrantClient a collection uses
// ──────────────────────────────────────────────────

export interface StoredPoint {
  id: string
  vector: number[]
  payload: Record<string, unknown>
}

export interface PointSearchRequest {
  vector: number[]
  limit: number
  filter?: { must: Array<{ key: string; match: { value: string } }> }
  score_threshold?: number
  with_payload: boolean
}

export interface ScoredPoint {
  id: string | number
  score: number
  payload?: Record<string, unknown> | null
}

/** Structurally satisfied by `QdrantClient`; swapped for an in-memory store in tests. */
export interface PointStore {
  upsert(collectionName: string, request: { wait: boolean; points: StoredPoint[] }): Promise<unknown>
  search(collectionName: string, request: PointSearchRequest): Promise<ScoredPoint[]>
}

// ──────────────────────────────────────────────────
// Qdrant-backed collection
// ──────────────────────────────────────────────────

export class QdrantMemoryCollection implements MemoryCollection {
  private readonly logger: TracingLogger

  constructor(
    readonly client: PointStore,
    readonly name: string,
    readonly embedding: EmbeddingFunction,
    logger: TracingLogger = new TracingLogger(),
  ) {
    this.logger = logger.child({ collection: name })
  }

  async add(record: MemoryRecord, options: { signal?: AbortSignal } = {}): Promise<string> {
    const valid = validateMemoryRecord(record)

    return withSpan(
      "caremem.memory.add",
      async () => {
        const vector = await this.embed(valid.content, options.signal)
        const { id, ...payload } = valid

        try {
          options.signal?.throwIfAborted()
          await this.client.upsert(this.name, {
            wait: true,
            points: [{ id, vector, payload }],
          })
        } catch (err) {
          throw toStorageError(`Failed to store memory ${id} in "${this.name}"`, err)
        }

        this.logger.debug("memory stored", {
          memoryId: id,
          userId: valid.userId,
          level: valid.level,
          category: valid.category,
        })
        return id
      },
      {
        [MemoryAttributes.COLLECTION]: this.name,
        [MemoryAttributes.USER_ID]: valid.userId,
        [MemoryAttributes.LEVEL]: valid.level,
        [MemoryAttributes.CATEGORY]: valid.category,
      },
    )
  }

  async search(query: string, options: SearchOptions = {}): Promise<MemoryMatch[]> {
    const { topK = DEFAULT_TOP_K, filter, scoreThreshold, signal } = options
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`)
    }

    const vector = await this.embed(query, signal)
    const must = Object.entries(filter ?? {}).flatMap(([key, value]) =>
      value === undefined ? [] : [{ key, match: { value } }],
    )

    let hits: ScoredPoint[]
    try {
      signal?.throwIfAborted()
      hits = await this.client.search(this.name, {
        vector,
        limit: topK,
        filter: must.length > 0 ? { must } : undefined,
        score_threshold: scoreThreshold !== undefined && scoreThreshold > 0 ? scoreThreshold : undefined,
        with_payload: true,
      })
    } catch (err) {
      throw toStorageError(`Search failed in "${this.name}"`, err)
    }
    addSpanEvent("caremem.memory.search", {
      [MemoryAttributes.COLLECTION]: this.name,
      [MemoryAttributes.TOP_K]: topK,
      [MemoryAttributes.RESULT_COUNT]: hits.length,
    })

    return hits
      .filter((hit) => scoreThreshold === undefined || normalizeScore(hit.score) >= scoreThreshold)
      .map((hit) => {
        const metadata = this.parsePayload(hit.id, hit.payload)
        return {
          id: String(hit.id),
          content: metadata.content,
          metadata,
          score: normalizeScore(hit.score),
        }
      })
      .sort((a, b) => b.score - a.score)
  }

  private async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let vector: number[]
    try {
      vector = await this.embedding.embed(text, { signal })
    } catch (err) {
      throw toStorageError(`Embedding failed for "${this.name}"`, err)
    }
    if (vector.length !== this.embedding.dimensions) {
      throw new StorageError(
        `Embedding returned ${vector.length} dimensions, collection "${this.name}" expects ${this.embedding.dimensions}`,
      )
    }
    return vector
  }

  private parsePayload(id: string | number, payload: unknown): MemoryMetadata {
    const result = StoredPayloadSchema.safeParse(payload)
    if (!result.success) {
      throw new StorageError(`Malformed payload on point ${id} in "${this.name}"`, {
        cause: result.error,
      })
    }
    return result.data
  }
}
