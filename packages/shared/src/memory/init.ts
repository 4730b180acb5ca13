import { QdrantClient } from "@qdrant/js-client-rest"
import { z } from "zod"

import { TracingLogger } from "../tracing/logger.js"
import { INDEXED_FIELDS, QdrantMemoryCollection } from "./collection.js"
import type { EmbeddingFunction } from "./embedding.js"
import { StorageError, toStorageError } from "./errors.js"

/** Every collection uses cosine distance; recall thresholds assume it. */
export const DISTANCE = "Cosine"

const COLLECTION_NAME = /^[A-Za-z0-9_-]{1,255}$/

export interface QdrantConnection {
  url: string
  apiKey?: string
  prefix?: string
}

/**
 * Parse `http(s)://host[:port][/prefix][?api_key=…]` into Qdrant client
 * options.
 */
export function parseConnectionString(connectionString: string): QdrantConnection {
  let parsed: URL
  try {
    parsed = new URL(connectionString.trim())
  } catch (err) {
    throw new StorageError("Invalid vector store connection string", { cause: err })
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new StorageError(
      `Unsupported vector store protocol "${parsed.protocol}", expected http or https`,
    )
  }

  const apiKey = parsed.searchParams.get("api_key") ?? parsed.searchParams.get("apiKey") ?? undefined
  const prefix = parsed.pathname.replace(/\/+$/, "")
  return {
    url: `${parsed.protocol}//${parsed.host}`,
    ...(apiKey ? { apiKey } : {}),
    ...(prefix ? { prefix } : {}),
  }
}

const VectorParamsSchema = z.object({
  size: z.number().int(),
  distance: z.string(),
})

export interface CollectionOptions {
  logger?: TracingLogger
  /** Per-request timeout for store calls, in milliseconds. */
  timeoutMs?: number
}

/**
 * Connect to the store and return a handle on `collectionName`, creating the
 * collection (cosine distance, `embedding.dimensions` wide, keyword indexes
 * on userId/category/level) when it does not exist yet. Repeated calls with
 * the same name return handles on the same collection.
 */
export async function getOrCreateCollection(
  connectionString: string,
  embedding: EmbeddingFunction,
  collectionName: string,
  options: CollectionOptions = {},
): Promise<QdrantMemoryCollection> {
  if (!COLLECTION_NAME.test(collectionName)) {
    throw new StorageError(`Invalid collection name "${collectionName}"`)
  }
  if (!Number.isInteger(embedding.dimensions) || embedding.dimensions < 1) {
    throw new StorageError(`Embedding dimensions must be a positive integer, got ${embedding.dimensions}`)
  }

  const logger = options.logger ?? new TracingLogger()
  const client = new QdrantClient({
    ...parseConnectionString(connectionString),
    timeout: options.timeoutMs,
    checkCompatibility: false,
  })

  if (await collectionExists(client, collectionName)) {
    await assertCompatible(client, collectionName, embedding.dimensions)
  } else if (await createCollection(client, collectionName, embedding.dimensions)) {
    await createPayloadIndexes(client, collectionName)
    logger.info("memory collection created", {
      collection: collectionName,
      dimensions: embedding.dimensions,
    })
  } else {
    await assertCompatible(client, collectionName, embedding.dimensions)
  }

  return new QdrantMemoryCollection(client, collectionName, embedding, logger)
}

async function collectionExists(client: QdrantClient, name: string): Promise<boolean> {
  try {
    const { collections } = await client.getCollections()
    return collections.some((c) => c.name === name)
  } catch (err) {
    throw toStorageError("Vector store unreachable", err)
  }
}

/**
 * Create the collection. Resolves to false when another caller created it
 * first; any other failure is a StorageError.
 */
async function createCollection(client: QdrantClient, name: string, size: number): Promise<boolean> {
  try {
    await client.createCollection(name, {
      vectors: { size, distance: DISTANCE },
    })
    return true
  } catch (err) {
    if (await collectionExists(client, name)) return false
    throw toStorageError(`Failed to create collection "${name}"`, err)
  }
}

async function createPayloadIndexes(client: QdrantClient, name: string): Promise<void> {
  try {
    await Promise.all(
      INDEXED_FIELDS.map((field) =>
        client.createPayloadIndex(name, {
          field_name: field,
          field_schema: "keyword",
          wait: true,
        }),
      ),
    )
  } catch (err) {
    throw toStorageError(`Failed to index collection "${name}"`, err)
  }
}

async function assertCompatible(client: QdrantClient, name: string, dimensions: number): Promise<void> {
  let vectors: unknown
  try {
    const info = await client.getCollection(name)
    vectors = info.config.params.vectors
  } catch (err) {
    throw toStorageError(`Failed to read collection "${name}"`, err)
  }

  const params = VectorParamsSchema.safeParse(vectors)
  if (!params.success) {
    throw new StorageError(`Collection "${name}" does not use a single unnamed vector`)
  }
  if (params.data.size !== dimensions || params.data.distance !== DISTANCE) {
    throw new StorageError(
      `Collection "${name}" is ${params.data.size}-d ${params.data.distance}, ` +
        `expected ${dimensions}-d ${DISTANCE}`,
    )
  }
}
