export type { ErrorCategory, ErrorClassification } from "./classify.js"
export { classifyError } from "./classify.js"
export type {
  FilterableField,
  MemoryCollection,
  PointSearchRequest,
  PointStore,
  ScoredPoint,
  SearchOptions,
  StoredPoint,
} from "./collection.js"
export { DEFAULT_TOP_K, INDEXED_FIELDS, QdrantMemoryCollection } from "./collection.js"
export type { EmbeddingFunction } from "./embedding.js"
export { cosineSimilarity, normalizeScore } from "./embedding.js"
export type { MemoryErrorKind } from "./errors.js"
export {
  MemoryError,
  ServiceError,
  StorageError,
  toServiceError,
  toStorageError,
  ValidationError,
} from "./errors.js"
export type { CollectionOptions, QdrantConnection } from "./init.js"
export { DISTANCE, getOrCreateCollection, parseConnectionString } from "./init.js"
export type { RecallOptions } from "./recall.js"
export { filterMatches, recall } from "./recall.js"
export { attributeMemory, toSentence, validateBaseMemory, validateMemoryRecord } from "./record.js"
export type { RetryConfig, RetryOptions } from "./retry.js"
export { calculateRetryDelay, DEFAULT_RETRY_CONFIG, withRetry } from "./retry.js"
export {
  AttributionSchema,
  BaseMemorySchema,
  CATEGORY_PRIORITY,
  EpisodicSummarySchema,
  MEMORY_CATEGORIES,
  MEMORY_LEVELS,
  MemoryCategorySchema,
  MemoryLevelSchema,
  MemoryRecordSchema,
  StoredPayloadSchema,
} from "./schemas.js"
export type {
  Attribution,
  BaseMemory,
  EpisodicSummary,
  MemoryCategory,
  MemoryLevel,
  MemoryMatch,
  MemoryMetadata,
  MemoryRecord,
} from "./types.js"
