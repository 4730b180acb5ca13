import type { z } from "zod"

import type {
  BaseMemorySchema,
  EpisodicSummarySchema,
  MemoryCategorySchema,
  MemoryLevelSchema,
  MemoryRecordSchema,
  StoredPayloadSchema,
} from "./schemas.js"

export type MemoryLevel = z.infer<typeof MemoryLevelSchema>

export type MemoryCategory = z.infer<typeof MemoryCategorySchema>

export type BaseMemory = z.infer<typeof BaseMemorySchema>

export type MemoryRecord = z.infer<typeof MemoryRecordSchema>

/** Everything stored next to the vector: the record minus its point id. */
export type MemoryMetadata = z.infer<typeof StoredPayloadSchema>

export type EpisodicSummary = z.infer<typeof EpisodicSummarySchema>

export interface MemoryMatch {
  id: string
  content: string
  metadata: MemoryMetadata
  /** Cosine similarity clamped to [0, 1]. */
  score: number
}

export interface Attribution {
  userId: string
  source: string
  id?: string
  createdAt?: string
}
