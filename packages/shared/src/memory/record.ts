import { randomUUID } from "node:crypto"

import { ValidationError } from "./errors.js"
import { BaseMemorySchema, MemoryRecordSchema } from "./schemas.js"
import type { Attribution, BaseMemory, MemoryRecord } from "./types.js"

export function validateBaseMemory(input: unknown): BaseMemory {
  const result = BaseMemorySchema.safeParse(input)
  if (!result.success) {
    throw ValidationError.fromZod("Invalid memory", result.error)
  }
  return result.data
}

export function validateMemoryRecord(input: unknown): MemoryRecord {
  const result = MemoryRecordSchema.safeParse(input)
  if (!result.success) {
    throw ValidationError.fromZod("Invalid memory record", result.error)
  }
  return result.data
}

/**
 * Attach ownership and provenance to an extracted memory. Extraction works on
 * raw text and knows nothing about who said it; the caller does.
 */
export function attributeMemory(memory: BaseMemory, attribution: Attribution): MemoryRecord {
  return validateMemoryRecord({
    ...memory,
    userId: attribution.userId,
    source: attribution.source,
    id: attribution.id ?? randomUUID(),
    createdAt: attribution.createdAt ?? new Date().toISOString(),
  })
}

/**
 * Render a memory as a sentence for prompt context, e.g.
 * `[CATEGORY: BIO_INFO] The user's name is Jay`.
 */
export function toSentence(memory: Pick<BaseMemory, "category" | "type" | "content">): string {
  const sentence = `The user's ${memory.type} is ${memory.content}`
  if (memory.category === "OTHER") return sentence
  return `[CATEGORY: ${memory.category}] ${sentence}`
}
