import { z } from "zod"

// ──────────────────────────────────────────────────
// Durability level
// ──────────────────────────────────────────────────

export const MEMORY_LEVELS = ["LTM", "STM"] as const

const LEVEL_ALIASES: Record<string, (typeof MEMORY_LEVELS)[number]> = {
  LTM: "LTM",
  STM: "STM",
  LONG_TERM: "LTM",
  SHORT_TERM: "STM",
  "LONG-TERM": "LTM",
  "SHORT-TERM": "STM",
}

/**
 * Long-term memories are persisted to the vector collection; short-term ones
 * stay with the conversational session. Spelled-out aliases normalize to the
 * canonical value, anything else fails.
 */
export const MemoryLevelSchema = z.preprocess(
  (value) =>
    typeof value === "string" ? (LEVEL_ALIASES[value.trim().toUpperCase()] ?? value) : value,
  z.enum(MEMORY_LEVELS),
)

// ──────────────────────────────────────────────────
// Care-domain category
// ──────────────────────────────────────────────────

export const MEMORY_CATEGORIES = [
  "ADRD_INFO",
  "CARE_GIVING",
  "BIO_INFO",
  "SOCIAL_CONNECTIONS",
  "TOPICS_OF_INTEREST",
  "PREFERENCES",
  "OTHER",
] as const

/**
 * Tie-break order when an utterance matches several categories equally well.
 * Most specific to the user first, catch-all last.
 */
export const CATEGORY_PRIORITY: readonly (typeof MEMORY_CATEGORIES)[number][] = [
  "BIO_INFO",
  "CARE_GIVING",
  "ADRD_INFO",
  "SOCIAL_CONNECTIONS",
  "PREFERENCES",
  "TOPICS_OF_INTEREST",
  "OTHER",
]

export const MemoryCategorySchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
  z.enum(MEMORY_CATEGORIES),
)

// ──────────────────────────────────────────────────
// Base memory (extraction output, not yet attributed)
// ──────────────────────────────────────────────────

const NOT_APPLICABLE = /^n\/?a$/i

export const BaseMemorySchema = z.object({
  content: z
    .string()
    .trim()
    .min(1, "content must not be empty")
    .max(2000)
    .refine((s) => !NOT_APPLICABLE.test(s), "content must not be empty"),
  level: MemoryLevelSchema,
  category: MemoryCategorySchema,
  type: z.string().trim().min(1, "type must not be empty"),
  topics: z.array(z.string().trim().min(1)).max(5).default([]),
})

// ──────────────────────────────────────────────────
// Memory record (attributed, ready to persist)
// ──────────────────────────────────────────────────

export const AttributionSchema = z.object({
  userId: z.string().trim().min(1, "userId must not be empty"),
  source: z.string().trim().min(1, "source must not be empty"),
})

export const MemoryRecordSchema = BaseMemorySchema.merge(AttributionSchema).extend({
  id: z.string().uuid(),
  createdAt: z.string().datetime({ offset: true }),
})

/** Payload shape stored alongside each vector. */
export const StoredPayloadSchema = MemoryRecordSchema.omit({ id: true })

// ──────────────────────────────────────────────────
// Episodic summary
// ──────────────────────────────────────────────────

export const EpisodicSummarySchema = z.object({
  topics: z.array(z.string().trim().min(1)).min(1).max(5),
  conversationSummary: z.string().trim().min(1),
  whatWorked: z.string().trim().min(1),
  whatToAvoid: z.string().trim().min(1),
})
