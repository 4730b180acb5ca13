import { describe, expect, it } from "vitest"

import { ValidationError } from "../memory/errors.js"
import {
  attributeMemory,
  toSentence,
  validateBaseMemory,
  validateMemoryRecord,
} from "../memory/record.js"
import {
  BaseMemorySchema,
  CATEGORY_PRIORITY,
  EpisodicSummarySchema,
  MEMORY_CATEGORIES,
  MemoryCategorySchema,
  MemoryLevelSchema,
} from "../memory/schemas.js"

// ──────────────────────────────────────────────────
// Helper factory
// ──────────────────────────────────────────────────

function validMemory(overrides: Record<string, unknown> = {}) {
  return {
    content: "user's name is Jay",
    level: "LTM",
    category: "BIO_INFO",
    type: "fact",
    topics: ["name"],
    ...overrides,
  }
}

function catchValidation(fn: () => unknown): ValidationError {
  try {
    fn()
  } catch (err) {
    if (err instanceof ValidationError) return err
    throw err
  }
  throw new Error("expected a ValidationError")
}

// ──────────────────────────────────────────────────
// Closed sets
// ──────────────────────────────────────────────────

describe("MemoryLevelSchema", () => {
  it("accepts canonical levels", () => {
    expect(MemoryLevelSchema.parse("LTM")).toBe("LTM")
    expect(MemoryLevelSchema.parse("STM")).toBe("STM")
  })

  it("normalizes spelled-out aliases in any case", () => {
    expect(MemoryLevelSchema.parse("LONG_TERM")).toBe("LTM")
    expect(MemoryLevelSchema.parse("short_term")).toBe("STM")
    expect(MemoryLevelSchema.parse(" long-term ")).toBe("LTM")
    expect(MemoryLevelSchema.parse("Short-Term")).toBe("STM")
    expect(MemoryLevelSchema.parse("ltm")).toBe("LTM")
  })

  it("rejects anything else", () => {
    expect(MemoryLevelSchema.safeParse("MEDIUM_TERM").success).toBe(false)
    expect(MemoryLevelSchema.safeParse("").success).toBe(false)
    expect(MemoryLevelSchema.safeParse(1).success).toBe(false)
  })
})

describe("MemoryCategorySchema", () => {
  it("accepts every category case-insensitively", () => {
    for (const category of MEMORY_CATEGORIES) {
      expect(MemoryCategorySchema.parse(category.toLowerCase())).toBe(category)
    }
    expect(MemoryCategorySchema.parse(" bio_info ")).toBe("BIO_INFO")
  })

  it("rejects unknown categories instead of defaulting to OTHER", () => {
    expect(MemoryCategorySchema.safeParse("FAVORITE_COLOR").success).toBe(false)
    expect(MemoryCategorySchema.safeParse("biographical-information").success).toBe(false)
  })
})

describe("CATEGORY_PRIORITY", () => {
  it("orders every category exactly once", () => {
    expect([...CATEGORY_PRIORITY].sort()).toEqual([...MEMORY_CATEGORIES].sort())
    expect(CATEGORY_PRIORITY[0]).toBe("BIO_INFO")
    expect(CATEGORY_PRIORITY.at(-1)).toBe("OTHER")
  })
})

// ──────────────────────────────────────────────────
// BaseMemory
// ──────────────────────────────────────────────────

describe("BaseMemorySchema", () => {
  it("accepts a valid memory and trims strings", () => {
    const result = BaseMemorySchema.parse(validMemory({ content: "  user's name is Jay  ", type: " fact " }))
    expect(result.content).toBe("user's name is Jay")
    expect(result.type).toBe("fact")
  })

  it("defaults topics to an empty list", () => {
    const { topics: _topics, ...rest } = validMemory()
    expect(BaseMemorySchema.parse(rest).topics).toEqual([])
  })

  it("rejects more than five topics", () => {
    expect(BaseMemorySchema.safeParse(validMemory({ topics: ["a", "b", "c", "d", "e", "f"] })).success).toBe(
      false,
    )
  })

  it("rejects content longer than 2000 characters", () => {
    expect(BaseMemorySchema.safeParse(validMemory({ content: "x".repeat(2001) })).success).toBe(false)
    expect(BaseMemorySchema.safeParse(validMemory({ content: "x".repeat(2000) })).success).toBe(true)
  })

  it("treats the N/A sentinel as empty content", () => {
    for (const content of ["N/A", "n/a", "NA", " N/A "]) {
      expect(BaseMemorySchema.safeParse(validMemory({ content })).success).toBe(false)
    }
  })
})

// ──────────────────────────────────────────────────
// Record operations
// ──────────────────────────────────────────────────

describe("validateBaseMemory", () => {
  it("returns the parsed memory", () => {
    expect(validateBaseMemory(validMemory({ level: "LONG_TERM" }))).toEqual({
      content: "user's name is Jay",
      level: "LTM",
      category: "BIO_INFO",
      type: "fact",
      topics: ["name"],
    })
  })

  it("lists every failing field", () => {
    const err = catchValidation(() =>
      validateBaseMemory(validMemory({ content: "   ", level: "FOREVER", category: "NOPE" })),
    )
    expect(err.kind).toBe("validation")
    expect(err.retryable).toBe(false)
    expect(err.issues.map((issue) => issue.split(":")[0])).toEqual(["content", "level", "category"])
    expect(err.message.startsWith("Invalid memory: content: content must not be empty")).toBe(true)
  })
})

describe("attributeMemory", () => {
  it("attaches userId, source, a uuid and a timestamp", () => {
    const record = attributeMemory(validateBaseMemory(validMemory()), {
      userId: "Jay Hanks",
      source: "QUERY",
    })

    expect(record.userId).toBe("Jay Hanks")
    expect(record.source).toBe("QUERY")
    expect(record.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
    expect(Number.isNaN(Date.parse(record.createdAt))).toBe(false)
    expect(record.content).toBe("user's name is Jay")
  })

  it("keeps a supplied id and timestamp", () => {
    const record = attributeMemory(validateBaseMemory(validMemory()), {
      userId: "u1",
      source: "QUERY",
      id: "6f1c0f52-4f0e-4a55-9a0e-3f3c5b8d2e11",
      createdAt: "2025-01-15T10:30:00Z",
    })
    expect(record.id).toBe("6f1c0f52-4f0e-4a55-9a0e-3f3c5b8d2e11")
    expect(record.createdAt).toBe("2025-01-15T10:30:00Z")
  })

  it("rejects a blank userId", () => {
    const err = catchValidation(() =>
      attributeMemory(validateBaseMemory(validMemory()), { userId: "  ", source: "QUERY" }),
    )
    expect(err.issues).toEqual(["userId: userId must not be empty"])
  })
})

describe("validateMemoryRecord", () => {
  it("rejects a non-uuid id", () => {
    const err = catchValidation(() =>
      validateMemoryRecord({
        ...validMemory(),
        userId: "u1",
        source: "QUERY",
        id: "not-a-uuid",
        createdAt: "2025-01-15T10:30:00Z",
      }),
    )
    expect(err.message.startsWith("Invalid memory record: id:")).toBe(true)
  })
})

describe("toSentence", () => {
  it("prefixes the category", () => {
    expect(toSentence({ category: "BIO_INFO", type: "name", content: "Jay" })).toBe(
      "[CATEGORY: BIO_INFO] The user's name is Jay",
    )
  })

  it("omits the prefix for OTHER", () => {
    expect(toSentence({ category: "OTHER", type: "favourite colour", content: "green" })).toBe(
      "The user's favourite colour is green",
    )
  })
})

// ──────────────────────────────────────────────────
// EpisodicSummarySchema
// ──────────────────────────────────────────────────

describe("EpisodicSummarySchema", () => {
  const summary = {
    topics: ["gardening"],
    conversationSummary: "Talked about tomatoes",
    whatWorked: "Short questions",
    whatToAvoid: "Asking about dates",
  }

  it("accepts a valid summary", () => {
    expect(EpisodicSummarySchema.parse(summary)).toEqual(summary)
  })

  it("requires between one and five topics", () => {
    expect(EpisodicSummarySchema.safeParse({ ...summary, topics: [] }).success).toBe(false)
    expect(EpisodicSummarySchema.safeParse({ ...summary, topics: ["a", "b", "c", "d", "e", "f"] }).success).toBe(
      false,
    )
  })
})
