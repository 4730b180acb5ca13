/**
 * Memory extraction: one utterance in, one validated BaseMemory out.
 *
 * 1. Build the extraction prompt
 * 2. Call the LLM
 * 3. Parse JSON (raw or fenced)
 * 4. Pick the single best category
 * 5. Validate against the record invariants
 *
 * Extraction is user-agnostic; attribution happens in the caller.
 */

import {
  type BaseMemory,
  CATEGORY_PRIORITY,
  type MemoryCategory,
  MemoryCategorySchema,
  toServiceError,
  validateBaseMemory,
  ValidationError,
} from "@caremem/shared/memory"
import { MemoryAttributes, type TracingLogger, withSpan } from "@caremem/shared/tracing"
import { z } from "zod"

import type { LLMCaller } from "../backends/llm.js"
import { buildExtractionSystemPrompt, buildExtractionUserPrompt } from "./prompts.js"
import { parseJsonResponse } from "./response.js"

const MAX_TOPICS = 5

// ──────────────────────────────────────────────────
// Response envelope
// ──────────────────────────────────────────────────

export const CategoryCandidateSchema = z.union([
  z.string(),
  z.object({
    category: z.string(),
    confidence: z.number().min(0).max(1).optional(),
  }),
])

export type CategoryCandidate = z.infer<typeof CategoryCandidateSchema>

/** Field values are validated later by the record schema; only the shape is checked here. */
export const ExtractionResponseSchema = z
  .object({
    category: z.unknown().optional(),
    categories: z.array(CategoryCandidateSchema).min(1).optional(),
    topics: z.array(z.unknown()).optional(),
  })
  .passthrough()

// ──────────────────────────────────────────────────
// Category selection
// ──────────────────────────────────────────────────

/**
 * Choose one category from the collaborator's candidates: highest confidence
 * wins; equal (or missing) confidence falls back to CATEGORY_PRIORITY order.
 * An unrecognised candidate fails the whole extraction.
 */
export function selectCategory(candidates: readonly CategoryCandidate[]): MemoryCategory {
  if (candidates.length === 0) {
    throw new ValidationError("Invalid memory", ["category: no category candidates"])
  }

  const ranked = candidates.map((candidate) => {
    const raw = typeof candidate === "string" ? candidate : candidate.category
    const parsed = MemoryCategorySchema.safeParse(raw)
    if (!parsed.success) {
      throw new ValidationError("Invalid memory", [`category: unrecognised category "${raw}"`])
    }
    const confidence = typeof candidate === "string" ? undefined : candidate.confidence
    return {
      category: parsed.data,
      confidence: confidence ?? -1,
      priority: CATEGORY_PRIORITY.indexOf(parsed.data),
    }
  })

  ranked.sort((a, b) => b.confidence - a.confidence || a.priority - b.priority)
  const [best] = ranked
  if (!best) {
    throw new ValidationError("Invalid memory", ["category: no category candidates"])
  }
  return best.category
}

/**
 * Turn a parsed collaborator answer into a BaseMemory, or fail with
 * ValidationError naming every broken field.
 */
export function toBaseMemory(raw: unknown): BaseMemory {
  const envelope = ExtractionResponseSchema.safeParse(raw)
  if (!envelope.success) {
    throw ValidationError.fromZod("Invalid memory", envelope.error)
  }

  const { categories, category, topics, ...fields } = envelope.data
  return validateBaseMemory({
    ...fields,
    category: categories ? selectCategory(categories) : category,
    topics: topics?.slice(0, MAX_TOPICS),
  })
}

// ──────────────────────────────────────────────────
// extract
// ──────────────────────────────────────────────────

export interface ExtractOptions {
  llm: LLMCaller
  logger?: TracingLogger
  signal?: AbortSignal
}

export async function extract(utterance: string, options: ExtractOptions): Promise<BaseMemory> {
  return withSpan("caremem.memory.extract", async (span) => {
    let response: string
    try {
      response = await options.llm(buildExtractionSystemPrompt(), buildExtractionUserPrompt(utterance), {
        signal: options.signal,
      })
    } catch (err) {
      throw toServiceError("Memory extraction call failed", err)
    }

    const memory = toBaseMemory(parseJsonResponse(response))
    span.setAttribute(MemoryAttributes.LEVEL, memory.level)
    span.setAttribute(MemoryAttributes.CATEGORY, memory.category)
    options.logger?.debug("memory extracted", {
      level: memory.level,
      category: memory.category,
      type: memory.type,
    })
    return memory
  })
}
