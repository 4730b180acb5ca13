/**
 * The "remember this" and "what do I know" flows.
 *
 * remember: decide → extract → attribute → (LTM only) add
 * recall:   search → per-user + threshold filter
 *
 * No step holds state across calls; a caller may abandon the flow between
 * steps without cleanup.
 */

import {
  AttributionSchema,
  attributeMemory,
  type MemoryCollection,
  type MemoryMatch,
  type MemoryRecord,
  recall,
  toSentence,
  ValidationError,
} from "@caremem/shared/memory"
import { MemoryAttributes, TracingLogger, withSpan } from "@caremem/shared/tracing"

import type { LLMCaller } from "./backends/llm.js"
import { decide } from "./memory/decision.js"
import { extract } from "./memory/extraction.js"

export type RememberResult =
  | { status: "skipped" }
  | { status: "short_term"; record: MemoryRecord }
  | { status: "stored"; id: string; record: MemoryRecord }

export interface RememberOptions {
  userId: string
  /** Provenance tag, e.g. "QUERY". */
  source: string
  signal?: AbortSignal
}

export interface PipelineRecallOptions {
  scoreThreshold?: number
  topK?: number
  signal?: AbortSignal
}

export interface MemoryPipelineDeps {
  llm: LLMCaller
  collection: MemoryCollection
  logger?: TracingLogger
  /** Defaults for recall (0.6 / 10). */
  recallDefaults?: { scoreThreshold: number; topK: number }
}

export class MemoryPipeline {
  private readonly llm: LLMCaller
  private readonly collection: MemoryCollection
  private readonly logger: TracingLogger
  private readonly recallDefaults: { scoreThreshold: number; topK: number }

  constructor(deps: MemoryPipelineDeps) {
    this.llm = deps.llm
    this.collection = deps.collection
    this.logger = (deps.logger ?? new TracingLogger()).child({ component: "memory-pipeline" })
    this.recallDefaults = deps.recallDefaults ?? { scoreThreshold: 0.6, topK: 10 }
  }

  /**
   * Remember whatever in `utterance` is worth remembering. Long-term memories
   * are stored in the collection; short-term ones are returned for the
   * session layer to keep.
   */
  async remember(utterance: string, options: RememberOptions): Promise<RememberResult> {
    const { userId, source, signal } = options
    const attribution = AttributionSchema.safeParse({ userId, source })
    if (!attribution.success) {
      throw ValidationError.fromZod("Invalid attribution", attribution.error)
    }

    return withSpan<RememberResult>(
      "caremem.memory.remember",
      async () => {
        const worthRemembering = await decide(utterance, { llm: this.llm, logger: this.logger, signal })
        if (!worthRemembering) {
          this.logger.debug("utterance skipped", { userId })
          return { status: "skipped" }
        }

        const memory = await extract(utterance, { llm: this.llm, logger: this.logger, signal })
        const record = attributeMemory(memory, { userId, source })

        if (record.level === "STM") {
          this.logger.info("short-term memory kept for session", {
            userId,
            memoryId: record.id,
            category: record.category,
          })
          return { status: "short_term", record }
        }

        const id = await this.collection.add(record, { signal })
        this.logger.info("long-term memory stored", {
          userId,
          memoryId: id,
          category: record.category,
        })
        return { status: "stored", id, record }
      },
      {
        [MemoryAttributes.USER_ID]: userId,
        [MemoryAttributes.SOURCE]: source,
        [MemoryAttributes.COLLECTION]: this.collection.name,
      },
    )
  }

  async recall(query: string, userId: string, options: PipelineRecallOptions = {}): Promise<MemoryMatch[]> {
    const scoreThreshold = options.scoreThreshold ?? this.recallDefaults.scoreThreshold
    const matches = await recall(query, userId, scoreThreshold, this.collection, {
      topK: options.topK ?? this.recallDefaults.topK,
      signal: options.signal,
    })
    this.logger.debug("memories recalled", { userId, count: matches.length, scoreThreshold })
    return matches
  }

  /** Numbered sentences for grounding an answer prompt; empty when nothing was recalled. */
  renderContext(matches: readonly MemoryMatch[]): string {
    return matches.map((m, i) => `${i + 1}. ${toSentence(m.metadata)}`).join("\n")
  }
}
