import {
  type EpisodicSummary,
  EpisodicSummarySchema,
  toServiceError,
  ValidationError,
} from "@caremem/shared/memory"
import { type TracingLogger, withSpan } from "@caremem/shared/tracing"

import type { LLMCaller } from "../backends/llm.js"
import { buildEpisodicSystemPrompt, buildEpisodicUserPrompt, type Message } from "./prompts.js"
import { parseJsonResponse } from "./response.js"

export interface SummarizeOptions {
  llm: LLMCaller
  logger?: TracingLogger
  signal?: AbortSignal
}

/**
 * Reflect on a finished conversation: what it covered, what helped, what to
 * avoid next time. The summary is returned to the caller, not stored.
 */
export async function summarizeEpisode(
  messages: readonly Message[],
  options: SummarizeOptions,
): Promise<EpisodicSummary> {
  if (messages.length === 0) {
    throw new ValidationError("Cannot summarize an empty conversation")
  }

  return withSpan(
    "caremem.memory.summarize_episode",
    async () => {
      let response: string
      try {
        response = await options.llm(buildEpisodicSystemPrompt(), buildEpisodicUserPrompt(messages), {
          signal: options.signal,
        })
      } catch (err) {
        throw toServiceError("Episode summary call failed", err)
      }

      const result = EpisodicSummarySchema.safeParse(parseJsonResponse(response))
      if (!result.success) {
        throw ValidationError.fromZod("Invalid episode summary", result.error)
      }

      options.logger?.debug("episode summarized", { topics: result.data.topics })
      return result.data
    },
    { "caremem.memory.message_count": messages.length },
  )
}
