/**
 * Is this utterance worth remembering at all?
 *
 * The collaborator answers YES or NO. Anything that is not clearly one of the
 * two is a failed decision, not a "no".
 */

import { ServiceError, toServiceError } from "@caremem/shared/memory"
import { MemoryAttributes, type TracingLogger, withSpan } from "@caremem/shared/tracing"

import type { LLMCaller } from "../backends/llm.js"
import { buildDecisionSystemPrompt, buildDecisionUserPrompt } from "./prompts.js"
import { stripReasoning, truncate } from "./response.js"

const LABEL = /^(?:output|answer|decision)\s*:\s*/i
const AFFIRMATIVE = new Set(["YES", "TRUE"])
const NEGATIVE = new Set(["NO", "FALSE"])

/**
 * Coerce a collaborator answer into a strict boolean.
 * Accepts YES/NO/TRUE/FALSE in any case, optionally quoted, fenced, labelled
 * ("Output: YES") or followed by punctuation.
 */
export function parseDecision(text: string): boolean {
  const token = stripReasoning(text)
    .replace(/`/g, "")
    .trim()
    .replace(LABEL, "")
    .replace(/^["'*\s]+|["'*.!\s]+$/g, "")
    .toUpperCase()

  if (AFFIRMATIVE.has(token)) return true
  if (NEGATIVE.has(token)) return false

  throw new ServiceError(`Uninterpretable memory decision: "${truncate(text)}"`)
}

export interface DecideOptions {
  llm: LLMCaller
  logger?: TracingLogger
  signal?: AbortSignal
}

export async function decide(utterance: string, options: DecideOptions): Promise<boolean> {
  return withSpan("caremem.memory.decide", async (span) => {
    let response: string
    try {
      response = await options.llm(buildDecisionSystemPrompt(), buildDecisionUserPrompt(utterance), {
        signal: options.signal,
      })
    } catch (err) {
      throw toServiceError("Memory decision call failed", err)
    }

    const decision = parseDecision(response)
    span.setAttribute(MemoryAttributes.DECISION, decision)
    options.logger?.debug("memory decision", { decision })
    return decision
  })
}
