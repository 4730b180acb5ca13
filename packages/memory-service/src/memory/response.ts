import { ServiceError } from "@caremem/shared/memory"

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi
const FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/m

/** Drop reasoning blocks some models prepend to their answer. */
export function stripReasoning(text: string): string {
  return text.replace(THINK_BLOCK, "").trim()
}

/**
 * Parse a collaborator's JSON answer, raw or markdown-fenced. Anything that is
 * not JSON is an uninterpretable response.
 */
export function parseJsonResponse(text: string): unknown {
  let cleaned = stripReasoning(text)
  const fenceMatch = cleaned.match(FENCE)
  if (fenceMatch?.[1]) {
    cleaned = fenceMatch[1].trim()
  }

  try {
    return JSON.parse(cleaned)
  } catch (err) {
    throw new ServiceError(`Collaborator returned non-JSON output: ${truncate(cleaned)}`, {
      cause: err,
      retryable: false,
    })
  }
}

export function truncate(text: string, max = 120): string {
  return text.length <= max ? text : `${text.slice(0, max)}…`
}
