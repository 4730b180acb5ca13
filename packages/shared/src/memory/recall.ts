import { MemoryAttributes, withSpan } from "../tracing/spans.js"
import { DEFAULT_TOP_K, type MemoryCollection } from "./collection.js"
import { ValidationError } from "./errors.js"
import type { MemoryMatch } from "./types.js"

export interface RecallOptions {
  /** Candidates requested from the store before filtering (default 10). */
  topK?: number
  signal?: AbortSignal
}

/**
 * Keep only `userId`'s matches scoring at least `scoreThreshold`, highest
 * score first. Equal scores keep the order the store returned them in.
 */
export function filterMatches(
  matches: readonly MemoryMatch[],
  userId: string,
  scoreThreshold: number,
): MemoryMatch[] {
  return matches
    .filter((m) => m.metadata.userId === userId && m.score >= scoreThreshold)
    .sort((a, b) => b.score - a.score)
}

/**
 * Memories of `userId` relevant to `query`. The user filter and threshold are
 * pushed down into the store query and re-applied here, so a store that
 * ignores either still never leaks another user's memory.
 */
export async function recall(
  query: string,
  userId: string,
  scoreThreshold: number,
  collection: MemoryCollection,
  options: RecallOptions = {},
): Promise<MemoryMatch[]> {
  if (userId.trim().length === 0) {
    throw new ValidationError("userId must not be empty")
  }
  if (!Number.isFinite(scoreThreshold)) {
    throw new ValidationError(`scoreThreshold must be a finite number, got ${scoreThreshold}`)
  }

  return withSpan(
    "caremem.memory.recall",
    async (span) => {
      const matches = await collection.search(query, {
        topK: options.topK,
        filter: { userId },
        scoreThreshold,
        signal: options.signal,
      })

      const kept = filterMatches(matches, userId, scoreThreshold)
      span.setAttribute(MemoryAttributes.RESULT_COUNT, kept.length)
      return kept
    },
    {
      [MemoryAttributes.COLLECTION]: collection.name,
      [MemoryAttributes.USER_ID]: userId,
      [MemoryAttributes.SCORE_THRESHOLD]: scoreThreshold,
      [MemoryAttributes.TOP_K]: options.topK ?? DEFAULT_TOP_K,
    },
  )
}
