/**
 * Tracing span helpers: typed wrappers around the OpenTelemetry API.
 *
 * These keep instrumentation call-sites short and attribute names
 * consistent across the memory pipeline.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const MemoryAttributes = {
  USER_ID: "caremem.memory.user_id",
  SOURCE: "caremem.memory.source",
  COLLECTION: "caremem.memory.collection",
  LEVEL: "caremem.memory.level",
  CATEGORY: "caremem.memory.category",
  DECISION: "caremem.memory.decision",
  TOP_K: "caremem.memory.top_k",
  SCORE_THRESHOLD: "caremem.memory.score_threshold",
  RESULT_COUNT: "caremem.memory.result_count",
  ERROR_KIND: "caremem.error.kind",
  ERROR_RETRYABLE: "caremem.error.retryable",
} as const

// ──────────────────────────────────────────────────
// Tracer
// ──────────────────────────────────────────────────

const TRACER_NAME = "caremem"

function getTracer() {
  return trace.getTracer(TRACER_NAME)
}

// ──────────────────────────────────────────────────
// withSpan
// ──────────────────────────────────────────────────

/**
 * Execute an async function inside a new active span.
 *
 * On success the span ends with OK status; on error it records the
 * exception and sets ERROR status before re-throwing.
 *
 * ```ts
 * const matches = await withSpan("caremem.memory.recall", async (span) => {
 *   span.setAttribute(MemoryAttributes.RESULT_COUNT, 3)
 *   return search()
 * }, { [MemoryAttributes.USER_ID]: userId })
 * ```
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes: Attributes = {},
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err instanceof Error ? err.message : String(err),
      })
      if (err instanceof Error) {
        span.recordException(err)
        if ("kind" in err && typeof err.kind === "string") {
          span.setAttribute(MemoryAttributes.ERROR_KIND, err.kind)
        }
        if ("retryable" in err && typeof err.retryable === "boolean") {
          span.setAttribute(MemoryAttributes.ERROR_RETRYABLE, err.retryable)
        }
      }
      throw err
    } finally {
      span.end()
    }
  })
}

// ──────────────────────────────────────────────────
// Utility
// ──────────────────────────────────────────────────

/** Record an event (log-style annotation) on the current active span. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  trace.getActiveSpan()?.addEvent(name, attributes)
}
