/**
 * Error classification for collaborator calls (LLM, embedding, vector store).
 * Memory operations never retry on their own; the classification sets the
 * `retryable` flag that `withRetry` reads.
 *
 * - TRANSIENT: HTTP 429/502/503, connection resets
 * - PERMANENT: HTTP 400/401/404, bad credentials, schema violations
 * - TIMEOUT: aborted or timed-out calls
 * - RESOURCE: rate limits, overload, exhausted memory or disk
 * - UNKNOWN: anything else
 */

export type ErrorCategory = "TRANSIENT" | "PERMANENT" | "TIMEOUT" | "RESOURCE" | "UNKNOWN"

export interface ErrorClassification {
  category: ErrorCategory
  retryable: boolean
  message: string
}

const TRANSIENT_HTTP_CODES = new Set([429, 502, 503, 529])

const PERMANENT_HTTP_CODES = new Set([400, 401, 403, 404, 405, 409, 422])

const TRANSIENT_NODE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
])

const RESOURCE_NODE_CODES = new Set(["ENOMEM", "ENOSPC", "EMFILE", "ENFILE"])

function classifyHttpStatus(status: number): ErrorClassification {
  if (TRANSIENT_HTTP_CODES.has(status)) {
    return { category: "TRANSIENT", retryable: true, message: `HTTP ${status} (transient)` }
  }
  if (PERMANENT_HTTP_CODES.has(status)) {
    return { category: "PERMANENT", retryable: false, message: `HTTP ${status} (permanent)` }
  }
  if (status === 408 || status === 504) {
    return { category: "TIMEOUT", retryable: true, message: `HTTP ${status} (timeout)` }
  }
  if (status >= 500) {
    return { category: "TRANSIENT", retryable: true, message: `HTTP ${status} (server error)` }
  }
  return { category: "PERMANENT", retryable: false, message: `HTTP ${status} (client error)` }
}

function classifyNodeError(code: string): ErrorClassification {
  if (TRANSIENT_NODE_CODES.has(code)) {
    return { category: "TRANSIENT", retryable: true, message: `Node error: ${code}` }
  }
  if (RESOURCE_NODE_CODES.has(code)) {
    return { category: "RESOURCE", retryable: true, message: `Resource error: ${code}` }
  }
  if (code === "ENOTFOUND" || code === "EACCES" || code === "ENOENT") {
    return { category: "PERMANENT", retryable: false, message: `Node error: ${code}` }
  }
  return { category: "UNKNOWN", retryable: true, message: `Unknown node error: ${code}` }
}

/** fetch() wraps socket failures in a TypeError whose cause carries the code. */
function causeCode(error: Error): string | undefined {
  const cause: unknown = error.cause
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code
  }
  return undefined
}

/**
 * Classify an error from any collaborator (HTTP, Node.js, LLM SDK, Qdrant client).
 */
export function classifyError(error: unknown): ErrorClassification {
  if (!(error instanceof Error)) {
    return { category: "UNKNOWN", retryable: true, message: String(error) }
  }

  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return { category: "TIMEOUT", retryable: true, message: "Operation aborted" }
  }

  if ("status" in error && typeof error.status === "number") {
    return classifyHttpStatus(error.status)
  }

  // Anthropic / OpenAI SDK errors by constructor name
  const ctorName = error.constructor.name
  if (ctorName === "RateLimitError") {
    return { category: "RESOURCE", retryable: true, message: "Rate limit exceeded" }
  }
  if (ctorName === "APIConnectionTimeoutError") {
    return { category: "TIMEOUT", retryable: true, message: "API connection timed out" }
  }
  if (ctorName === "APIConnectionError") {
    return { category: "TRANSIENT", retryable: true, message: "API connection error" }
  }
  if (ctorName === "AuthenticationError") {
    return { category: "PERMANENT", retryable: false, message: "Authentication failed" }
  }

  if ("code" in error && typeof error.code === "string") {
    return classifyNodeError(error.code)
  }

  const nested = causeCode(error)
  if (nested) {
    return classifyNodeError(nested)
  }

  if (error.message.toLowerCase().includes("timeout")) {
    return { category: "TIMEOUT", retryable: true, message: error.message }
  }

  return { category: "UNKNOWN", retryable: true, message: error.message }
}
