/**
 * Caller-side retry for memory operations. The operations themselves fail
 * fast; wrap a whole step (decide, extract, add, recall) in `withRetry` to
 * replay it from scratch. Exponential backoff with ±25% jitter.
 */

import { setTimeout as sleep } from "node:timers/promises"

import { MemoryError } from "./errors.js"

export interface RetryConfig {
  /** Base delay in milliseconds. Default: 500. */
  baseDelayMs: number
  /** Maximum delay in milliseconds. Default: 10_000. */
  maxDelayMs: number
  /** Multiplier applied per retry attempt. Default: 2. */
  multiplier: number
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  multiplier: 2,
}

/**
 * @param attempt - 0-based: first retry = 0
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.multiplier, attempt)
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs)

  const jitterFactor = 0.75 + Math.random() * 0.5
  return Math.round(cappedDelay * jitterFactor)
}

export interface RetryOptions {
  /** Total attempts including the first. Default: 3. */
  attempts?: number
  retryConfig?: RetryConfig
  signal?: AbortSignal
  onRetry?: (err: MemoryError, attempt: number, delayMs: number) => void
}

/**
 * Re-run `fn` while it fails with a retryable MemoryError. Anything else,
 * including ValidationError, is rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3)
  const config = options.retryConfig ?? DEFAULT_RETRY_CONFIG

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      const canRetry = err instanceof MemoryError && err.retryable && attempt + 1 < attempts
      if (!canRetry) throw err

      const delayMs = calculateRetryDelay(attempt, config)
      options.onRetry?.(err, attempt + 1, delayMs)
      await sleep(delayMs, undefined, { signal: options.signal })
    }
  }
}
