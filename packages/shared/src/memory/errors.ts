import type { ZodError } from "zod"

import { classifyError } from "./classify.js"

export type MemoryErrorKind = "service" | "validation" | "storage"

export class MemoryError extends Error {
  readonly kind: MemoryErrorKind
  readonly retryable: boolean

  constructor(kind: MemoryErrorKind, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.kind = kind
    this.retryable = options.retryable ?? false
  }
}

/** An LLM or embedding collaborator failed, timed out, or answered nonsense. */
export class ServiceError extends MemoryError {
  constructor(message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super("service", message, options)
  }
}

/** Data violates a memory record invariant. Never retryable. */
export class ValidationError extends MemoryError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = [], options: { cause?: unknown } = {}) {
    super("validation", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, {
      cause: options.cause,
      retryable: false,
    })
    this.issues = issues
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    return new ValidationError(message, issues, { cause: error })
  }
}

/** The vector store is unreachable, misconfigured, or a read/write failed. */
export class StorageError extends MemoryError {
  constructor(message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super("storage", message, options)
  }
}

// ──────────────────────────────────────────────────
// Wrapping collaborator failures
// ──────────────────────────────────────────────────

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function toServiceError(context: string, err: unknown): ServiceError {
  if (err instanceof ServiceError) return err
  return new ServiceError(`${context}: ${describe(err)}`, {
    cause: err,
    retryable: classifyError(err).retryable,
  })
}

/** Validation errors pass through untouched; everything else becomes a StorageError. */
export function toStorageError(context: string, err: unknown): MemoryError {
  if (err instanceof StorageError || err instanceof ValidationError) return err
  return new StorageError(`${context}: ${describe(err)}`, {
    cause: err,
    retryable: classifyError(err).retryable,
  })
}
