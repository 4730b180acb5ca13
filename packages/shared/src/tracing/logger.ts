/**
 * Structured JSON logger with automatic trace context inclusion.
 *
 * Every log entry carries traceId and spanId from the active OTel span
 * (if any), so log lines can be joined to traces.
 */

import { trace } from "@opentelemetry/api"

export type LogLevel = "debug" | "info" | "warn" | "error"

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"]

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value)
}

export interface TracingLoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel
  /** Service name to include in every log line. */
  serviceName?: string
  /** Fields merged into every entry. */
  bindings?: Record<string, unknown>
}

export class TracingLogger {
  private readonly minLevel: LogLevel
  private readonly serviceName: string
  private readonly bindings: Record<string, unknown>

  constructor(options?: TracingLoggerOptions) {
    this.minLevel = options?.level ?? "info"
    this.serviceName = options?.serviceName ?? "caremem"
    this.bindings = options?.bindings ?? {}
  }

  /** A logger that adds `bindings` to every entry, e.g. `{ component: "recall" }`. */
  child(bindings: Record<string, unknown>): TracingLogger {
    return new TracingLogger({
      level: this.minLevel,
      serviceName: this.serviceName,
      bindings: { ...this.bindings, ...bindings },
    })
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra)
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra)
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra)
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra)
  }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.minLevel]) return

    const entry: Record<string, unknown> = {
      level,
      time: new Date().toISOString(),
      service: this.serviceName,
      msg: message,
      ...this.bindings,
    }

    const span = trace.getActiveSpan()
    if (span) {
      const ctx = span.spanContext()
      entry.traceId = ctx.traceId
      entry.spanId = ctx.spanId
    }

    if (extra) {
      Object.assign(entry, extra)
    }

    // stderr for error/warn, unix convention
    const out = level === "error" || level === "warn" ? process.stderr : process.stdout
    out.write(JSON.stringify(entry) + "\n")
  }
}
