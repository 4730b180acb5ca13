export { DEFAULT_TRACING_CONFIG, initTracing, shutdownTracing, type TracingConfig } from "./init.js"
export { isLogLevel, LOG_LEVELS, type LogLevel, TracingLogger, type TracingLoggerOptions } from "./logger.js"
export { addSpanEvent, MemoryAttributes, withSpan } from "./spans.js"
