/**
 * Configuration module — validates environment variables at startup.
 *
 * All config is sourced from process.env and validated eagerly.
 * Missing required values throw immediately so the process fails fast,
 * before any collection is opened or collaborator called.
 */

import { isLogLevel, type LogLevel, type TracingConfig } from "@caremem/shared/tracing"

export type LlmProvider = "openai" | "anthropic"

export interface LlmConfig {
  provider: LlmProvider
  apiKey: string
  model: string
  /** OpenAI-compatible base URL (DeepSeek by default); ignored for anthropic unless set. */
  baseUrl?: string
  /** Per-call timeout in milliseconds. */
  timeoutMs: number
}

export interface EmbeddingConfig {
  model: string
  /** OpenAI-compatible embeddings endpoint, e.g. a local Ollama. */
  baseUrl: string
  apiKey: string
  dimensions: number
}

export interface Config {
  /** Vector store connection string */
  qdrantUrl: string
  /** Collection holding long-term memories */
  collection: string
  llm: LlmConfig
  embedding: EmbeddingConfig
  recall: {
    scoreThreshold: number
    topK: number
  }
  logLevel: LogLevel
  tracing: TracingConfig
}

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: "deepseek-chat",
  anthropic: "claude-sonnet-4-5",
}

/**
 * Load and validate configuration from environment variables.
 * Throws if required values are missing or malformed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const qdrantUrl = env.QDRANT_URL
  if (!qdrantUrl) {
    throw new Error("QDRANT_URL is required")
  }

  const llmApiKey = env.LLM_API_KEY
  if (!llmApiKey) {
    throw new Error("LLM_API_KEY is required")
  }

  const provider = env.LLM_PROVIDER ?? "openai"
  if (provider !== "openai" && provider !== "anthropic") {
    throw new Error(`Invalid LLM_PROVIDER: ${provider}. Must be "openai" or "anthropic".`)
  }

  const logLevel = env.LOG_LEVEL ?? "info"
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`)
  }

  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (exporterType !== "otlp" && exporterType !== "console" && exporterType !== "both") {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", or "both".`,
    )
  }

  return {
    qdrantUrl: withApiKey(qdrantUrl, env.QDRANT_API_KEY),
    collection: env.MEMORY_COLLECTION ?? "lstm_memory",
    llm: {
      provider,
      apiKey: llmApiKey,
      model: env.LLM_MODEL ?? DEFAULT_MODELS[provider],
      baseUrl: env.LLM_BASE_URL ?? (provider === "openai" ? "https://api.deepseek.com" : undefined),
      timeoutMs: parseIntOr(env.LLM_TIMEOUT_MS, 30_000),
    },
    embedding: {
      model: env.EMBEDDING_MODEL ?? "nomic-embed-text",
      baseUrl: env.EMBEDDING_BASE_URL ?? "http://localhost:11434/v1",
      apiKey: env.EMBEDDING_API_KEY ?? "ollama",
      dimensions: parseIntOr(env.EMBEDDING_DIMENSIONS, 768),
    },
    recall: {
      scoreThreshold: parseFloatOr(env.RECALL_SCORE_THRESHOLD, 0.6),
      topK: parseIntOr(env.RECALL_TOP_K, 10),
    },
    logLevel,
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318/v1/traces",
      sampleRate: parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0),
      serviceName: env.OTEL_SERVICE_NAME ?? "caremem-memory-service",
      exporterType,
    },
  }
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1) return fallback
  return parsed
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return Math.max(0, Math.min(1, parsed))
}

/** Fold QDRANT_API_KEY into the connection string unless it already carries one. */
function withApiKey(connectionString: string, apiKey: string | undefined): string {
  if (!apiKey) return connectionString
  let url: URL
  try {
    url = new URL(connectionString)
  } catch {
    throw new Error(`Invalid QDRANT_URL: ${connectionString}`)
  }
  if (!url.searchParams.has("api_key")) {
    url.searchParams.set("api_key", apiKey)
  }
  return url.toString()
}
