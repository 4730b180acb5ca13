/**
 * OpenTelemetry SDK initialization.
 *
 * Call `initTracing()` once before the pipeline is constructed.
 * Call `shutdownTracing()` during graceful shutdown to flush buffered spans.
 *
 * When tracing is disabled the OTel API falls back to no-op
 * implementations and `withSpan` costs next to nothing.
 */

import { HttpInstrumentation } from "@opentelemetry/instrumentation-http"
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  SimpleSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

export interface TracingConfig {
  /** Enable tracing (default: false) */
  enabled: boolean
  /** OTLP collector traces endpoint (default: http://localhost:4318/v1/traces) */
  endpoint: string
  /** Sampling rate 0.0–1.0 (default: 1.0) */
  sampleRate: number
  /** Service name for resource attribution */
  serviceName: string
  /** otlp (production), console (dev), both */
  exporterType: "otlp" | "console" | "both"
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: false,
  endpoint: "http://localhost:4318/v1/traces",
  sampleRate: 1.0,
  serviceName: "caremem-memory-service",
  exporterType: "otlp",
}

let sdk: NodeSDK | undefined

/**
 * Initialize the OpenTelemetry SDK. Subsequent calls are no-ops until
 * `shutdownTracing()` runs.
 */
export function initTracing(config: Partial<TracingConfig> = {}): boolean {
  if (sdk) return true

  const resolved: TracingConfig = { ...DEFAULT_TRACING_CONFIG, ...config }
  if (!resolved.enabled) return false

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: resolved.serviceName,
    [ATTR_SERVICE_VERSION]: "0.1.0",
  })

  const sampler =
    resolved.sampleRate >= 1.0
      ? new AlwaysOnSampler()
      : new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(resolved.sampleRate) })

  const spanProcessors: SpanProcessor[] = []
  if (resolved.exporterType === "console" || resolved.exporterType === "both") {
    spanProcessors.push(new SimpleSpanProcessor(new ConsoleSpanExporter()))
  }
  if (resolved.exporterType === "otlp" || resolved.exporterType === "both") {
    spanProcessors.push(new BatchSpanProcessor(new OTLPTraceExporter({ url: resolved.endpoint })))
  }

  sdk = new NodeSDK({
    resource,
    sampler,
    spanProcessors,
    instrumentations: [new HttpInstrumentation()],
  })

  sdk.start()
  return true
}

/**
 * Gracefully shut down the SDK, flushing any buffered spans.
 */
export async function shutdownTracing(): Promise<void> {
  if (!sdk) return
  try {
    await sdk.shutdown()
  } finally {
    sdk = undefined
  }
}
