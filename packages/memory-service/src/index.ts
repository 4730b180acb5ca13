import { getOrCreateCollection } from "@caremem/shared/memory"
import { initTracing, TracingLogger } from "@caremem/shared/tracing"

import { OpenAICompatibleEmbedding } from "./backends/embedding.js"
import { createLlmCaller } from "./backends/llm.js"
import type { Config } from "./config.js"
import { MemoryPipeline } from "./pipeline.js"

/**
 * Wire a pipeline from config. Order matters: tracing first so every later
 * call is instrumented, the embedding model before the collection it sizes.
 */
export async function createMemoryPipeline(config: Config): Promise<MemoryPipeline> {
  initTracing(config.tracing)

  const logger = new TracingLogger({ level: config.logLevel, serviceName: config.tracing.serviceName })
  const embedding = new OpenAICompatibleEmbedding(config.embedding)
  const collection = await getOrCreateCollection(config.qdrantUrl, embedding, config.collection, {
    logger,
  })

  logger.info("memory pipeline ready", {
    collection: collection.name,
    llmProvider: config.llm.provider,
    llmModel: config.llm.model,
    embeddingModel: config.embedding.model,
  })

  return new MemoryPipeline({
    llm: createLlmCaller(config.llm),
    collection,
    logger,
    recallDefaults: config.recall,
  })
}

export { OpenAICompatibleEmbedding } from "./backends/embedding.js"
export type { LLMCallOptions, LLMCaller } from "./backends/llm.js"
export { createAnthropicCaller, createLlmCaller, createOpenAICaller } from "./backends/llm.js"
export type { Config, EmbeddingConfig, LlmConfig, LlmProvider } from "./config.js"
export { loadConfig } from "./config.js"
export type { DecideOptions } from "./memory/decision.js"
export { decide, parseDecision } from "./memory/decision.js"
export type { SummarizeOptions } from "./memory/episodic.js"
export { summarizeEpisode } from "./memory/episodic.js"
export type { CategoryCandidate, ExtractOptions } from "./memory/extraction.js"
export { extract, selectCategory, toBaseMemory } from "./memory/extraction.js"
export type { Message } from "./memory/prompts.js"
export { formatConversation } from "./memory/prompts.js"
export type {
  MemoryPipelineDeps,
  PipelineRecallOptions,
  RememberOptions,
  RememberResult,
} from "./pipeline.js"
export { MemoryPipeline } from "./pipeline.js"
