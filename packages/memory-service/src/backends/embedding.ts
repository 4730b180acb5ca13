import { type EmbeddingFunction, ServiceError } from "@caremem/shared/memory"
import OpenAI from "openai"

import type { EmbeddingConfig } from "../config.js"

/**
 * Embeddings over an OpenAI-compatible `/embeddings` endpoint. The default
 * configuration points at a local Ollama serving nomic-embed-text (768-d).
 */
export class OpenAICompatibleEmbedding implements EmbeddingFunction {
  readonly dimensions: number
  private readonly client: OpenAI
  private readonly model: string

  constructor(config: EmbeddingConfig) {
    this.dimensions = config.dimensions
    this.model = config.model
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    })
  }

  async embed(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const response = await this.client.embeddings.create(
      { model: this.model, input: text },
      { signal: options.signal },
    )

    const vector = response.data[0]?.embedding
    if (!vector) {
      throw new ServiceError(`Embedding model ${this.model} returned no vector`)
    }
    return vector
  }
}
