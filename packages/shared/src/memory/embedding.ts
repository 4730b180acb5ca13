/**
 * Text → vector collaborator. A collection is bound to one embedding
 * function for its whole life: the same model (and therefore the same
 * dimensionality) embeds both stored content and recall queries.
 */
export interface EmbeddingFunction {
  readonly dimensions: number
  embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0

  let dot = 0
  let normA = 0
  let normB = 0

  for (let i = 0; i < a.length; i++) {
    const ai = a[i] ?? 0
    const bi = b[i] ?? 0
    dot += ai * bi
    normA += ai * ai
    normB += bi * bi
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB)
  if (denom === 0) return 0

  return dot / denom
}

/** Clamp a raw cosine score into the [0, 1] range recall thresholds are expressed in. */
export function normalizeScore(raw: number): number {
  if (!Number.isFinite(raw)) return 0
  return Math.min(1, Math.max(0, raw))
}
