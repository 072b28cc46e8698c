// =============================================================================
// InMemoryEmbeddingAdapter — Deterministic bag-of-words hashing embeddings
// =============================================================================

import type { EmbeddingPort, EmbeddingResult } from "../../ports/embedding.port.js";

/**
 * Local embedder for tests and demos. Each lowercased word is hashed into a
 * bucket, so texts sharing vocabulary land close together in cosine space
 * and the same text always yields the same vector.
 */
export class InMemoryEmbeddingAdapter implements EmbeddingPort {
  readonly dimensions: number;
  readonly modelId: string;
  private readonly embedFn: (text: string) => number[];

  constructor(options?: {
    dimensions?: number;
    modelId?: string;
    embedFn?: (text: string) => number[];
  }) {
    this.dimensions = options?.dimensions ?? 256;
    this.modelId = options?.modelId ?? "inmemory-hashing";
    this.embedFn = options?.embedFn ?? ((text) => hashingVector(text, this.dimensions));
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    signal?.throwIfAborted();
    const embedding = this.embedFn(text);
    return { embedding, tokenCount: Math.ceil(text.length / 4) };
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult[]> {
    return Promise.all(texts.map((t) => this.embed(t, signal)));
  }
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0);
}

/** Unit-length term-frequency vector over hashed buckets; all zeros for empty text. */
export function hashingVector(text: string, dimensions: number): number[] {
  const vec = new Array<number>(dimensions).fill(0);
  for (const word of tokenize(text)) {
    const bucket = fnv1a(word) % dimensions;
    vec[bucket] = (vec[bucket] ?? 0) + 1;
  }
  let norm = 0;
  for (const v of vec) norm += v * v;
  norm = Math.sqrt(norm);
  return norm === 0 ? vec : vec.map((v) => v / norm);
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
