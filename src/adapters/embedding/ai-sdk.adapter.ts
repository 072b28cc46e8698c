// =============================================================================
// AiSdkEmbeddingAdapter — Wraps AI SDK embed/embedMany into EmbeddingPort
// =============================================================================

import { embed, embedMany } from "ai";
import type { EmbeddingModel } from "ai";

import type { EmbeddingPort, EmbeddingResult } from "../../ports/embedding.port.js";

export interface AiSdkEmbeddingAdapterOptions {
  model: EmbeddingModel<string>;
  /** Vector length produced by the model */
  dimensions: number;
  modelId?: string;
  /** Retries performed inside the SDK call (default: 0; the pipelines retry) */
  maxRetries?: number;
}

export class AiSdkEmbeddingAdapter implements EmbeddingPort {
  readonly dimensions: number;
  readonly modelId: string;
  private readonly model: EmbeddingModel<string>;
  private readonly maxRetries: number;

  constructor(options: AiSdkEmbeddingAdapterOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.modelId =
      options.modelId ?? (typeof options.model === "string" ? options.model : options.model.modelId);
    this.maxRetries = options.maxRetries ?? 0;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    const result = await embed({
      model: this.model,
      value: text,
      maxRetries: this.maxRetries,
      abortSignal: signal,
    });
    return { embedding: result.embedding, tokenCount: result.usage.tokens };
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];
    const result = await embedMany({
      model: this.model,
      values: texts,
      maxRetries: this.maxRetries,
      abortSignal: signal,
    });
    const perText = Math.round(result.usage.tokens / texts.length);
    return result.embeddings.map((embedding) => ({ embedding, tokenCount: perText }));
  }
}
