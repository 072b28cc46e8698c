// =============================================================================
// EpisodicStore — Append-only episode summaries over a vector store
// =============================================================================

import type { Episode, ScoredEpisode } from "../domain/memory.schema.js";
import { ValidationError } from "../errors.js";
import type {
  MetadataValue,
  VectorDocument,
  VectorStorePort,
} from "../ports/vector-store.port.js";

export interface NewEpisode {
  userId: string;
  turnStart: number;
  turnEnd: number;
  summary: string;
  embedding: number[];
}

export interface EpisodeSearchOptions {
  topK: number;
  /** Only episodes strictly closer than this cosine distance */
  maxDistance: number;
}

export interface EpisodicStoreOptions {
  /** Episode id factory (default: crypto.randomUUID) */
  generateId?: () => string;
  now?: () => number;
}

/**
 * Episodes are immutable once written; there is no update or delete path.
 * Each is stored as one vector document whose metadata carries the owner
 * and the turn range it summarizes.
 */
export class EpisodicStore {
  private readonly vectors: VectorStorePort;
  private readonly generateId: () => string;
  private readonly now: () => number;

  constructor(vectors: VectorStorePort, options: EpisodicStoreOptions = {}) {
    this.vectors = vectors;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.now = options.now ?? Date.now;
  }

  async append(input: NewEpisode): Promise<Episode> {
    validateEpisode(input);
    const episode: Episode = {
      id: this.generateId(),
      userId: input.userId,
      turnStart: input.turnStart,
      turnEnd: input.turnEnd,
      summary: input.summary,
      embedding: [...input.embedding],
      createdAt: new Date(this.now()).toISOString(),
    };
    await this.vectors.upsert([toDocument(episode)]);
    return episode;
  }

  /** Nearest episodes for the user, ascending by distance, never padded. */
  async search(userId: string, embedding: number[], options: EpisodeSearchOptions): Promise<ScoredEpisode[]> {
    if (options.topK <= 0) return [];
    const results = await this.vectors.query({
      embedding,
      topK: options.topK,
      maxDistance: options.maxDistance,
      filter: { userId },
      includeEmbeddings: true,
    });
    return results
      .filter((result) => result.distance < options.maxDistance)
      .map((result) => ({
        ...fromDocument({
          id: result.id,
          content: result.content,
          metadata: result.metadata,
          embedding: result.embedding ?? [],
        }),
        distance: result.distance,
      }));
  }

  /** Most recently written episodes, newest first. */
  async recent(userId: string, limit: number): Promise<Episode[]> {
    const documents = await this.vectors.list({ filter: { userId }, limit });
    return documents.map(fromDocument);
  }

  count(userId: string): Promise<number> {
    return this.vectors.count({ userId });
  }
}

function validateEpisode(input: NewEpisode): void {
  if (input.userId.trim() === "") {
    throw new ValidationError("must not be empty", "userId");
  }
  if (!Number.isInteger(input.turnStart) || input.turnStart < 1) {
    throw new ValidationError("must be a positive integer", "turnStart");
  }
  if (!Number.isInteger(input.turnEnd) || input.turnEnd < input.turnStart) {
    throw new ValidationError("must be an integer >= turnStart", "turnEnd");
  }
  if (input.summary.trim() === "") {
    throw new ValidationError("must not be empty", "summary");
  }
  if (input.embedding.length === 0 || !input.embedding.every(Number.isFinite)) {
    throw new ValidationError("must be a non-empty vector of finite numbers", "embedding");
  }
}

function toDocument(episode: Episode): VectorDocument {
  return {
    id: episode.id,
    embedding: episode.embedding,
    content: episode.summary,
    metadata: {
      userId: episode.userId,
      turnStart: episode.turnStart,
      turnEnd: episode.turnEnd,
      createdAt: episode.createdAt,
    },
  };
}

function fromDocument(document: VectorDocument): Episode {
  return {
    id: document.id,
    userId: metadataString(document.metadata, "userId"),
    turnStart: metadataNumber(document.metadata, "turnStart"),
    turnEnd: metadataNumber(document.metadata, "turnEnd"),
    summary: document.content,
    embedding: document.embedding,
    createdAt: metadataString(document.metadata, "createdAt"),
  };
}

function metadataString(metadata: Record<string, MetadataValue>, field: string): string {
  const value = metadata[field];
  return value === undefined ? "" : String(value);
}

function metadataNumber(metadata: Record<string, MetadataValue>, field: string): number {
  const value = metadata[field];
  return typeof value === "number" ? value : Number(value ?? 0);
}
