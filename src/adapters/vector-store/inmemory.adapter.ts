// =============================================================================
// InMemoryVectorStore — Brute-force cosine distance vector search
// =============================================================================

import type {
  VectorStorePort,
  VectorDocument,
  VectorSearchParams,
  VectorSearchResult,
  VectorListParams,
  VectorFilter,
  MetadataValue,
} from "../../ports/vector-store.port.js";

interface StoredDocument {
  doc: VectorDocument;
  /** Insertion order, used for newest-first listing */
  seq: number;
}

export class InMemoryVectorStore implements VectorStorePort {
  private readonly store = new Map<string, StoredDocument>();
  private seq = 0;

  async upsert(documents: VectorDocument[]): Promise<void> {
    for (const doc of documents) {
      this.store.set(doc.id, { doc: cloneDocument(doc), seq: ++this.seq });
    }
  }

  async query(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    if (params.topK <= 0) return [];
    const results: VectorSearchResult[] = [];

    for (const { doc } of this.store.values()) {
      if (params.filter && !matchesFilter(doc.metadata, params.filter)) {
        continue;
      }

      const distance = cosineDistance(params.embedding, doc.embedding);
      if (params.maxDistance !== undefined && !(distance < params.maxDistance)) continue;

      results.push({
        id: doc.id,
        content: doc.content,
        metadata: { ...doc.metadata },
        distance,
        embedding: params.includeEmbeddings ? [...doc.embedding] : undefined,
      });
    }

    results.sort((a, b) => a.distance - b.distance);
    return results.slice(0, params.topK);
  }

  async list(params: VectorListParams): Promise<VectorDocument[]> {
    return [...this.store.values()]
      .filter(({ doc }) => !params.filter || matchesFilter(doc.metadata, params.filter))
      .sort((a, b) => b.seq - a.seq)
      .slice(0, Math.max(0, params.limit))
      .map(({ doc }) => cloneDocument(doc));
  }

  async count(filter?: VectorFilter): Promise<number> {
    let total = 0;
    for (const { doc } of this.store.values()) {
      if (!filter || matchesFilter(doc.metadata, filter)) total++;
    }
    return total;
  }
}

// =============================================================================
// Cosine distance
// =============================================================================

/**
 * 1 - cosine similarity, in [0, 2]. Vectors of different length or with a
 * zero norm are treated as orthogonal (distance 1).
 */
export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) return 1;
  let dot = 0, normA = 0, normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 1 : 1 - dot / denom;
}

function matchesFilter(metadata: Record<string, MetadataValue>, filter: VectorFilter): boolean {
  for (const [key, expected] of Object.entries(filter)) {
    if (metadata[key] !== expected) return false;
  }
  return true;
}

function cloneDocument(doc: VectorDocument): VectorDocument {
  return {
    id: doc.id,
    embedding: [...doc.embedding],
    content: doc.content,
    metadata: { ...doc.metadata },
  };
}
