// =============================================================================
// VectorStorePort — Append and cosine-distance search over embedded documents
// =============================================================================

// =============================================================================
// Core types
// =============================================================================

export type MetadataValue = string | number | boolean;

export interface VectorDocument {
  id: string;
  embedding: number[];
  content: string;
  metadata: Record<string, MetadataValue>;
}

export interface VectorSearchResult {
  id: string;
  content: string;
  metadata: Record<string, MetadataValue>;
  /** Cosine distance (1 - cosine similarity); lower is closer */
  distance: number;
  embedding?: number[];
}

/** Exact-match metadata filter; every entry must match. */
export type VectorFilter = Record<string, MetadataValue>;

// =============================================================================
// Search params
// =============================================================================

export interface VectorSearchParams {
  /** Query vector */
  embedding: number[];
  /** Max results */
  topK: number;
  /** Only documents strictly closer than this cosine distance */
  maxDistance?: number;
  /** Metadata filter */
  filter?: VectorFilter;
  /** Include embedding vectors in results */
  includeEmbeddings?: boolean;
}

export interface VectorListParams {
  filter?: VectorFilter;
  /** Newest first */
  limit: number;
}

// =============================================================================
// Port interface
// =============================================================================

export interface VectorStorePort {
  /** Insert documents; ids are expected to be fresh */
  upsert(documents: VectorDocument[]): Promise<void>;

  /** Nearest documents, ascending by distance */
  query(params: VectorSearchParams): Promise<VectorSearchResult[]>;

  /** Most recently inserted documents */
  list(params: VectorListParams): Promise<VectorDocument[]>;

  /** Number of documents matching the filter */
  count(filter?: VectorFilter): Promise<number>;
}
