// =============================================================================
// pgvector Vector Store Adapter — Implements VectorStorePort
// =============================================================================
//
// Requires: pg, pgvector extension enabled in PostgreSQL
//
// Usage:
//   const store = new PgVectorStoreAdapter({
//     connectionString: '...',
//     dimensions: 1536,
//   })
//   await store.initialize()
//
// =============================================================================

import type { Pool } from "pg";

import type {
  MetadataValue,
  VectorStorePort,
  VectorDocument,
  VectorSearchResult,
  VectorSearchParams,
  VectorListParams,
  VectorFilter,
} from "../../../ports/vector-store.port.js";

export interface PgVectorStoreOptions {
  /** PostgreSQL connection string; ignored when `pool` is given */
  connectionString?: string;
  /** Existing pool to share; it is not closed by {@link PgVectorStoreAdapter.close} */
  pool?: Pool;
  /** Table name (default: 'memory_episodes') */
  tableName?: string;
  /** Schema name (default: 'public') */
  schema?: string;
  /** Embedding dimensions (default: 1536) */
  dimensions?: number;
  /** Pool size (default: 10) */
  poolSize?: number;
  /** Use HNSW index for approximate search (default: true) */
  useHnsw?: boolean;
}

type DocumentRecord = {
  id: string;
  content: string;
  metadata: Record<string, MetadataValue> | string;
  embedding?: string | number[];
  distance?: number | string;
};

export class PgVectorStoreAdapter implements VectorStorePort {
  private pool: Pool | null;
  private readonly ownsPool: boolean;
  private readonly tableName: string;
  private readonly table: string;
  private readonly dimensions: number;
  private readonly options: PgVectorStoreOptions;

  constructor(options: PgVectorStoreOptions) {
    this.options = options;
    this.pool = options.pool ?? null;
    this.ownsPool = !options.pool;
    this.dimensions = options.dimensions ?? 1536;
    this.tableName = options.tableName ?? "memory_episodes";
    this.table = `${options.schema ?? "public"}.${this.tableName}`;
  }

  /** Initialize the adapter: creates extension, table and indexes */
  async initialize(): Promise<void> {
    if (!this.pool) {
      const { default: pg } = await import("pg");
      this.pool = new pg.Pool({
        connectionString: this.options.connectionString,
        max: this.options.poolSize ?? 10,
      });
    }
    const pool = this.pool;

    await pool.query("CREATE EXTENSION IF NOT EXISTS vector");

    await pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id TEXT PRIMARY KEY,
        embedding vector(${this.dimensions}) NOT NULL,
        content TEXT NOT NULL DEFAULT '',
        metadata JSONB NOT NULL DEFAULT '{}',
        created_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp()
      )
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_${this.tableName}_metadata
      ON ${this.table} USING gin (metadata jsonb_path_ops)
    `);

    if (this.options.useHnsw !== false) {
      await pool.query(`
        CREATE INDEX IF NOT EXISTS idx_${this.tableName}_hnsw
        ON ${this.table}
        USING hnsw (embedding vector_cosine_ops)
      `);
    }
  }

  async upsert(documents: VectorDocument[]): Promise<void> {
    if (documents.length === 0) return;

    const values: unknown[] = [];
    const placeholders: string[] = [];
    let idx = 1;

    for (const doc of documents) {
      placeholders.push(`($${idx}, $${idx + 1}::vector, $${idx + 2}, $${idx + 3}::jsonb)`);
      values.push(doc.id, toVectorLiteral(doc.embedding), doc.content, JSON.stringify(doc.metadata));
      idx += 4;
    }

    await this.getPool().query(
      `INSERT INTO ${this.table} (id, embedding, content, metadata)
       VALUES ${placeholders.join(", ")}
       ON CONFLICT (id) DO UPDATE SET
         embedding = EXCLUDED.embedding,
         content = EXCLUDED.content,
         metadata = EXCLUDED.metadata`,
      values,
    );
  }

  async query(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    if (params.topK <= 0) return [];

    const values: unknown[] = [toVectorLiteral(params.embedding)];
    const where = this.filterClause(params.filter, values);
    values.push(params.topK);
    const selectEmbedding = params.includeEmbeddings ? ", embedding" : "";

    const result = await this.getPool().query<DocumentRecord>(
      `SELECT id, content, metadata, embedding <=> $1::vector AS distance${selectEmbedding}
       FROM ${this.table}
       ${where}
       ORDER BY embedding <=> $1::vector
       LIMIT $${values.length}`,
      values,
    );

    const results: VectorSearchResult[] = result.rows.map((row) => ({
      id: row.id,
      content: row.content,
      metadata: parseMetadata(row.metadata),
      distance: Number(row.distance),
      ...(params.includeEmbeddings && row.embedding !== undefined
        ? { embedding: parseVector(row.embedding) }
        : {}),
    }));

    const { maxDistance } = params;
    return maxDistance === undefined ? results : results.filter((r) => r.distance < maxDistance);
  }

  async list(params: VectorListParams): Promise<VectorDocument[]> {
    if (params.limit <= 0) return [];

    const values: unknown[] = [];
    const where = this.filterClause(params.filter, values);
    values.push(params.limit);

    const result = await this.getPool().query<DocumentRecord>(
      `SELECT id, content, metadata, embedding
       FROM ${this.table}
       ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${values.length}`,
      values,
    );

    return result.rows.map((row) => ({
      id: row.id,
      content: row.content,
      metadata: parseMetadata(row.metadata),
      embedding: row.embedding === undefined ? [] : parseVector(row.embedding),
    }));
  }

  async count(filter?: VectorFilter): Promise<number> {
    const values: unknown[] = [];
    const where = this.filterClause(filter, values);
    const result = await this.getPool().query<{ count: string | number }>(
      `SELECT COUNT(*) AS count FROM ${this.table} ${where}`,
      values,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  /** Close the pool when this adapter opened it */
  async close(): Promise<void> {
    if (this.pool && this.ownsPool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  /** Exact-match metadata filter as JSONB containment; appends its parameter to `values`. */
  private filterClause(filter: VectorFilter | undefined, values: unknown[]): string {
    if (!filter || Object.keys(filter).length === 0) return "";
    values.push(JSON.stringify(filter));
    return `WHERE metadata @> $${values.length}::jsonb`;
  }

  private getPool(): Pool {
    if (!this.pool) {
      throw new Error("PgVectorStoreAdapter: call initialize() before use");
    }
    return this.pool;
  }
}

function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

/** pgvector returns `[1,2,3]` text unless a type parser is registered. */
function parseVector(raw: string | number[]): number[] {
  if (Array.isArray(raw)) return raw;
  const body = raw.trim().replace(/^\[/, "").replace(/\]$/, "");
  return body === "" ? [] : body.split(",").map(Number);
}

function parseMetadata(raw: Record<string, MetadataValue> | string): Record<string, MetadataValue> {
  if (typeof raw !== "string") return raw;
  const parsed: unknown = JSON.parse(raw);
  const metadata: Record<string, MetadataValue> = {};
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        metadata[key] = value;
      }
    }
  }
  return metadata;
}
