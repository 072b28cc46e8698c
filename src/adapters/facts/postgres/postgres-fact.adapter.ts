// =============================================================================
// PostgreSQL Fact Repository — Implements FactRepositoryPort
// =============================================================================
//
// Requires: pg
// Table: memory_facts (user_id, category, key, value, confidence, importance,
//        is_active, version, created_at, updated_at)
//
// Usage:
//   const facts = new PostgresFactRepository({ connectionString: '...' })
//   await facts.initialize() // creates table and indexes if not exists
//
// At most one active row per (user_id, category, key) is enforced by a
// partial unique index; inactive rows accumulate as history.
//
// =============================================================================

import type { Pool } from "pg";

import {
  FACT_CATEGORIES,
  FactCategorySchema,
  type Fact,
  type FactIdentity,
} from "../../../domain/memory.schema.js";
import type {
  FactMutation,
  FactRepositoryPort,
  NewFact,
} from "../../../ports/fact-repository.port.js";

export interface PostgresFactRepositoryOptions {
  /** PostgreSQL connection string; ignored when `pool` is given */
  connectionString?: string;
  /** Existing pool to share; it is not closed by {@link PostgresFactRepository.close} */
  pool?: Pool;
  /** Table name (default: 'memory_facts') */
  tableName?: string;
  /** Schema name (default: 'public') */
  schema?: string;
  /** Pool size (default: 10) */
  poolSize?: number;
}

type FactRecord = {
  user_id: string;
  category: string;
  key: string;
  value: string;
  confidence: number;
  importance: number;
  is_active: boolean;
  version: number;
  created_at: Date | string;
  updated_at: Date | string;
};

const COLUMNS =
  "user_id, category, key, value, confidence, importance, is_active, version, created_at, updated_at";

export class PostgresFactRepository implements FactRepositoryPort {
  private pool: Pool | null;
  private readonly ownsPool: boolean;
  private readonly tableName: string;
  private readonly table: string;
  private readonly options: PostgresFactRepositoryOptions;

  constructor(options: PostgresFactRepositoryOptions) {
    this.options = options;
    this.pool = options.pool ?? null;
    this.ownsPool = !options.pool;
    this.tableName = options.tableName ?? "memory_facts";
    this.table = `${options.schema ?? "public"}.${this.tableName}`;
  }

  /** Initialize the adapter: opens the pool, creates table and indexes */
  async initialize(): Promise<void> {
    if (!this.pool) {
      const { default: pg } = await import("pg");
      this.pool = new pg.Pool({
        connectionString: this.options.connectionString,
        max: this.options.poolSize ?? 10,
      });
    }
    const pool = this.pool;

    const categories = FACT_CATEGORIES.map((c) => `'${c}'`).join(", ");
    await pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL,
        category TEXT NOT NULL CHECK (category IN (${categories})),
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        confidence DOUBLE PRECISION NOT NULL CHECK (confidence BETWEEN 0 AND 1),
        importance DOUBLE PRECISION NOT NULL CHECK (importance BETWEEN 0 AND 1),
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        version INTEGER NOT NULL DEFAULT 1,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);

    await pool.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_${this.tableName}_active
      ON ${this.table} (user_id, category, key)
      WHERE is_active
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_${this.tableName}_importance
      ON ${this.table} (user_id, importance DESC, updated_at DESC)
      WHERE is_active
    `);
  }

  async getActive(identity: FactIdentity): Promise<Fact | null> {
    const result = await this.getPool().query<FactRecord>(
      `SELECT ${COLUMNS} FROM ${this.table}
       WHERE user_id = $1 AND category = $2 AND key = $3 AND is_active`,
      [identity.userId, identity.category, identity.key],
    );
    const row = result.rows[0];
    return row ? toFact(row) : null;
  }

  async insertIfAbsent(fact: NewFact): Promise<Fact | null> {
    const result = await this.getPool().query<FactRecord>(
      `INSERT INTO ${this.table} (user_id, category, key, value, confidence, importance)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (user_id, category, key) WHERE is_active DO NOTHING
       RETURNING ${COLUMNS}`,
      [fact.userId, fact.category, fact.key, fact.value, fact.confidence, fact.importance],
    );
    const row = result.rows[0];
    return row ? toFact(row) : null;
  }

  async compareAndSwap(
    identity: FactIdentity,
    expectedVersion: number,
    mutation: FactMutation,
  ): Promise<Fact | null> {
    const result = await this.getPool().query<FactRecord>(
      `UPDATE ${this.table}
       SET value = $5, confidence = $6, version = version + 1, updated_at = clock_timestamp()
       WHERE user_id = $1 AND category = $2 AND key = $3 AND is_active AND version = $4
       RETURNING ${COLUMNS}`,
      [
        identity.userId,
        identity.category,
        identity.key,
        expectedVersion,
        mutation.value,
        mutation.confidence,
      ],
    );
    const row = result.rows[0];
    return row ? toFact(row) : null;
  }

  async deactivate(identity: FactIdentity): Promise<boolean> {
    const result = await this.getPool().query(
      `UPDATE ${this.table}
       SET is_active = FALSE, version = version + 1, updated_at = clock_timestamp()
       WHERE user_id = $1 AND category = $2 AND key = $3 AND is_active`,
      [identity.userId, identity.category, identity.key],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listActive(userId: string, minImportance: number): Promise<Fact[]> {
    const result = await this.getPool().query<FactRecord>(
      `SELECT ${COLUMNS} FROM ${this.table}
       WHERE user_id = $1 AND is_active AND importance >= $2
       ORDER BY importance DESC, updated_at DESC, id DESC`,
      [userId, minImportance],
    );
    return result.rows.map(toFact);
  }

  async listByKeys(userId: string, keys: string[]): Promise<Fact[]> {
    if (keys.length === 0) return [];
    const result = await this.getPool().query<FactRecord>(
      `SELECT ${COLUMNS} FROM ${this.table}
       WHERE user_id = $1 AND is_active AND key = ANY($2::text[])
       ORDER BY importance DESC, updated_at DESC, id DESC`,
      [userId, keys],
    );
    return result.rows.map(toFact);
  }

  async history(identity: FactIdentity): Promise<Fact[]> {
    const result = await this.getPool().query<FactRecord>(
      `SELECT ${COLUMNS} FROM ${this.table}
       WHERE user_id = $1 AND category = $2 AND key = $3
       ORDER BY id ASC`,
      [identity.userId, identity.category, identity.key],
    );
    return result.rows.map(toFact);
  }

  /** Close the pool when this adapter opened it */
  async close(): Promise<void> {
    if (this.pool && this.ownsPool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  private getPool(): Pool {
    if (!this.pool) {
      throw new Error("PostgresFactRepository: call initialize() before use");
    }
    return this.pool;
  }
}

function toFact(row: FactRecord): Fact {
  return {
    userId: row.user_id,
    category: FactCategorySchema.parse(row.category),
    key: row.key,
    value: row.value,
    confidence: Number(row.confidence),
    importance: Number(row.importance),
    isActive: row.is_active,
    version: Number(row.version),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

function toIso(value: Date | string): string {
  return (value instanceof Date ? value : new Date(value)).toISOString();
}
