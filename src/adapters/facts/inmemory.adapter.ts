// =============================================================================
// InMemoryFactRepository — Map-backed facts with version compare-and-swap
// =============================================================================

import {
  factIdentityKey,
  type Fact,
  type FactIdentity,
} from "../../domain/memory.schema.js";
import type {
  FactMutation,
  FactRepositoryPort,
  NewFact,
} from "../../ports/fact-repository.port.js";

interface FactRow {
  fact: Fact;
  /** Bumped on every write; orders rows updated within the same millisecond */
  touched: number;
}

export interface InMemoryFactRepositoryOptions {
  /** Clock used for createdAt/updatedAt (default: Date.now) */
  now?: () => number;
}

export class InMemoryFactRepository implements FactRepositoryPort {
  private readonly rows: FactRow[] = [];
  private readonly active = new Map<string, FactRow>();
  private readonly now: () => number;
  private clock = 0;

  constructor(options: InMemoryFactRepositoryOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async getActive(identity: FactIdentity): Promise<Fact | null> {
    const row = this.active.get(factIdentityKey(identity));
    return row ? { ...row.fact } : null;
  }

  async insertIfAbsent(fact: NewFact): Promise<Fact | null> {
    const id = factIdentityKey(fact);
    if (this.active.has(id)) return null;

    const timestamp = new Date(this.now()).toISOString();
    const row: FactRow = {
      fact: {
        userId: fact.userId,
        category: fact.category,
        key: fact.key,
        value: fact.value,
        confidence: fact.confidence,
        importance: fact.importance,
        isActive: true,
        version: 1,
        createdAt: timestamp,
        updatedAt: timestamp,
      },
      touched: ++this.clock,
    };
    this.rows.push(row);
    this.active.set(id, row);
    return { ...row.fact };
  }

  async compareAndSwap(
    identity: FactIdentity,
    expectedVersion: number,
    mutation: FactMutation,
  ): Promise<Fact | null> {
    const row = this.active.get(factIdentityKey(identity));
    if (!row || row.fact.version !== expectedVersion) return null;

    row.fact = {
      ...row.fact,
      value: mutation.value,
      confidence: mutation.confidence,
      version: row.fact.version + 1,
      updatedAt: new Date(this.now()).toISOString(),
    };
    row.touched = ++this.clock;
    return { ...row.fact };
  }

  async deactivate(identity: FactIdentity): Promise<boolean> {
    const id = factIdentityKey(identity);
    const row = this.active.get(id);
    if (!row) return false;

    row.fact = {
      ...row.fact,
      isActive: false,
      version: row.fact.version + 1,
      updatedAt: new Date(this.now()).toISOString(),
    };
    row.touched = ++this.clock;
    this.active.delete(id);
    return true;
  }

  async listActive(userId: string, minImportance: number): Promise<Fact[]> {
    return this.sortedActive(
      (fact) => fact.userId === userId && fact.importance >= minImportance,
    );
  }

  async listByKeys(userId: string, keys: string[]): Promise<Fact[]> {
    if (keys.length === 0) return [];
    const wanted = new Set(keys);
    return this.sortedActive((fact) => fact.userId === userId && wanted.has(fact.key));
  }

  async history(identity: FactIdentity): Promise<Fact[]> {
    return this.rows
      .filter(
        ({ fact }) =>
          fact.userId === identity.userId &&
          fact.category === identity.category &&
          fact.key === identity.key,
      )
      .map(({ fact }) => ({ ...fact }));
  }

  /** Total rows held, active or not */
  get size(): number {
    return this.rows.length;
  }

  private sortedActive(predicate: (fact: Fact) => boolean): Fact[] {
    return [...this.active.values()]
      .filter(({ fact }) => predicate(fact))
      .sort(
        (a, b) =>
          b.fact.importance - a.fact.importance ||
          b.fact.updatedAt.localeCompare(a.fact.updatedAt) ||
          b.touched - a.touched,
      )
      .map(({ fact }) => ({ ...fact }));
  }
}
