// =============================================================================
// FactRepositoryPort — Durable facts with compare-and-swap writes
// =============================================================================

import type { Fact, FactIdentity } from "../domain/memory.schema.js";

export interface NewFact extends FactIdentity {
  value: string;
  confidence: number;
  importance: number;
}

export interface FactMutation {
  value: string;
  confidence: number;
}

/**
 * Storage contract for facts. Writes are conditional so that the
 * check-then-act sequence of conflict resolution never needs a lock held
 * across the store:
 *
 * - {@link insertIfAbsent} only succeeds when no active row exists for the
 *   triple.
 * - {@link compareAndSwap} only succeeds when the active row still carries
 *   `expectedVersion`.
 *
 * A `null` result means the precondition failed and nothing was written.
 */
export interface FactRepositoryPort {
  getActive(identity: FactIdentity): Promise<Fact | null>;

  insertIfAbsent(fact: NewFact): Promise<Fact | null>;

  compareAndSwap(
    identity: FactIdentity,
    expectedVersion: number,
    mutation: FactMutation,
  ): Promise<Fact | null>;

  /** Soft delete. Returns false when there was no active row. */
  deactivate(identity: FactIdentity): Promise<boolean>;

  /** Active facts with importance >= minImportance, importance desc, updatedAt desc */
  listActive(userId: string, minImportance: number): Promise<Fact[]>;

  /** Active facts for the given keys, same ordering as listActive */
  listByKeys(userId: string, keys: string[]): Promise<Fact[]>;

  /** Every row for the triple, active or not, oldest first */
  history(identity: FactIdentity): Promise<Fact[]>;
}
