// =============================================================================
// FactStore — Confidence-gated conditional upsert over a fact repository
// =============================================================================

import {
  FactCandidateSchema,
  factIdentityKey,
  type Fact,
  type FactCandidate,
  type FactCategory,
  type FactIdentity,
  type UpsertOutcome,
} from "../domain/memory.schema.js";
import { ConcurrencyConflictError, ValidationError } from "../errors.js";
import type { FactRepositoryPort } from "../ports/fact-repository.port.js";
import { KeyedMutex } from "./keyed-mutex.js";

export interface FactStoreOptions {
  /** Lost compare-and-swap rounds tolerated per upsert (default: 5) */
  maxConflictRetries?: number;
}

/**
 * Durable user facts. At most one active fact exists per
 * `(userId, category, key)`; a newer candidate replaces it only when it is
 * strictly more confident. Equal confidence is not an update trigger.
 *
 * Confidence therefore never decreases for a key: a later correction with
 * lower confidence is rejected and the stale value stays.
 */
export class FactStore {
  private readonly repository: FactRepositoryPort;
  private readonly mutex = new KeyedMutex();
  private readonly maxConflictRetries: number;

  constructor(repository: FactRepositoryPort, options: FactStoreOptions = {}) {
    this.repository = repository;
    this.maxConflictRetries = options.maxConflictRetries ?? 5;
  }

  /**
   * Insert, update or reject a candidate. Throws {@link ValidationError}
   * before touching storage when the candidate is malformed.
   */
  async upsertCandidate(userId: string, candidate: FactCandidate): Promise<UpsertOutcome> {
    if (userId.trim() === "") {
      throw new ValidationError("must not be empty", "userId");
    }
    const parsed = FactCandidateSchema.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        issue?.message ?? "invalid fact candidate",
        issue ? issue.path.join(".") : undefined,
      );
    }
    const fact = parsed.data;
    const identity: FactIdentity = { userId, category: fact.category, key: fact.key };

    return this.mutex.runExclusive(factIdentityKey(identity), async () => {
      for (let round = 0; round <= this.maxConflictRetries; round++) {
        try {
          return await this.attemptUpsert(identity, fact);
        } catch (error) {
          if (!(error instanceof ConcurrencyConflictError)) throw error;
          if (round === this.maxConflictRetries) throw error;
        }
      }
      throw new ConcurrencyConflictError(factIdentityKey(identity));
    });
  }

  /** Active facts with importance >= minImportance, importance desc then most recent. */
  listActive(userId: string, minImportance = 0): Promise<Fact[]> {
    return this.repository.listActive(userId, minImportance);
  }

  getActive(userId: string, category: FactCategory, key: string): Promise<Fact | null> {
    return this.repository.getActive({ userId, category, key });
  }

  listByKeys(userId: string, keys: string[]): Promise<Fact[]> {
    return this.repository.listByKeys(userId, keys);
  }

  /** Soft delete; the row stays in history. */
  deactivate(userId: string, category: FactCategory, key: string): Promise<boolean> {
    const identity: FactIdentity = { userId, category, key };
    return this.mutex.runExclusive(factIdentityKey(identity), () =>
      this.repository.deactivate(identity),
    );
  }

  history(userId: string, category: FactCategory, key: string): Promise<Fact[]> {
    return this.repository.history({ userId, category, key });
  }

  /** One read-decide-write round. A lost race surfaces as ConcurrencyConflictError. */
  private async attemptUpsert(identity: FactIdentity, candidate: FactCandidate): Promise<UpsertOutcome> {
    const existing = await this.repository.getActive(identity);

    if (!existing) {
      const inserted = await this.repository.insertIfAbsent({
        ...identity,
        value: candidate.value,
        confidence: candidate.confidence,
        importance: candidate.importance,
      });
      if (!inserted) {
        throw new ConcurrencyConflictError(
          factIdentityKey(identity),
          `Active fact appeared concurrently for ${factIdentityKey(identity)}`,
        );
      }
      return "inserted";
    }

    if (!shouldReplace(existing, candidate)) return "rejected";

    const swapped = await this.repository.compareAndSwap(identity, existing.version, {
      value: candidate.value,
      confidence: candidate.confidence,
    });
    if (!swapped) {
      throw new ConcurrencyConflictError(
        factIdentityKey(identity),
        `Fact ${factIdentityKey(identity)} changed since version ${existing.version}`,
      );
    }
    return "updated";
  }
}

/** Only a strictly more confident candidate replaces the active fact. */
export function shouldReplace(existing: Pick<Fact, "confidence">, candidate: FactCandidate): boolean {
  return candidate.confidence > existing.confidence;
}
