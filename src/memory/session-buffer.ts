// =============================================================================
// SessionBuffer — Per-user short-term turns with a compaction trigger
// =============================================================================

import type { BufferConfig } from "../domain/config.schema.js";
import { TurnInputSchema, type Turn, type TurnInput } from "../domain/memory.schema.js";
import { ValidationError } from "../errors.js";

interface Session {
  turns: Turn[];
  compacting: boolean;
  lastActivity: number;
}

export interface CompactionSlice {
  /** Oldest turns, handed to the compaction pipeline */
  slice: Turn[];
  /** Most recent turns, left resident */
  retained: Turn[];
}

export interface SessionBufferOptions extends Partial<BufferConfig> {
  /** Clock for idle tracking (default: Date.now) */
  now?: () => number;
}

/**
 * Keyed store of short-term sessions. Every operation is synchronous, so
 * calls for one user are linearized by the event loop and a slice is taken
 * atomically with respect to `append`.
 */
export class SessionBuffer {
  readonly triggerSize: number;
  readonly retainCount: number;
  readonly idleTtlMs: number;
  private readonly sessions = new Map<string, Session>();
  /** Next sequence per user; outlives idle eviction so numbers are never reused */
  private readonly nextSequences = new Map<string, number>();
  private readonly now: () => number;

  constructor(options: SessionBufferOptions = {}) {
    this.triggerSize = options.triggerSize ?? 20;
    this.retainCount = options.retainCount ?? 10;
    this.idleTtlMs = options.idleTtlMs ?? 30 * 60_000;
    this.now = options.now ?? Date.now;
  }

  /** Append a turn and return the new resident length. */
  append(userId: string, input: TurnInput): number {
    const parsed = TurnInputSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        issue?.message ?? "invalid turn",
        issue ? String(issue.path[0] ?? "turn") : "turn",
      );
    }

    const session = this.sessionFor(userId);
    const sequence = this.nextSequences.get(userId) ?? 1;
    this.nextSequences.set(userId, sequence + 1);
    session.turns.push({
      role: parsed.data.role,
      content: parsed.data.content,
      sequence,
    });
    session.lastActivity = this.now();
    return session.turns.length;
  }

  /** True when the buffer reached the trigger size and no compaction is in flight. */
  shouldCompact(userId: string): boolean {
    const session = this.sessions.get(userId);
    if (!session || session.compacting) return false;
    return session.turns.length >= this.triggerSize;
  }

  /** Mark a compaction in flight. False when one already is. */
  claimCompaction(userId: string): boolean {
    const session = this.sessionFor(userId);
    if (session.compacting) return false;
    session.compacting = true;
    return true;
  }

  releaseCompaction(userId: string): void {
    const session = this.sessions.get(userId);
    if (session) session.compacting = false;
  }

  isCompacting(userId: string): boolean {
    return this.sessions.get(userId)?.compacting ?? false;
  }

  /**
   * Split off everything but the most recent `retainCount` turns and keep
   * only the retained ones resident.
   */
  takeCompactionSlice(userId: string): CompactionSlice {
    const session = this.sessions.get(userId);
    if (!session || session.turns.length <= this.retainCount) {
      return { slice: [], retained: session ? [...session.turns] : [] };
    }
    const cut = session.turns.length - this.retainCount;
    const slice = session.turns.slice(0, cut);
    const retained = session.turns.slice(cut);
    session.turns = retained;
    return { slice, retained: [...retained] };
  }

  /** Put an un-compacted slice back, merged in sequence order. */
  restoreSlice(userId: string, slice: Turn[]): void {
    if (slice.length === 0) return;
    const session = this.sessionFor(userId);
    const bySequence = new Map<number, Turn>();
    for (const turn of [...slice, ...session.turns]) {
      bySequence.set(turn.sequence, turn);
    }
    session.turns = [...bySequence.values()].sort((a, b) => a.sequence - b.sequence);
  }

  /** Resident turns, oldest first. */
  turns(userId: string): Turn[] {
    return [...(this.sessions.get(userId)?.turns ?? [])];
  }

  /** Sequence of the oldest resident turn, or the next sequence when empty. */
  baseSequence(userId: string): number {
    const next = this.nextSequences.get(userId) ?? 1;
    return this.sessions.get(userId)?.turns[0]?.sequence ?? next;
  }

  size(userId: string): number {
    return this.sessions.get(userId)?.turns.length ?? 0;
  }

  has(userId: string): boolean {
    return this.sessions.has(userId);
  }

  userIds(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Drop sessions idle for longer than `idleTtlMs`. Sessions with a
   * compaction in flight are kept. Returns the evicted user ids.
   */
  evictIdle(now = this.now()): string[] {
    const evicted: string[] = [];
    for (const [userId, session] of this.sessions) {
      if (session.compacting) continue;
      if (now - session.lastActivity > this.idleTtlMs) {
        this.sessions.delete(userId);
        evicted.push(userId);
      }
    }
    return evicted;
  }

  clear(): void {
    this.sessions.clear();
    this.nextSequences.clear();
  }

  private sessionFor(userId: string): Session {
    let session = this.sessions.get(userId);
    if (!session) {
      session = { turns: [], compacting: false, lastActivity: this.now() };
      this.sessions.set(userId, session);
    }
    return session;
  }
}
