// =============================================================================
// CompactionPipeline — Summarize, embed and persist the oldest turns
// =============================================================================

import type { CompactionConfig } from "../domain/config.schema.js";
import type { Episode, Turn } from "../domain/memory.schema.js";
import { toError } from "../errors.js";
import type { MemoryEventBus } from "../events/event-bus.js";
import type { EmbeddingPort } from "../ports/embedding.port.js";
import type { LoggingPort } from "../ports/logging.port.js";
import type { SummarizerPort } from "../ports/summarizer.port.js";
import { withRetry } from "../utils/retry.js";
import type { EpisodicStore } from "./episodic-store.js";
import type { SessionBuffer } from "./session-buffer.js";

export type CompactionOutcome =
  | { status: "completed"; episode: Episode }
  | { status: "skipped"; reason: string }
  | { status: "restored"; turnStart: number; turnEnd: number; error: Error }
  | { status: "dropped"; stage: "embed" | "persist"; turns: Turn[]; error: Error };

export interface CompactionPipelineDeps {
  buffer: SessionBuffer;
  episodes: EpisodicStore;
  summarizer: SummarizerPort;
  embedder: EmbeddingPort;
  events: MemoryEventBus;
  logger: LoggingPort;
  config: CompactionConfig;
}

/**
 * Moves the oldest resident turns of a session into one episode.
 *
 * The caller claims the compaction on the buffer before dispatching; `run`
 * always releases that claim. A summarizer that stays down puts the slice
 * back in the buffer. An embedder or store that stays down loses the slice,
 * which is reported as `compaction:dropped`.
 */
export class CompactionPipeline {
  private readonly deps: CompactionPipelineDeps;

  constructor(deps: CompactionPipelineDeps) {
    this.deps = deps;
  }

  async run(userId: string, signal?: AbortSignal): Promise<CompactionOutcome> {
    try {
      return await this.compact(userId, signal);
    } finally {
      this.deps.buffer.releaseCompaction(userId);
    }
  }

  private async compact(userId: string, signal?: AbortSignal): Promise<CompactionOutcome> {
    const { buffer, episodes, summarizer, embedder, events, logger, config } = this.deps;

    const { slice } = buffer.takeCompactionSlice(userId);
    const first = slice[0];
    const last = slice[slice.length - 1];
    if (!first || !last) {
      const reason = "nothing to compact";
      events.emit("compaction:skipped", { userId, reason });
      return { status: "skipped", reason };
    }
    const turnStart = first.sequence;
    const turnEnd = last.sequence;

    events.emit("compaction:started", { userId, turnStart, turnEnd, turnCount: slice.length });
    logger.debug("Compacting turns", { userId, turnStart, turnEnd });

    const retry = {
      maxAttempts: config.maxAttempts,
      retryDelayMs: config.retryDelayMs,
      signal,
    };

    let summary: string;
    try {
      summary = await withRetry(async () => {
        const text = (await summarizer.summarize(slice, signal)).trim();
        if (text.length < config.minSummaryChars) {
          throw new Error(`summary shorter than ${config.minSummaryChars} characters`);
        }
        return text;
      }, {
        ...retry,
        dependency: "summarizer",
        onRetry: (error, attempt) =>
          logger.warn("Summarizer attempt failed, retrying", { userId, attempt, error: error.message }),
      });
    } catch (error) {
      const err = toError(error);
      buffer.restoreSlice(userId, slice);
      events.emit("compaction:restored", { userId, turnStart, turnEnd, error: err.message });
      logger.warn("Summarization failed, turns restored to the buffer", {
        userId,
        turnStart,
        turnEnd,
        error: err.message,
      });
      return { status: "restored", turnStart, turnEnd, error: err };
    }

    let embedding: number[];
    try {
      embedding = await withRetry(async () => (await embedder.embed(summary, signal)).embedding, {
        ...retry,
        dependency: "embedder",
      });
    } catch (error) {
      return this.drop(userId, "embed", slice, toError(error));
    }

    let episode: Episode;
    try {
      episode = await withRetry(
        () => episodes.append({ userId, turnStart, turnEnd, summary, embedding }),
        { ...retry, dependency: "episode store" },
      );
    } catch (error) {
      return this.drop(userId, "persist", slice, toError(error));
    }

    events.emit("compaction:completed", { userId, episodeId: episode.id, turnStart, turnEnd });
    logger.info("Compacted turns into an episode", {
      userId,
      episodeId: episode.id,
      turnStart,
      turnEnd,
    });
    return { status: "completed", episode };
  }

  private drop(
    userId: string,
    stage: "embed" | "persist",
    turns: Turn[],
    error: Error,
  ): CompactionOutcome {
    const turnStart = turns[0]?.sequence;
    const turnEnd = turns[turns.length - 1]?.sequence;
    this.deps.events.emit("compaction:dropped", { userId, stage, turns, error: error.message });
    this.deps.logger.error("Compaction dropped, turns were not persisted", {
      userId,
      stage,
      turnStart,
      turnEnd,
      error: error.message,
    });
    return { status: "dropped", stage, turns, error };
  }
}
