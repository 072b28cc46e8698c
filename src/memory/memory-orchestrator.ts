// =============================================================================
// MemoryOrchestrator — Request path plus background compaction and extraction
// =============================================================================

import {
  WorkerPool,
  type WorkerPoolEvent,
  type WorkerPoolMetrics,
} from "../background/worker-pool.js";
import {
  resolveMemoryConfig,
  type MemoryConfig,
  type MemoryConfigInput,
} from "../domain/config.schema.js";
import type { Episode, Fact, Turn } from "../domain/memory.schema.js";
import { MemoryError, ValidationError, toError } from "../errors.js";
import { MemoryEventBus } from "../events/event-bus.js";
import { InMemoryFactRepository } from "../adapters/facts/inmemory.adapter.js";
import { InMemoryVectorStore } from "../adapters/vector-store/inmemory.adapter.js";
import { silentLogger } from "../adapters/logging/console-logging.adapter.js";
import type { EmbeddingPort } from "../ports/embedding.port.js";
import type { FactExtractorPort } from "../ports/fact-extractor.port.js";
import type { FactRepositoryPort } from "../ports/fact-repository.port.js";
import type { LoggingPort } from "../ports/logging.port.js";
import type { ResponderPort } from "../ports/responder.port.js";
import type { SummarizerPort } from "../ports/summarizer.port.js";
import type { VectorStorePort } from "../ports/vector-store.port.js";
import { formatBundle } from "./bundle-format.js";
import { CompactionPipeline } from "./compaction-pipeline.js";
import { EpisodicStore } from "./episodic-store.js";
import { ExtractionPipeline } from "./extraction-pipeline.js";
import { FactStore } from "./fact-store.js";
import { KeyNormalizer } from "./key-normalizer.js";
import { RetrievalEngine, type Bundle } from "./retrieval-engine.js";
import {
  classifyIntent,
  decideRetrievalMode,
  type MessageIntent,
  type RetrievalMode,
} from "./retrieval-policy.js";
import { SessionBuffer } from "./session-buffer.js";

export const FALLBACK_REPLY = "Sorry, I couldn't come up with a reply just now. Please try again.";

/** Compaction frees buffer space, so it runs ahead of extraction. */
const COMPACTION_PRIORITY = 0;
const EXTRACTION_PRIORITY = 1;

export interface MemoryOrchestratorOptions {
  summarizer: SummarizerPort;
  extractor: FactExtractorPort;
  responder: ResponderPort;
  embedder: EmbeddingPort;
  /** Default: in-memory repository */
  factRepository?: FactRepositoryPort;
  /** Default: in-memory vector store */
  vectorStore?: VectorStorePort;
  config?: MemoryConfigInput;
  logger?: LoggingPort;
  events?: MemoryEventBus;
  keys?: KeyNormalizer;
  /** Clock shared by the buffer and the stores (default: Date.now) */
  now?: () => number;
}

export interface OnMessageResult {
  reply: string;
  /** Absent when the retrieval policy skipped long-term memory */
  bundle?: Bundle;
  /** Memory text handed to the responder */
  context: string;
  mode: RetrievalMode;
  intent: MessageIntent;
}

export interface MemorySnapshot {
  userId: string;
  facts: Fact[];
  turns: Turn[];
  baseSequence: number;
  compacting: boolean;
  episodeCount: number;
  recentEpisodes: Episode[];
  /** Pool counters across all users */
  background: WorkerPoolMetrics;
}

interface MemoryTask {
  kind: "compaction" | "extraction";
  userId: string;
  run(signal: AbortSignal): Promise<void>;
}

export class MemoryOrchestrator {
  readonly config: MemoryConfig;
  readonly events: MemoryEventBus;
  readonly buffer: SessionBuffer;
  readonly facts: FactStore;
  readonly episodes: EpisodicStore;
  readonly retrieval: RetrievalEngine;
  readonly compaction: CompactionPipeline;
  readonly extraction: ExtractionPipeline;

  private readonly responder: ResponderPort;
  private readonly logger: LoggingPort;
  private readonly pool: WorkerPool<MemoryTask, void>;
  private nextTaskId = 0;
  private closed = false;

  /** Throws ConfigurationError when `config` is invalid. */
  constructor(options: MemoryOrchestratorOptions) {
    this.config = resolveMemoryConfig(options.config);
    this.logger = options.logger ?? silentLogger;
    this.events = options.events ?? new MemoryEventBus();
    this.responder = options.responder;

    const now = options.now ?? Date.now;
    this.buffer = new SessionBuffer({ ...this.config.buffer, now });
    this.facts = new FactStore(
      options.factRepository ?? new InMemoryFactRepository({ now }),
      this.config.facts,
    );
    this.episodes = new EpisodicStore(options.vectorStore ?? new InMemoryVectorStore(), { now });

    this.compaction = new CompactionPipeline({
      buffer: this.buffer,
      episodes: this.episodes,
      summarizer: options.summarizer,
      embedder: options.embedder,
      events: this.events,
      logger: this.logger,
      config: this.config.compaction,
    });
    this.extraction = new ExtractionPipeline({
      extractor: options.extractor,
      facts: this.facts,
      keys: options.keys ?? new KeyNormalizer(),
      events: this.events,
      logger: this.logger,
      config: this.config.extraction,
    });
    this.retrieval = new RetrievalEngine({
      facts: this.facts,
      episodes: this.episodes,
      embedder: options.embedder,
      events: this.events,
      logger: this.logger,
      config: this.config.retrieval,
    });

    this.pool = new WorkerPool<MemoryTask, void>(
      (task, signal) => task.run(signal),
      { size: this.config.pool.size, taskTimeoutMs: this.config.pool.taskTimeoutMs },
      (event) => this.onPoolEvent(event),
    );
  }

  /**
   * Handle one inbound user message and return the reply. Memory failures
   * degrade the context; a responder failure or a message the buffer
   * rejects yields {@link FALLBACK_REPLY}. Compaction and extraction run in
   * the background.
   */
  async onMessage(userId: string, text: string): Promise<OnMessageResult> {
    this.assertOpen();

    const intent = classifyIntent(text);
    try {
      this.buffer.append(userId, { role: "user", content: text });
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.logger.warn("Inbound message rejected by the session buffer", { userId, error: error.message });
      return { reply: FALLBACK_REPLY, context: "", mode: "session", intent };
    }
    this.scheduleCompaction(userId);

    const mode = decideRetrievalMode(text);
    let bundle: Bundle | undefined;
    let context = "";
    if (mode === "active") {
      bundle = await this.retrieval.retrieve(userId, text);
      context = formatBundle(bundle, { maxChars: this.config.retrieval.maxContextChars });
    }

    const reply = await this.respond(userId, text, context);

    // The session may have been closed or evicted while awaiting the responder
    if (!this.closed) {
      this.buffer.append(userId, { role: "assistant", content: reply });
      this.scheduleCompaction(userId);
      this.schedule("extraction", userId, EXTRACTION_PRIORITY, async (signal) => {
        await this.extraction.run(userId, text, signal);
      });
    }

    return { reply, bundle, context, mode, intent };
  }

  /** Resolves once all queued background work has finished. */
  whenIdle(): Promise<void> {
    return this.pool.whenIdle();
  }

  async inspect(userId: string, recentEpisodeLimit = 5): Promise<MemorySnapshot> {
    const [facts, episodeCount, recentEpisodes] = await Promise.all([
      this.facts.listActive(userId, 0),
      this.episodes.count(userId),
      this.episodes.recent(userId, recentEpisodeLimit),
    ]);
    return {
      userId,
      facts,
      turns: this.buffer.turns(userId),
      baseSequence: this.buffer.baseSequence(userId),
      compacting: this.buffer.isCompacting(userId),
      episodeCount,
      recentEpisodes,
      background: this.pool.getMetrics(),
    };
  }

  /** Drop sessions idle past the configured TTL; returns the evicted user ids. */
  evictIdleSessions(now?: number): string[] {
    const evicted = this.buffer.evictIdle(now);
    if (evicted.length > 0) {
      this.logger.info("Evicted idle sessions", { count: evicted.length });
    }
    return evicted;
  }

  /** Stop accepting messages, finish background work and clear sessions. */
  async shutdown(timeoutMs = 30_000): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.pool.drain(timeoutMs);
    } finally {
      this.buffer.clear();
    }
  }

  private async respond(userId: string, message: string, memoryContext: string): Promise<string> {
    try {
      const reply = await this.responder.respond({
        userId,
        message,
        memoryContext,
        recentTurns: this.buffer.turns(userId),
      });
      if (reply.trim() === "") {
        this.logger.warn("Responder returned an empty reply", { userId });
        return FALLBACK_REPLY;
      }
      return reply;
    } catch (error) {
      this.logger.error("Responder failed", { userId, error: toError(error).message });
      return FALLBACK_REPLY;
    }
  }

  private scheduleCompaction(userId: string): void {
    if (!this.buffer.shouldCompact(userId)) return;
    if (!this.buffer.claimCompaction(userId)) return;
    this.schedule("compaction", userId, COMPACTION_PRIORITY, async (signal) => {
      await this.compaction.run(userId, signal);
    });
  }

  private schedule(
    kind: MemoryTask["kind"],
    userId: string,
    priority: number,
    run: (signal: AbortSignal) => Promise<void>,
  ): void {
    const taskId = `${kind}:${userId}:${++this.nextTaskId}`;
    this.pool.dispatch(taskId, { kind, userId, run }, priority);
  }

  private onPoolEvent(event: WorkerPoolEvent<void>): void {
    switch (event.type) {
      case "task:failed":
        this.events.emit("task:failed", { taskId: event.taskId, error: event.error.message });
        this.logger.error("Background task failed", {
          taskId: event.taskId,
          error: event.error.message,
        });
        break;
      case "task:cancelled":
        this.events.emit("task:failed", { taskId: event.taskId, error: event.reason });
        this.logger.warn("Background task cancelled", { taskId: event.taskId, reason: event.reason });
        break;
      case "task:timeout":
        this.logger.warn("Background task timed out", { taskId: event.taskId });
        break;
      default:
        break;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new MemoryError("SHUT_DOWN", "MemoryOrchestrator has been shut down");
    }
  }
}
