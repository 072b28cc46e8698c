// =============================================================================
// ExtractionPipeline — Message → validated, deduplicated fact upserts
// =============================================================================

import type { ExtractionConfig } from "../domain/config.schema.js";
import {
  FactCandidateSchema,
  type FactCandidate,
  type RawFactCandidate,
} from "../domain/memory.schema.js";
import { toError } from "../errors.js";
import type { MemoryEventBus } from "../events/event-bus.js";
import type { FactExtractorPort } from "../ports/fact-extractor.port.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { withRetry } from "../utils/retry.js";
import type { FactStore } from "./fact-store.js";
import type { KeyNormalizer } from "./key-normalizer.js";

/** Scores assumed when the extractor leaves them out */
const DEFAULT_CONFIDENCE = 1.0;
const DEFAULT_IMPORTANCE = 0.5;

export interface ExtractionReport {
  status: "completed" | "skipped" | "failed";
  reason?: string;
  /** Raw candidates returned by the extractor */
  candidates: number;
  inserted: number;
  updated: number;
  rejected: number;
  /** Malformed, below threshold, duplicate or failed to write */
  discarded: number;
}

export interface ExtractionPipelineDeps {
  extractor: FactExtractorPort;
  facts: FactStore;
  keys: KeyNormalizer;
  events: MemoryEventBus;
  logger: LoggingPort;
  config: ExtractionConfig;
}

export class ExtractionPipeline {
  private readonly deps: ExtractionPipelineDeps;

  constructor(deps: ExtractionPipelineDeps) {
    this.deps = deps;
  }

  async run(userId: string, message: string, signal?: AbortSignal): Promise<ExtractionReport> {
    const { extractor, facts, events, logger, config } = this.deps;
    const report: ExtractionReport = {
      status: "completed",
      candidates: 0,
      inserted: 0,
      updated: 0,
      rejected: 0,
      discarded: 0,
    };

    const skipReason = this.skipReason(message);
    if (skipReason) {
      events.emit("extraction:skipped", { userId, reason: skipReason });
      logger.debug("Skipping extraction", { userId, reason: skipReason });
      return { ...report, status: "skipped", reason: skipReason };
    }

    let raw: RawFactCandidate[];
    try {
      raw = await withRetry(() => extractor.extract(message, signal), {
        dependency: "fact extractor",
        maxAttempts: config.maxAttempts,
        retryDelayMs: config.retryDelayMs,
        signal,
      });
    } catch (error) {
      const err = toError(error);
      events.emit("extraction:failed", { userId, error: err.message });
      logger.warn("Fact extraction failed, nothing written", { userId, error: err.message });
      return { ...report, status: "failed", reason: err.message };
    }

    report.candidates = raw.length;
    const survivors = this.selectCandidates(raw);
    report.discarded = raw.length - survivors.length;

    for (const candidate of survivors) {
      try {
        const outcome = await facts.upsertCandidate(userId, candidate);
        report[outcome]++;
        events.emit("fact:upserted", {
          userId,
          category: candidate.category,
          key: candidate.key,
          outcome,
        });
      } catch (error) {
        report.discarded++;
        logger.error("Failed to persist fact", {
          userId,
          category: candidate.category,
          key: candidate.key,
          error: toError(error).message,
        });
      }
    }

    events.emit("extraction:completed", {
      userId,
      candidates: report.candidates,
      inserted: report.inserted,
      updated: report.updated,
      rejected: report.rejected,
      discarded: report.discarded,
    });
    return report;
  }

  /**
   * Validate, canonicalize, threshold and deduplicate. For a repeated
   * `(category, key)` the most confident candidate wins; the first seen
   * wins a tie.
   */
  selectCandidates(raw: RawFactCandidate[]): FactCandidate[] {
    const { keys, logger, config } = this.deps;
    const best = new Map<string, FactCandidate>();

    for (const entry of raw) {
      const parsed = FactCandidateSchema.safeParse({
        category: entry.category.trim().toLowerCase(),
        key: keys.normalize(entry.key),
        value: entry.value,
        confidence: entry.confidence ?? DEFAULT_CONFIDENCE,
        importance: entry.importance ?? DEFAULT_IMPORTANCE,
      });
      if (!parsed.success) {
        logger.debug("Discarding extraction candidate", { entry, issues: parsed.error.issues.length });
        continue;
      }
      const candidate = parsed.data;

      if (candidate.confidence < config.minConfidence) {
        logger.debug("Skipping low-confidence fact", { key: candidate.key, confidence: candidate.confidence });
        continue;
      }
      if (candidate.importance < config.minImportance) {
        logger.debug("Skipping low-importance fact", { key: candidate.key, importance: candidate.importance });
        continue;
      }

      const dedupeKey = `${candidate.category}::${candidate.key}`;
      const current = best.get(dedupeKey);
      if (!current || candidate.confidence > current.confidence) {
        best.set(dedupeKey, candidate);
      }
    }

    return [...best.values()];
  }

  private skipReason(message: string): string | undefined {
    const { config } = this.deps;
    if (!config.skipQuestions) return undefined;
    const trimmed = message.trim();
    if (trimmed.endsWith("?")) return "question";
    const words = trimmed.split(/\s+/).filter((word) => word.length > 0);
    if (words.length < config.minWords) return "too short";
    return undefined;
  }
}
