// =============================================================================
// RetrievalEngine — Profile facts plus nearest episodes under a deadline
// =============================================================================

import type { RetrievalConfig } from "../domain/config.schema.js";
import type { Fact, ScoredEpisode } from "../domain/memory.schema.js";
import { toError } from "../errors.js";
import type { MemoryEventBus } from "../events/event-bus.js";
import type { EmbeddingPort } from "../ports/embedding.port.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { settleWithin, track } from "../utils/deadline.js";
import type { EpisodicStore } from "./episodic-store.js";
import type { FactStore } from "./fact-store.js";

export type DegradedStage = "profile" | "semantic" | "timeout";

export interface EpisodeHit {
  episode: ScoredEpisode;
  /** Summary cut to the preview length */
  preview: string;
}

export interface Bundle {
  /** Importance desc, then most recently updated */
  profile: Fact[];
  /** Distance asc */
  recentContext: EpisodeHit[];
  /** Stages that failed or did not finish in time; empty when complete */
  degraded: DegradedStage[];
}

export interface RetrieveOptions {
  topKEpisodes?: number;
  minFactImportance?: number;
  maxDistance?: number;
  /** Hard deadline; no deadline when omitted and none is configured */
  timeoutMs?: number;
}

export interface RetrievalEngineDeps {
  facts: FactStore;
  episodes: EpisodicStore;
  embedder: EmbeddingPort;
  events: MemoryEventBus;
  logger: LoggingPort;
  config: RetrievalConfig;
}

export const EMPTY_BUNDLE: Readonly<Bundle> = Object.freeze({
  profile: [],
  recentContext: [],
  degraded: [],
});

/**
 * Two independent stages run concurrently: the user profile (facts above
 * an importance floor) and semantic recall (episodes strictly closer than
 * `maxDistance`). Results are concatenated, never re-scored across stages.
 * `retrieve` never throws; failed stages are listed in `degraded`.
 */
export class RetrievalEngine {
  private readonly deps: RetrievalEngineDeps;

  constructor(deps: RetrievalEngineDeps) {
    this.deps = deps;
  }

  async retrieve(userId: string, queryText: string, options: RetrieveOptions = {}): Promise<Bundle> {
    const { config, events, logger } = this.deps;
    const topK = options.topKEpisodes ?? config.topKEpisodes;
    const minImportance = options.minFactImportance ?? config.minFactImportance;
    const maxDistance = options.maxDistance ?? config.maxDistance;
    const timeoutMs = options.timeoutMs ?? config.timeoutMs;

    const profileTask = track(this.deps.facts.listActive(userId, minImportance));
    const semanticTask = track(this.semantic(userId, queryText, topK, maxDistance));

    const finished = await settleWithin([profileTask.done, semanticTask.done], timeoutMs);

    const degraded: DegradedStage[] = [];
    let profile: Fact[] = [];
    let recentContext: EpisodeHit[] = [];

    const profileState = profileTask.current();
    if (profileState.status === "fulfilled") {
      profile = profileState.value;
    } else if (profileState.status === "rejected") {
      degraded.push("profile");
      logger.warn("Profile stage failed", { userId, error: toError(profileState.error).message });
    }

    const semanticState = semanticTask.current();
    if (semanticState.status === "fulfilled") {
      recentContext = semanticState.value;
    } else if (semanticState.status === "rejected") {
      degraded.push("semantic");
      logger.warn("Semantic stage failed", { userId, error: toError(semanticState.error).message });
    }

    if (!finished) {
      degraded.push("timeout");
      logger.warn("Retrieval deadline exceeded", { userId, timeoutMs });
    }

    if (degraded.length > 0) {
      events.emit("retrieval:degraded", { userId, stages: [...degraded] });
    }
    return { profile, recentContext, degraded };
  }

  private async semantic(
    userId: string,
    queryText: string,
    topK: number,
    maxDistance: number,
  ): Promise<EpisodeHit[]> {
    if (topK <= 0) return [];
    const { embedding } = await this.deps.embedder.embed(queryText);
    const episodes = await this.deps.episodes.search(userId, embedding, { topK, maxDistance });
    return episodes.map((episode) => ({
      episode,
      preview: preview(episode.summary, this.deps.config.previewChars),
    }));
  }
}

function preview(summary: string, maxChars: number): string {
  return summary.length <= maxChars ? summary : summary.slice(0, maxChars);
}
