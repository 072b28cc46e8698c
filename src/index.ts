// =============================================================================
// tiered-memory — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export {
  MemoryOrchestrator,
  FALLBACK_REPLY,
  type MemoryOrchestratorOptions,
  type OnMessageResult,
  type MemorySnapshot,
} from "./memory/memory-orchestrator.js";
export {
  SessionBuffer,
  type SessionBufferOptions,
  type CompactionSlice,
} from "./memory/session-buffer.js";
export { FactStore, shouldReplace, type FactStoreOptions } from "./memory/fact-store.js";
export {
  EpisodicStore,
  type NewEpisode,
  type EpisodeSearchOptions,
  type EpisodicStoreOptions,
} from "./memory/episodic-store.js";
export {
  CompactionPipeline,
  type CompactionOutcome,
  type CompactionPipelineDeps,
} from "./memory/compaction-pipeline.js";
export {
  ExtractionPipeline,
  type ExtractionReport,
  type ExtractionPipelineDeps,
} from "./memory/extraction-pipeline.js";
export {
  RetrievalEngine,
  EMPTY_BUNDLE,
  type Bundle,
  type EpisodeHit,
  type DegradedStage,
  type RetrieveOptions,
  type RetrievalEngineDeps,
} from "./memory/retrieval-engine.js";
export { formatBundle, NO_MEMORY_TEXT, type FormatBundleOptions } from "./memory/bundle-format.js";
export {
  decideRetrievalMode,
  classifyIntent,
  type RetrievalMode,
  type MessageIntent,
} from "./memory/retrieval-policy.js";
export {
  KeyNormalizer,
  loadCanonicalKeyTable,
  CanonicalKeyTableSchema,
  type CanonicalKeyTable,
} from "./memory/key-normalizer.js";
export { KeyedMutex } from "./memory/keyed-mutex.js";

// ─────────────────────────────────────────────────────────────────────────────
// Domain Schemas
// ─────────────────────────────────────────────────────────────────────────────

export {
  TurnRoleSchema,
  TurnInputSchema,
  FACT_CATEGORIES,
  FactCategorySchema,
  FactCandidateSchema,
  RawFactCandidateSchema,
  factIdentityKey,
  type TurnRole,
  type TurnInput,
  type Turn,
  type FactCategory,
  type FactCandidate,
  type RawFactCandidate,
  type FactIdentity,
  type Fact,
  type UpsertOutcome,
  type Episode,
  type ScoredEpisode,
} from "./domain/memory.schema.js";
export {
  MemoryConfigSchema,
  PostgresConfigSchema,
  resolveMemoryConfig,
  loadMemoryConfigFromEnv,
  loadPostgresConfigFromEnv,
  type MemoryConfig,
  type MemoryConfigInput,
  type PostgresConfig,
} from "./domain/config.schema.js";
export {
  MemoryEventTypeSchema,
  type MemoryEventType,
  type MemoryEvent,
  type MemoryEventPayloads,
} from "./domain/events.schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Errors & Events
// ─────────────────────────────────────────────────────────────────────────────

export {
  MemoryError,
  ValidationError,
  TransientDependencyError,
  ConcurrencyConflictError,
  ConfigurationError,
} from "./errors.js";
export {
  MemoryEventBus,
  type EventBusOptions,
  type MemoryEventHandler,
  type WildcardEventHandler,
} from "./events/event-bus.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports (contracts for hexagonal architecture)
// ─────────────────────────────────────────────────────────────────────────────

export type { SummarizerPort } from "./ports/summarizer.port.js";
export type { FactExtractorPort } from "./ports/fact-extractor.port.js";
export type { ResponderPort, RespondParams } from "./ports/responder.port.js";
export type { EmbeddingPort, EmbeddingResult } from "./ports/embedding.port.js";
export type { FactRepositoryPort, NewFact, FactMutation } from "./ports/fact-repository.port.js";
export type {
  VectorStorePort,
  VectorDocument,
  VectorSearchParams,
  VectorSearchResult,
  VectorListParams,
  VectorFilter,
  MetadataValue,
} from "./ports/vector-store.port.js";
export type { LoggingPort, LogLevel, LogEntry } from "./ports/logging.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export { InMemoryFactRepository } from "./adapters/facts/inmemory.adapter.js";
export {
  PostgresFactRepository,
  type PostgresFactRepositoryOptions,
} from "./adapters/facts/postgres/postgres-fact.adapter.js";
export { InMemoryVectorStore, cosineDistance } from "./adapters/vector-store/inmemory.adapter.js";
export {
  PgVectorStoreAdapter,
  type PgVectorStoreOptions,
} from "./adapters/vector-store/pgvector/pgvector-store.adapter.js";
export { InMemoryEmbeddingAdapter, hashingVector } from "./adapters/embedding/inmemory.adapter.js";
export {
  AiSdkEmbeddingAdapter,
  type AiSdkEmbeddingAdapterOptions,
} from "./adapters/embedding/ai-sdk.adapter.js";
export {
  AiSdkSummarizerAdapter,
  buildSummarizationPrompt,
  type AiSdkSummarizerOptions,
} from "./adapters/llm/ai-sdk-summarizer.adapter.js";
export {
  AiSdkFactExtractorAdapter,
  cleanModelJson,
  type AiSdkFactExtractorOptions,
} from "./adapters/llm/ai-sdk-extractor.adapter.js";
export {
  AiSdkResponderAdapter,
  type AiSdkResponderOptions,
} from "./adapters/llm/ai-sdk-responder.adapter.js";
export {
  ConsoleLoggingAdapter,
  silentLogger,
  type ConsoleLoggingOptions,
} from "./adapters/logging/console-logging.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Background
// ─────────────────────────────────────────────────────────────────────────────

export {
  WorkerPool,
  type WorkerPoolConfig,
  type WorkerPoolEvent,
  type WorkerPoolMetrics,
} from "./background/worker-pool.js";
