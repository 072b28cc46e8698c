// =============================================================================
// Config Schema — Thresholds, sizes and budgets for the memory engine
// =============================================================================

import { z } from "zod";
import { ConfigurationError } from "../errors.js";

const unit = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();

export const BufferConfigSchema = z.object({
  /** Resident turn count that fires compaction */
  triggerSize: positiveInt.default(20),
  /** Most recent turns kept verbatim after compaction */
  retainCount: z.number().int().min(0).default(10),
  /** Sessions idle longer than this are evicted */
  idleTtlMs: positiveInt.default(30 * 60_000),
});

export const CompactionConfigSchema = z.object({
  maxAttempts: positiveInt.default(3),
  retryDelayMs: z.number().int().min(0).default(200),
  /** Summaries shorter than this count as a failed summarization */
  minSummaryChars: z.number().int().min(0).default(10),
});

export const ExtractionConfigSchema = z.object({
  minConfidence: unit.default(0.4),
  minImportance: unit.default(0.2),
  maxAttempts: positiveInt.default(2),
  retryDelayMs: z.number().int().min(0).default(200),
  /** Questions and very short messages carry no facts worth extracting */
  skipQuestions: z.boolean().default(true),
  minWords: z.number().int().min(0).default(3),
});

export const RetrievalConfigSchema = z.object({
  topKEpisodes: z.number().int().min(0).default(3),
  minFactImportance: unit.default(0.5),
  /** Cosine distance cutoff; episodes at or beyond it are never injected */
  maxDistance: z.number().min(0).max(2).default(0.4),
  previewChars: positiveInt.default(150),
  /** Hard deadline for the request-path retrieval */
  timeoutMs: positiveInt.default(250),
  maxContextChars: positiveInt.default(1600),
});

export const FactStoreConfigSchema = z.object({
  maxConflictRetries: positiveInt.default(5),
});

export const PoolConfigSchema = z.object({
  size: positiveInt.default(4),
  taskTimeoutMs: positiveInt.default(120_000),
});

export const MemoryConfigSchema = z
  .object({
    buffer: BufferConfigSchema.default({}),
    compaction: CompactionConfigSchema.default({}),
    extraction: ExtractionConfigSchema.default({}),
    retrieval: RetrievalConfigSchema.default({}),
    facts: FactStoreConfigSchema.default({}),
    pool: PoolConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.buffer.retainCount >= config.buffer.triggerSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["buffer", "retainCount"],
        message: "must be smaller than buffer.triggerSize",
      });
    }
  });

export type MemoryConfig = z.output<typeof MemoryConfigSchema>;
export type MemoryConfigInput = z.input<typeof MemoryConfigSchema>;

export type BufferConfig = MemoryConfig["buffer"];
export type CompactionConfig = MemoryConfig["compaction"];
export type ExtractionConfig = MemoryConfig["extraction"];
export type RetrievalConfig = MemoryConfig["retrieval"];

/** Parse and default a (partial) configuration. Throws {@link ConfigurationError}. */
export function resolveMemoryConfig(input: MemoryConfigInput = {}): MemoryConfig {
  return parseMemoryConfig(input);
}

function parseMemoryConfig(input: unknown): MemoryConfig {
  const result = MemoryConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return result.data;
}

// =============================================================================
// Environment
// =============================================================================

type Env = Record<string, string | undefined>;

const ENV_NUMBERS: Array<[string, keyof MemoryConfig, string]> = [
  ["MEMORY_TRIGGER_SIZE", "buffer", "triggerSize"],
  ["MEMORY_RETAIN_COUNT", "buffer", "retainCount"],
  ["MEMORY_IDLE_TTL_MS", "buffer", "idleTtlMs"],
  ["MEMORY_COMPACTION_ATTEMPTS", "compaction", "maxAttempts"],
  ["MEMORY_MIN_CONFIDENCE", "extraction", "minConfidence"],
  ["MEMORY_MIN_IMPORTANCE", "extraction", "minImportance"],
  ["MEMORY_TOP_K_EPISODES", "retrieval", "topKEpisodes"],
  ["MEMORY_MIN_FACT_IMPORTANCE", "retrieval", "minFactImportance"],
  ["MEMORY_MAX_DISTANCE", "retrieval", "maxDistance"],
  ["MEMORY_RETRIEVAL_TIMEOUT_MS", "retrieval", "timeoutMs"],
  ["MEMORY_POOL_SIZE", "pool", "size"],
];

/**
 * Build a config from `MEMORY_*` variables layered over defaults.
 * A variable that is set but not numeric is a configuration error.
 */
export function loadMemoryConfigFromEnv(env: Env = process.env): MemoryConfig {
  const sections: Record<string, Record<string, number>> = {};
  const issues: string[] = [];

  for (const [name, section, field] of ENV_NUMBERS) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      issues.push(`${name}: expected a number, got "${raw}"`);
      continue;
    }
    sections[section] = { ...sections[section], [field]: value };
  }

  if (issues.length > 0) throw new ConfigurationError(issues);
  return parseMemoryConfig(sections);
}

export const PostgresConfigSchema = z.object({
  connectionString: z.string().min(1),
  poolSize: positiveInt.default(10),
  schema: z.string().regex(/^[a-z_][a-z0-9_]*$/i).default("public"),
});

export type PostgresConfig = z.output<typeof PostgresConfigSchema>;

/** `DATABASE_URL` wins; otherwise the connection string is assembled from `PG_*`. */
export function loadPostgresConfigFromEnv(env: Env = process.env): PostgresConfig {
  const connectionString =
    env.DATABASE_URL ??
    `postgresql://${encodeURIComponent(env.PG_USER ?? "postgres")}:${encodeURIComponent(
      env.PG_PASSWORD ?? "",
    )}@${env.PG_HOST ?? "localhost"}:${env.PG_PORT ?? "5432"}/${env.PG_DB ?? "postgres"}`;

  const result = PostgresConfigSchema.safeParse({
    connectionString,
    poolSize: env.PG_POOL_SIZE ? Number(env.PG_POOL_SIZE) : undefined,
    schema: env.PG_SCHEMA,
  });
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}
