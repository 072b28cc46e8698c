/**
 * Structured error hierarchy for the memory engine.
 *
 * All errors extend {@link MemoryError} so callers can branch on type or on
 * the stable `code`:
 *
 * ```ts
 * try {
 *   await facts.upsertCandidate(userId, candidate);
 * } catch (e) {
 *   if (e instanceof ValidationError) { ... }
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all memory engine errors. Includes an error code for programmatic matching. */
export class MemoryError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MemoryError";
    this.code = code;
  }
}

/** Thrown when a candidate fact, turn or query is malformed. Nothing is mutated. */
export class ValidationError extends MemoryError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Thrown when a summarizer, embedder, extractor or store stays unavailable after retries. */
export class TransientDependencyError extends MemoryError {
  readonly dependency: string;
  readonly attempts: number;
  constructor(dependency: string, attempts: number, cause?: Error) {
    super(
      "DEPENDENCY_UNAVAILABLE",
      `${dependency} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}${
        cause ? `: ${cause.message}` : ""
      }`,
      { cause },
    );
    this.name = "TransientDependencyError";
    this.dependency = dependency;
    this.attempts = attempts;
  }
}

/** Thrown when a compare-and-swap on a fact row loses the race too many times. */
export class ConcurrencyConflictError extends MemoryError {
  readonly resource: string;
  constructor(resource: string, message?: string) {
    super("CONCURRENCY_CONFLICT", message ?? `Concurrent write conflict on ${resource}`);
    this.name = "ConcurrencyConflictError";
    this.resource = resource;
  }
}

/** Thrown at startup when thresholds or sizes are invalid. Never raised per request. */
export class ConfigurationError extends MemoryError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super("CONFIGURATION_ERROR", `Invalid memory configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
