// =============================================================================
// Retry — Bounded attempts with linear backoff
// =============================================================================

import { setTimeout as sleep } from "node:timers/promises";

import { TransientDependencyError, toError } from "../errors.js";

export interface RetryOptions {
  /** Name reported in the final error, e.g. "summarizer" */
  dependency: string;
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  /** Delay before retry n is `retryDelayMs * n` */
  retryDelayMs: number;
  signal?: AbortSignal;
  /** Called after a failed attempt that will be retried */
  onRetry?: (error: Error, attempt: number) => void;
  /** Errors for which this returns false are rethrown without retrying */
  retryIf?: (error: Error) => boolean;
}

/**
 * Run `fn` until it resolves or attempts are exhausted. Exhaustion throws
 * {@link TransientDependencyError} wrapping the last failure; an aborted
 * signal stops immediately with the abort reason.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);
      if (options.signal?.aborted) throw lastError;
      if (options.retryIf && !options.retryIf(lastError)) throw lastError;
      if (attempt < maxAttempts) {
        options.onRetry?.(lastError, attempt);
        if (options.retryDelayMs > 0) {
          await sleep(options.retryDelayMs * attempt, undefined, { signal: options.signal });
        }
      }
    }
  }

  throw new TransientDependencyError(options.dependency, maxAttempts, lastError);
}
