// =============================================================================
// SummarizerPort — Compress a run of turns into a short summary
// =============================================================================

import type { Turn } from "../domain/memory.schema.js";

export interface SummarizerPort {
  /** Turns arrive in sequence order. May throw; callers retry. */
  summarize(turns: Turn[], signal?: AbortSignal): Promise<string>;
}
