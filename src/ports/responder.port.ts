// =============================================================================
// ResponderPort — Produce the assistant reply for one inbound message
// =============================================================================

import type { Turn } from "../domain/memory.schema.js";

export interface RespondParams {
  userId: string;
  message: string;
  /** Formatted memory bundle, empty when retrieval was skipped */
  memoryContext: string;
  /** Resident short-term turns, oldest first, including the new user turn */
  recentTurns: Turn[];
  signal?: AbortSignal;
}

export interface ResponderPort {
  respond(params: RespondParams): Promise<string>;
}
