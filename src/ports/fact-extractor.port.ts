// =============================================================================
// FactExtractorPort — Propose candidate facts from a user message
// =============================================================================

import type { RawFactCandidate } from "../domain/memory.schema.js";

export interface FactExtractorPort {
  /** Zero candidates is a valid answer. Candidates are validated downstream. */
  extract(message: string, signal?: AbortSignal): Promise<RawFactCandidate[]>;
}
