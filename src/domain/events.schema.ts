// =============================================================================
// Events Schema — Background pipeline and retrieval lifecycle events
// =============================================================================

import { z } from "zod";
import type { Turn, UpsertOutcome, FactCategory } from "./memory.schema.js";

export const MemoryEventTypeSchema = z.enum([
  "compaction:started",
  "compaction:completed",
  "compaction:skipped",
  "compaction:restored",
  "compaction:dropped",
  "extraction:completed",
  "extraction:skipped",
  "extraction:failed",
  "fact:upserted",
  "retrieval:degraded",
  "task:failed",
]);

export type MemoryEventType = z.infer<typeof MemoryEventTypeSchema>;

export interface MemoryEventPayloads {
  "compaction:started": { userId: string; turnStart: number; turnEnd: number; turnCount: number };
  "compaction:completed": { userId: string; episodeId: string; turnStart: number; turnEnd: number };
  "compaction:skipped": { userId: string; reason: string };
  "compaction:restored": { userId: string; turnStart: number; turnEnd: number; error: string };
  "compaction:dropped": { userId: string; stage: "embed" | "persist"; turns: Turn[]; error: string };
  "extraction:completed": {
    userId: string;
    candidates: number;
    inserted: number;
    updated: number;
    rejected: number;
    discarded: number;
  };
  "extraction:skipped": { userId: string; reason: string };
  "extraction:failed": { userId: string; error: string };
  "fact:upserted": { userId: string; category: FactCategory; key: string; outcome: UpsertOutcome };
  "retrieval:degraded": { userId: string; stages: string[] };
  "task:failed": { taskId: string; error: string };
}

export interface MemoryEvent<K extends MemoryEventType = MemoryEventType> {
  type: K;
  timestamp: number;
  data: MemoryEventPayloads[K];
}
