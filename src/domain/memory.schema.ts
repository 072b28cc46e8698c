// =============================================================================
// Memory Schema — Turns, facts and episodes
// =============================================================================

import { z } from "zod";

// =============================================================================
// Turns
// =============================================================================

export const TurnRoleSchema = z.enum(["user", "assistant"]);

export type TurnRole = z.infer<typeof TurnRoleSchema>;

export const TurnInputSchema = z.object({
  role: TurnRoleSchema,
  content: z.string().refine((content) => content.trim() !== "", "content must not be empty"),
});

export type TurnInput = z.infer<typeof TurnInputSchema>;

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  /** Per-user position, starting at 1 and never reused */
  readonly sequence: number;
}

// =============================================================================
// Facts
// =============================================================================

export const FACT_CATEGORIES = ["identity", "preference", "constraint", "instruction"] as const;

export const FactCategorySchema = z.enum(FACT_CATEGORIES);

export type FactCategory = z.infer<typeof FactCategorySchema>;

const UnitIntervalSchema = z.number().finite().min(0).max(1);

/** A validated candidate, ready for the conditional upsert. */
export const FactCandidateSchema = z.object({
  category: FactCategorySchema,
  key: z.string().trim().min(1, "key must not be empty"),
  value: z.string().trim().min(1, "value must not be empty"),
  confidence: UnitIntervalSchema,
  importance: UnitIntervalSchema,
});

export type FactCandidate = z.infer<typeof FactCandidateSchema>;

/**
 * Lenient shape for what an extractor hands back. Category stays an open
 * string here and is narrowed later by {@link FactCandidateSchema}; scalar
 * values are stringified and scores may arrive as numeric strings.
 */
export const RawFactCandidateSchema = z.object({
  category: z.string(),
  key: z.string(),
  value: z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v)),
  confidence: z.coerce.number().optional(),
  importance: z.coerce.number().optional(),
});

export type RawFactCandidate = z.output<typeof RawFactCandidateSchema>;

export interface FactIdentity {
  userId: string;
  category: FactCategory;
  key: string;
}

export interface Fact extends FactIdentity {
  value: string;
  confidence: number;
  importance: number;
  isActive: boolean;
  /** Incremented on every in-place mutation; used for compare-and-swap */
  version: number;
  createdAt: string;
  updatedAt: string;
}

export type UpsertOutcome = "inserted" | "updated" | "rejected";

// =============================================================================
// Episodes
// =============================================================================

export interface Episode {
  id: string;
  userId: string;
  turnStart: number;
  turnEnd: number;
  summary: string;
  embedding: number[];
  createdAt: string;
}

export interface ScoredEpisode extends Episode {
  /** Cosine distance to the query, 0 = identical direction */
  distance: number;
}

export function factIdentityKey(identity: FactIdentity): string {
  return `${identity.userId}::${identity.category}::${identity.key}`;
}
