// =============================================================================
// KeyNormalizer — Maps extractor key aliases onto canonical fact keys
// =============================================================================

import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { FactCategorySchema, type FactCategory } from "../domain/memory.schema.js";
import { ConfigurationError } from "../errors.js";

export const CanonicalKeyTableSchema = z.record(
  z.string().regex(/^[a-z][a-z0-9_]*$/),
  z.object({
    category: FactCategorySchema,
    aliases: z.array(z.string().min(1)).default([]),
  }),
);

export type CanonicalKeyTable = z.output<typeof CanonicalKeyTableSchema>;

let defaultTable: CanonicalKeyTable | undefined;

/** Read `data/canonical-keys.json` shipped beside the package sources. */
export function loadCanonicalKeyTable(
  path = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "data", "canonical-keys.json"),
): CanonicalKeyTable {
  const parsed = CanonicalKeyTableSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `canonical-keys.${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export class KeyNormalizer {
  private readonly table: CanonicalKeyTable;
  private readonly aliasIndex = new Map<string, string>();

  constructor(table?: CanonicalKeyTable) {
    this.table = table ?? (defaultTable ??= loadCanonicalKeyTable());
    for (const [canonical, entry] of Object.entries(this.table)) {
      this.aliasIndex.set(canonical, canonical);
      for (const alias of entry.aliases) {
        this.aliasIndex.set(toKeyForm(alias), canonical);
      }
    }
  }

  /**
   * Canonical key for `raw`. Unknown keys are kept, in lowercase
   * snake_case form, so that the key space stays open.
   */
  normalize(raw: string): string {
    const key = toKeyForm(raw);
    return this.aliasIndex.get(key) ?? key;
  }

  isCanonical(key: string): boolean {
    return key in this.table;
  }

  canonicalKeys(): string[] {
    return Object.keys(this.table);
  }

  /** Canonical keys grouped by their usual category, in table order. */
  keysByCategory(): Record<FactCategory, string[]> {
    const grouped: Record<FactCategory, string[]> = {
      identity: [],
      preference: [],
      constraint: [],
      instruction: [],
    };
    for (const [canonical, entry] of Object.entries(this.table)) {
      grouped[entry.category].push(canonical);
    }
    return grouped;
  }
}

function toKeyForm(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_");
}
