// =============================================================================
// Bundle formatting — Memory bundle → prompt text within a character budget
// =============================================================================

import type { Bundle } from "./retrieval-engine.js";

export const NO_MEMORY_TEXT = "No relevant memory found.";

export interface FormatBundleOptions {
  /** Upper bound on the length of the returned text (default: 1600) */
  maxChars?: number;
}

/**
 * Render profile facts and episode previews as two markdown sections.
 * Items are added in bundle order until the next one would exceed the
 * budget; a section whose first item does not fit is left out entirely.
 */
export function formatBundle(bundle: Bundle, options: FormatBundleOptions = {}): string {
  const maxChars = options.maxChars ?? 1600;
  const lines: string[] = [];
  let length = 0;

  const tryAdd = (...added: string[]): boolean => {
    const extra = added.reduce((sum, line) => sum + line.length + 1, 0) - (lines.length === 0 ? 1 : 0);
    if (length + extra > maxChars) return false;
    lines.push(...added);
    length += extra;
    return true;
  };

  const addSection = (header: string, items: string[]): void => {
    const [firstItem, ...rest] = items;
    if (firstItem === undefined) return;
    const lead = lines.length > 0 ? ["", header] : [header];
    if (!tryAdd(...lead, firstItem)) return;
    for (const item of rest) {
      if (!tryAdd(item)) break;
    }
  };

  addSection(
    "## User Profile",
    bundle.profile.map((fact) => `- ${fact.key}: ${fact.value}`),
  );
  addSection(
    "## Recent Context",
    bundle.recentContext.map(
      (hit) => `- turns ${hit.episode.turnStart}-${hit.episode.turnEnd}: ${hit.preview}`,
    ),
  );

  return lines.length > 0 ? lines.join("\n") : NO_MEMORY_TEXT;
}
