// =============================================================================
// Retrieval policy — Cheap heuristics deciding whether to query long-term memory
// =============================================================================

/** `active` queries facts and episodes; `session` relies on resident turns only. */
export type RetrievalMode = "active" | "session";

export type MessageIntent = "greeting" | "command" | "question" | "statement";

const SKIP_PHRASES = new Set([
  "hi",
  "hello",
  "hey",
  "thanks",
  "thank you",
  "ok",
  "okay",
  "bye",
  "yes",
  "no",
]);

const GREETINGS = new Set([
  "hi",
  "hello",
  "hey",
  "howdy",
  "good morning",
  "good evening",
  "good afternoon",
]);

const COMMAND_PATTERN = /^(remember|forget|update|change|set|don't|stop|always)\b/;

function normalizeMessage(message: string): string {
  return message.trim().toLowerCase().replace(/[!.,]+$/, "").trim();
}

/** Greetings and bare acknowledgements skip retrieval; everything else retrieves. */
export function decideRetrievalMode(message: string): RetrievalMode {
  return SKIP_PHRASES.has(normalizeMessage(message)) ? "session" : "active";
}

export function classifyIntent(message: string): MessageIntent {
  const lower = normalizeMessage(message);
  if (GREETINGS.has(lower)) return "greeting";
  if (COMMAND_PATTERN.test(lower)) return "command";
  if (message.includes("?")) return "question";
  return "statement";
}
