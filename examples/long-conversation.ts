// =============================================================================
// Long conversation — compaction, fact extraction and retrieval end to end
// =============================================================================
//
// Runs entirely in process: in-memory stores, the hashing embedder and
// rule-based stand-ins for the summarizer, extractor and responder. Swap in
// AiSdkSummarizerAdapter / AiSdkFactExtractorAdapter / AiSdkResponderAdapter
// and the Postgres adapters for a real deployment.
//
// Usage:    npx tsx examples/long-conversation.ts

import {
  ConsoleLoggingAdapter,
  InMemoryEmbeddingAdapter,
  MemoryOrchestrator,
  type FactExtractorPort,
  type RawFactCandidate,
  type ResponderPort,
  type SummarizerPort,
} from "../src/index.js";

const summarizer: SummarizerPort = {
  async summarize(turns) {
    const topics = turns
      .filter((turn) => turn.role === "user")
      .map((turn) => turn.content.replace(/[.!?]+$/, ""))
      .join("; ");
    return `The user talked about: ${topics}.`;
  },
};

const RULES: Array<{ pattern: RegExp; category: string; key: string; importance: number }> = [
  { pattern: /my name is (\w+)/i, category: "identity", key: "name", importance: 0.9 },
  { pattern: /i live in (\w+)/i, category: "identity", key: "city", importance: 0.6 },
  { pattern: /i (?:prefer|use) (\w+) for formatting/i, category: "preference", key: "formatter", importance: 0.7 },
  { pattern: /i (?:switched to|prefer|use) (\w+) for testing/i, category: "preference", key: "test framework", importance: 0.7 },
  { pattern: /keep lines under (\d+)/i, category: "constraint", key: "max line length", importance: 0.8 },
];

const extractor: FactExtractorPort = {
  async extract(message) {
    const candidates: RawFactCandidate[] = [];
    for (const rule of RULES) {
      const value = rule.pattern.exec(message)?.[1];
      if (value) {
        candidates.push({ category: rule.category, key: rule.key, value, confidence: 0.9, importance: rule.importance });
      }
    }
    return candidates;
  },
};

const responder: ResponderPort = {
  async respond({ message, memoryContext }) {
    const lines = memoryContext.split("\n").filter((line) => line.startsWith("- "));
    return lines.length > 0
      ? `(${lines.length} memory items in view) Noted: "${message}"`
      : `Noted: "${message}"`;
  },
};

const SCRIPT = [
  "Hi!",
  "My name is Alex and I live in Lisbon.",
  "I am building a billing service in TypeScript.",
  "I use prettier for formatting.",
  "Please keep lines under 100 characters.",
  "I use jest for testing at the moment.",
  "The service talks to Postgres through a small repository layer.",
  "We deploy it on a single container for now.",
  "Latency matters, the checkout call should stay fast.",
  "Actually, I switched to vitest for testing.",
  "Can you remind me which formatter I use?",
  "Thanks!",
];

async function main(): Promise<void> {
  const logger = new ConsoleLoggingAdapter({ level: "info" });
  const memory = new MemoryOrchestrator({
    summarizer,
    extractor,
    responder,
    embedder: new InMemoryEmbeddingAdapter(),
    logger,
    config: {
      buffer: { triggerSize: 8, retainCount: 4 },
      retrieval: { maxDistance: 0.9 },
    },
  });

  memory.events.on("compaction:completed", (e) => {
    console.log(`[compaction] turns ${e.data.turnStart}-${e.data.turnEnd} -> ${e.data.episodeId}`);
  });
  memory.events.on("fact:upserted", (e) => {
    console.log(`[fact] ${e.data.category}/${e.data.key}: ${e.data.outcome}`);
  });

  for (const message of SCRIPT) {
    const result = await memory.onMessage("alex", message);
    console.log(`> ${message}\n< ${result.reply} [${result.mode}/${result.intent}]`);
    await memory.whenIdle();
  }

  const snapshot = await memory.inspect("alex");
  console.log("\nActive facts:");
  for (const fact of snapshot.facts) {
    console.log(`  ${fact.category}/${fact.key} = ${fact.value} (confidence ${fact.confidence})`);
  }
  console.log(`Episodes: ${snapshot.episodeCount}, resident turns from #${snapshot.baseSequence}`);

  await memory.shutdown();
}

main().catch(console.error);
