import { describe, it, expect, vi } from "vitest";
import { MemoryOrchestrator, FALLBACK_REPLY, type MemoryOrchestratorOptions } from "../memory-orchestrator.js";
import { NO_MEMORY_TEXT } from "../bundle-format.js";
import { InMemoryEmbeddingAdapter } from "../../adapters/embedding/inmemory.adapter.js";
import type { MemoryConfigInput } from "../../domain/config.schema.js";
import type { MemoryEvent } from "../../domain/events.schema.js";
import type { RawFactCandidate, Turn } from "../../domain/memory.schema.js";
import { MemoryError } from "../../errors.js";
import type { RespondParams } from "../../ports/responder.port.js";

const FAST: MemoryConfigInput = {
  compaction: { retryDelayMs: 0 },
  extraction: { retryDelayMs: 0 },
  retrieval: { timeoutMs: 1_000 },
};

function summarizeRange(turns: Turn[]): Promise<string> {
  return Promise.resolve(`Summary of turns ${turns[0]?.sequence}-${turns[turns.length - 1]?.sequence}`);
}

function build(overrides: Partial<MemoryOrchestratorOptions> = {}) {
  const respondCalls: RespondParams[] = [];
  const memory = new MemoryOrchestrator({
    summarizer: { summarize: vi.fn(summarizeRange) },
    extractor: { extract: vi.fn(async (): Promise<RawFactCandidate[]> => []) },
    responder: {
      respond: vi.fn(async (params: RespondParams) => {
        respondCalls.push(params);
        return `echo: ${params.message}`;
      }),
    },
    embedder: new InMemoryEmbeddingAdapter(),
    config: FAST,
    ...overrides,
  });
  return { memory, respondCalls };
}

describe("MemoryOrchestrator", () => {
  it("answers with memory context and records both turns", async () => {
    const { memory, respondCalls } = build();

    const result = await memory.onMessage("u1", "I use FastAPI for my backend services");

    expect(result).toEqual({
      reply: "echo: I use FastAPI for my backend services",
      bundle: { profile: [], recentContext: [], degraded: [] },
      context: NO_MEMORY_TEXT,
      mode: "active",
      intent: "statement",
    });
    expect(respondCalls[0]?.recentTurns.map((t) => t.content)).toEqual(["I use FastAPI for my backend services"]);
    expect(memory.buffer.turns("u1").map((t) => `${t.sequence}:${t.role}`)).toEqual(["1:user", "2:assistant"]);
    await memory.shutdown();
  });

  it("skips long-term memory for greetings", async () => {
    const { memory, respondCalls } = build();

    const result = await memory.onMessage("u1", "Hello!");

    expect(result).toMatchObject({ mode: "session", context: "", intent: "greeting" });
    expect(result.bundle).toBeUndefined();
    expect(respondCalls[0]?.memoryContext).toBe("");
    await memory.shutdown();
  });

  it("replies with the fallback to a blank message without touching memory", async () => {
    const { memory, respondCalls } = build();

    const result = await memory.onMessage("u1", "   ");

    expect(result).toEqual({ reply: FALLBACK_REPLY, context: "", mode: "session", intent: "statement" });
    expect(respondCalls).toHaveLength(0);
    expect(memory.buffer.turns("u1")).toEqual([]);
    await memory.whenIdle();
    expect((await memory.inspect("u1")).facts).toEqual([]);
    await memory.shutdown();
  });

  it("falls back when the responder fails or returns nothing", async () => {
    const respond = vi
      .fn<(params: RespondParams) => Promise<string>>()
      .mockRejectedValueOnce(new Error("model unavailable"))
      .mockResolvedValueOnce("   ");
    const { memory } = build({ responder: { respond } });

    expect((await memory.onMessage("u1", "Tell me about my project")).reply).toBe(FALLBACK_REPLY);
    expect((await memory.onMessage("u1", "Tell me about my project again")).reply).toBe(FALLBACK_REPLY);
    expect(memory.buffer.turns("u1").filter((t) => t.role === "assistant").map((t) => t.content)).toEqual([
      FALLBACK_REPLY,
      FALLBACK_REPLY,
    ]);
    await memory.shutdown();
  });

  it("extracts facts in the background and injects them on later turns", async () => {
    const extract = vi.fn(async (message: string): Promise<RawFactCandidate[]> =>
      message.startsWith("My name is")
        ? [{ category: "identity", key: "full name", value: "Alex", confidence: 0.95, importance: 0.9 }]
        : [],
    );
    const { memory, respondCalls } = build({ extractor: { extract } });

    await memory.onMessage("u1", "My name is Alex by the way");
    await memory.whenIdle();
    await memory.onMessage("u1", "Suggest a name for my new service");

    expect(respondCalls[1]?.memoryContext).toBe("## User Profile\n- name: Alex");
    expect((await memory.facts.getActive("u1", "identity", "name"))?.value).toBe("Alex");
    await memory.shutdown();
  });

  it("compacts the oldest turns once the buffer reaches the trigger", async () => {
    const events: MemoryEvent[] = [];
    const { memory } = build({
      config: { ...FAST, buffer: { triggerSize: 4, retainCount: 2 } },
    });
    memory.events.onAny((event) => events.push(event));

    await memory.onMessage("u1", "I am building a hackathon project");
    await memory.onMessage("u1", "It uses Postgres and pgvector");
    await memory.whenIdle();

    const snapshot = await memory.inspect("u1");
    expect(snapshot.episodeCount).toBe(1);
    expect(snapshot.recentEpisodes[0]).toMatchObject({
      turnStart: 1,
      turnEnd: 2,
      summary: "Summary of turns 1-2",
    });
    expect(snapshot.turns.map((t) => t.sequence)).toEqual([3, 4]);
    expect(snapshot.baseSequence).toBe(3);
    expect(snapshot.compacting).toBe(false);
    expect(snapshot.background).toMatchObject({ activeWorkers: 0, queueDepth: 0, totalCompleted: 3, totalFailed: 0 });
    expect(events.filter((e) => e.type === "compaction:completed")).toHaveLength(1);
    await memory.shutdown();
  });

  it("still replies when the embedder is down", async () => {
    const embedder = new InMemoryEmbeddingAdapter();
    vi.spyOn(embedder, "embed").mockRejectedValue(new Error("embedder offline"));
    const { memory } = build({ embedder });

    const result = await memory.onMessage("u1", "What did we decide about the schema?");

    expect(result.reply).toBe("echo: What did we decide about the schema?");
    expect(result.bundle?.degraded).toEqual(["semantic"]);
    await memory.shutdown();
  });

  it("evicts idle sessions on its clock", async () => {
    let clock = 1_000;
    const { memory } = build({
      now: () => clock,
      config: { ...FAST, buffer: { idleTtlMs: 60_000 } },
    });

    await memory.onMessage("u1", "I live in Lisbon now");
    clock += 30_000;
    await memory.onMessage("u2", "I work on the billing service");

    expect(memory.evictIdleSessions(1_000 + 60_001)).toEqual(["u1"]);
    expect(memory.buffer.has("u1")).toBe(false);
    expect(memory.buffer.has("u2")).toBe(true);
    await memory.shutdown();
  });

  it("refuses messages after shutdown", async () => {
    const { memory } = build();
    await memory.onMessage("u1", "Remember that I prefer tabs");
    await memory.shutdown();

    expect(memory.buffer.has("u1")).toBe(false);
    await expect(memory.onMessage("u1", "hello again")).rejects.toBeInstanceOf(MemoryError);
    await expect(memory.onMessage("u1", "hello again")).rejects.toMatchObject({ code: "SHUT_DOWN" });
  });

  it("rejects an invalid configuration", () => {
    expect(() => build({ config: { buffer: { triggerSize: 4, retainCount: 4 } } })).toThrow(
      "Invalid memory configuration: buffer.retainCount: must be smaller than buffer.triggerSize",
    );
  });
});
