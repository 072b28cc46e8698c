import { describe, it, expect, vi } from "vitest";
import { ExtractionPipeline } from "../extraction-pipeline.js";
import { FactStore } from "../fact-store.js";
import { KeyNormalizer } from "../key-normalizer.js";
import { InMemoryFactRepository } from "../../adapters/facts/inmemory.adapter.js";
import { silentLogger } from "../../adapters/logging/console-logging.adapter.js";
import { ExtractionConfigSchema, type ExtractionConfig } from "../../domain/config.schema.js";
import type { RawFactCandidate } from "../../domain/memory.schema.js";
import { MemoryEventBus } from "../../events/event-bus.js";
import type { MemoryEvent } from "../../domain/events.schema.js";
import type { FactExtractorPort } from "../../ports/fact-extractor.port.js";

function setup(extract: FactExtractorPort["extract"], overrides: Partial<ExtractionConfig> = {}) {
  const facts = new FactStore(new InMemoryFactRepository());
  const bus = new MemoryEventBus();
  const events: MemoryEvent[] = [];
  bus.onAny((event) => events.push(event));
  const pipeline = new ExtractionPipeline({
    extractor: { extract },
    facts,
    keys: new KeyNormalizer(),
    events: bus,
    logger: silentLogger,
    config: ExtractionConfigSchema.parse({ retryDelayMs: 0, ...overrides }),
  });
  return { facts, events, pipeline };
}

describe("ExtractionPipeline", () => {
  it("normalizes categories and keys before upserting", async () => {
    const extract = vi.fn(async (): Promise<RawFactCandidate[]> => [
      { category: "Identity", key: "full_name", value: "Alex", confidence: 0.9, importance: 0.9 },
      { category: "identity", key: "City", value: "Berlin" },
    ]);
    const { facts, pipeline } = setup(extract);

    const report = await pipeline.run("u1", "My name is Alex and I live in Berlin");

    expect(report).toEqual({
      status: "completed",
      candidates: 2,
      inserted: 2,
      updated: 0,
      rejected: 0,
      discarded: 0,
    });
    expect(await facts.getActive("u1", "identity", "name")).toMatchObject({ value: "Alex" });
    expect(await facts.getActive("u1", "identity", "location")).toMatchObject({
      value: "Berlin",
      confidence: 1,
      importance: 0.5,
    });
  });

  it("skips questions without calling the extractor", async () => {
    const extract = vi.fn(async (): Promise<RawFactCandidate[]> => []);
    const { events, pipeline } = setup(extract);

    const report = await pipeline.run("u1", "What is my name again?");

    expect(report).toMatchObject({ status: "skipped", reason: "question", candidates: 0 });
    expect(extract).not.toHaveBeenCalled();
    expect(events.map((e) => e.type)).toEqual(["extraction:skipped"]);
  });

  it("skips messages shorter than the word floor", async () => {
    const extract = vi.fn(async (): Promise<RawFactCandidate[]> => []);
    const { pipeline } = setup(extract);

    expect(await pipeline.run("u1", "ok cool")).toMatchObject({ status: "skipped", reason: "too short" });
    expect(extract).not.toHaveBeenCalled();
  });

  it("extracts from every message when skipping is disabled", async () => {
    const extract = vi.fn(async (): Promise<RawFactCandidate[]> => []);
    const { pipeline } = setup(extract, { skipQuestions: false });

    expect((await pipeline.run("u1", "hi?")).status).toBe("completed");
    expect(extract).toHaveBeenCalledWith("hi?", undefined);
  });

  it("discards malformed and below-threshold candidates", async () => {
    const extract = vi.fn(async (): Promise<RawFactCandidate[]> => [
      { category: "preference", key: "language", value: "Kotlin", confidence: 0.95, importance: 0.8 },
      { category: "preference", key: "formatter", value: "black", confidence: 0.3, importance: 0.8 },
      { category: "preference", key: "database", value: "Postgres", confidence: 0.9, importance: 0.1 },
      { category: "hobby", key: "sport", value: "climbing", confidence: 0.9, importance: 0.9 },
      { category: "identity", key: "  ", value: "nobody", confidence: 0.9, importance: 0.9 },
    ]);
    const { facts, pipeline } = setup(extract);

    const report = await pipeline.run("u1", "I write Kotlin, format with black and use Postgres");

    expect(report).toMatchObject({ candidates: 5, inserted: 1, discarded: 4 });
    expect((await facts.listActive("u1")).map((f) => f.key)).toEqual(["language"]);
  });

  it("reports updates and rejections against existing facts", async () => {
    const extract = vi
      .fn<FactExtractorPort["extract"]>()
      .mockResolvedValueOnce([
        { category: "preference", key: "language", value: "Kotlin", confidence: 0.7, importance: 0.8 },
        { category: "identity", key: "name", value: "Alex", confidence: 1, importance: 0.9 },
      ])
      .mockResolvedValueOnce([
        { category: "preference", key: "lang", value: "Rust", confidence: 0.9, importance: 0.8 },
        { category: "identity", key: "name", value: "Al", confidence: 0.6, importance: 0.9 },
      ]);
    const { facts, events, pipeline } = setup(extract);

    await pipeline.run("u1", "My name is Alex and I like Kotlin");
    const report = await pipeline.run("u1", "Call me Al, and I switched to Rust");

    expect(report).toMatchObject({ inserted: 0, updated: 1, rejected: 1, discarded: 0 });
    expect(await facts.getActive("u1", "preference", "language")).toMatchObject({ value: "Rust" });
    expect(await facts.getActive("u1", "identity", "name")).toMatchObject({ value: "Alex" });

    const outcomes = events
      .filter((e) => e.type === "fact:upserted")
      .map((e) => e.data);
    expect(outcomes).toEqual([
      { userId: "u1", category: "preference", key: "language", outcome: "inserted" },
      { userId: "u1", category: "identity", key: "name", outcome: "inserted" },
      { userId: "u1", category: "preference", key: "language", outcome: "updated" },
      { userId: "u1", category: "identity", key: "name", outcome: "rejected" },
    ]);
  });

  it("reports a failed extraction after exhausting retries", async () => {
    const extract = vi.fn<FactExtractorPort["extract"]>().mockRejectedValue(new Error("bad gateway"));
    const { facts, events, pipeline } = setup(extract);

    const report = await pipeline.run("u1", "I live in Lisbon these days");

    expect(report).toMatchObject({
      status: "failed",
      reason: "fact extractor failed after 2 attempts: bad gateway",
    });
    expect(extract).toHaveBeenCalledTimes(2);
    expect(await facts.listActive("u1")).toEqual([]);
    expect(events.map((e) => e.type)).toEqual(["extraction:failed"]);
  });

  it("counts a candidate that fails to persist as discarded", async () => {
    const extract = vi.fn(async (): Promise<RawFactCandidate[]> => [
      { category: "identity", key: "name", value: "Alex", confidence: 1, importance: 0.9 },
      { category: "identity", key: "job", value: "engineer", confidence: 1, importance: 0.7 },
    ]);
    const { facts, pipeline } = setup(extract);
    vi.spyOn(facts, "upsertCandidate").mockRejectedValueOnce(new Error("connection reset"));

    const report = await pipeline.run("u1", "I am Alex and I work as an engineer");
    expect(report).toMatchObject({ candidates: 2, inserted: 1, discarded: 1 });
  });

  describe("selectCandidates", () => {
    it("keeps the most confident candidate per key, first seen on a tie", () => {
      const { pipeline } = setup(vi.fn());
      const selected = pipeline.selectCandidates([
        { category: "preference", key: "language", value: "Go", confidence: 0.7, importance: 0.5 },
        { category: "preference", key: "programming language", value: "Rust", confidence: 0.9, importance: 0.5 },
        { category: "preference", key: "LANG", value: "Zig", confidence: 0.9, importance: 0.5 },
        { category: "identity", key: "language", value: "English", confidence: 0.8, importance: 0.5 },
      ]);

      expect(selected.map((c) => `${c.category}/${c.key}=${c.value}`)).toEqual([
        "preference/language=Rust",
        "identity/language=English",
      ]);
    });
  });
});
