import { describe, it, expect, vi } from "vitest";
import { FactStore, shouldReplace } from "../fact-store.js";
import { InMemoryFactRepository } from "../../adapters/facts/inmemory.adapter.js";
import { ConcurrencyConflictError, ValidationError } from "../../errors.js";
import type { FactCandidate } from "../../domain/memory.schema.js";

function candidate(overrides: Partial<FactCandidate> = {}): FactCandidate {
  return {
    category: "identity",
    key: "name",
    value: "Alex",
    confidence: 0.9,
    importance: 0.8,
    ...overrides,
  };
}

function tickingClock(start = Date.UTC(2026, 0, 1)): () => number {
  let now = start;
  return () => (now += 1_000);
}

describe("FactStore.upsertCandidate", () => {
  it("inserts then rejects an identical re-submission", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    expect(await store.upsertCandidate("u1", candidate())).toBe("inserted");
    expect(await store.upsertCandidate("u1", candidate())).toBe("rejected");

    const facts = await store.listActive("u1", 0);
    expect(facts).toHaveLength(1);
    expect(facts[0]?.version).toBe(1);
  });

  it("rejects a lower-confidence correction and keeps the stale value", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    await store.upsertCandidate("u1", candidate({ value: "Alex", confidence: 1.0 }));
    expect(await store.upsertCandidate("u1", candidate({ value: "Al", confidence: 0.6 }))).toBe(
      "rejected",
    );

    const fact = await store.getActive("u1", "identity", "name");
    expect(fact?.value).toBe("Alex");
    expect(fact?.confidence).toBe(1.0);
  });

  it("updates on strictly higher confidence", async () => {
    const store = new FactStore(new InMemoryFactRepository({ now: tickingClock() }));
    await store.upsertCandidate("u1", candidate({ value: "Kotlin", key: "language", category: "preference", confidence: 0.5 }));
    const outcome = await store.upsertCandidate(
      "u1",
      candidate({ value: "TypeScript", key: "language", category: "preference", confidence: 0.7 }),
    );
    expect(outcome).toBe("updated");

    const fact = await store.getActive("u1", "preference", "language");
    expect(fact).toMatchObject({ value: "TypeScript", confidence: 0.7, version: 2, isActive: true });
    expect(fact?.updatedAt).not.toBe(fact?.createdAt);
  });

  it("rejects a different value at equal confidence", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    expect(await store.upsertCandidate("u1", candidate({ value: "Alex", confidence: 0.8 }))).toBe("inserted");
    expect(await store.upsertCandidate("u1", candidate({ value: "Al", confidence: 0.8 }))).toBe("rejected");

    const fact = await store.getActive("u1", "identity", "name");
    expect(fact).toMatchObject({ value: "Alex", confidence: 0.8, version: 1 });
  });

  it("does not change importance on update", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    await store.upsertCandidate("u1", candidate({ importance: 0.3, confidence: 0.5 }));
    await store.upsertCandidate("u1", candidate({ value: "Alexandra", importance: 0.9, confidence: 0.9 }));
    expect((await store.getActive("u1", "identity", "name"))?.importance).toBe(0.3);
  });

  it("never lowers the confidence of an active fact", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    const sequence = [0.5, 0.9, 0.4, 0.9, 0.7, 1.0, 0.2];
    let highest = 0;
    for (const [i, confidence] of sequence.entries()) {
      await store.upsertCandidate("u1", candidate({ value: `v${i}`, confidence }));
      const fact = await store.getActive("u1", "identity", "name");
      expect(fact?.confidence).toBeGreaterThanOrEqual(highest);
      highest = fact?.confidence ?? highest;
    }
    expect(highest).toBe(1.0);
  });

  it("rejects invalid candidates without writing", async () => {
    const repository = new InMemoryFactRepository();
    const store = new FactStore(repository);

    await expect(store.upsertCandidate("u1", candidate({ confidence: 1.5 }))).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(store.upsertCandidate("u1", candidate({ importance: -0.1 }))).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(store.upsertCandidate("u1", candidate({ value: "  " }))).rejects.toBeInstanceOf(
      ValidationError,
    );
    const unknownCategory: FactCandidate = JSON.parse(JSON.stringify({ ...candidate(), category: "hobby" }));
    await expect(store.upsertCandidate("u1", unknownCategory)).rejects.toBeInstanceOf(ValidationError);
    await expect(store.upsertCandidate(" ", candidate())).rejects.toBeInstanceOf(ValidationError);

    expect(repository.size).toBe(0);
  });

  it("keeps exactly one active fact per triple under concurrent upserts", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    const confidences = [0.45, 0.9, 0.6, 0.75, 0.5, 0.95, 0.8, 0.55];
    const outcomes = await Promise.all(
      confidences.map((confidence, i) =>
        store.upsertCandidate("u1", candidate({ value: `name-${i}`, confidence })),
      ),
    );

    expect(outcomes.filter((o) => o === "inserted")).toHaveLength(1);
    const active = await store.listActive("u1", 0);
    expect(active).toHaveLength(1);
    expect(active[0]?.confidence).toBe(0.95);
    expect(active[0]?.value).toBe("name-5");
  });

  it("stores 20 distinct facts as at most 20 active facts, one per key", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    for (let i = 0; i < 20; i++) {
      await store.upsertCandidate("u1", candidate({ key: `key_${i % 10}`, value: `value ${i}`, confidence: 0.5 + i / 100 }));
    }
    const active = await store.listActive("u1", 0);
    expect(active.length).toBeLessThanOrEqual(20);
    expect(new Set(active.map((f) => `${f.category}:${f.key}`)).size).toBe(active.length);
    expect(active).toHaveLength(10);
  });

  it("lists by importance desc, then most recently updated", async () => {
    const store = new FactStore(new InMemoryFactRepository({ now: tickingClock() }));
    await store.upsertCandidate("u1", candidate({ key: "name", importance: 0.6 }));
    await store.upsertCandidate("u1", candidate({ key: "job", value: "Engineer", importance: 0.9 }));
    await store.upsertCandidate("u1", candidate({ key: "location", value: "Oslo", importance: 0.6 }));
    await store.upsertCandidate("u1", candidate({ key: "timezone", value: "CET", importance: 0.3 }));

    const keys = (await store.listActive("u1", 0.5)).map((f) => f.key);
    expect(keys).toEqual(["job", "location", "name"]);
  });

  it("retries a lost compare-and-swap and gives up after maxConflictRetries", async () => {
    const repository = new InMemoryFactRepository();
    const store = new FactStore(repository, { maxConflictRetries: 2 });
    await store.upsertCandidate("u1", candidate({ confidence: 0.5 }));

    const cas = vi.spyOn(repository, "compareAndSwap").mockResolvedValue(null);
    await expect(store.upsertCandidate("u1", candidate({ confidence: 0.9 }))).rejects.toBeInstanceOf(
      ConcurrencyConflictError,
    );
    expect(cas).toHaveBeenCalledTimes(3);

    cas.mockRestore();
    expect(await store.upsertCandidate("u1", candidate({ confidence: 0.9 }))).toBe("updated");
  });

  it("recovers when a concurrent writer inserted first", async () => {
    const repository = new InMemoryFactRepository();
    const store = new FactStore(repository);
    const insert = vi.spyOn(repository, "insertIfAbsent");
    insert.mockImplementationOnce(async (fact) => {
      await repository.insertIfAbsent({ ...fact, value: "Other", confidence: 0.5 });
      return null;
    });

    expect(await store.upsertCandidate("u1", candidate({ confidence: 0.9 }))).toBe("updated");
    expect((await store.getActive("u1", "identity", "name"))?.value).toBe("Alex");
  });
});

describe("FactStore supplements", () => {
  it("deactivates softly and keeps history oldest first", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    await store.upsertCandidate("u1", candidate({ value: "Alex" }));
    expect(await store.deactivate("u1", "identity", "name")).toBe(true);
    expect(await store.deactivate("u1", "identity", "name")).toBe(false);
    expect(await store.getActive("u1", "identity", "name")).toBeNull();

    expect(await store.upsertCandidate("u1", candidate({ value: "Sam", confidence: 0.5 }))).toBe("inserted");
    const history = await store.history("u1", "identity", "name");
    expect(history.map((f) => [f.value, f.isActive])).toEqual([
      ["Alex", false],
      ["Sam", true],
    ]);
  });

  it("looks facts up by key", async () => {
    const store = new FactStore(new InMemoryFactRepository());
    await store.upsertCandidate("u1", candidate({ key: "name", importance: 0.5 }));
    await store.upsertCandidate("u1", candidate({ key: "formatter", category: "preference", value: "black", importance: 0.7 }));
    await store.upsertCandidate("u2", candidate({ key: "formatter", category: "preference", value: "prettier" }));

    const facts = await store.listByKeys("u1", ["formatter", "name", "database"]);
    expect(facts.map((f) => f.value)).toEqual(["black", "Alex"]);
    expect(await store.listByKeys("u1", [])).toEqual([]);
  });
});

describe("shouldReplace", () => {
  it("follows the confidence gate", () => {
    const existing = { value: "a", confidence: 0.5 };
    expect(shouldReplace(existing, candidate({ value: "a", confidence: 0.6 }))).toBe(true);
    expect(shouldReplace(existing, candidate({ value: "b", confidence: 0.5 }))).toBe(false);
    expect(shouldReplace(existing, candidate({ value: "a", confidence: 0.5 }))).toBe(false);
    expect(shouldReplace(existing, candidate({ value: "b", confidence: 0.4 }))).toBe(false);
  });
});
