import { describe, it, expect } from "vitest";
import { InMemoryVectorStore, cosineDistance } from "../inmemory.adapter.js";

describe("cosineDistance", () => {
  it("is 0 for the same direction and 1 for orthogonal vectors", () => {
    expect(cosineDistance([2, 0], [5, 0])).toBe(0);
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
  });

  it("treats mismatched or zero vectors as orthogonal", () => {
    expect(cosineDistance([1, 0], [1, 0, 0])).toBe(1);
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });
});

describe("InMemoryVectorStore", () => {
  async function seeded(): Promise<InMemoryVectorStore> {
    const store = new InMemoryVectorStore();
    await store.upsert([
      { id: "a", embedding: [1, 0], content: "alpha", metadata: { userId: "u1" } },
      { id: "b", embedding: [1, 1], content: "beta", metadata: { userId: "u1" } },
      { id: "c", embedding: [0, 1], content: "gamma", metadata: { userId: "u1" } },
      { id: "d", embedding: [1, 0], content: "delta", metadata: { userId: "u2" } },
    ]);
    return store;
  }

  it("returns the nearest documents in ascending distance", async () => {
    const store = await seeded();
    const results = await store.query({ embedding: [1, 0], topK: 2, filter: { userId: "u1" } });

    expect(results.map((r) => r.id)).toEqual(["a", "b"]);
    expect(results[1]?.distance).toBeCloseTo(1 - Math.SQRT1_2, 10);
    expect(results[0]?.embedding).toBeUndefined();
  });

  it("excludes documents at or beyond maxDistance", async () => {
    const store = await seeded();
    const results = await store.query({ embedding: [1, 0], topK: 10, maxDistance: 1, filter: { userId: "u1" } });

    expect(results.map((r) => r.id)).toEqual(["a", "b"]);
  });

  it("returns copies of the embeddings when asked", async () => {
    const store = await seeded();
    const [first] = await store.query({ embedding: [1, 0], topK: 1, includeEmbeddings: true });

    expect(first?.embedding).toEqual([1, 0]);
    first?.embedding?.push(9);
    const [again] = await store.query({ embedding: [1, 0], topK: 1, includeEmbeddings: true });
    expect(again?.embedding).toEqual([1, 0]);
  });

  it("returns nothing for a non-positive topK", async () => {
    const store = await seeded();
    expect(await store.query({ embedding: [1, 0], topK: 0 })).toEqual([]);
  });

  it("lists newest first and counts by filter", async () => {
    const store = await seeded();

    expect((await store.list({ filter: { userId: "u1" }, limit: 2 })).map((d) => d.id)).toEqual(["c", "b"]);
    expect(await store.list({ limit: 0 })).toEqual([]);
    expect(await store.count()).toBe(4);
    expect(await store.count({ userId: "u2" })).toBe(1);
  });
});
