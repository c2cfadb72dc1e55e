import { describe, expect, it } from "vitest";

import { cosineSimilarity, InMemoryVectorIndex } from "@/lib/vector/memory-index";

describe("InMemoryVectorIndex", () => {
  it("returns an empty list for an empty index", async () => {
    const index = new InMemoryVectorIndex(3);

    await expect(index.query([1, 0, 0], 5)).resolves.toEqual([]);
  });

  it("orders matches by descending similarity and honours topK", async () => {
    const index = new InMemoryVectorIndex(2);
    await index.upsert("far", [0, 1], { materialId: "m1" });
    await index.upsert("near", [1, 0], { materialId: "m1" });
    await index.upsert("middle", [1, 1], { materialId: "m1" });

    const matches = await index.query([1, 0], 2);

    expect(matches.map((match) => match.id)).toEqual(["near", "middle"]);
    expect(matches[0]?.score).toBeCloseTo(1);
    expect(matches[1]?.score).toBeCloseTo(Math.SQRT1_2);
  });

  it("replaces an entry on re-upsert", async () => {
    const index = new InMemoryVectorIndex(2);
    await index.upsert("v1", [0, 1], { sequence: 0 });
    await index.upsert("v1", [1, 0], { sequence: 0 });

    expect(index.size).toBe(1);
    await expect(index.query([1, 0], 1)).resolves.toEqual([{ id: "v1", score: 1 }]);
  });
});

describe("cosineSimilarity", () => {
  it("is zero against a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});
