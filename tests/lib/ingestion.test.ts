import { beforeEach, describe, expect, it, vi } from "vitest";

import type { EmbeddingProvider } from "@/lib/ai/types";
import { createEmbeddingGenerator } from "@/lib/embeddings";
import { ConcurrencyConflictError, PermanentProviderError } from "@/lib/errors";
import type { DocumentParser } from "@/lib/parsing/types";
import { createEventBus } from "@/lib/progress/events";
import { createLedger, registerLedgerHandlers } from "@/lib/progress/ledger";
import { createIngestionService } from "@/lib/study/ingestion";
import { InMemoryVectorIndex } from "@/lib/vector/memory-index";
import type { ChunkRepository } from "@/lib/store/types";
import type { VectorIndexClient } from "@/lib/vector/types";
import { createFakeEmbeddingProvider, topicVector } from "../support/fakes";
import { MemoryStore } from "../support/memory-store";

const MATERIAL_TEXT = "Photosynthesis basics.\n\nMitosis splits cells.\n\nOther notes here.";

const upload = {
  ownerId: "student-1",
  courseId: "bio-101",
  file: { name: "notes.txt", url: "https://files.test/notes.txt", extension: "txt" },
};

describe("ingestion service", () => {
  let store: MemoryStore;
  let index: InMemoryVectorIndex;

  function setup(
    overrides: {
      parseDocument?: DocumentParser;
      provider?: EmbeddingProvider;
      index?: VectorIndexClient;
      chunks?: Partial<ChunkRepository>;
    } = {},
  ) {
    const bus = createEventBus();
    const repositories = store.repositories();
    registerLedgerHandlers(bus, createLedger(repositories.ledger, { examCompleted: 25, materialUploaded: 10 }));

    const provider =
      overrides.provider ?? createFakeEmbeddingProvider({ dimension: 3, vectorFor: topicVector }).provider;

    return createIngestionService({
      materials: repositories.materials,
      chunks: { ...repositories.chunks, ...overrides.chunks },
      embeddings: createEmbeddingGenerator(provider, { maxAttempts: 1, retryBaseDelayMs: 0 }),
      index: overrides.index ?? index,
      parseDocument: overrides.parseDocument ?? (async () => MATERIAL_TEXT),
      bus,
      chunking: { maxChars: 25, overlapChars: 0 },
    });
  }

  beforeEach(() => {
    store = new MemoryStore();
    index = new InMemoryVectorIndex(3);
  });

  it("registers an upload as pending and credits the uploader", async () => {
    const ingestion = setup();

    const material = await ingestion.registerMaterialUpload(upload);

    expect(material.ingestionStatus).toBe("pending");
    expect(store.profile("student-1")).toMatchObject({ studyMaterialsUploadedCount: 1, totalPoints: 10 });
  });

  it("chunks, embeds and publishes a material", async () => {
    const ingestion = setup();
    const material = await ingestion.registerMaterialUpload(upload);

    const summary = await ingestion.ingestMaterial(material.id);

    expect(summary).toEqual({ materialId: material.id, chunkCount: 3 });
    expect(store.materials.get(material.id)).toMatchObject({ ingestionStatus: "indexed", chunkCount: 3 });

    const chunks = [...store.chunks.values()].sort((a, b) => a.sequence - b.sequence);
    expect(chunks.map((chunk) => chunk.text)).toEqual([
      "Photosynthesis basics.\n\n",
      "Mitosis splits cells.\n\n",
      "Other notes here.",
    ]);
    expect(chunks.map((chunk) => chunk.vectorId)).toEqual([`${material.id}_0`, `${material.id}_1`, `${material.id}_2`]);
    expect(index.size).toBe(3);

    const [best] = await index.query([0, 1, 0], 1);
    expect(best).toEqual({ id: `${material.id}_1`, score: 1 });
  });

  it("marks the material failed and keeps no chunks when embedding fails", async () => {
    const provider: EmbeddingProvider = {
      name: "openai",
      model: "broken",
      dimension: 3,
      maxBatchSize: 10,
      embedBatch: async () => {
        throw new PermanentProviderError("request_failed", "embedding quota exceeded");
      },
    };
    const ingestion = setup({ provider });
    const material = await ingestion.registerMaterialUpload(upload);

    await expect(ingestion.ingestMaterial(material.id)).rejects.toThrow("embedding quota exceeded");

    expect(store.materials.get(material.id)).toMatchObject({
      ingestionStatus: "failed",
      chunkCount: 0,
      errorMessage: "embedding quota exceeded",
    });
    expect(store.chunks.size).toBe(0);
    expect(index.size).toBe(0);
  });

  it("rolls back saved chunks and upserted vectors when a vector upsert fails", async () => {
    let upserts = 0;
    const flaky: VectorIndexClient = {
      dimension: 3,
      upsert: async (id, vector, metadata) => {
        upserts += 1;
        if (upserts === 2) {
          throw new Error("index unavailable");
        }
        await index.upsert(id, vector, metadata);
      },
      remove: (ids) => index.remove(ids),
      query: (vector, topK) => index.query(vector, topK),
    };
    const ingestion = setup({ index: flaky });
    const material = await ingestion.registerMaterialUpload(upload);

    await expect(ingestion.ingestMaterial(material.id)).rejects.toThrow("index unavailable");

    expect(store.materials.get(material.id)?.ingestionStatus).toBe("failed");
    expect(store.chunks.size).toBe(0);
    expect(index.size).toBe(0);
  });

  it("still marks the material failed and rethrows the ingestion error when cleanup fails", async () => {
    const failing: VectorIndexClient = {
      dimension: 3,
      upsert: async () => {
        throw new Error("index unavailable");
      },
      remove: async () => {
        throw new Error("index still unavailable");
      },
      query: (vector, topK) => index.query(vector, topK),
    };
    const ingestion = setup({
      index: failing,
      chunks: { deleteChunksForMaterial: vi.fn().mockRejectedValue(new Error("store unavailable")) },
    });
    const material = await ingestion.registerMaterialUpload(upload);

    await expect(ingestion.ingestMaterial(material.id)).rejects.toThrow("index unavailable");

    expect(store.materials.get(material.id)).toMatchObject({
      ingestionStatus: "failed",
      chunkCount: 0,
      errorMessage: "index unavailable",
    });
  });

  it("keeps one vector per chunk across a failed run and its retry", async () => {
    let upserts = 0;
    const flaky: VectorIndexClient = {
      dimension: 3,
      upsert: async (id, vector, metadata) => {
        upserts += 1;
        await index.upsert(id, vector, metadata);
        if (upserts === 3) {
          throw new Error("index unavailable");
        }
      },
      remove: async () => {
        throw new Error("index unavailable");
      },
      query: (vector, topK) => index.query(vector, topK),
    };
    const ingestion = setup({ index: flaky });
    const material = await ingestion.registerMaterialUpload(upload);

    await expect(ingestion.ingestMaterial(material.id)).rejects.toThrow("index unavailable");
    expect(index.size).toBe(3);

    await expect(ingestion.ingestMaterial(material.id)).resolves.toEqual({ materialId: material.id, chunkCount: 3 });
    expect(index.size).toBe(3);
    expect(store.chunks.size).toBe(3);
  });

  it("fails a material with no extractable text", async () => {
    const ingestion = setup({ parseDocument: async () => "  \n\t " });
    const material = await ingestion.registerMaterialUpload(upload);

    const failure = ingestion.ingestMaterial(material.id);

    await expect(failure).rejects.toBeInstanceOf(PermanentProviderError);
    await expect(failure).rejects.toMatchObject({ code: "parse_failed" });
    expect(store.materials.get(material.id)).toMatchObject({
      ingestionStatus: "failed",
      errorMessage: "notes.txt: no extractable text",
    });
  });

  it("refuses to ingest a material twice", async () => {
    const ingestion = setup();
    const material = await ingestion.registerMaterialUpload(upload);
    await ingestion.ingestMaterial(material.id);

    await expect(ingestion.ingestMaterial(material.id)).rejects.toBeInstanceOf(ConcurrencyConflictError);
    expect(store.materials.get(material.id)?.ingestionStatus).toBe("indexed");
    expect(store.chunks.size).toBe(3);
  });

  it("retries a failed material", async () => {
    let calls = 0;
    const ingestion = setup({
      parseDocument: async () => {
        calls += 1;
        if (calls === 1) {
          throw new PermanentProviderError("parse_failed", "download failed");
        }
        return MATERIAL_TEXT;
      },
    });
    const material = await ingestion.registerMaterialUpload(upload);

    await expect(ingestion.ingestMaterial(material.id)).rejects.toThrow("download failed");
    await expect(ingestion.ingestMaterial(material.id)).resolves.toEqual({ materialId: material.id, chunkCount: 3 });
    expect(store.materials.get(material.id)?.errorMessage).toBeUndefined();
  });
});
