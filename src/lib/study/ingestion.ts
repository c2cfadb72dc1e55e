import type { EmbeddingGenerator } from "@/lib/embeddings";
import { errorMessage, PermanentProviderError } from "@/lib/errors";
import { splitIntoChunks, type ChunkingOptions } from "@/lib/parsing/chunker";
import type { DocumentParser } from "@/lib/parsing/types";
import type { EventBus } from "@/lib/progress/events";
import type { ChunkDraft, ChunkRepository, MaterialRepository, NewStudyMaterial, StudyMaterial } from "@/lib/store/types";
import type { VectorIndexClient } from "@/lib/vector/types";

const UPSERT_CONCURRENCY = 16;

export type IngestionDeps = {
  materials: MaterialRepository;
  chunks: ChunkRepository;
  embeddings: EmbeddingGenerator;
  index: VectorIndexClient;
  parseDocument: DocumentParser;
  bus: EventBus;
  chunking: ChunkingOptions;
};

export type IngestionSummary = {
  materialId: string;
  chunkCount: number;
};

export type IngestionService = {
  registerMaterialUpload(input: NewStudyMaterial): Promise<StudyMaterial>;
  ingestMaterial(materialId: string): Promise<IngestionSummary>;
};

/**
 * Upload -> extract -> chunk -> embed -> write chunks -> upsert vectors ->
 * publish. Retrieval only sees chunks of `indexed` materials, so nothing is
 * reachable until the final status write, and any failure before it is
 * rolled back to a `failed` material with no chunks and no vectors. Vector ids
 * are derived from material and sequence, so a retry overwrites rather than
 * adds.
 */
export function vectorIdFor(materialId: string, sequence: number): string {
  return `${materialId}_${sequence}`;
}

export function createIngestionService(deps: IngestionDeps): IngestionService {

  async function upsertVectors(drafts: ChunkDraft[], vectors: number[][], materialId: string): Promise<void> {
    for (let i = 0; i < drafts.length; i += UPSERT_CONCURRENCY) {
      await Promise.all(
        drafts.slice(i, i + UPSERT_CONCURRENCY).map((draft, offset) => {
          const vector = vectors[i + offset];
          if (!vector) {
            throw new PermanentProviderError("invalid_response", `Missing embedding for chunk ${draft.sequence}`);
          }
          return deps.index.upsert(draft.vectorId, vector, { materialId, sequence: draft.sequence });
        }),
      );
    }
  }

  // Leftovers of an earlier run whose rollback did not finish.
  async function clearPreviousChunks(materialId: string): Promise<void> {
    const previous = await deps.chunks.listChunksForMaterial(materialId);
    if (!previous.length) {
      return;
    }
    await deps.index.remove(previous.map((chunk) => chunk.vectorId));
    await deps.chunks.deleteChunksForMaterial(materialId);
    console.warn("[ingestion] cleared chunks of an earlier run", { materialId, chunkCount: previous.length });
  }

  // Each step is attempted even when an earlier one fails; the caller rethrows the ingestion error.
  async function rollBack(materialId: string, vectorIds: string[], error: unknown): Promise<void> {
    const message = errorMessage(error);
    let removedChunks = 0;

    try {
      await deps.index.remove(vectorIds);
    } catch (cleanupError) {
      console.error("[ingestion] vector cleanup failed", { materialId, message: errorMessage(cleanupError) });
    }
    try {
      removedChunks = await deps.chunks.deleteChunksForMaterial(materialId);
    } catch (cleanupError) {
      console.error("[ingestion] chunk cleanup failed", { materialId, message: errorMessage(cleanupError) });
    }
    try {
      await deps.materials.updateIngestion(materialId, { status: "failed", chunkCount: 0, errorMessage: message });
    } catch (statusError) {
      console.error("[ingestion] could not mark material failed", { materialId, message: errorMessage(statusError) });
    }

    console.error("[ingestion] failed", { materialId, removedChunks, message });
  }

  return {
    async registerMaterialUpload(input) {
      const material = await deps.materials.createMaterial(input);
      console.info("[ingestion] material registered", { materialId: material.id, ownerId: material.ownerId });

      await deps.bus.publish({
        kind: "material_uploaded",
        materialId: material.id,
        userId: material.ownerId,
        occurredAt: material.createdAt,
      });
      return material;
    },

    async ingestMaterial(materialId) {
      const material = await deps.materials.claimForIngestion(materialId);
      const startedAt = Date.now();
      let vectorIds: string[] = [];

      try {
        await clearPreviousChunks(materialId);

        const text = await deps.parseDocument(material.file);
        if (!text.trim()) {
          throw new PermanentProviderError("parse_failed", `${material.file.name}: no extractable text`);
        }

        const pieces = splitIntoChunks(text, deps.chunking);
        const vectors = await deps.embeddings.embed(pieces, "document");
        const drafts = pieces.map((piece, sequence) => ({
          sequence,
          text: piece,
          vectorId: vectorIdFor(materialId, sequence),
        }));
        vectorIds = drafts.map((draft) => draft.vectorId);

        await deps.chunks.saveChunks(materialId, drafts);
        await upsertVectors(drafts, vectors, materialId);
        await deps.materials.updateIngestion(materialId, { status: "indexed", chunkCount: drafts.length });

        console.info("[ingestion] indexed", {
          materialId,
          chunkCount: drafts.length,
          latencyMs: Date.now() - startedAt,
        });
        return { materialId, chunkCount: drafts.length };
      } catch (error) {
        await rollBack(materialId, vectorIds, error);
        throw error;
      }
    },
  };
}
