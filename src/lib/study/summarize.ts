import type { ModelRouter } from "@/lib/ai/modelRouter";
import { AccessDeniedError, NotFoundError, ValidationError } from "@/lib/errors";
import { joinChunks } from "@/lib/parsing/chunker";
import type { ChunkRepository, MaterialRepository } from "@/lib/store/types";

const MAX_SUMMARY_SOURCE_CHARS = 30_000;

export type MaterialSummary = {
  materialId: string;
  summary: string;
  truncated: boolean;
};

export async function summarizeMaterial(
  deps: { materials: MaterialRepository; chunks: ChunkRepository; models: ModelRouter; overlapChars: number },
  input: { userId: string; materialId: string },
): Promise<MaterialSummary> {
  const material = await deps.materials.getMaterial(input.materialId);
  if (!material) {
    throw new NotFoundError("Material not found");
  }
  if (material.ownerId !== input.userId) {
    throw new AccessDeniedError("Material belongs to another user");
  }
  if (material.ingestionStatus !== "indexed") {
    throw new ValidationError(`Material is not indexed yet (status: ${material.ingestionStatus})`);
  }

  const chunks = await deps.chunks.listChunksForMaterial(material.id);
  const source = joinChunks(
    chunks.map((chunk) => chunk.text),
    deps.overlapChars,
  );
  if (!source.trim()) {
    throw new ValidationError("Material has no text to summarize");
  }

  const truncated = source.length > MAX_SUMMARY_SOURCE_CHARS;
  const prompt = [
    `Summarize the study material "${material.file.name}".`,
    "",
    "=== MATERIAL ===",
    truncated ? `${source.slice(0, MAX_SUMMARY_SOURCE_CHARS)}\n...[truncated]` : source,
    "=== END MATERIAL ===",
  ].join("\n");

  const response = await deps.models.generate({ taskType: "summarize_material", prompt });
  return { materialId: material.id, summary: response.text.trim(), truncated };
}
