import { errorMessage } from "@/lib/errors";
import { getAuthenticatedUid } from "@/lib/server/auth";
import { apiOk, readJsonBody, toErrorResponse } from "@/lib/server/http";
import { getServices } from "@/lib/server/services";
import { registerMaterialSchema, validateBody } from "@/lib/validation";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const ownerId = await getAuthenticatedUid(request);
    const v = validateBody(registerMaterialSchema, await readJsonBody(request));
    if (!v.ok) return v.error;

    const { ingestion } = getServices();
    const material = await ingestion.registerMaterialUpload({ ownerId, ...v.data });

    // Runs after the response; progress is visible through GET /api/materials/{id}.
    void ingestion.ingestMaterial(material.id).catch((error: unknown) => {
      console.warn("[ingestion] background ingestion failed", {
        materialId: material.id,
        message: errorMessage(error),
      });
    });

    return apiOk({ materialId: material.id, ingestionStatus: material.ingestionStatus }, 202);
  } catch (error) {
    return toErrorResponse(error, "materials");
  }
}
