import { getAuthenticatedUid } from "@/lib/server/auth";
import { apiOk, readJsonBody, toErrorResponse } from "@/lib/server/http";
import { getServices } from "@/lib/server/services";
import { feedbackSchema, validateBody } from "@/lib/validation";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const userId = await getAuthenticatedUid(request);
    const v = validateBody(feedbackSchema, await readJsonBody(request));
    if (!v.ok) return v.error;

    const result = await getServices().feedback.submitFeedback({ userId, ...v.data });
    return apiOk(result, 201);
  } catch (error) {
    return toErrorResponse(error, "study-feedback");
  }
}
