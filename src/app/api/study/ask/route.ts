import { getAuthenticatedUid } from "@/lib/server/auth";
import { apiOk, readJsonBody, toErrorResponse } from "@/lib/server/http";
import { getServices } from "@/lib/server/services";
import { askQuestionSchema, validateBody } from "@/lib/validation";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const userId = await getAuthenticatedUid(request);
    const v = validateBody(askQuestionSchema, await readJsonBody(request));
    if (!v.ok) return v.error;

    const result = await getServices().retrieval.answerQuestion({ userId, question: v.data.question });
    return apiOk(result);
  } catch (error) {
    return toErrorResponse(error, "study-ask");
  }
}
