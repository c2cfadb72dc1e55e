import { getAuthenticatedUid } from "@/lib/server/auth";
import { apiOk, toErrorResponse } from "@/lib/server/http";
import { getServices } from "@/lib/server/services";

export const runtime = "nodejs";

export async function GET(request: Request) {
  try {
    const userId = await getAuthenticatedUid(request);
    return apiOk(await getServices().ledger.getProgress(userId));
  } catch (error) {
    return toErrorResponse(error, "progress");
  }
}
