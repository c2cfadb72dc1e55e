import { getAdminAuth } from "@/lib/firebase-admin";

export class RequestAuthError extends Error {
  readonly code = "unauthenticated";
  status: number;

  constructor(message: string, status = 401) {
    super(message);
    this.name = "RequestAuthError";
    this.status = status;
  }
}

function extractBearerToken(request: Request): string {
  const header = request.headers.get("authorization") ?? "";
  if (!header.startsWith("Bearer ")) {
    throw new RequestAuthError("Missing bearer token");
  }

  const token = header.slice("Bearer ".length).trim();
  if (!token) {
    throw new RequestAuthError("Missing bearer token");
  }

  return token;
}

/** Verifies the Firebase ID token (revocation checked) and returns its uid. */
export async function getAuthenticatedUid(request: Request): Promise<string> {
  const token = extractBearerToken(request);

  try {
    const decoded = await getAdminAuth().verifyIdToken(token, true);
    return decoded.uid;
  } catch (error) {
    console.warn("[auth] token verification failed", {
      code: error instanceof Error && "code" in error ? String(error.code) : "unknown",
    });
    throw new RequestAuthError("Invalid authentication token");
  }
}
