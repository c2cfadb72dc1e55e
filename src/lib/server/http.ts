import { NextResponse } from "next/server";

import { errorMessage, isDomainError, ConcurrencyConflictError } from "@/lib/errors";
import { RequestAuthError } from "@/lib/server/auth";

export function apiOk<T>(body: T, status = 200): NextResponse {
  return NextResponse.json(body, { status });
}

export function apiError(message: string, status: number, extra?: { code?: string; details?: unknown }): NextResponse {
  return NextResponse.json({ error: message, ...extra }, { status });
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    const body: unknown = await request.json();
    return body;
  } catch {
    return undefined;
  }
}

/** Maps thrown errors to responses; anything unrecognised is a logged 500. */
export function toErrorResponse(error: unknown, source: string): NextResponse {
  if (error instanceof RequestAuthError) {
    return apiError(error.message, error.status, { code: error.code });
  }

  if (error instanceof ConcurrencyConflictError) {
    return apiError(error.message, error.status, { code: error.code, details: error.details });
  }

  if (isDomainError(error)) {
    if (error.status >= 500) {
      console.error(`[${source}] upstream failure`, { code: error.code, message: error.message });
    }
    return apiError(error.message, error.status, { code: error.code });
  }

  console.error(`[${source}] unexpected error`, { message: errorMessage(error) });
  return apiError("Internal server error", 500);
}
