/**
 * Request validation for route handlers.
 *
 *   const v = validateBody(askQuestionSchema, await readJsonBody(request));
 *   if (!v.ok) return v.error;
 */

import { NextResponse } from "next/server";
import type { ZodType, ZodTypeDef } from "zod";

type ValidationSuccess<T> = { ok: true; data: T };
type ValidationFailure = { ok: false; error: NextResponse };

export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
): ValidationSuccess<T> | ValidationFailure {
  const result = schema.safeParse(body);
  if (result.success) {
    return { ok: true, data: result.data };
  }

  return {
    ok: false,
    error: NextResponse.json(
      {
        error: "Invalid request",
        code: "validation_error",
        details: result.error.issues.map((issue) =>
          issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        ),
      },
      { status: 400 },
    ),
  };
}

export * from "./schemas";
