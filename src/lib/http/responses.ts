import { NextResponse, type NextRequest } from "next/server";
import type { ZodType, ZodTypeDef } from "zod";
import { errorMessage, isDomainError, type ApiErrorKind } from "@/lib/errors";

// Every client-visible failure uses the same status; `kind` tells them apart
export const ERROR_STATUS = 400;

export interface ApiErrorBody {
  detail: string;
  kind: ApiErrorKind;
  details?: unknown;
}

export function errorResponse(
  detail: string,
  kind: ApiErrorKind,
  details?: unknown
): NextResponse<ApiErrorBody> {
  return NextResponse.json<ApiErrorBody>(
    details === undefined ? { detail, kind } : { detail, kind, details },
    { status: ERROR_STATUS }
  );
}

/**
 * Map a thrown error to the endpoint's error response.
 * Domain errors keep their own kind; anything else gets `fallback`.
 */
export function toErrorResponse(
  error: unknown,
  fallback: ApiErrorKind
): NextResponse<ApiErrorBody> {
  const kind = isDomainError(error) ? error.kind : fallback;
  return errorResponse(errorMessage(error), kind);
}

type Parsed<T> =
  | { ok: true; data: T }
  | { ok: false; response: NextResponse<ApiErrorBody> };

export function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown
): Parsed<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      response: errorResponse(
        "Validation failed",
        "invalid_request",
        parsed.error.flatten().fieldErrors
      ),
    };
  }
  return { ok: true, data: parsed.data };
}

/**
 * Read and validate a JSON request body.
 */
export async function parseJsonBody<T>(
  request: NextRequest,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<Parsed<T>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return { ok: false, response: errorResponse("Invalid JSON body", "invalid_request") };
  }
  return validate(schema, body);
}
