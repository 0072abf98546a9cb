/**
 * Request parsing shared by route handlers.
 */

import type * as z from "zod";
import { validationError } from "./response-helpers";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export type ParseResult<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

/** Reads the JSON body and validates it; failures become 400 responses. */
export async function parseJsonBody<T>(
  request: Request,
  schema: z.ZodType<T>
): Promise<ParseResult<T>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return { ok: false, response: validationError("Malformed JSON body") };
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      response: validationError("Invalid request body", zodErrorDetails(parsed.error)),
    };
  }
  return { ok: true, data: parsed.data };
}

/** Validates query parameters (first value per key). */
export function parseQuery<T>(
  searchParams: URLSearchParams,
  schema: z.ZodType<T>
): ParseResult<T> {
  const query: Record<string, string> = {};
  for (const [key, value] of searchParams) {
    if (!(key in query)) query[key] = value;
  }
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    return {
      ok: false,
      response: validationError("Invalid query parameters", zodErrorDetails(parsed.error)),
    };
  }
  return { ok: true, data: parsed.data };
}

/** Parses a positive integer path id; null when malformed. */
export function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** Scheme + host of the request, used for absolute media and link URLs. */
export function requestOrigin(request: Request): string {
  return new URL(request.url).origin;
}
