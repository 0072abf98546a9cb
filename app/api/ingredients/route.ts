import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, internalError } from "@/lib/api/response-helpers";
import { parseQuery } from "@/lib/api/request-helpers";
import { authenticate } from "@/lib/auth/session";
import { ingredientQuerySchema } from "@/lib/validation/request-schema";

/**
 * GET /api/ingredients
 * Unpaginated. ?name=<prefix> filters case-insensitively by name prefix.
 */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await authenticate(request, db);
    if (!auth.ok) return auth.response;

    const query = parseQuery(new URL(request.url).searchParams, ingredientQuerySchema);
    if (!query.ok) return query.response;

    const prefix = query.data.name?.trim();
    return json(await db.listIngredients(prefix || undefined));
  } catch (err) {
    console.error("GET /api/ingredients error:", err);
    return internalError(err);
  }
}
