import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { noContent, internalError } from "@/lib/api/response-helpers";
import { requireUser } from "@/lib/auth/session";
import { tokenDigest } from "@/lib/auth/tokens";
import { getSettings } from "@/lib/config/settings";

/**
 * POST /api/auth/token/logout
 * Revokes the token the request was made with; other sessions stay valid.
 */
export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    await db.deleteAuthToken(tokenDigest(auth.token, getSettings().secretKey));
    return noContent();
  } catch (err) {
    console.error("POST /api/auth/token/logout error:", err);
    return internalError(err);
  }
}
