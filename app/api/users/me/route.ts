import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, internalError } from "@/lib/api/response-helpers";
import { requestOrigin } from "@/lib/api/request-helpers";
import { requireUser } from "@/lib/auth/session";
import { serializeUser } from "@/lib/serializers/users";

/** GET /api/users/me: the authenticated user's profile. */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    return json(
      await serializeUser({ db, viewer: auth.user, origin: requestOrigin(request) }, auth.user)
    );
  } catch (err) {
    console.error("GET /api/users/me error:", err);
    return internalError(err);
  }
}
