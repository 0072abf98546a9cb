import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { internalError } from "@/lib/api/response-helpers";
import { parseQuery, requestOrigin } from "@/lib/api/request-helpers";
import { paginate } from "@/lib/api/pagination";
import { requireUser } from "@/lib/auth/session";
import { recipesLimitQuerySchema } from "@/lib/validation/request-schema";
import { serializeUsersWithRecipes } from "@/lib/serializers/users";

/**
 * GET /api/users/subscriptions
 * Authors the user follows, each with a recipe preview (?recipes_limit).
 */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    const url = new URL(request.url);
    const query = parseQuery(url.searchParams, recipesLimitQuerySchema);
    if (!query.ok) return query.response;

    const ctx = { db, viewer: auth.user, origin: requestOrigin(request) };
    const userId = auth.user.id;
    const recipesLimit = query.data.recipes_limit;
    return await paginate(url, {
      count: () => db.countFollowedAuthors(userId),
      fetch: (window) => db.listFollowedAuthors(userId, window),
      serialize: (rows) => serializeUsersWithRecipes(ctx, rows, recipesLimit),
    });
  } catch (err) {
    console.error("GET /api/users/subscriptions error:", err);
    return internalError(err);
  }
}
