import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, validationError, internalError } from "@/lib/api/response-helpers";
import { parseJsonBody, parseQuery, requestOrigin } from "@/lib/api/request-helpers";
import { paginate } from "@/lib/api/pagination";
import { authenticate, requireUser } from "@/lib/auth/session";
import { createRecipeSchema, recipeListQuerySchema } from "@/lib/validation/request-schema";
import { toRecipeFilter } from "@/lib/recipes/filters";
import { createRecipe, findMissingIngredientIds } from "@/lib/recipes/recipe-writes";
import { serializeRecipe, serializeRecipes } from "@/lib/serializers/recipes";

/**
 * GET /api/recipes
 * Newest first. Filters: ?author=<id>&is_favorited=1&is_in_shopping_cart=1
 */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await authenticate(request, db);
    if (!auth.ok) return auth.response;

    const url = new URL(request.url);
    const query = parseQuery(url.searchParams, recipeListQuerySchema);
    if (!query.ok) return query.response;

    const filter = toRecipeFilter(query.data, auth.user);
    const ctx = { db, viewer: auth.user, origin: requestOrigin(request) };
    return await paginate(url, {
      count: () => db.countRecipes(filter),
      fetch: (window) => db.listRecipes(filter, window),
      serialize: (rows) => serializeRecipes(ctx, rows),
    });
  } catch (err) {
    console.error("GET /api/recipes error:", err);
    return internalError(err);
  }
}

/**
 * POST /api/recipes
 * Body: { ingredients: [{ id, amount }], image, name, text, cooking_time }
 */
export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    const body = await parseJsonBody(request, createRecipeSchema);
    if (!body.ok) return body.response;

    const missing = await findMissingIngredientIds(db, body.data.ingredients);
    if (missing.length > 0) {
      return validationError("Invalid request body", {
        ingredients: missing.map((id) => `Ingredient with id ${id} does not exist.`),
      });
    }

    const id = await createRecipe(db, auth.user.id, body.data);
    const recipe = await db.getRecipe(id);
    if (!recipe) throw new Error(`Recipe ${id} missing after insert`);

    const ctx = { db, viewer: auth.user, origin: requestOrigin(request) };
    return json(await serializeRecipe(ctx, recipe), 201);
  } catch (err) {
    console.error("POST /api/recipes error:", err);
    return internalError(err);
  }
}
