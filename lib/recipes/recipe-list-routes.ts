/**
 * Handlers shared by /api/recipes/[recipeId]/favorite and /shopping_cart.
 * Both lists behave the same; only the table and messages differ.
 */

import type { NextRequest } from "next/server";
import type { RecipeListKind } from "@/lib/db/adapter";
import { getDb } from "@/lib/db";
import { isUniqueViolation } from "@/lib/db/errors";
import { requireUser } from "@/lib/auth/session";
import {
  json,
  noContent,
  validationError,
  notFoundError,
  internalError,
} from "@/lib/api/response-helpers";
import { parseId, requestOrigin } from "@/lib/api/request-helpers";
import { serializeRecipeMinified } from "@/lib/serializers/recipes";

export type RecipeRouteParams = { params: Promise<{ recipeId: string }> };

const LABELS: Record<RecipeListKind, string> = {
  favorite: "favorites",
  shopping_cart: "the shopping cart",
};

export function recipeListHandlers(kind: RecipeListKind) {
  const route = `/api/recipes/[recipeId]/${kind}`;

  async function add(request: NextRequest, { params }: RecipeRouteParams): Promise<Response> {
    try {
      const { recipeId } = await params;
      const db = getDb();
      const auth = await requireUser(request, db);
      if (!auth.ok) return auth.response;

      const id = parseId(recipeId);
      const recipe = id === null ? null : await db.getRecipe(id);
      if (!recipe) return notFoundError("Recipe not found");

      const listed = await db.getListedRecipeIds(kind, auth.user.id, [recipe.id]);
      if (listed.length > 0) {
        return validationError(`Recipe is already in ${LABELS[kind]}.`);
      }
      try {
        await db.addToRecipeList(kind, auth.user.id, recipe.id);
      } catch (err) {
        if (isUniqueViolation(err)) return validationError(`Recipe is already in ${LABELS[kind]}.`);
        throw err;
      }
      return json(serializeRecipeMinified(requestOrigin(request), recipe), 201);
    } catch (err) {
      console.error(`POST ${route} error:`, err);
      return internalError(err);
    }
  }

  async function remove(request: NextRequest, { params }: RecipeRouteParams): Promise<Response> {
    try {
      const { recipeId } = await params;
      const db = getDb();
      const auth = await requireUser(request, db);
      if (!auth.ok) return auth.response;

      const id = parseId(recipeId);
      const recipe = id === null ? null : await db.getRecipe(id);
      if (!recipe) return notFoundError("Recipe not found");

      const removed = await db.removeFromRecipeList(kind, auth.user.id, recipe.id);
      if (!removed) return validationError(`Recipe is not in ${LABELS[kind]}.`);
      return noContent();
    } catch (err) {
      console.error(`DELETE ${route} error:`, err);
      return internalError(err);
    }
  }

  return { add, remove };
}
