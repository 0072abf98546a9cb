/**
 * Recipe list query → adapter filter.
 */

import type { RecipeFilter, UserRow } from "@/lib/db/adapter";
import type * as z from "zod";
import type { recipeListQuerySchema } from "@/lib/validation/request-schema";

export type RecipeListQuery = z.infer<typeof recipeListQuerySchema>;

/** Favorite/cart flags only narrow the list for an authenticated viewer. */
export function toRecipeFilter(query: RecipeListQuery, viewer: UserRow | null): RecipeFilter {
  const filter: RecipeFilter = {};
  if (query.author !== undefined) filter.authorId = query.author;
  if (viewer && query.is_favorited) filter.favoritedBy = viewer.id;
  if (viewer && query.is_in_shopping_cart) filter.inShoppingCartOf = viewer.id;
  return filter;
}
