/**
 * Recipe response shapes.
 */

import type { RecipeRow, RecipeIngredientRow } from "@/lib/db/adapter";
import { mediaUrl } from "@/lib/media/images";
import { serializeUsers, type SerializeContext, type UserPayload } from "./users";

export interface RecipeIngredientPayload {
  id: number;
  name: string;
  measurement_unit: string;
  amount: number;
}

export interface RecipePayload {
  id: number;
  author: UserPayload;
  ingredients: RecipeIngredientPayload[];
  is_favorited: boolean;
  is_in_shopping_cart: boolean;
  name: string;
  image: string;
  text: string;
  cooking_time: number;
}

export interface RecipeMinifiedPayload {
  id: number;
  name: string;
  image: string;
  cooking_time: number;
}

export function serializeRecipeMinified(origin: string, recipe: RecipeRow): RecipeMinifiedPayload {
  return {
    id: recipe.id,
    name: recipe.name,
    image: mediaUrl(origin, recipe.image),
    cooking_time: recipe.cooking_time,
  };
}

function groupIngredients(rows: RecipeIngredientRow[]): Map<number, RecipeIngredientPayload[]> {
  const byRecipe = new Map<number, RecipeIngredientPayload[]>();
  for (const row of rows) {
    const list = byRecipe.get(row.recipe_id) ?? [];
    list.push({
      id: row.ingredient_id,
      name: row.name,
      measurement_unit: row.measurement_unit,
      amount: row.amount,
    });
    byRecipe.set(row.recipe_id, list);
  }
  return byRecipe;
}

export async function serializeRecipes(
  ctx: SerializeContext,
  recipes: RecipeRow[]
): Promise<RecipePayload[]> {
  if (recipes.length === 0) return [];
  const ids = recipes.map((r) => r.id);
  const authorIds = [...new Set(recipes.map((r) => r.author_id))];

  const [authorRows, ingredientRows, favorited, inCart] = await Promise.all([
    ctx.db.getUsersByIds(authorIds),
    ctx.db.getRecipeIngredients(ids),
    ctx.viewer
      ? ctx.db.getListedRecipeIds("favorite", ctx.viewer.id, ids)
      : Promise.resolve<number[]>([]),
    ctx.viewer
      ? ctx.db.getListedRecipeIds("shopping_cart", ctx.viewer.id, ids)
      : Promise.resolve<number[]>([]),
  ]);

  const authors = new Map(
    (await serializeUsers(ctx, authorRows)).map((a) => [a.id, a] as const)
  );
  const ingredients = groupIngredients(ingredientRows);
  const favoritedSet = new Set<number>(favorited);
  const cartSet = new Set<number>(inCart);

  const payloads: RecipePayload[] = [];
  for (const recipe of recipes) {
    const author = authors.get(recipe.author_id);
    if (!author) throw new Error(`Author ${recipe.author_id} of recipe ${recipe.id} not found`);
    payloads.push({
      id: recipe.id,
      author,
      ingredients: ingredients.get(recipe.id) ?? [],
      is_favorited: favoritedSet.has(recipe.id),
      is_in_shopping_cart: cartSet.has(recipe.id),
      name: recipe.name,
      image: mediaUrl(ctx.origin, recipe.image),
      text: recipe.text,
      cooking_time: recipe.cooking_time,
    });
  }
  return payloads;
}

export async function serializeRecipe(
  ctx: SerializeContext,
  recipe: RecipeRow
): Promise<RecipePayload> {
  const [payload] = await serializeRecipes(ctx, [recipe]);
  return payload;
}
