/**
 * Recipe create/update: image file plus recipe row plus ingredient lines.
 * Rows are written in one transaction; a new image file is removed again
 * when the transaction fails, and a replaced one only after it commits.
 */

import type { DbAdapter, RecipeIngredientInput, RecipeRow } from "@/lib/db/adapter";
import type { CreateRecipeInput, UpdateRecipeInput } from "@/lib/validation/request-schema";
import { deleteImage, saveImage } from "@/lib/media/images";
import { generateShortLink } from "./short-link";

const RECIPE_IMAGES = "recipes/images";

/** Ids in the request that have no ingredient row. */
export async function findMissingIngredientIds(
  db: DbAdapter,
  items: { id: number }[]
): Promise<number[]> {
  const ids = items.map((i) => i.id);
  const found = new Set((await db.getIngredientsByIds(ids)).map((i) => i.id));
  return ids.filter((id) => !found.has(id));
}

function toLines(items: CreateRecipeInput["ingredients"]): RecipeIngredientInput[] {
  return items.map((i) => ({ ingredient_id: i.id, amount: i.amount }));
}

export async function createRecipe(
  db: DbAdapter,
  authorId: number,
  input: CreateRecipeInput
): Promise<number> {
  const image = await saveImage(input.image, RECIPE_IMAGES);
  try {
    return await db.transaction(async (tx) => {
      const id = await tx.insertRecipe({
        author_id: authorId,
        name: input.name,
        image,
        text: input.text,
        cooking_time: input.cooking_time,
        short_link: generateShortLink(),
      });
      await tx.replaceRecipeIngredients(id, toLines(input.ingredients));
      return id;
    });
  } catch (err) {
    await deleteImage(image);
    throw err;
  }
}

export async function updateRecipe(
  db: DbAdapter,
  recipe: RecipeRow,
  input: UpdateRecipeInput
): Promise<void> {
  const image = input.image ? await saveImage(input.image, RECIPE_IMAGES) : undefined;
  try {
    await db.transaction(async (tx) => {
      await tx.updateRecipe(recipe.id, {
        name: input.name,
        text: input.text,
        cooking_time: input.cooking_time,
        image,
      });
      await tx.replaceRecipeIngredients(recipe.id, toLines(input.ingredients));
    });
  } catch (err) {
    if (image) await deleteImage(image);
    throw err;
  }
  if (image) await deleteImage(recipe.image);
}

/** Removes the recipe (cascading to its lists) and then its image file. */
export async function deleteRecipe(db: DbAdapter, recipe: RecipeRow): Promise<void> {
  await db.deleteRecipe(recipe.id);
  await deleteImage(recipe.image);
}
