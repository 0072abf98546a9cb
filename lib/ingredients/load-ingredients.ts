/**
 * Bulk ingredient import from a JSON file:
 * [{ "name": "...", "measurement_unit": "..." }, ...]
 */

import * as fs from "fs/promises";
import * as z from "zod";
import type { DbAdapter } from "@/lib/db/adapter";
import { ingredientSchema } from "@/lib/schemas";
import { isMissingFileError } from "@/lib/media/images";

export const DEFAULT_INGREDIENTS_FILE = "data/ingredients.json";

const ingredientFileSchema = z.array(ingredientSchema);

export class IngredientFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IngredientFileError";
  }
}

export interface LoadIngredientsResult {
  /** Entries in the file. */
  total: number;
  /** Rows actually inserted; existing (name, unit) pairs are skipped. */
  created: number;
}

async function readIngredientFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) throw new IngredientFileError(`File not found: ${filePath}`);
    throw err;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new IngredientFileError(`Invalid JSON in ${filePath}`);
  }
}

export async function loadIngredients(
  db: DbAdapter,
  filePath: string = DEFAULT_INGREDIENTS_FILE
): Promise<LoadIngredientsResult> {
  const parsed = ingredientFileSchema.safeParse(await readIngredientFile(filePath));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new IngredientFileError(`Invalid ingredient data${where}: ${issue.message}`);
  }
  const created = await db.insertIngredients(parsed.data);
  return { total: parsed.data.length, created };
}
