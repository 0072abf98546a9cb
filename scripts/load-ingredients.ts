#!/usr/bin/env -S npx tsx
/**
 * Imports ingredients from a JSON array of { name, measurement_unit }.
 * Existing (name, measurement_unit) pairs are skipped.
 *
 * Usage:
 *   npm run load-ingredients -- [file]
 *   npx tsx scripts/load-ingredients.ts data/ingredients.json
 */

import { loadEnvFile } from "../lib/config/settings";
import { closeDb, getDb } from "../lib/db";
import { DEFAULT_INGREDIENTS_FILE, loadIngredients } from "../lib/ingredients/load-ingredients";

async function main() {
  loadEnvFile();

  const file = process.argv[2] ?? DEFAULT_INGREDIENTS_FILE;
  const { created, total } = await loadIngredients(getDb(), file);
  console.log(`Loaded ${created} ingredients`);
  if (created < total) {
    console.log(`  Skipped ${total - created} already present`);
  }
}

main()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(() => closeDb());
