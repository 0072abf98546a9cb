#!/usr/bin/env -S npx tsx
/**
 * Applies pending database migrations for the configured DB_DRIVER.
 *
 * Usage:
 *   npm run migrate
 *   npx tsx scripts/migrate.ts
 */

import { loadEnvFile } from "../lib/config/settings";
import { closeDb, migrateDb } from "../lib/db";

async function main() {
  loadEnvFile();

  const applied = await migrateDb();
  if (applied.length === 0) {
    console.log("No migrations to apply.");
  }
  for (const name of applied) {
    console.log(`  Applied ${name}`);
  }
}

main()
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(() => closeDb());
