/**
 * First-run initialization.
 * Creates the data and media directories and opens the database
 * (SQLite applies pending migrations on open).
 * Idempotent; safe to call on every startup.
 */

import * as fs from "fs";
import { getDb } from "@/lib/db";
import { ensureDataDir, getMediaRoot } from "./data-dir";

let _initialized = false;

export async function ensureFirstRunComplete(): Promise<void> {
  if (_initialized) return;
  _initialized = true;

  try {
    ensureDataDir();
    fs.mkdirSync(getMediaRoot(), { recursive: true });

    const db = getDb();
    const ingredients = await db.countIngredients();
    if (ingredients === 0) {
      console.log("  No ingredients yet. Load them with: npm run load-ingredients");
    }
  } catch (err) {
    console.error("First-run initialization failed:", err);
  }
}
