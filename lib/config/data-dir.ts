/**
 * Data directory layout.
 *
 * Local data lives under a single directory (default: ~/.foodgram/):
 *   ~/.foodgram/
 *     foodgram.db   SQLite database
 *     media/        uploaded recipe images and avatars
 *
 * Override with FOODGRAM_DATA_DIR, SQLITE_PATH or MEDIA_ROOT.
 */

import * as path from "path";
import * as fs from "fs";

export function getDataDir(): string {
  const env = process.env.FOODGRAM_DATA_DIR;
  if (env) return env;
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  return path.join(home, ".foodgram");
}

export function ensureDataDir(): string {
  const dir = getDataDir();
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function getSqlitePath(): string {
  return process.env.SQLITE_PATH ?? path.join(ensureDataDir(), "foodgram.db");
}

export function getMediaRoot(): string {
  return path.resolve(process.env.MEDIA_ROOT ?? path.join(getDataDir(), "media"));
}
