/**
 * Database adapter factory.
 * Reads DB_DRIVER: "sqlite" (default) or "postgres".
 * SQLite: uses SQLITE_PATH or <data dir>/foodgram.db
 * Postgres: uses POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB, DB_HOST, DB_PORT
 */

import Database from "better-sqlite3";
import postgres from "postgres";
import type { Sql } from "postgres";
import type { DbAdapter } from "./adapter";
import { createSqliteAdapter } from "./sqlite-adapter";
import { createPostgresAdapter } from "./postgres-adapter";
import { runMigrations, runPostgresMigrations } from "./migrate";
import { getSettings, type PostgresSettings } from "@/lib/config/settings";
import { getSqlitePath } from "@/lib/config/data-dir";

let _adapter: DbAdapter | null = null;
let _sql: Sql | null = null;

function connectPostgres(cfg: PostgresSettings): Sql {
  if (_sql) return _sql;
  _sql = postgres({
    host: cfg.host,
    port: cfg.port,
    user: cfg.user,
    password: cfg.password,
    database: cfg.database,
    onnotice: () => undefined,
  });
  return _sql;
}

export function getDb(): DbAdapter {
  if (_adapter) return _adapter;

  const settings = getSettings();

  if (settings.dbDriver === "postgres") {
    _adapter = createPostgresAdapter(connectPostgres(settings.postgres));
    return _adapter;
  }

  _adapter = createSqliteAdapter(getSqlitePath());
  return _adapter;
}

/**
 * Apply pending schema migrations for the configured driver.
 * SQLite also migrates whenever an adapter opens the file.
 * Returns the migration names applied by this call.
 */
export async function migrateDb(): Promise<string[]> {
  const settings = getSettings();
  if (settings.dbDriver === "postgres") {
    return runPostgresMigrations(connectPostgres(settings.postgres));
  }
  const db = new Database(getSqlitePath());
  try {
    return runMigrations(db);
  } finally {
    db.close();
  }
}

/** Close the Postgres pool so CLI scripts can exit. */
export async function closeDb(): Promise<void> {
  _adapter = null;
  if (_sql) {
    const sql = _sql;
    _sql = null;
    await sql.end();
  }
}

/** For tests: reset the singleton and optionally use in-memory DB */
export function resetDbForTesting(inMemory = true): DbAdapter {
  _adapter = null;
  const adapter = createSqliteAdapter(inMemory ? ":memory:" : getSqlitePath());
  _adapter = adapter;
  return adapter;
}
