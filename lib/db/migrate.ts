/**
 * Migration runners for SQLite and Postgres.
 * Tracks applied migrations in the _migrations table.
 * Migrations are embedded as strings so the standalone server build needs no SQL files.
 */

import type Database from "better-sqlite3";
import type { Sql } from "postgres";

interface Migration {
  name: string;
  sql: string;
}

const SQLITE_MIGRATIONS: Migration[] = [
  {
    name: "001_users.sql",
    sql: /* sql */ `
-- Users
CREATE TABLE IF NOT EXISTS app_user (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  email TEXT NOT NULL,
  username TEXT NOT NULL UNIQUE,
  first_name TEXT NOT NULL,
  last_name TEXT NOT NULL,
  password_hash TEXT NOT NULL,
  avatar TEXT,
  date_joined TEXT NOT NULL DEFAULT (datetime('now'))
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_app_user_email ON app_user(lower(email));

-- Auth tokens (HMAC digests, never the raw token)
CREATE TABLE IF NOT EXISTS auth_token (
  digest TEXT PRIMARY KEY,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);
CREATE INDEX IF NOT EXISTS idx_auth_token_user_id ON auth_token(user_id);

-- Follows
CREATE TABLE IF NOT EXISTS follow (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  author_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  UNIQUE (user_id, author_id),
  CHECK (user_id != author_id)
);
CREATE INDEX IF NOT EXISTS idx_follow_author_id ON follow(author_id);
`,
  },
  {
    name: "002_recipes.sql",
    sql: /* sql */ `
-- Ingredients
CREATE TABLE IF NOT EXISTS ingredient (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL CHECK (length(name) BETWEEN 1 AND 128),
  measurement_unit TEXT NOT NULL CHECK (length(measurement_unit) BETWEEN 1 AND 64),
  UNIQUE (name, measurement_unit)
);
CREATE INDEX IF NOT EXISTS idx_ingredient_name ON ingredient(name);

-- Recipes
CREATE TABLE IF NOT EXISTS recipe (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  author_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  name TEXT NOT NULL CHECK (length(name) BETWEEN 1 AND 256),
  image TEXT NOT NULL,
  text TEXT NOT NULL,
  cooking_time INTEGER NOT NULL CHECK (cooking_time BETWEEN 1 AND 32000),
  pub_date TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  short_link TEXT NOT NULL UNIQUE CHECK (length(short_link) <= 32)
);
CREATE INDEX IF NOT EXISTS idx_recipe_pub_date ON recipe(pub_date DESC, id DESC);
CREATE INDEX IF NOT EXISTS idx_recipe_author_id ON recipe(author_id, pub_date DESC);

-- Recipe ingredients
CREATE TABLE IF NOT EXISTS recipe_ingredient (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  recipe_id INTEGER NOT NULL REFERENCES recipe(id) ON DELETE CASCADE,
  ingredient_id INTEGER NOT NULL REFERENCES ingredient(id) ON DELETE CASCADE,
  amount INTEGER NOT NULL CHECK (amount BETWEEN 1 AND 32000),
  UNIQUE (recipe_id, ingredient_id)
);

-- Favorites
CREATE TABLE IF NOT EXISTS favorite (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  recipe_id INTEGER NOT NULL REFERENCES recipe(id) ON DELETE CASCADE,
  UNIQUE (user_id, recipe_id)
);

-- Shopping cart
CREATE TABLE IF NOT EXISTS shopping_cart (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  recipe_id INTEGER NOT NULL REFERENCES recipe(id) ON DELETE CASCADE,
  UNIQUE (user_id, recipe_id)
);
`,
  },
];

const POSTGRES_MIGRATIONS: Migration[] = [
  {
    name: "001_users.sql",
    sql: /* sql */ `
CREATE TABLE IF NOT EXISTS app_user (
  id INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
  email VARCHAR(254) NOT NULL,
  username VARCHAR(150) NOT NULL UNIQUE,
  first_name VARCHAR(150) NOT NULL,
  last_name VARCHAR(150) NOT NULL,
  password_hash TEXT NOT NULL,
  avatar TEXT,
  date_joined TEXT NOT NULL DEFAULT to_char(now() AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"')
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_app_user_email ON app_user (lower(email));

CREATE TABLE IF NOT EXISTS auth_token (
  digest TEXT PRIMARY KEY,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now()
);
CREATE INDEX IF NOT EXISTS idx_auth_token_user_id ON auth_token (user_id);

CREATE TABLE IF NOT EXISTS follow (
  id INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  author_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  CONSTRAINT unique_follow UNIQUE (user_id, author_id),
  CONSTRAINT prevent_self_follow CHECK (user_id <> author_id)
);
CREATE INDEX IF NOT EXISTS idx_follow_author_id ON follow (author_id);
`,
  },
  {
    name: "002_recipes.sql",
    sql: /* sql */ `
CREATE TABLE IF NOT EXISTS ingredient (
  id INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
  name VARCHAR(128) NOT NULL CHECK (length(name) >= 1),
  measurement_unit VARCHAR(64) NOT NULL CHECK (length(measurement_unit) >= 1),
  CONSTRAINT unique_ingredient UNIQUE (name, measurement_unit)
);
CREATE INDEX IF NOT EXISTS idx_ingredient_lower_name ON ingredient (lower(name) text_pattern_ops);

CREATE TABLE IF NOT EXISTS recipe (
  id INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
  author_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  name VARCHAR(256) NOT NULL CHECK (length(name) >= 1),
  image TEXT NOT NULL,
  text TEXT NOT NULL,
  cooking_time SMALLINT NOT NULL CHECK (cooking_time BETWEEN 1 AND 32000),
  pub_date TEXT NOT NULL DEFAULT to_char(now() AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"'),
  short_link VARCHAR(32) NOT NULL UNIQUE
);
CREATE INDEX IF NOT EXISTS idx_recipe_pub_date ON recipe (pub_date DESC, id DESC);
CREATE INDEX IF NOT EXISTS idx_recipe_author_id ON recipe (author_id, pub_date DESC);

CREATE TABLE IF NOT EXISTS recipe_ingredient (
  id INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
  recipe_id INTEGER NOT NULL REFERENCES recipe(id) ON DELETE CASCADE,
  ingredient_id INTEGER NOT NULL REFERENCES ingredient(id) ON DELETE CASCADE,
  amount SMALLINT NOT NULL CHECK (amount BETWEEN 1 AND 32000),
  CONSTRAINT unique_recipe_ingredient UNIQUE (recipe_id, ingredient_id)
);

CREATE TABLE IF NOT EXISTS favorite (
  id INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  recipe_id INTEGER NOT NULL REFERENCES recipe(id) ON DELETE CASCADE,
  CONSTRAINT unique_favorite UNIQUE (user_id, recipe_id)
);

CREATE TABLE IF NOT EXISTS shopping_cart (
  id INTEGER GENERATED BY DEFAULT AS IDENTITY PRIMARY KEY,
  user_id INTEGER NOT NULL REFERENCES app_user(id) ON DELETE CASCADE,
  recipe_id INTEGER NOT NULL REFERENCES recipe(id) ON DELETE CASCADE,
  CONSTRAINT unique_shopping_cart UNIQUE (user_id, recipe_id)
);
`,
  },
];

/** Applies pending migrations; returns the names applied by this call. */
export function runMigrations(db: Database.Database): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied: string[] = [];
  const isApplied = db.prepare<[string], { name: string }>(
    "SELECT name FROM _migrations WHERE name = ?"
  );
  const record = db.prepare<[string]>("INSERT INTO _migrations (name) VALUES (?)");

  for (const migration of SQLITE_MIGRATIONS) {
    if (isApplied.get(migration.name)) continue;

    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.name);
    })();
    applied.push(migration.name);
  }
  return applied;
}

export async function runPostgresMigrations(sql: Sql): Promise<string[]> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;

  const applied: string[] = [];
  for (const migration of POSTGRES_MIGRATIONS) {
    const rows = await sql<{ name: string }[]>`
      SELECT name FROM _migrations WHERE name = ${migration.name}
    `;
    if (rows.length > 0) continue;

    await sql.begin(async (tx) => {
      await tx.unsafe(migration.sql).simple();
      await tx`INSERT INTO _migrations (name) VALUES (${migration.name})`;
    });
    applied.push(migration.name);
  }
  return applied;
}
