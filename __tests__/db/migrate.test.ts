import { describe, it, expect } from "vitest";
import Database from "better-sqlite3";
import { runMigrations } from "@/lib/db/migrate";

describe("runMigrations", () => {
  it("applies every migration once and records it", () => {
    const db = new Database(":memory:");
    expect(runMigrations(db)).toEqual(["001_users.sql", "002_recipes.sql"]);
    expect(runMigrations(db)).toEqual([]);

    const recorded = db
      .prepare<[], { name: string }>("SELECT name FROM _migrations ORDER BY name")
      .all()
      .map((r) => r.name);
    expect(recorded).toEqual(["001_users.sql", "002_recipes.sql"]);
    db.close();
  });

  it("creates the recipe tables", () => {
    const db = new Database(":memory:");
    runMigrations(db);
    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map((r) => r.name);
    expect(tables).toEqual([
      "_migrations",
      "app_user",
      "auth_token",
      "favorite",
      "follow",
      "ingredient",
      "recipe",
      "recipe_ingredient",
      "shopping_cart",
    ]);
    db.close();
  });
});
