/**
 * SQLite implementation of DbAdapter.
 * Uses better-sqlite3. Timestamps stored as ISO-8601 TEXT.
 */

import Database from "better-sqlite3";
import type {
  DbAdapter,
  IngredientRow,
  NewIngredient,
  NewRecipe,
  NewUser,
  PageWindow,
  RecipeFilter,
  RecipeIngredientInput,
  RecipeIngredientRow,
  RecipeListKind,
  RecipeRow,
  RecipeUpdate,
  ShoppingListRow,
  TransactionFn,
  UserRow,
  UserUpdate,
} from "./adapter";
import { runMigrations } from "./migrate";

const LIST_TABLES: Record<RecipeListKind, string> = {
  favorite: "favorite",
  shopping_cart: "shopping_cart",
};

type SqlParam = string | number | null;

type AdapterOperations = Omit<DbAdapter, "transaction">;

function placeholders(values: readonly unknown[]): string {
  return values.map(() => "?").join(", ");
}

/** Unicode-aware lower-casing; SQLite's lower() only folds ASCII. */
function casefold(value: unknown): unknown {
  return typeof value === "string" ? value.toLowerCase() : value;
}

function recipeWhere(filter: RecipeFilter): { clause: string; params: number[] } {
  const conditions: string[] = [];
  const params: number[] = [];
  if (filter.authorId !== undefined) {
    conditions.push("r.author_id = ?");
    params.push(filter.authorId);
  }
  if (filter.favoritedBy !== undefined) {
    conditions.push("EXISTS (SELECT 1 FROM favorite f WHERE f.recipe_id = r.id AND f.user_id = ?)");
    params.push(filter.favoritedBy);
  }
  if (filter.inShoppingCartOf !== undefined) {
    conditions.push("EXISTS (SELECT 1 FROM shopping_cart c WHERE c.recipe_id = r.id AND c.user_id = ?)");
    params.push(filter.inShoppingCartOf);
  }
  return {
    clause: conditions.length ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

function updateSet(updates: Record<string, SqlParam | undefined>): {
  set: string[];
  vals: SqlParam[];
} {
  const set: string[] = [];
  const vals: SqlParam[] = [];
  for (const [k, v] of Object.entries(updates)) {
    if (k !== "id" && v !== undefined) {
      set.push(`${k} = ?`);
      vals.push(v);
    }
  }
  return { set, vals };
}

export function createSqliteAdapter(dbPath: string | ":memory:"): DbAdapter {
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  db.function("casefold", { deterministic: true }, casefold);
  runMigrations(db);

  const operations: AdapterOperations = {
    // --- Users ---
    async getUserById(id: number) {
      const row = db.prepare<[number], UserRow>("SELECT * FROM app_user WHERE id = ?").get(id);
      return row ?? null;
    },
    async getUsersByIds(ids: number[]) {
      if (ids.length === 0) return [];
      return db
        .prepare<number[], UserRow>(`SELECT * FROM app_user WHERE id IN (${placeholders(ids)})`)
        .all(...ids);
    },
    async getUserByEmail(email: string) {
      const row = db
        .prepare<[string], UserRow>("SELECT * FROM app_user WHERE lower(email) = lower(?)")
        .get(email);
      return row ?? null;
    },
    async getUserByUsername(username: string) {
      const row = db
        .prepare<[string], UserRow>("SELECT * FROM app_user WHERE username = ?")
        .get(username);
      return row ?? null;
    },
    async listUsers(page: PageWindow) {
      return db
        .prepare<[number, number], UserRow>("SELECT * FROM app_user ORDER BY id ASC LIMIT ? OFFSET ?")
        .all(page.limit, page.offset);
    },
    async countUsers() {
      const row = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM app_user").get();
      return row?.n ?? 0;
    },
    async insertUser(row: NewUser) {
      const r = db
        .prepare<SqlParam[]>(
          "INSERT INTO app_user (email, username, first_name, last_name, password_hash, avatar, date_joined) VALUES (?, ?, ?, ?, ?, ?, ?)"
        )
        .run(
          row.email,
          row.username,
          row.first_name,
          row.last_name,
          row.password_hash,
          row.avatar ?? null,
          row.date_joined ?? new Date().toISOString()
        );
      return Number(r.lastInsertRowid);
    },
    async updateUser(id: number, updates: UserUpdate) {
      const { set, vals } = updateSet(updates);
      if (set.length === 0) return;
      db.prepare<SqlParam[]>(`UPDATE app_user SET ${set.join(", ")} WHERE id = ?`).run(...vals, id);
    },

    // --- Auth tokens ---
    async insertAuthToken(digest: string, userId: number) {
      db.prepare<[string, number, string]>(
        "INSERT INTO auth_token (digest, user_id, created_at) VALUES (?, ?, ?)"
      ).run(digest, userId, new Date().toISOString());
    },
    async getUserByTokenDigest(digest: string) {
      const row = db
        .prepare<[string], UserRow>(
          "SELECT u.* FROM app_user u INNER JOIN auth_token t ON t.user_id = u.id WHERE t.digest = ?"
        )
        .get(digest);
      return row ?? null;
    },
    async deleteAuthToken(digest: string) {
      db.prepare<[string]>("DELETE FROM auth_token WHERE digest = ?").run(digest);
    },

    // --- Follows ---
    async getFollowedAuthorIds(userId: number, authorIds: number[]) {
      if (authorIds.length === 0) return [];
      const rows = db
        .prepare<number[], { author_id: number }>(
          `SELECT author_id FROM follow WHERE user_id = ? AND author_id IN (${placeholders(authorIds)})`
        )
        .all(userId, ...authorIds);
      return rows.map((r) => r.author_id);
    },
    async insertFollow(userId: number, authorId: number) {
      db.prepare<[number, number]>("INSERT INTO follow (user_id, author_id) VALUES (?, ?)").run(
        userId,
        authorId
      );
    },
    async deleteFollow(userId: number, authorId: number) {
      const r = db
        .prepare<[number, number]>("DELETE FROM follow WHERE user_id = ? AND author_id = ?")
        .run(userId, authorId);
      return r.changes > 0;
    },
    async listFollowedAuthors(userId: number, page: PageWindow) {
      return db
        .prepare<[number, number, number], UserRow>(
          `SELECT u.* FROM app_user u
           INNER JOIN follow f ON f.author_id = u.id
           WHERE f.user_id = ? ORDER BY u.id ASC LIMIT ? OFFSET ?`
        )
        .all(userId, page.limit, page.offset);
    },
    async countFollowedAuthors(userId: number) {
      const row = db
        .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM follow WHERE user_id = ?")
        .get(userId);
      return row?.n ?? 0;
    },

    // --- Ingredients ---
    async listIngredients(namePrefix?: string) {
      if (namePrefix) {
        return db
          .prepare<[string], IngredientRow>(
            "SELECT * FROM ingredient WHERE instr(casefold(name), casefold(?)) = 1 ORDER BY name ASC, id ASC"
          )
          .all(namePrefix);
      }
      return db
        .prepare<[], IngredientRow>("SELECT * FROM ingredient ORDER BY name ASC, id ASC")
        .all();
    },
    async getIngredient(id: number) {
      const row = db
        .prepare<[number], IngredientRow>("SELECT * FROM ingredient WHERE id = ?")
        .get(id);
      return row ?? null;
    },
    async getIngredientsByIds(ids: number[]) {
      if (ids.length === 0) return [];
      return db
        .prepare<number[], IngredientRow>(
          `SELECT * FROM ingredient WHERE id IN (${placeholders(ids)}) ORDER BY id ASC`
        )
        .all(...ids);
    },
    async insertIngredients(rows: NewIngredient[]) {
      const insert = db.prepare<[string, string]>(
        "INSERT OR IGNORE INTO ingredient (name, measurement_unit) VALUES (?, ?)"
      );
      const insertAll = db.transaction((items: NewIngredient[]) => {
        let created = 0;
        for (const item of items) {
          created += insert.run(item.name, item.measurement_unit).changes;
        }
        return created;
      });
      return insertAll(rows);
    },
    async countIngredients() {
      const row = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM ingredient").get();
      return row?.n ?? 0;
    },

    // --- Recipes ---
    async getRecipe(id: number) {
      const row = db.prepare<[number], RecipeRow>("SELECT * FROM recipe WHERE id = ?").get(id);
      return row ?? null;
    },
    async getRecipeByShortLink(shortLink: string) {
      const row = db
        .prepare<[string], RecipeRow>("SELECT * FROM recipe WHERE short_link = ?")
        .get(shortLink);
      return row ?? null;
    },
    async listRecipes(filter: RecipeFilter, page?: PageWindow) {
      const { clause, params } = recipeWhere(filter);
      const sql = `SELECT r.* FROM recipe r ${clause} ORDER BY r.pub_date DESC, r.id DESC`;
      if (!page) return db.prepare<number[], RecipeRow>(sql).all(...params);
      return db
        .prepare<number[], RecipeRow>(`${sql} LIMIT ? OFFSET ?`)
        .all(...params, page.limit, page.offset);
    },
    async countRecipes(filter: RecipeFilter) {
      const { clause, params } = recipeWhere(filter);
      const row = db
        .prepare<number[], { n: number }>(`SELECT COUNT(*) AS n FROM recipe r ${clause}`)
        .get(...params);
      return row?.n ?? 0;
    },
    async insertRecipe(row: NewRecipe) {
      const r = db
        .prepare<SqlParam[]>(
          "INSERT INTO recipe (author_id, name, image, text, cooking_time, pub_date, short_link) VALUES (?, ?, ?, ?, ?, ?, ?)"
        )
        .run(
          row.author_id,
          row.name,
          row.image,
          row.text,
          row.cooking_time,
          row.pub_date ?? new Date().toISOString(),
          row.short_link
        );
      return Number(r.lastInsertRowid);
    },
    async updateRecipe(id: number, updates: RecipeUpdate) {
      const { set, vals } = updateSet(updates);
      if (set.length === 0) return;
      db.prepare<SqlParam[]>(`UPDATE recipe SET ${set.join(", ")} WHERE id = ?`).run(...vals, id);
    },
    async deleteRecipe(id: number) {
      db.prepare<[number]>("DELETE FROM recipe WHERE id = ?").run(id);
    },

    // --- Recipe ingredients ---
    async getRecipeIngredients(recipeIds: number[]) {
      if (recipeIds.length === 0) return [];
      return db
        .prepare<number[], RecipeIngredientRow>(
          `SELECT ri.recipe_id, ri.ingredient_id, i.name, i.measurement_unit, ri.amount
           FROM recipe_ingredient ri
           INNER JOIN ingredient i ON i.id = ri.ingredient_id
           WHERE ri.recipe_id IN (${placeholders(recipeIds)})
           ORDER BY ri.recipe_id ASC, ri.id ASC`
        )
        .all(...recipeIds);
    },
    async replaceRecipeIngredients(recipeId: number, items: RecipeIngredientInput[]) {
      const insert = db.prepare<[number, number, number]>(
        "INSERT INTO recipe_ingredient (recipe_id, ingredient_id, amount) VALUES (?, ?, ?)"
      );
      db.prepare<[number]>("DELETE FROM recipe_ingredient WHERE recipe_id = ?").run(recipeId);
      for (const item of items) {
        insert.run(recipeId, item.ingredient_id, item.amount);
      }
    },

    // --- Favorites / shopping cart ---
    async getListedRecipeIds(kind: RecipeListKind, userId: number, recipeIds: number[]) {
      if (recipeIds.length === 0) return [];
      const rows = db
        .prepare<number[], { recipe_id: number }>(
          `SELECT recipe_id FROM ${LIST_TABLES[kind]} WHERE user_id = ? AND recipe_id IN (${placeholders(recipeIds)})`
        )
        .all(userId, ...recipeIds);
      return rows.map((r) => r.recipe_id);
    },
    async addToRecipeList(kind: RecipeListKind, userId: number, recipeId: number) {
      db.prepare<[number, number]>(
        `INSERT INTO ${LIST_TABLES[kind]} (user_id, recipe_id) VALUES (?, ?)`
      ).run(userId, recipeId);
    },
    async removeFromRecipeList(kind: RecipeListKind, userId: number, recipeId: number) {
      const r = db
        .prepare<[number, number]>(
          `DELETE FROM ${LIST_TABLES[kind]} WHERE user_id = ? AND recipe_id = ?`
        )
        .run(userId, recipeId);
      return r.changes > 0;
    },
    async getShoppingList(userId: number) {
      return db
        .prepare<[number], ShoppingListRow>(
          `SELECT i.name, i.measurement_unit, SUM(ri.amount) AS amount
           FROM shopping_cart c
           INNER JOIN recipe_ingredient ri ON ri.recipe_id = c.recipe_id
           INNER JOIN ingredient i ON i.id = ri.ingredient_id
           WHERE c.user_id = ?
           GROUP BY i.name, i.measurement_unit
           ORDER BY i.name ASC, i.measurement_unit ASC`
        )
        .all(userId);
    },
  };

  // Inside a transaction callback: nested transactions join the open one.
  const bound: DbAdapter = {
    ...operations,
    transaction: <T>(fn: TransactionFn<T>) => fn(bound),
  };

  // Calls run one at a time on the single connection. Nothing queued while a
  // transaction callback awaits runs inside that transaction.
  let queue: Promise<void> = Promise.resolve();
  function exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  return {
    ...serialized(operations, exclusive),
    transaction: <T>(fn: TransactionFn<T>) =>
      exclusive(async () => {
        db.exec("BEGIN");
        try {
          const result = await fn(bound);
          db.exec("COMMIT");
          return result;
        } catch (e) {
          db.exec("ROLLBACK");
          throw e;
        }
      }),
  };
}

type Exclusive = <T>(task: () => Promise<T>) => Promise<T>;

function serialized(ops: AdapterOperations, run: Exclusive): AdapterOperations {
  return {
    getUserById: (...args) => run(() => ops.getUserById(...args)),
    getUsersByIds: (...args) => run(() => ops.getUsersByIds(...args)),
    getUserByEmail: (...args) => run(() => ops.getUserByEmail(...args)),
    getUserByUsername: (...args) => run(() => ops.getUserByUsername(...args)),
    listUsers: (...args) => run(() => ops.listUsers(...args)),
    countUsers: (...args) => run(() => ops.countUsers(...args)),
    insertUser: (...args) => run(() => ops.insertUser(...args)),
    updateUser: (...args) => run(() => ops.updateUser(...args)),
    insertAuthToken: (...args) => run(() => ops.insertAuthToken(...args)),
    getUserByTokenDigest: (...args) => run(() => ops.getUserByTokenDigest(...args)),
    deleteAuthToken: (...args) => run(() => ops.deleteAuthToken(...args)),
    getFollowedAuthorIds: (...args) => run(() => ops.getFollowedAuthorIds(...args)),
    insertFollow: (...args) => run(() => ops.insertFollow(...args)),
    deleteFollow: (...args) => run(() => ops.deleteFollow(...args)),
    listFollowedAuthors: (...args) => run(() => ops.listFollowedAuthors(...args)),
    countFollowedAuthors: (...args) => run(() => ops.countFollowedAuthors(...args)),
    listIngredients: (...args) => run(() => ops.listIngredients(...args)),
    getIngredient: (...args) => run(() => ops.getIngredient(...args)),
    getIngredientsByIds: (...args) => run(() => ops.getIngredientsByIds(...args)),
    insertIngredients: (...args) => run(() => ops.insertIngredients(...args)),
    countIngredients: (...args) => run(() => ops.countIngredients(...args)),
    getRecipe: (...args) => run(() => ops.getRecipe(...args)),
    getRecipeByShortLink: (...args) => run(() => ops.getRecipeByShortLink(...args)),
    listRecipes: (...args) => run(() => ops.listRecipes(...args)),
    countRecipes: (...args) => run(() => ops.countRecipes(...args)),
    insertRecipe: (...args) => run(() => ops.insertRecipe(...args)),
    updateRecipe: (...args) => run(() => ops.updateRecipe(...args)),
    deleteRecipe: (...args) => run(() => ops.deleteRecipe(...args)),
    getRecipeIngredients: (...args) => run(() => ops.getRecipeIngredients(...args)),
    replaceRecipeIngredients: (...args) => run(() => ops.replaceRecipeIngredients(...args)),
    getListedRecipeIds: (...args) => run(() => ops.getListedRecipeIds(...args)),
    addToRecipeList: (...args) => run(() => ops.addToRecipeList(...args)),
    removeFromRecipeList: (...args) => run(() => ops.removeFromRecipeList(...args)),
    getShoppingList: (...args) => run(() => ops.getShoppingList(...args)),
  };
}
