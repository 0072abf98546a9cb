/**
 * Postgres implementation of DbAdapter (DB_DRIVER=postgres).
 * Uses the postgres client. Schema comes from runPostgresMigrations (npm run migrate).
 */

import type { Sql, TransactionSql } from "postgres";
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

const LIST_TABLES: Record<RecipeListKind, string> = {
  favorite: "favorite",
  shopping_cart: "shopping_cart",
};

type Begin = <T>(fn: TransactionFn<T>) => Promise<T>;

/** begin is null for an adapter already bound to a transaction. */
function buildAdapter(sql: Sql | TransactionSql, begin: Begin | null): DbAdapter {
  function recipeWhere(filter: RecipeFilter) {
    const conditions = [];
    if (filter.authorId !== undefined) {
      conditions.push(sql`r.author_id = ${filter.authorId}`);
    }
    if (filter.favoritedBy !== undefined) {
      conditions.push(
        sql`EXISTS (SELECT 1 FROM favorite f WHERE f.recipe_id = r.id AND f.user_id = ${filter.favoritedBy})`
      );
    }
    if (filter.inShoppingCartOf !== undefined) {
      conditions.push(
        sql`EXISTS (SELECT 1 FROM shopping_cart c WHERE c.recipe_id = r.id AND c.user_id = ${filter.inShoppingCartOf})`
      );
    }
    return conditions.reduce(
      (acc, cond, i) => (i === 0 ? sql`WHERE ${cond}` : sql`${acc} AND ${cond}`),
      sql``
    );
  }

  const adapter: DbAdapter = {
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      return begin ? begin(fn) : fn(adapter);
    },

    // --- Users ---
    async getUserById(id: number) {
      const rows = await sql<UserRow[]>`SELECT * FROM app_user WHERE id = ${id}`;
      return rows[0] ?? null;
    },
    async getUsersByIds(ids: number[]) {
      if (ids.length === 0) return [];
      return sql<UserRow[]>`SELECT * FROM app_user WHERE id IN ${sql(ids)}`;
    },
    async getUserByEmail(email: string) {
      const rows = await sql<UserRow[]>`SELECT * FROM app_user WHERE lower(email) = lower(${email})`;
      return rows[0] ?? null;
    },
    async getUserByUsername(username: string) {
      const rows = await sql<UserRow[]>`SELECT * FROM app_user WHERE username = ${username}`;
      return rows[0] ?? null;
    },
    async listUsers(page: PageWindow) {
      return sql<UserRow[]>`
        SELECT * FROM app_user ORDER BY id ASC LIMIT ${page.limit} OFFSET ${page.offset}
      `;
    },
    async countUsers() {
      const rows = await sql<{ n: number }[]>`SELECT COUNT(*)::int AS n FROM app_user`;
      return rows[0]?.n ?? 0;
    },
    async insertUser(row: NewUser) {
      const rows = await sql<{ id: number }[]>`
        INSERT INTO app_user (email, username, first_name, last_name, password_hash, avatar, date_joined)
        VALUES (${row.email}, ${row.username}, ${row.first_name}, ${row.last_name},
                ${row.password_hash}, ${row.avatar ?? null}, ${row.date_joined ?? new Date().toISOString()})
        RETURNING id
      `;
      return rows[0].id;
    },
    async updateUser(id: number, updates: UserUpdate) {
      if (updates.password_hash !== undefined) {
        await sql`UPDATE app_user SET password_hash = ${updates.password_hash} WHERE id = ${id}`;
      }
      if (updates.avatar !== undefined) {
        await sql`UPDATE app_user SET avatar = ${updates.avatar} WHERE id = ${id}`;
      }
    },

    // --- Auth tokens ---
    async insertAuthToken(digest: string, userId: number) {
      await sql`INSERT INTO auth_token (digest, user_id) VALUES (${digest}, ${userId})`;
    },
    async getUserByTokenDigest(digest: string) {
      const rows = await sql<UserRow[]>`
        SELECT u.* FROM app_user u
        INNER JOIN auth_token t ON t.user_id = u.id
        WHERE t.digest = ${digest}
      `;
      return rows[0] ?? null;
    },
    async deleteAuthToken(digest: string) {
      await sql`DELETE FROM auth_token WHERE digest = ${digest}`;
    },

    // --- Follows ---
    async getFollowedAuthorIds(userId: number, authorIds: number[]) {
      if (authorIds.length === 0) return [];
      const rows = await sql<{ author_id: number }[]>`
        SELECT author_id FROM follow WHERE user_id = ${userId} AND author_id IN ${sql(authorIds)}
      `;
      return rows.map((r) => r.author_id);
    },
    async insertFollow(userId: number, authorId: number) {
      await sql`INSERT INTO follow (user_id, author_id) VALUES (${userId}, ${authorId})`;
    },
    async deleteFollow(userId: number, authorId: number) {
      const result = await sql`DELETE FROM follow WHERE user_id = ${userId} AND author_id = ${authorId}`;
      return result.count > 0;
    },
    async listFollowedAuthors(userId: number, page: PageWindow) {
      return sql<UserRow[]>`
        SELECT u.* FROM app_user u
        INNER JOIN follow f ON f.author_id = u.id
        WHERE f.user_id = ${userId}
        ORDER BY u.id ASC LIMIT ${page.limit} OFFSET ${page.offset}
      `;
    },
    async countFollowedAuthors(userId: number) {
      const rows = await sql<{ n: number }[]>`
        SELECT COUNT(*)::int AS n FROM follow WHERE user_id = ${userId}
      `;
      return rows[0]?.n ?? 0;
    },

    // --- Ingredients ---
    async listIngredients(namePrefix?: string) {
      if (namePrefix) {
        return sql<IngredientRow[]>`
          SELECT * FROM ingredient
          WHERE starts_with(lower(name), lower(${namePrefix}))
          ORDER BY name COLLATE "C" ASC, id ASC
        `;
      }
      return sql<IngredientRow[]>`SELECT * FROM ingredient ORDER BY name COLLATE "C" ASC, id ASC`;
    },
    async getIngredient(id: number) {
      const rows = await sql<IngredientRow[]>`SELECT * FROM ingredient WHERE id = ${id}`;
      return rows[0] ?? null;
    },
    async getIngredientsByIds(ids: number[]) {
      if (ids.length === 0) return [];
      return sql<IngredientRow[]>`SELECT * FROM ingredient WHERE id IN ${sql(ids)} ORDER BY id ASC`;
    },
    async insertIngredients(rows: NewIngredient[]) {
      if (rows.length === 0) return 0;
      let created = 0;
      // Stay well under the bind-parameter limit.
      for (let i = 0; i < rows.length; i += 1000) {
        const chunk = rows.slice(i, i + 1000);
        const result = await sql`
          INSERT INTO ingredient ${sql(chunk, "name", "measurement_unit")}
          ON CONFLICT (name, measurement_unit) DO NOTHING
        `;
        created += result.count;
      }
      return created;
    },
    async countIngredients() {
      const rows = await sql<{ n: number }[]>`SELECT COUNT(*)::int AS n FROM ingredient`;
      return rows[0]?.n ?? 0;
    },

    // --- Recipes ---
    async getRecipe(id: number) {
      const rows = await sql<RecipeRow[]>`SELECT * FROM recipe WHERE id = ${id}`;
      return rows[0] ?? null;
    },
    async getRecipeByShortLink(shortLink: string) {
      const rows = await sql<RecipeRow[]>`SELECT * FROM recipe WHERE short_link = ${shortLink}`;
      return rows[0] ?? null;
    },
    async listRecipes(filter: RecipeFilter, page?: PageWindow) {
      const window = page ? sql`LIMIT ${page.limit} OFFSET ${page.offset}` : sql``;
      return sql<RecipeRow[]>`
        SELECT r.* FROM recipe r ${recipeWhere(filter)}
        ORDER BY r.pub_date DESC, r.id DESC
        ${window}
      `;
    },
    async countRecipes(filter: RecipeFilter) {
      const rows = await sql<{ n: number }[]>`
        SELECT COUNT(*)::int AS n FROM recipe r ${recipeWhere(filter)}
      `;
      return rows[0]?.n ?? 0;
    },
    async insertRecipe(row: NewRecipe) {
      const rows = await sql<{ id: number }[]>`
        INSERT INTO recipe (author_id, name, image, text, cooking_time, pub_date, short_link)
        VALUES (${row.author_id}, ${row.name}, ${row.image}, ${row.text}, ${row.cooking_time},
                ${row.pub_date ?? new Date().toISOString()}, ${row.short_link})
        RETURNING id
      `;
      return rows[0].id;
    },
    async updateRecipe(id: number, updates: RecipeUpdate) {
      await sql`
        UPDATE recipe SET
          name = COALESCE(${updates.name ?? null}, name),
          image = COALESCE(${updates.image ?? null}, image),
          text = COALESCE(${updates.text ?? null}, text),
          cooking_time = COALESCE(${updates.cooking_time ?? null}, cooking_time)
        WHERE id = ${id}
      `;
    },
    async deleteRecipe(id: number) {
      await sql`DELETE FROM recipe WHERE id = ${id}`;
    },

    // --- Recipe ingredients ---
    async getRecipeIngredients(recipeIds: number[]) {
      if (recipeIds.length === 0) return [];
      return sql<RecipeIngredientRow[]>`
        SELECT ri.recipe_id, ri.ingredient_id, i.name, i.measurement_unit, ri.amount
        FROM recipe_ingredient ri
        INNER JOIN ingredient i ON i.id = ri.ingredient_id
        WHERE ri.recipe_id IN ${sql(recipeIds)}
        ORDER BY ri.recipe_id ASC, ri.id ASC
      `;
    },
    async replaceRecipeIngredients(recipeId: number, items: RecipeIngredientInput[]) {
      await sql`DELETE FROM recipe_ingredient WHERE recipe_id = ${recipeId}`;
      if (items.length === 0) return;
      const rows = items.map((item) => ({
        recipe_id: recipeId,
        ingredient_id: item.ingredient_id,
        amount: item.amount,
      }));
      await sql`INSERT INTO recipe_ingredient ${sql(rows, "recipe_id", "ingredient_id", "amount")}`;
    },

    // --- Favorites / shopping cart ---
    async getListedRecipeIds(kind: RecipeListKind, userId: number, recipeIds: number[]) {
      if (recipeIds.length === 0) return [];
      const rows = await sql<{ recipe_id: number }[]>`
        SELECT recipe_id FROM ${sql(LIST_TABLES[kind])}
        WHERE user_id = ${userId} AND recipe_id IN ${sql(recipeIds)}
      `;
      return rows.map((r) => r.recipe_id);
    },
    async addToRecipeList(kind: RecipeListKind, userId: number, recipeId: number) {
      await sql`
        INSERT INTO ${sql(LIST_TABLES[kind])} (user_id, recipe_id) VALUES (${userId}, ${recipeId})
      `;
    },
    async removeFromRecipeList(kind: RecipeListKind, userId: number, recipeId: number) {
      const result = await sql`
        DELETE FROM ${sql(LIST_TABLES[kind])} WHERE user_id = ${userId} AND recipe_id = ${recipeId}
      `;
      return result.count > 0;
    },
    async getShoppingList(userId: number) {
      return sql<ShoppingListRow[]>`
        SELECT i.name, i.measurement_unit, SUM(ri.amount)::int AS amount
        FROM shopping_cart c
        INNER JOIN recipe_ingredient ri ON ri.recipe_id = c.recipe_id
        INNER JOIN ingredient i ON i.id = ri.ingredient_id
        WHERE c.user_id = ${userId}
        GROUP BY i.name, i.measurement_unit
        ORDER BY i.name COLLATE "C" ASC, i.measurement_unit COLLATE "C" ASC
      `;
    },
  };

  return adapter;
}

export function createPostgresAdapter(sql: Sql): DbAdapter {
  const begin: Begin = async <T>(fn: TransactionFn<T>): Promise<T> => {
    // begin() unwraps promise tuples in its return type; keep T intact via a box.
    const box: T[] = [];
    await sql.begin(async (tx) => {
      box.push(await fn(buildAdapter(tx, null)));
    });
    return box[0];
  };
  return buildAdapter(sql, begin);
}
