/**
 * Database adapter interface.
 * Single seam between route handlers and storage.
 * Supports SQLite (default) and Postgres (DB_DRIVER=postgres).
 */

export interface UserRow {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  avatar: string | null;
  date_joined: string;
}

export interface IngredientRow {
  id: number;
  name: string;
  measurement_unit: string;
}

export interface RecipeRow {
  id: number;
  author_id: number;
  name: string;
  image: string;
  text: string;
  cooking_time: number;
  pub_date: string;
  short_link: string;
}

/** Recipe ingredient line joined with its ingredient. */
export interface RecipeIngredientRow {
  recipe_id: number;
  ingredient_id: number;
  name: string;
  measurement_unit: string;
  amount: number;
}

export interface ShoppingListRow {
  name: string;
  measurement_unit: string;
  amount: number;
}

export type NewUser = Omit<UserRow, "id" | "avatar" | "date_joined"> & {
  avatar?: string | null;
  date_joined?: string;
};

export type UserUpdate = Partial<Pick<UserRow, "password_hash" | "avatar">>;

export type NewIngredient = Omit<IngredientRow, "id">;

export type NewRecipe = Omit<RecipeRow, "id" | "pub_date"> & {
  pub_date?: string;
};

export type RecipeUpdate = Partial<
  Pick<RecipeRow, "name" | "image" | "text" | "cooking_time">
>;

export interface RecipeIngredientInput {
  ingredient_id: number;
  amount: number;
}

/** Per-user recipe collections that share one shape. */
export type RecipeListKind = "favorite" | "shopping_cart";

export interface RecipeFilter {
  authorId?: number;
  favoritedBy?: number;
  inShoppingCartOf?: number;
}

export interface PageWindow {
  limit: number;
  offset: number;
}

/**
 * Run multiple operations in a transaction.
 * On success: commit. On error/throw: rollback.
 */
export type TransactionFn<T> = (adapter: DbAdapter) => Promise<T>;

export interface DbAdapter {
  /** Run operations in a transaction. Rolls back on error. */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;

  // --- Users ---
  getUserById(id: number): Promise<UserRow | null>;
  getUsersByIds(ids: number[]): Promise<UserRow[]>;
  /** Case-insensitive match. */
  getUserByEmail(email: string): Promise<UserRow | null>;
  getUserByUsername(username: string): Promise<UserRow | null>;
  listUsers(page: PageWindow): Promise<UserRow[]>;
  countUsers(): Promise<number>;
  insertUser(row: NewUser): Promise<number>;
  updateUser(id: number, updates: UserUpdate): Promise<void>;

  // --- Auth tokens ---
  insertAuthToken(digest: string, userId: number): Promise<void>;
  getUserByTokenDigest(digest: string): Promise<UserRow | null>;
  deleteAuthToken(digest: string): Promise<void>;

  // --- Follows ---
  /** Subset of authorIds that userId follows. */
  getFollowedAuthorIds(userId: number, authorIds: number[]): Promise<number[]>;
  insertFollow(userId: number, authorId: number): Promise<void>;
  /** Returns false when no such follow existed. */
  deleteFollow(userId: number, authorId: number): Promise<boolean>;
  listFollowedAuthors(userId: number, page: PageWindow): Promise<UserRow[]>;
  countFollowedAuthors(userId: number): Promise<number>;

  // --- Ingredients ---
  /** Ordered by name, then id. Prefix match is case-insensitive. */
  listIngredients(namePrefix?: string): Promise<IngredientRow[]>;
  getIngredient(id: number): Promise<IngredientRow | null>;
  getIngredientsByIds(ids: number[]): Promise<IngredientRow[]>;
  /** Skips (name, measurement_unit) duplicates. Returns rows created. */
  insertIngredients(rows: NewIngredient[]): Promise<number>;
  countIngredients(): Promise<number>;

  // --- Recipes ---
  getRecipe(id: number): Promise<RecipeRow | null>;
  getRecipeByShortLink(shortLink: string): Promise<RecipeRow | null>;
  /** Newest first. Without a page window, every matching recipe. */
  listRecipes(filter: RecipeFilter, page?: PageWindow): Promise<RecipeRow[]>;
  countRecipes(filter: RecipeFilter): Promise<number>;
  insertRecipe(row: NewRecipe): Promise<number>;
  updateRecipe(id: number, updates: RecipeUpdate): Promise<void>;
  deleteRecipe(id: number): Promise<void>;

  // --- Recipe ingredients ---
  /** Batch: lines for all given recipes, in insertion order. Avoids N+1. */
  getRecipeIngredients(recipeIds: number[]): Promise<RecipeIngredientRow[]>;
  replaceRecipeIngredients(
    recipeId: number,
    items: RecipeIngredientInput[]
  ): Promise<void>;

  // --- Favorites / shopping cart ---
  /** Subset of recipeIds in the user's list. */
  getListedRecipeIds(
    kind: RecipeListKind,
    userId: number,
    recipeIds: number[]
  ): Promise<number[]>;
  addToRecipeList(kind: RecipeListKind, userId: number, recipeId: number): Promise<void>;
  /** Returns false when the recipe was not in the list. */
  removeFromRecipeList(
    kind: RecipeListKind,
    userId: number,
    recipeId: number
  ): Promise<boolean>;
  /** Ingredient amounts summed over the user's cart, sorted by name then unit. */
  getShoppingList(userId: number): Promise<ShoppingListRow[]>;
}
