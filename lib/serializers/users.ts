/**
 * User response shapes. Batch functions take whole pages so follow flags
 * and recipe previews cost a fixed number of queries.
 */

import type { DbAdapter, RecipeRow, UserRow } from "@/lib/db/adapter";
import { mediaUrl } from "@/lib/media/images";
import { serializeRecipeMinified, type RecipeMinifiedPayload } from "./recipes";

/** Who is asking and where absolute URLs point. */
export interface SerializeContext {
  db: DbAdapter;
  viewer: UserRow | null;
  origin: string;
}

export interface CreatedUserPayload {
  email: string;
  id: number;
  username: string;
  first_name: string;
  last_name: string;
}

export interface UserPayload extends CreatedUserPayload {
  is_subscribed: boolean;
  avatar: string | null;
}

export interface UserWithRecipesPayload extends UserPayload {
  recipes: RecipeMinifiedPayload[];
  recipes_count: number;
}

export function serializeCreatedUser(user: UserRow): CreatedUserPayload {
  return {
    email: user.email,
    id: user.id,
    username: user.username,
    first_name: user.first_name,
    last_name: user.last_name,
  };
}

export async function serializeUsers(
  ctx: SerializeContext,
  users: UserRow[]
): Promise<UserPayload[]> {
  const followed = new Set(
    ctx.viewer && users.length > 0
      ? await ctx.db.getFollowedAuthorIds(
          ctx.viewer.id,
          users.map((u) => u.id)
        )
      : []
  );
  return users.map((user) => ({
    ...serializeCreatedUser(user),
    is_subscribed: followed.has(user.id),
    avatar: user.avatar ? mediaUrl(ctx.origin, user.avatar) : null,
  }));
}

export async function serializeUser(ctx: SerializeContext, user: UserRow): Promise<UserPayload> {
  const [payload] = await serializeUsers(ctx, [user]);
  return payload;
}

/**
 * Authors with their newest recipes. `recipesLimit` caps the preview list;
 * recipes_count is always the full total.
 */
export async function serializeUsersWithRecipes(
  ctx: SerializeContext,
  authors: UserRow[],
  recipesLimit?: number
): Promise<UserWithRecipesPayload[]> {
  const users = await serializeUsers(ctx, authors);
  return Promise.all(
    users.map(async (user) => {
      const filter = { authorId: user.id };
      const [recipes, recipes_count] = await Promise.all([
        recipesLimit === 0
          ? Promise.resolve<RecipeRow[]>([])
          : ctx.db.listRecipes(
              filter,
              recipesLimit === undefined ? undefined : { limit: recipesLimit, offset: 0 }
            ),
        ctx.db.countRecipes(filter),
      ]);
      return {
        ...user,
        recipes: recipes.map((r) => serializeRecipeMinified(ctx.origin, r)),
        recipes_count,
      };
    })
  );
}
