/**
 * Favorites and shopping cart share one handler pair; both are exercised.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { DbAdapter, RecipeListKind, UserRow } from "@/lib/db/adapter";
import { createTestDb } from "@/__tests__/lib/create-test-db";
import {
  apiRequest,
  createRecipeRow,
  createUser,
  issueToken,
  routeParams,
} from "@/__tests__/lib/api-helpers";

let db: DbAdapter;

vi.mock("@/lib/db", () => ({
  getDb: () => db,
}));

import * as favoriteRoute from "@/app/api/recipes/[recipeId]/favorite/route";
import * as cartRoute from "@/app/api/recipes/[recipeId]/shopping_cart/route";

const cases: { kind: RecipeListKind; route: typeof favoriteRoute; label: string }[] = [
  { kind: "favorite", route: favoriteRoute, label: "favorites" },
  { kind: "shopping_cart", route: cartRoute, label: "the shopping cart" },
];

let cook: UserRow;
let token: string;
let recipeId: number;

beforeEach(async () => {
  db = createTestDb();
  cook = await createUser(db, "cook");
  token = await issueToken(db, cook);
  await db.insertIngredients([{ name: "rice", measurement_unit: "g" }]);
  const [rice] = await db.listIngredients();
  recipeId = await createRecipeRow(db, cook, "pilaf", [{ ingredient_id: rice.id, amount: 250 }]);
});

describe.each(cases)("/api/recipes/[recipeId]/$kind", ({ kind, route, label }) => {
  const call = (method: "POST" | "DELETE", id: number | string, auth?: string) => {
    const request = apiRequest(`/api/recipes/${id}/${kind}/`, { method, token: auth });
    const params = routeParams({ recipeId: String(id) });
    return method === "POST" ? route.POST(request, params) : route.DELETE(request, params);
  };

  it("adds the recipe and returns its short form", async () => {
    const res = await call("POST", recipeId, token);
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      id: recipeId,
      name: "pilaf",
      image: "http://localhost/media/recipes/images/pilaf.png",
      cooking_time: 10,
    });
    expect(await db.getListedRecipeIds(kind, cook.id, [recipeId])).toEqual([recipeId]);
  });

  it("rejects a second add", async () => {
    await call("POST", recipeId, token);
    const res = await call("POST", recipeId, token);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "validation_failed",
      message: `Recipe is already in ${label}.`,
    });
  });

  it("answers 400 when a concurrent request added the recipe first", async () => {
    await db.addToRecipeList(kind, cook.id, recipeId);
    db = { ...db, getListedRecipeIds: async () => [] };

    const res = await call("POST", recipeId, token);
    expect(res.status).toBe(400);
    expect((await res.json()).message).toBe(`Recipe is already in ${label}.`);
  });

  it("removes the recipe once", async () => {
    await call("POST", recipeId, token);
    expect((await call("DELETE", recipeId, token)).status).toBe(204);

    const again = await call("DELETE", recipeId, token);
    expect(again.status).toBe(400);
    expect((await again.json()).message).toBe(`Recipe is not in ${label}.`);
  });

  it("returns 404 for unknown recipes and 401 for anonymous users", async () => {
    expect((await call("POST", 999, token)).status).toBe(404);
    expect((await call("DELETE", "abc", token)).status).toBe(404);
    expect((await call("POST", recipeId)).status).toBe(401);
  });
});
