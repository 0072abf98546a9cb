/**
 * Recipe CRUD, filters, permissions and short links.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import type { DbAdapter, UserRow } from "@/lib/db/adapter";
import { createTestDb } from "@/__tests__/lib/create-test-db";
import {
  PNG_DATA_URI,
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

import { GET as listRecipes, POST as createRecipe } from "@/app/api/recipes/route";
import {
  GET as getRecipe,
  PATCH as patchRecipe,
  DELETE as deleteRecipe,
} from "@/app/api/recipes/[recipeId]/route";
import { GET as getLink } from "@/app/api/recipes/[recipeId]/get-link/route";
import { GET as followShortLink } from "@/app/s/[code]/route";

const mediaPath = (stored: string) => path.join(process.env.MEDIA_ROOT ?? "", stored);

let author: UserRow;
let stranger: UserRow;
let authorToken: string;
let strangerToken: string;
let flour: number;
let egg: number;
let milk: number;

beforeEach(async () => {
  db = createTestDb();
  author = await createUser(db, "author");
  stranger = await createUser(db, "stranger");
  authorToken = await issueToken(db, author);
  strangerToken = await issueToken(db, stranger);
  await db.insertIngredients([
    { name: "egg", measurement_unit: "pcs" },
    { name: "flour", measurement_unit: "g" },
    { name: "milk", measurement_unit: "ml" },
  ]);
  [egg, flour, milk] = (await db.listIngredients()).map((i) => i.id);
});

function createBody(overrides: Record<string, unknown> = {}) {
  return {
    ingredients: [
      { id: flour, amount: 200 },
      { id: egg, amount: 2 },
    ],
    image: PNG_DATA_URI,
    name: "Pancakes",
    text: "Whisk, rest, fry.",
    cooking_time: 20,
    ...overrides,
  };
}

async function createViaApi(token = authorToken, overrides: Record<string, unknown> = {}) {
  return createRecipe(
    apiRequest("/api/recipes/", { method: "POST", token, body: createBody(overrides) })
  );
}

describe("POST /api/recipes", () => {
  it("creates a recipe with its ingredients and image", async () => {
    const res = await createViaApi();
    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body).toEqual({
      id: expect.any(Number),
      author: {
        email: "author@example.com",
        id: author.id,
        username: "author",
        first_name: "Test",
        last_name: "Cook",
        is_subscribed: false,
        avatar: null,
      },
      ingredients: [
        { id: flour, name: "flour", measurement_unit: "g", amount: 200 },
        { id: egg, name: "egg", measurement_unit: "pcs", amount: 2 },
      ],
      is_favorited: false,
      is_in_shopping_cart: false,
      name: "Pancakes",
      image: expect.stringMatching(/^http:\/\/localhost\/media\/recipes\/images\/[0-9a-f-]{36}\.png$/),
      text: "Whisk, rest, fry.",
      cooking_time: 20,
    });

    const stored = await db.getRecipe(body.id);
    expect(stored?.short_link).toHaveLength(22);
    expect(fs.existsSync(mediaPath(stored?.image ?? ""))).toBe(true);
  });

  it("rejects unknown ingredient ids", async () => {
    const res = await createViaApi(authorToken, { ingredients: [{ id: 999, amount: 1 }] });
    expect(res.status).toBe(400);
    expect((await res.json()).details).toEqual({
      ingredients: ["Ingredient with id 999 does not exist."],
    });
    expect(await db.countRecipes({})).toBe(0);
  });

  it("rejects booleans and arrays in numeric fields", async () => {
    const res = await createViaApi(authorToken, {
      ingredients: [{ id: flour, amount: true }],
      cooking_time: [7],
    });
    expect(res.status).toBe(400);
    expect(Object.keys((await res.json()).details).sort()).toEqual([
      "cooking_time",
      "ingredients.0.amount",
    ]);
    expect(await db.countRecipes({})).toBe(0);
  });

  it("rejects an invalid image", async () => {
    const res = await createViaApi(authorToken, { image: "data:image/png;base64,!!!" });
    expect(res.status).toBe(400);
    expect(Object.keys((await res.json()).details)).toEqual(["image"]);
  });

  it("requires authentication", async () => {
    const res = await createRecipe(apiRequest("/api/recipes/", { method: "POST", body: createBody() }));
    expect(res.status).toBe(401);
  });
});

describe("GET /api/recipes", () => {
  let ids: number[];

  beforeEach(async () => {
    ids = [
      await createRecipeRow(db, author, "porridge", [{ ingredient_id: milk, amount: 300 }], "2024-05-01T08:00:00.000Z"),
      await createRecipeRow(db, stranger, "omelette", [{ ingredient_id: egg, amount: 3 }], "2024-05-02T08:00:00.000Z"),
      await createRecipeRow(db, author, "crepes", [{ ingredient_id: flour, amount: 150 }], "2024-05-03T08:00:00.000Z"),
    ];
  });

  it("lists newest first with pagination", async () => {
    const res = await listRecipes(apiRequest("/api/recipes/?limit=2"));
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.count).toBe(3);
    expect(body.next).toBe("http://localhost/api/recipes/?limit=2&page=2");
    expect(body.results.map((r: { name: string }) => r.name)).toEqual(["crepes", "omelette"]);
  });

  it("filters by author", async () => {
    const body = await (await listRecipes(apiRequest(`/api/recipes/?author=${author.id}`))).json();
    expect(body.results.map((r: { id: number }) => r.id)).toEqual([ids[2], ids[0]]);
  });

  it("filters by the viewer's favorites and cart and flags them", async () => {
    await db.addToRecipeList("favorite", stranger.id, ids[0]);
    await db.addToRecipeList("shopping_cart", stranger.id, ids[1]);

    const favs = await (await listRecipes(apiRequest("/api/recipes/?is_favorited=1", { token: strangerToken }))).json();
    expect(favs.results.map((r: { id: number; is_favorited: boolean }) => [r.id, r.is_favorited])).toEqual([[ids[0], true]]);

    const cart = await (await listRecipes(apiRequest("/api/recipes/?is_in_shopping_cart=true", { token: strangerToken }))).json();
    expect(cart.results.map((r: { id: number; is_in_shopping_cart: boolean }) => [r.id, r.is_in_shopping_cart])).toEqual([[ids[1], true]]);
  });

  it("ignores the flags for anonymous viewers and false values", async () => {
    await db.addToRecipeList("favorite", stranger.id, ids[0]);
    const anon = await (await listRecipes(apiRequest("/api/recipes/?is_favorited=1"))).json();
    expect(anon.count).toBe(3);
    const off = await (await listRecipes(apiRequest("/api/recipes/?is_favorited=0", { token: strangerToken }))).json();
    expect(off.count).toBe(3);
  });

  it("rejects malformed filter values", async () => {
    const res = await listRecipes(apiRequest("/api/recipes/?is_favorited=maybe"));
    expect(res.status).toBe(400);
    expect(Object.keys((await res.json()).details)).toEqual(["is_favorited"]);
    expect((await listRecipes(apiRequest("/api/recipes/?author=me"))).status).toBe(400);
  });

  it("marks authors the viewer follows", async () => {
    await db.insertFollow(stranger.id, author.id);
    const body = await (await listRecipes(apiRequest(`/api/recipes/?author=${author.id}`, { token: strangerToken }))).json();
    expect(body.results[0].author.is_subscribed).toBe(true);
  });
});

describe("GET /api/recipes/[recipeId]", () => {
  it("returns 404 for unknown recipes", async () => {
    const res = await getRecipe(apiRequest("/api/recipes/42/"), routeParams({ recipeId: "42" }));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", message: "Recipe not found" });
  });
});

describe("PATCH /api/recipes/[recipeId]", () => {
  let recipeId: number;

  beforeEach(async () => {
    recipeId = (await (await createViaApi()).json()).id;
  });

  function patch(body: unknown, token?: string, id = recipeId) {
    return patchRecipe(
      apiRequest(`/api/recipes/${id}/`, { method: "PATCH", token, body }),
      routeParams({ recipeId: String(id) })
    );
  }

  it("updates given fields and replaces ingredients", async () => {
    const before = await db.getRecipe(recipeId);
    const res = await patch({ name: "Thin pancakes", ingredients: [{ id: milk, amount: 500 }] }, authorToken);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.name).toBe("Thin pancakes");
    expect(body.cooking_time).toBe(20);
    expect(body.ingredients).toEqual([{ id: milk, name: "milk", measurement_unit: "ml", amount: 500 }]);
    expect((await db.getRecipe(recipeId))?.image).toBe(before?.image);
  });

  it("replaces the image file", async () => {
    const before = await db.getRecipe(recipeId);
    const res = await patch({ image: PNG_DATA_URI, ingredients: [{ id: egg, amount: 1 }] }, authorToken);
    expect(res.status).toBe(200);
    const after = await db.getRecipe(recipeId);
    expect(after?.image).not.toBe(before?.image);
    expect(fs.existsSync(mediaPath(before?.image ?? ""))).toBe(false);
    expect(fs.existsSync(mediaPath(after?.image ?? ""))).toBe(true);
  });

  it("requires ingredients", async () => {
    const res = await patch({ name: "No ingredients" }, authorToken);
    expect(res.status).toBe(400);
    expect(Object.keys((await res.json()).details)).toEqual(["ingredients"]);
  });

  it("checks existence, then authentication, then authorship", async () => {
    expect((await patch({ ingredients: [{ id: egg, amount: 1 }] }, undefined, 9999)).status).toBe(404);
    expect((await patch({ ingredients: [{ id: egg, amount: 1 }] })).status).toBe(401);
    const forbidden = await patch({ ingredients: [{ id: egg, amount: 1 }] }, strangerToken);
    expect(forbidden.status).toBe(403);
    expect(await forbidden.json()).toEqual({
      error: "forbidden",
      message: "You do not have permission to perform this action.",
    });
  });
});

describe("DELETE /api/recipes/[recipeId]", () => {
  it("lets only the author delete, removing the image", async () => {
    const recipeId = (await (await createViaApi()).json()).id;
    const stored = await db.getRecipe(recipeId);
    const call = (token?: string) =>
      deleteRecipe(
        apiRequest(`/api/recipes/${recipeId}/`, { method: "DELETE", token }),
        routeParams({ recipeId: String(recipeId) })
      );

    expect((await call()).status).toBe(401);
    expect((await call(strangerToken)).status).toBe(403);
    expect((await call(authorToken)).status).toBe(204);
    expect(await db.getRecipe(recipeId)).toBeNull();
    expect(fs.existsSync(mediaPath(stored?.image ?? ""))).toBe(false);
    expect((await call(authorToken)).status).toBe(404);
  });
});

describe("short links", () => {
  it("returns the short link and redirects it to the recipe page", async () => {
    const recipeId = await createRecipeRow(db, author, "kasha", [{ ingredient_id: milk, amount: 200 }]);
    const recipe = await db.getRecipe(recipeId);
    const code = recipe?.short_link ?? "";

    const res = await getLink(apiRequest(`/api/recipes/${recipeId}/get-link/`), routeParams({ recipeId: String(recipeId) }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ "short-link": `http://localhost/s/${code}` });

    const redirect = await followShortLink(apiRequest(`/s/${code}`), routeParams({ code }));
    expect(redirect.status).toBe(302);
    expect(redirect.headers.get("location")).toBe(`http://localhost/recipes/${recipeId}/`);
  });

  it("returns 404 for unknown codes", async () => {
    const res = await followShortLink(apiRequest("/s/nope"), routeParams({ code: "nope" }));
    expect(res.status).toBe(404);
  });
});
