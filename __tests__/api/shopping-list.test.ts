import { describe, it, expect, vi, beforeEach } from "vitest";
import type { DbAdapter, UserRow } from "@/lib/db/adapter";
import { createTestDb } from "@/__tests__/lib/create-test-db";
import { apiRequest, createRecipeRow, createUser, issueToken } from "@/__tests__/lib/api-helpers";

let db: DbAdapter;

vi.mock("@/lib/db", () => ({
  getDb: () => db,
}));

import { GET as downloadShoppingCart } from "@/app/api/recipes/download_shopping_cart/route";

let cook: UserRow;
let token: string;

beforeEach(async () => {
  db = createTestDb();
  cook = await createUser(db, "cook");
  token = await issueToken(db, cook);
});

describe("GET /api/recipes/download_shopping_cart", () => {
  it("requires authentication", async () => {
    const res = await downloadShoppingCart(apiRequest("/api/recipes/download_shopping_cart/"));
    expect(res.status).toBe(401);
  });

  it("rejects an empty cart", async () => {
    const res = await downloadShoppingCart(apiRequest("/api/recipes/download_shopping_cart/", { token }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "validation_failed",
      message: "Shopping cart is empty.",
    });
  });

  it("sums amounts across carted recipes", async () => {
    await db.insertIngredients([
      { name: "sugar", measurement_unit: "g" },
      { name: "egg", measurement_unit: "pcs" },
      { name: "sugar", measurement_unit: "tbsp" },
    ]);
    const byKey = new Map(
      (await db.listIngredients()).map((i) => [`${i.name}/${i.measurement_unit}`, i.id])
    );
    const id = (key: string) => byKey.get(key) ?? 0;

    const cake = await createRecipeRow(db, cook, "cake", [
      { ingredient_id: id("sugar/g"), amount: 200 },
      { ingredient_id: id("egg/pcs"), amount: 3 },
    ]);
    const meringue = await createRecipeRow(db, cook, "meringue", [
      { ingredient_id: id("sugar/g"), amount: 100 },
      { ingredient_id: id("egg/pcs"), amount: 2 },
      { ingredient_id: id("sugar/tbsp"), amount: 1 },
    ]);
    const skipped = await createRecipeRow(db, cook, "omelette", [
      { ingredient_id: id("egg/pcs"), amount: 4 },
    ]);
    await db.addToRecipeList("shopping_cart", cook.id, cake);
    await db.addToRecipeList("shopping_cart", cook.id, meringue);
    await db.addToRecipeList("favorite", cook.id, skipped);

    const res = await downloadShoppingCart(apiRequest("/api/recipes/download_shopping_cart/", { token }));
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="shopping_list.txt"');
    expect(await res.text()).toBe(
      "Shopping list:\n\negg (pcs): 5\nsugar (g): 300\nsugar (tbsp): 1\n"
    );
  });
});
