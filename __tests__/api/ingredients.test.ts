import { describe, it, expect, vi, beforeEach } from "vitest";
import type { DbAdapter } from "@/lib/db/adapter";
import { createTestDb } from "@/__tests__/lib/create-test-db";
import { apiRequest, routeParams } from "@/__tests__/lib/api-helpers";

let db: DbAdapter;

vi.mock("@/lib/db", () => ({
  getDb: () => db,
}));

import { GET as listIngredients } from "@/app/api/ingredients/route";
import { GET as getIngredient } from "@/app/api/ingredients/[ingredientId]/route";

beforeEach(async () => {
  db = createTestDb();
  await db.insertIngredients([
    { name: "сахар", measurement_unit: "г" },
    { name: "Сметана", measurement_unit: "г" },
    { name: "соль", measurement_unit: "г" },
    { name: "butter", measurement_unit: "g" },
  ]);
});

describe("GET /api/ingredients", () => {
  it("returns all ingredients unpaginated, ordered by name", async () => {
    const res = await listIngredients(apiRequest("/api/ingredients/"));
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.map((i: { name: string }) => i.name)).toEqual(["butter", "Сметана", "сахар", "соль"]);
  });

  it("filters by name prefix, ignoring case", async () => {
    const res = await listIngredients(apiRequest(`/api/ingredients/?name=${encodeURIComponent("С")}`));
    const body = await res.json();
    expect(body.map((i: { name: string }) => i.name)).toEqual(["Сметана", "сахар", "соль"]);

    const narrow = await (await listIngredients(apiRequest(`/api/ingredients/?name=${encodeURIComponent("сМ")}`))).json();
    expect(narrow).toEqual([{ id: expect.any(Number), name: "Сметана", measurement_unit: "г" }]);
  });
});

describe("GET /api/ingredients/[ingredientId]", () => {
  it("returns one ingredient", async () => {
    const [first] = await db.listIngredients("butter");
    const res = await getIngredient(
      apiRequest(`/api/ingredients/${first.id}/`),
      routeParams({ ingredientId: String(first.id) })
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ id: first.id, name: "butter", measurement_unit: "g" });
  });

  it("returns 404 for an unknown id", async () => {
    const res = await getIngredient(apiRequest("/api/ingredients/999/"), routeParams({ ingredientId: "999" }));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", message: "Ingredient not found" });
  });
});
