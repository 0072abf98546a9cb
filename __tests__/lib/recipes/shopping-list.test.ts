import { describe, it, expect } from "vitest";
import { renderShoppingList } from "@/lib/recipes/shopping-list";

describe("renderShoppingList", () => {
  it("renders a header and one line per ingredient", () => {
    const text = renderShoppingList([
      { name: "butter", measurement_unit: "g", amount: 50 },
      { name: "sugar", measurement_unit: "g", amount: 180 },
    ]);
    expect(text).toBe("Shopping list:\n\nbutter (g): 50\nsugar (g): 180\n");
  });

  it("renders only the header for no rows", () => {
    expect(renderShoppingList([])).toBe("Shopping list:\n\n");
  });
});
