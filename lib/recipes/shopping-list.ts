import type { ShoppingListRow } from "@/lib/db/adapter";

export const SHOPPING_LIST_FILENAME = "shopping_list.txt";

/** Rows arrive already summed and sorted by the adapter. */
export function renderShoppingList(rows: ShoppingListRow[]): string {
  const lines = rows.map((row) => `${row.name} (${row.measurement_unit}): ${row.amount}\n`);
  return `Shopping list:\n\n${lines.join("")}`;
}
