import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { validationError, internalError } from "@/lib/api/response-helpers";
import { requireUser } from "@/lib/auth/session";
import { renderShoppingList, SHOPPING_LIST_FILENAME } from "@/lib/recipes/shopping-list";

/**
 * GET /api/recipes/download_shopping_cart
 * Plain-text list of ingredient totals across the user's cart.
 */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    const rows = await db.getShoppingList(auth.user.id);
    if (rows.length === 0) {
      return validationError("Shopping cart is empty.");
    }

    return new Response(renderShoppingList(rows), {
      status: 200,
      headers: {
        "Content-Type": "text/plain; charset=utf-8",
        "Content-Disposition": `attachment; filename="${SHOPPING_LIST_FILENAME}"`,
      },
    });
  } catch (err) {
    console.error("GET /api/recipes/download_shopping_cart error:", err);
    return internalError(err);
  }
}
