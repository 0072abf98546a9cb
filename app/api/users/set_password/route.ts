import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { noContent, fieldError, internalError } from "@/lib/api/response-helpers";
import { parseJsonBody } from "@/lib/api/request-helpers";
import { requireUser } from "@/lib/auth/session";
import { hashPassword, verifyPassword } from "@/lib/auth/password";
import { setPasswordSchema } from "@/lib/validation/request-schema";

/**
 * POST /api/users/set_password
 * Body: { current_password, new_password }. Existing tokens stay valid.
 */
export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await requireUser(request, db);
    if (!auth.ok) return auth.response;

    const body = await parseJsonBody(request, setPasswordSchema);
    if (!body.ok) return body.response;

    if (!(await verifyPassword(body.data.current_password, auth.user.password_hash))) {
      return fieldError("current_password", "Invalid password.");
    }

    await db.updateUser(auth.user.id, { password_hash: await hashPassword(body.data.new_password) });
    return noContent();
  } catch (err) {
    console.error("POST /api/users/set_password error:", err);
    return internalError(err);
  }
}
