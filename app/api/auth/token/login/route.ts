import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, validationError, internalError } from "@/lib/api/response-helpers";
import { parseJsonBody } from "@/lib/api/request-helpers";
import { loginSchema } from "@/lib/validation/request-schema";
import { verifyPassword } from "@/lib/auth/password";
import { generateToken, tokenDigest } from "@/lib/auth/tokens";
import { getSettings } from "@/lib/config/settings";

const INVALID_CREDENTIALS = "Unable to log in with provided credentials.";

/**
 * POST /api/auth/token/login
 * Body: { email, password }. Issues a new token per login.
 */
export async function POST(request: NextRequest) {
  try {
    const body = await parseJsonBody(request, loginSchema);
    if (!body.ok) return body.response;

    const db = getDb();
    const user = await db.getUserByEmail(body.data.email);
    if (!user || !(await verifyPassword(body.data.password, user.password_hash))) {
      return validationError(INVALID_CREDENTIALS, { body: [INVALID_CREDENTIALS] });
    }

    const token = generateToken();
    await db.insertAuthToken(tokenDigest(token, getSettings().secretKey), user.id);
    return json({ auth_token: token });
  } catch (err) {
    console.error("POST /api/auth/token/login error:", err);
    return internalError(err);
  }
}
