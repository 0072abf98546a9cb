import { NextRequest } from "next/server";
import type { DbAdapter } from "@/lib/db/adapter";
import { getDb } from "@/lib/db";
import { isUniqueViolation } from "@/lib/db/errors";
import { json, validationError, internalError } from "@/lib/api/response-helpers";
import { parseJsonBody, requestOrigin } from "@/lib/api/request-helpers";
import { paginate } from "@/lib/api/pagination";
import { authenticate } from "@/lib/auth/session";
import { hashPassword } from "@/lib/auth/password";
import { createUserSchema } from "@/lib/validation/request-schema";
import { serializeCreatedUser, serializeUsers } from "@/lib/serializers/users";

/**
 * GET /api/users
 * Paginated user list, ordered by id.
 */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await authenticate(request, db);
    if (!auth.ok) return auth.response;

    const ctx = { db, viewer: auth.user, origin: requestOrigin(request) };
    return await paginate(new URL(request.url), {
      count: () => db.countUsers(),
      fetch: (window) => db.listUsers(window),
      serialize: (rows) => serializeUsers(ctx, rows),
    });
  } catch (err) {
    console.error("GET /api/users error:", err);
    return internalError(err);
  }
}

/** Field errors for an email or username already in use; null when both are free. */
async function duplicateDetails(
  db: DbAdapter,
  email: string,
  username: string
): Promise<Record<string, string[]> | null> {
  const details: Record<string, string[]> = {};
  if (await db.getUserByEmail(email)) {
    details.email = ["A user with that email already exists."];
  }
  if (await db.getUserByUsername(username)) {
    details.username = ["A user with that username already exists."];
  }
  return Object.keys(details).length > 0 ? details : null;
}

/**
 * POST /api/users
 * Registration. Body: { email, username, first_name, last_name, password }
 */
export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const auth = await authenticate(request, db);
    if (!auth.ok) return auth.response;

    const body = await parseJsonBody(request, createUserSchema);
    if (!body.ok) return body.response;
    const { email, username, first_name, last_name, password } = body.data;

    const taken = await duplicateDetails(db, email, username);
    if (taken) {
      return validationError("Invalid request body", taken);
    }

    let id: number;
    try {
      id = await db.insertUser({
        email,
        username,
        first_name,
        last_name,
        password_hash: await hashPassword(password),
      });
    } catch (err) {
      const raced = isUniqueViolation(err) ? await duplicateDetails(db, email, username) : null;
      if (raced) return validationError("Invalid request body", raced);
      throw err;
    }
    const user = await db.getUserById(id);
    if (!user) throw new Error(`User ${id} missing after insert`);
    return json(serializeCreatedUser(user), 201);
  } catch (err) {
    console.error("POST /api/users error:", err);
    return internalError(err);
  }
}
