/**
 * Token authentication for route handlers.
 *
 * Header: `Authorization: Token <key>`. A missing header (or another scheme)
 * means an anonymous request; a malformed or unknown token is a 401 everywhere,
 * including endpoints that allow anonymous access.
 */

import type { DbAdapter, UserRow } from "@/lib/db/adapter";
import { getSettings } from "@/lib/config/settings";
import { unauthorizedError } from "@/lib/api/response-helpers";
import { tokenDigest } from "./tokens";

export type AuthResult =
  | { ok: true; user: UserRow | null; token: string | null }
  | { ok: false; response: Response };

export type RequiredAuthResult =
  | { ok: true; user: UserRow; token: string }
  | { ok: false; response: Response };

const KEYWORD = "token";

export async function authenticate(request: Request, db: DbAdapter): Promise<AuthResult> {
  const header = request.headers.get("authorization");
  if (!header) return { ok: true, user: null, token: null };

  const parts = header.trim().split(/\s+/);
  if (parts[0].toLowerCase() !== KEYWORD) return { ok: true, user: null, token: null };

  if (parts.length === 1) {
    return { ok: false, response: unauthorizedError("Invalid token header. No credentials provided.") };
  }
  if (parts.length > 2) {
    return {
      ok: false,
      response: unauthorizedError("Invalid token header. Token string should not contain spaces."),
    };
  }

  const token = parts[1];
  const user = await db.getUserByTokenDigest(tokenDigest(token, getSettings().secretKey));
  if (!user) return { ok: false, response: unauthorizedError("Invalid token.") };
  return { ok: true, user, token };
}

/** Like authenticate, but anonymous requests get a 401. */
export async function requireUser(request: Request, db: DbAdapter): Promise<RequiredAuthResult> {
  const auth = await authenticate(request, db);
  if (!auth.ok) return auth;
  if (!auth.user || !auth.token) return { ok: false, response: unauthorizedError() };
  return { ok: true, user: auth.user, token: auth.token };
}
