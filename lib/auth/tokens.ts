/**
 * Opaque API tokens. Clients hold the 40-char hex key; the database keeps
 * only an HMAC-SHA256 digest keyed by SECRET_KEY.
 */

import { createHmac, randomBytes } from "crypto";

export const TOKEN_BYTES = 20;

export function generateToken(): string {
  return randomBytes(TOKEN_BYTES).toString("hex");
}

export function tokenDigest(token: string, secretKey: string): string {
  return createHmac("sha256", secretKey).update(token).digest("hex");
}
