/**
 * Short recipe codes: a random uuid rendered in base57
 * (no 0/O, 1/I/l look-alikes), always 22 characters.
 */

import { v4 as uuidv4 } from "uuid";

export const SHORT_LINK_ALPHABET = "23456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";
export const SHORT_LINK_LENGTH = 22;

const BASE = BigInt(SHORT_LINK_ALPHABET.length);
const ZERO = BigInt(0);

export function encodeBase57(value: bigint): string {
  let out = "";
  let n = value;
  while (n > ZERO) {
    out = SHORT_LINK_ALPHABET[Number(n % BASE)] + out;
    n /= BASE;
  }
  return out.padStart(SHORT_LINK_LENGTH, SHORT_LINK_ALPHABET[0]);
}

export function generateShortLink(): string {
  return encodeBase57(BigInt(`0x${uuidv4().replace(/-/g, "")}`));
}

export function shortLinkUrl(origin: string, code: string): string {
  return `${origin}/s/${code}`;
}
