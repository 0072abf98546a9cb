import { describe, it, expect } from "vitest";
import { hashPassword, verifyPassword } from "@/lib/auth/password";

describe("password hashing", () => {
  it("stores scrypt$salt$hash and verifies the plain password", async () => {
    const stored = await hashPassword("pa55word-test");
    const [prefix, salt, hash] = stored.split("$");
    expect(prefix).toBe("scrypt");
    expect(salt).toMatch(/^[0-9a-f]{32}$/);
    expect(hash).toMatch(/^[0-9a-f]{128}$/);
    expect(await verifyPassword("pa55word-test", stored)).toBe(true);
    expect(await verifyPassword("pa55word-tesT", stored)).toBe(false);
  });

  it("salts every hash", async () => {
    expect(await hashPassword("same-password")).not.toBe(await hashPassword("same-password"));
  });

  it("rejects unrecognised hash formats", async () => {
    expect(await verifyPassword("x", "")).toBe(false);
    expect(await verifyPassword("x", "md5$abc$def")).toBe(false);
    expect(await verifyPassword("x", "scrypt$00$abcd")).toBe(false);
  });
});
