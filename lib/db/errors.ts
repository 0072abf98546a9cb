/**
 * Driver-neutral checks on errors thrown by the adapters.
 */

/** Postgres unique_violation. */
const PG_UNIQUE_VIOLATION = "23505";
const SQLITE_UNIQUE_CODES = new Set(["SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY"]);

/**
 * True when an insert lost a race against a concurrent request for the same
 * unique key (both drivers expose the reason as `code`).
 */
export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("code" in err)) return false;
  const { code } = err;
  return code === PG_UNIQUE_VIOLATION || (typeof code === "string" && SQLITE_UNIQUE_CODES.has(code));
}
