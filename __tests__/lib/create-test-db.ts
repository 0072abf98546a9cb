/**
 * Test helper: in-memory SQLite DbAdapter with migrations applied.
 * Use for tests that need real DB behavior (transactions, constraints, cascades).
 * Replaces createMockDbAdapter() when you need actual SQLite semantics.
 *
 * @example
 *   const db = createTestDb();
 *   const id = await db.insertUser({ email: "cook@example.com", ... });
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { createSqliteAdapter } from "@/lib/db/sqlite-adapter";

/**
 * Creates an in-memory SQLite adapter, runs migrations, and returns the DbAdapter.
 * Each call returns a fresh isolated database.
 */
export function createTestDb(): DbAdapter {
  return createSqliteAdapter(":memory:");
}
