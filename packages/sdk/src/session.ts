/**
 * Scoped acquisition of databases
 *
 * Invariants:
 * - A database opened here is closed on every exit path of the callback
 * - A failure to close never hides the error thrown by the callback
 */

import type { DatabaseConfiguration } from "./config.js";
import { Database } from "./database.js";

export { claimPath, isPathOpen, LOCK_FILE, type ClaimOptions, type LockInfo, type PathClaim } from "./lock.js";

/**
 * Open a database, run `fn` against it, then close it
 *
 * @example
 * ```typescript
 * const color = await withDatabase("db", { directory: "/tmp" }, async (db) => {
 *   const doc = await db.getDocument("foo");
 *   return doc ? asString(doc.get("color")) : undefined;
 * });
 * ```
 */
export async function withDatabase<T>(
  name: string,
  config: DatabaseConfiguration,
  fn: (db: Database) => Promise<T> | T
): Promise<T> {
  const db = await Database.open(name, config);
  return db.use(fn);
}
