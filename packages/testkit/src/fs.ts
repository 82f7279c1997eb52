/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Database } from "@tallydb/sdk";
import type { DatabaseConfiguration } from "@tallydb/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "tallydb-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "tallydb-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a freshly created database in a temp directory
 *
 * The database is closed and the directory removed afterwards. A cleanup
 * failure is only reported if `fn` itself succeeded.
 *
 * @param fn - Receives the open database and its directory
 * @param options - Configuration overrides (the directory is always the temp one)
 * @returns Result of fn
 */
export async function withTempDatabase<T>(
  fn: (db: Database, dir: string) => Promise<T>,
  options: Partial<DatabaseConfiguration> & { name?: string } = {}
): Promise<T> {
  const { name = "test", ...config } = options;
  const dir = await createTempDir();
  let db: Database;
  try {
    db = await Database.open(name, { ...config, directory: dir });
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  let failed = false;
  try {
    return await fn(db, dir);
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      await db.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(dir);
    } catch (err) {
      cleanupError ??= err;
    }
    if (!failed && cleanupError !== undefined) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}
