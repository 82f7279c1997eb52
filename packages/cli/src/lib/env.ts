/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { expandTilde } from "@tallydb/sdk";

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Resolve the database directory
 * Priority: CLI option > TALLYDB_DIR env var > default "./data"
 */
export function resolveDirectory(cliDir?: string, env: Env = process.env): string {
  const dir = cliDir ?? env.TALLYDB_DIR ?? "./data";
  return path.resolve(expandTilde(dir));
}

/**
 * Check if timing metrics should be written to stderr
 */
export function isVerbose(env: Env = process.env): boolean {
  return env.TALLYDB_CLI_DEBUG === "1";
}
