/**
 * Database configuration parsing and file-set path resolution
 */

import { homedir } from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { OpenError } from "./errors.js";

/**
 * Extension of the directory that holds one database's files
 */
export const FILE_SET_EXTENSION = ".tallydb";

export type BackendKind = "file" | "memory";

/**
 * Options accepted by `Database.open`
 */
export interface DatabaseConfiguration {
  /** Directory the file-set lives in; "~" expands to the home directory */
  directory: string;
  /** Storage substrate (default: "file") */
  backend?: BackendKind;
  /** Journal entries that trigger an automatic compaction (default: 1000) */
  compactThreshold?: number;
  /** How long to wait for another process's lock; 0 fails immediately (default: 0) */
  lockTimeoutMs?: number;
  /** Flush every commit to disk (default: true) */
  fsync?: boolean;
}

export type ResolvedConfiguration = Required<DatabaseConfiguration>;

const NamePattern = /^[^/\\\0]+$/;

const DatabaseNameSchema = z
  .string()
  .min(1, "name must be non-empty")
  .superRefine((val, ctx) => {
    if (!NamePattern.test(val) || val === "." || val === "..") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "name must not contain path separators or be a relative directory",
      });
    }
  });

export const DatabaseConfigurationSchema = z
  .object({
    directory: z.string().min(1, "directory must be non-empty"),
    backend: z.enum(["file", "memory"]).default("file"),
    compactThreshold: z.number().int().positive().default(1000),
    lockTimeoutMs: z.number().int().nonnegative().default(0),
    fsync: z.boolean().default(true),
  })
  .strict();

/**
 * Expand a leading tilde (~) to the home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left as they are
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate a database name
 * @throws OpenError if the name cannot be used as a file-set name
 */
export function validateDatabaseName(name: unknown): string {
  const parsed = DatabaseNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new OpenError(String(name), `invalid database name (${describeIssues(parsed.error)})`);
  }
  return parsed.data;
}

/**
 * Apply defaults and normalize the directory to an absolute path
 * @throws OpenError if the configuration is invalid
 */
export function resolveConfiguration(config: unknown): ResolvedConfiguration {
  const parsed = DatabaseConfigurationSchema.safeParse(config);
  if (!parsed.success) {
    const directory =
      typeof config === "object" && config !== null && "directory" in config
        ? String(config.directory)
        : "<unknown>";
    throw new OpenError(directory, `invalid configuration (${describeIssues(parsed.error)})`);
  }

  return {
    ...parsed.data,
    directory: path.resolve(expandTilde(parsed.data.directory)),
  };
}

/**
 * Location of a database's file-set: `<directory>/<name>.tallydb`
 */
export function databasePath(name: string, directory: string): string {
  return path.join(path.resolve(expandTilde(directory)), `${validateDatabaseName(name)}${FILE_SET_EXTENSION}`);
}
