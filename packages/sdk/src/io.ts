/**
 * Crash-safe file I/O for the storage substrate
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files always reside in the same directory as the target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Appends are acknowledged only after the data reaches the disk
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { StorageIOError, errnoCode } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Options shared by the durable write helpers
 */
export interface DurabilityOptions {
  /** Flush data to disk before returning (default: true) */
  fsync?: boolean;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StorageIOError(dirPath, "mkdir", { cause: err });
  }
}

/**
 * Flush file data, falling back to a full sync where datasync is unsupported
 */
async function syncHandle(handle: fs.FileHandle): Promise<void> {
  try {
    await handle.datasync();
  } catch (err) {
    // ENOTSUP/ENOSYS: not supported on this platform
    // EINVAL: some CIFS/FUSE mounts report this instead
    const code = errnoCode(err);
    if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
      await handle.sync();
    } else {
      throw err;
    }
  }
}

/**
 * Fsync a directory so a rename inside it is durable (best-effort)
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dirsync.failed", { message: dir, details: { code } });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  options: DurabilityOptions = {}
): Promise<void> {
  const fsync = options.fsync ?? true;
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");
    if (fsync) {
      await syncHandle(fileHandle);
    }

    // Close the file handle before rename
    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (fsync) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { message: tmp, details: { error: String(closeErr) } });
      });
    }

    await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      logger.debug("io.cleanup.failed", { message: tmp, details: { error: String(rmErr) } });
    });

    throw new StorageIOError(filePath, "write", { cause: err });
  }
}

/**
 * Append content to a file, creating it if needed, and flush before returning
 */
export async function appendDurable(
  filePath: string,
  content: string,
  options: DurabilityOptions = {}
): Promise<void> {
  let handle: fs.FileHandle | null = null;
  try {
    handle = await fs.open(filePath, "a", 0o600);
    await handle.appendFile(content, "utf-8");
    if (options.fsync ?? true) {
      await syncHandle(handle);
    }
  } catch (err) {
    throw new StorageIOError(filePath, "append", { cause: err });
  } finally {
    if (handle) {
      await handle.close();
    }
  }
}

/**
 * Read a UTF-8 file
 * @returns File contents, or null if the file doesn't exist
 * @throws StorageIOError for other read failures
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new StorageIOError(filePath, "read", { cause: err });
  }
}

/**
 * Truncate a file to `length` bytes (no-op if it doesn't exist)
 */
export async function truncateFile(filePath: string, length = 0): Promise<void> {
  try {
    await fs.truncate(filePath, length);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw new StorageIOError(filePath, "truncate", { cause: err });
    }
  }
}

/**
 * Check whether a path exists
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new StorageIOError(target, "stat", { cause: err });
  }
}

/**
 * Recursively remove a file or directory (idempotent - no error if it doesn't exist)
 */
export async function removePath(target: string): Promise<void> {
  try {
    await fs.rm(target, { recursive: true, force: true });
  } catch (err) {
    throw new StorageIOError(target, "remove", { cause: err });
  }
}
