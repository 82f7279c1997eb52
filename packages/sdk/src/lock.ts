/**
 * Exclusive ownership of a database file-set
 *
 * Two layers: a per-process registry of open paths, and a `LOCK` file created
 * with an exclusive open so that other processes are kept out as well.
 *
 * Invariants:
 * - At most one claim per resolved path per process
 * - The LOCK file holds the owner's pid; a lock whose pid is gone is reclaimed
 * - A released claim never removes a lock it does not own
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { ResourceBusyError, StorageIOError, errnoCode } from "./errors.js";
import { ensureDirectory, readFileIfExists } from "./io.js";
import { logger } from "./observability/logs.js";

export const LOCK_FILE = "LOCK";

const LockInfoSchema = z.object({
  pid: z.number().int().positive(),
  acquiredAt: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface ClaimOptions {
  /** Also take the cross-process LOCK file inside the file-set directory */
  lockFile: boolean;
  /** Time to keep retrying a held lock; 0 fails on the first attempt */
  timeoutMs?: number;
  /** Delay between attempts (default: 50ms) */
  retryIntervalMs?: number;
}

/**
 * A held claim on a file-set path
 */
export interface PathClaim {
  readonly path: string;
  release(): Promise<void>;
}

const openPaths = new Set<string>();

/**
 * True if a database handle in this process currently holds `target`
 */
export function isPathOpen(target: string): boolean {
  return openPaths.has(path.resolve(target));
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user
    return errnoCode(err) === "EPERM";
  }
}

async function readLockInfo(lockPath: string): Promise<LockInfo | null> {
  const raw = await readFileIfExists(lockPath);
  if (raw === null) {
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    // A lock caught mid-write has no readable owner yet
    return null;
  }
  const parsed = LockInfoSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

/**
 * Cross-process lock using exclusive open
 */
class FileLock {
  #lockPath: string;
  #acquired = false;

  constructor(dir: string) {
    this.#lockPath = path.join(dir, LOCK_FILE);
  }

  /**
   * Acquire the lock, reclaiming it from dead processes
   * @throws ResourceBusyError if a live process still holds it after `timeoutMs`
   */
  async acquire(timeoutMs: number, retryIntervalMs: number): Promise<void> {
    const startTime = Date.now();
    await ensureDirectory(path.dirname(this.#lockPath));

    while (true) {
      if (await this.#tryCreate()) {
        this.#acquired = true;
        return;
      }

      const holder = await readLockInfo(this.#lockPath);
      if (holder && this.#isStale(holder)) {
        logger.warn("lock.reclaim", {
          message: `${this.#lockPath}: reclaiming lock left by pid ${holder.pid}`,
        });
        await this.#unlink();
        continue;
      }

      if (Date.now() - startTime >= timeoutMs) {
        const who = holder
          ? `locked by pid ${holder.pid} since ${holder.acquiredAt}`
          : "lock is being taken by another process";
        throw new ResourceBusyError(path.dirname(this.#lockPath), who);
      }

      await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
    }
  }

  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }
    this.#acquired = false;
    await this.#unlink();
  }

  /**
   * The registry already excludes other handles in this process, so a lock
   * carrying our own pid is left over from a handle that was never closed
   */
  #isStale(holder: LockInfo): boolean {
    return holder.pid === process.pid || !isProcessAlive(holder.pid);
  }

  async #tryCreate(): Promise<boolean> {
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(this.#lockPath, "wx", 0o600);
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        return false;
      }
      throw new StorageIOError(this.#lockPath, "lock", { cause: err });
    }

    try {
      const info: LockInfo = { pid: process.pid, acquiredAt: new Date().toISOString() };
      await handle.writeFile(JSON.stringify(info));
      await handle.sync();
      return true;
    } catch (err) {
      await fs.rm(this.#lockPath, { force: true });
      throw new StorageIOError(this.#lockPath, "lock", { cause: err });
    } finally {
      await handle.close();
    }
  }

  async #unlink(): Promise<void> {
    try {
      await fs.unlink(this.#lockPath);
    } catch (err) {
      // The file-set may have been destroyed while the lock was held
      if (errnoCode(err) !== "ENOENT") {
        throw new StorageIOError(this.#lockPath, "unlock", { cause: err });
      }
    }
  }
}

/**
 * Claim exclusive use of a file-set path
 * @throws ResourceBusyError if this process or another live one holds it
 */
export async function claimPath(target: string, options: ClaimOptions): Promise<PathClaim> {
  const resolved = path.resolve(target);
  if (openPaths.has(resolved)) {
    throw new ResourceBusyError(resolved, "already open in this process");
  }

  // Reserve before the first await so concurrent claims see it
  openPaths.add(resolved);
  const lock = options.lockFile ? new FileLock(resolved) : null;

  try {
    await lock?.acquire(options.timeoutMs ?? 0, options.retryIntervalMs ?? 50);
  } catch (err) {
    openPaths.delete(resolved);
    throw err;
  }

  let released = false;
  return {
    path: resolved,
    async release(): Promise<void> {
      if (released) {
        return;
      }
      released = true;
      try {
        await lock?.release();
      } finally {
        openPaths.delete(resolved);
      }
    },
  };
}
