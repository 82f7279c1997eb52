/**
 * Shared in-memory record table for storage backends
 *
 * Subclasses decide how a mutation is made durable (`persist`); this class
 * owns the sequence checks and the live-record bookkeeping.
 *
 * Invariants:
 * - A mutation is applied in memory only after `persist` resolves
 * - `lastSequence` only grows, by exactly one per commit
 * - `count` equals the number of records that are not tombstones
 */

import { SaveConflictError, StorageIOError } from "../errors.js";
import type { CommitResult, StorageBackend, StoredRecord } from "./types.js";

/**
 * One committed change, as written to a log
 */
export interface Mutation {
  op: "put" | "delete";
  key: string;
  sequence: number;
  body: Uint8Array | null;
}

export abstract class RecordTable implements StorageBackend {
  readonly path: string;
  #records = new Map<string, StoredRecord>();
  #count = 0;
  #lastSequence = 0;
  #closed = false;

  constructor(path: string) {
    this.path = path;
  }

  get count(): number {
    return this.#count;
  }

  get lastSequence(): number {
    return this.#lastSequence;
  }

  get closed(): boolean {
    return this.#closed;
  }

  nextSequence(): number {
    return this.#lastSequence + 1;
  }

  async get(key: string): Promise<StoredRecord | null> {
    this.checkOpen("get");
    return this.#records.get(key) ?? null;
  }

  async put(
    key: string,
    body: Uint8Array,
    sequence: number,
    expectedSequence?: number
  ): Promise<CommitResult> {
    this.checkOpen("put");
    const existing = this.#checkCommit(key, sequence, expectedSequence);
    const created = !existing || existing.deleted;

    await this.persist({ op: "put", key, sequence, body });
    this.apply({ op: "put", key, sequence, body });
    await this.afterCommit();

    return { created, sequence };
  }

  async delete(key: string, sequence: number, expectedSequence?: number): Promise<boolean> {
    this.checkOpen("delete");
    const existing = this.#checkCommit(key, sequence, expectedSequence);
    if (!existing || existing.deleted) {
      return false;
    }

    await this.persist({ op: "delete", key, sequence, body: null });
    this.apply({ op: "delete", key, sequence, body: null });
    await this.afterCommit();

    return true;
  }

  async close(): Promise<void> {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    await this.release();
  }

  abstract compact(): Promise<void>;

  /**
   * Make a mutation durable; the in-memory table is untouched if this throws
   */
  protected abstract persist(mutation: Mutation): Promise<void>;

  /**
   * Hook run after a mutation is applied
   */
  protected async afterCommit(): Promise<void> {}

  /**
   * Hook run once when the handle closes
   */
  protected async release(): Promise<void> {}

  /**
   * Apply a mutation to the in-memory table without any checks (used by replay)
   */
  protected apply(mutation: Mutation): void {
    const existing = this.#records.get(mutation.key);
    const wasLive = existing !== undefined && !existing.deleted;

    if (mutation.op === "put") {
      this.#records.set(mutation.key, {
        key: mutation.key,
        sequence: mutation.sequence,
        deleted: false,
        body: mutation.body,
      });
      if (!wasLive) {
        this.#count++;
      }
    } else {
      this.#records.set(mutation.key, {
        key: mutation.key,
        sequence: mutation.sequence,
        deleted: true,
        body: null,
      });
      if (wasLive) {
        this.#count--;
      }
    }

    this.#lastSequence = Math.max(this.#lastSequence, mutation.sequence);
  }

  /**
   * Raise the sequence counter to a value loaded from a base image
   */
  protected restoreSequence(sequence: number): void {
    this.#lastSequence = Math.max(this.#lastSequence, sequence);
  }

  /**
   * All records, tombstones included, in insertion order
   */
  protected records(): StoredRecord[] {
    return Array.from(this.#records.values());
  }

  protected checkOpen(action: string): void {
    if (this.#closed) {
      throw new StorageIOError(this.path, `${action} on closed handle`);
    }
  }

  #checkCommit(
    key: string,
    sequence: number,
    expectedSequence: number | undefined
  ): StoredRecord | undefined {
    if (sequence !== this.#lastSequence + 1) {
      throw new SaveConflictError(key, sequence - 1, this.#lastSequence);
    }

    const existing = this.#records.get(key);
    if (expectedSequence !== undefined) {
      // A tombstone counts as absent
      const current = existing && !existing.deleted ? existing.sequence : 0;
      if (current !== expectedSequence) {
        throw new SaveConflictError(key, expectedSequence, current);
      }
    }
    return existing;
  }
}
