/**
 * Storage substrate contract
 *
 * The database sees storage as a durable keyed byte store with a single
 * monotonic sequence counter. Each `put`/`delete` is one atomic commit.
 */

/**
 * A stored entry; tombstones keep their sequence but carry no body
 */
export interface StoredRecord {
  key: string;
  sequence: number;
  deleted: boolean;
  body: Uint8Array | null;
}

export interface CommitResult {
  /** True if the key had no live record before this commit */
  created: boolean;
  /** Sequence the commit was recorded at */
  sequence: number;
}

/**
 * An open handle on one file-set
 */
export interface StorageBackend {
  /** File-set location this handle was opened at */
  readonly path: string;
  /** Number of live (non-deleted) records */
  readonly count: number;
  /** Highest sequence ever committed */
  readonly lastSequence: number;

  /**
   * Sequence the next commit must carry (`lastSequence + 1`); does not reserve it
   */
  nextSequence(): number;

  /**
   * Look up a record, tombstones included
   */
  get(key: string): Promise<StoredRecord | null>;

  /**
   * Commit `body` under `key`
   * @param sequence - Must equal `nextSequence()`
   * @param expectedSequence - When given, the key's current sequence (0 = absent) must match
   * @throws SaveConflictError if either sequence check fails
   * @throws StorageIOError if the commit cannot be made durable
   */
  put(key: string, body: Uint8Array, sequence: number, expectedSequence?: number): Promise<CommitResult>;

  /**
   * Commit a tombstone for `key`
   * @returns false (and commits nothing) if the key has no live record
   */
  delete(key: string, sequence: number, expectedSequence?: number): Promise<boolean>;

  /**
   * Fold pending log entries into the base image
   */
  compact(): Promise<void>;

  /**
   * Release the handle; later calls fail with StorageIOError
   */
  close(): Promise<void>;
}

/**
 * Tuning knobs passed through from the database configuration
 */
export interface BackendOptions {
  /** Flush every commit to disk before acknowledging it (default: true) */
  fsync?: boolean;
  /** Number of log entries that triggers an automatic compaction (default: 1000) */
  compactThreshold?: number;
}

/**
 * Opens, checks for and destroys file-sets of one storage kind
 */
export interface StorageBackendFactory {
  readonly kind: string;
  open(path: string, options?: BackendOptions): Promise<StorageBackend>;
  exists(path: string): Promise<boolean>;
  /** Remove the file-set; no-op if absent */
  destroy(path: string): Promise<void>;
}
