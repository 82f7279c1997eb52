/**
 * Database: a named file-set of documents with a database-wide sequence
 *
 * Invariants:
 * - State only moves forward: unopened → open → closed
 * - Every commit (save or delete) takes exactly `lastSequence + 1`
 * - Mutating operations run one at a time per instance
 * - Listeners run after the commit is durable and the mutex is released
 */

import { decodeValue, encodeValue } from "./codec.js";
import {
  databasePath,
  resolveConfiguration,
  validateDatabaseName,
  type BackendKind,
  type DatabaseConfiguration,
  type ResolvedConfiguration,
} from "./config.js";
import { ASSIGN_SEQUENCE, Document, type DocumentView, type MutableDocument } from "./document.js";
import {
  DatabaseClosedError,
  InvalidDocumentIdError,
  OpenError,
  SaveConflictError,
  StorageIOError,
} from "./errors.js";
import { claimPath, type PathClaim } from "./lock.js";
import { Mutex } from "./mutex.js";
import { logger } from "./observability/logs.js";
import { metrics, type MetricsSnapshot } from "./observability/metrics.js";
import { backendFor } from "./storage/index.js";
import type { StorageBackend } from "./storage/types.js";

export type DatabaseState = "unopened" | "open" | "closed";

/**
 * How a commit treats a stored revision the caller has not seen
 * - lastWriteWins: overwrite it
 * - failOnConflict: throw SaveConflictError unless the stored sequence is the one the document was loaded at
 */
export type ConcurrencyControl = "lastWriteWins" | "failOnConflict";

export interface SaveOptions {
  concurrency?: ConcurrencyControl;
}

export type ChangeListener = (db: Database, ids: string[]) => void;
export type DocumentChangeListener = (db: Database, id: string) => void;

/**
 * Returned by listener registration; `remove()` unregisters
 */
export interface ListenerToken {
  remove(): void;
}

export interface DatabaseStats extends MetricsSnapshot {
  count: number;
  lastSequence: number;
}

interface NotificationBuffer {
  onReady: (db: Database) => void;
  pending: string[];
}

/**
 * Embedded document database
 *
 * @example
 * ```typescript
 * const db = await Database.open("db", { directory: "/tmp" });
 * const doc = new MutableDocument("foo");
 * doc.set("color", "green");
 * await db.save(doc);
 * await db.close();
 * ```
 */
export class Database {
  readonly #name: string;
  readonly #config: ResolvedConfiguration;
  readonly #path: string;
  #state: DatabaseState = "unopened";
  #backend: StorageBackend | null = null;
  #claim: PathClaim | null = null;
  #mutex = new Mutex();
  #listeners = new Set<ChangeListener>();
  #documentListeners = new Map<string, Set<DocumentChangeListener>>();
  #buffer: NotificationBuffer | null = null;

  /**
   * Create an unopened handle; call `open()` before use
   * @throws OpenError if the name or configuration is invalid
   */
  constructor(name: string, config: DatabaseConfiguration) {
    this.#name = validateDatabaseName(name);
    this.#config = resolveConfiguration(config);
    this.#path = databasePath(this.#name, this.#config.directory);
  }

  /**
   * Open (creating if absent) the database `name` in `config.directory`
   * @throws OpenError if the file-set cannot be opened or is corrupt
   * @throws ResourceBusyError if the file-set is open elsewhere
   */
  static async open(name: string, config: DatabaseConfiguration): Promise<Database> {
    return new Database(name, config).open();
  }

  /**
   * Remove a database's file-set; a no-op if it does not exist
   * @throws ResourceBusyError while any handle has it open
   */
  static async deleteFile(name: string, directory: string, backend: BackendKind = "file"): Promise<void> {
    const target = databasePath(name, directory);
    const factory = backendFor(backend);
    if (!(await factory.exists(target))) {
      return;
    }

    const claim = await claimPath(target, { lockFile: backend === "file" });
    try {
      await factory.destroy(target);
    } finally {
      await claim.release();
    }

    metrics.reset(target);
    logger.debug("db.delete_file", { database: name, message: target });
  }

  static async exists(name: string, directory: string, backend: BackendKind = "file"): Promise<boolean> {
    return backendFor(backend).exists(databasePath(name, directory));
  }

  get name(): string {
    return this.#name;
  }

  get directory(): string {
    return this.#config.directory;
  }

  /**
   * Location of the file-set: `<directory>/<name>.tallydb`
   */
  get path(): string {
    return this.#path;
  }

  get state(): DatabaseState {
    return this.#state;
  }

  get config(): Readonly<ResolvedConfiguration> {
    return this.#config;
  }

  /**
   * Number of live documents
   */
  get count(): number {
    return this.#requireOpen("count").count;
  }

  /**
   * Highest sequence ever assigned; 0 for an empty database
   */
  get lastSequence(): number {
    return this.#requireOpen("lastSequence").lastSequence;
  }

  /**
   * Open the file-set; a no-op if already open
   */
  async open(): Promise<this> {
    await this.#mutex.withLock(async () => {
      if (this.#state === "open") {
        return;
      }
      if (this.#state === "closed") {
        throw new DatabaseClosedError(this.#name, "open");
      }

      const claim = await claimPath(this.#path, {
        lockFile: this.#config.backend === "file",
        timeoutMs: this.#config.lockTimeoutMs,
      });

      try {
        this.#backend = await backendFor(this.#config.backend).open(this.#path, {
          fsync: this.#config.fsync,
          compactThreshold: this.#config.compactThreshold,
        });
      } catch (err) {
        await claim.release();
        if (err instanceof StorageIOError) {
          throw new OpenError(this.#path, err.message, { cause: err });
        }
        throw err;
      }

      this.#claim = claim;
      this.#state = "open";
      logger.debug("db.open", {
        database: this.#name,
        message: this.#path,
        details: { count: this.#backend.count, lastSequence: this.#backend.lastSequence },
      });
    });
    return this;
  }

  /**
   * Look up a live document
   * @returns An immutable snapshot, or null if the id was never saved or is deleted
   */
  async getDocument(id: string): Promise<Document | null> {
    const backend = this.#requireOpen("getDocument");
    if (id.length === 0) {
      return null;
    }

    const record = await backend.get(id);
    if (!record || record.deleted || !record.body) {
      metrics.recordRead(this.#path, false);
      return null;
    }

    metrics.recordRead(this.#path, true);
    return new Document(id, decodeValue(record.body).freeze(), record.sequence);
  }

  /**
   * Look up a live document as an editable copy
   */
  async getMutableDocument(id: string): Promise<MutableDocument | null> {
    const doc = await this.getDocument(id);
    return doc ? doc.toMutable() : null;
  }

  /**
   * Commit a document and record the assigned sequence on it
   * @throws SaveConflictError under failOnConflict when the stored revision moved on
   * @throws StorageIOError if the commit cannot be made durable
   */
  async save(doc: MutableDocument, options: SaveOptions = {}): Promise<void> {
    this.#requireOpen("save");
    const body = encodeValue(doc.properties());
    const expected = options.concurrency === "failOnConflict" ? doc.sequence : undefined;

    await this.#mutex.withLock(async () => {
      const backend = this.#requireOpen("save");
      const sequence = backend.nextSequence();
      const startTime = performance.now();

      const result = await this.#commit(() => backend.put(doc.id, body, sequence, expected));
      doc[ASSIGN_SEQUENCE](sequence);

      metrics.recordSave(this.#path, performance.now() - startTime);
      logger.debug("db.save", {
        database: this.#name,
        id: doc.id,
        details: { sequence, created: result.created, bytes: body.length },
      });
    });

    this.#notify([doc.id]);
  }

  /**
   * Delete a document, leaving a tombstone that consumes a sequence
   * @returns false if there was no live document to delete
   * @throws SaveConflictError under failOnConflict when the document changed since it was loaded
   */
  async deleteDocument(target: string | DocumentView, options: SaveOptions = {}): Promise<boolean> {
    this.#requireOpen("deleteDocument");
    const id = typeof target === "string" ? target : target.id;
    if (id.length === 0) {
      throw new InvalidDocumentIdError(id);
    }
    const expected =
      options.concurrency === "failOnConflict" && typeof target !== "string" ? target.sequence : undefined;

    const deleted = await this.#mutex.withLock(async () => {
      const backend = this.#requireOpen("deleteDocument");
      const sequence = backend.nextSequence();
      const removed = await this.#commit(() => backend.delete(id, sequence, expected));
      if (removed) {
        metrics.recordDelete(this.#path);
        logger.debug("db.delete", { database: this.#name, id, details: { sequence } });
      }
      return removed;
    });

    if (deleted) {
      this.#notify([id]);
    }
    return deleted;
  }

  /**
   * Fold the storage journal into its base image
   */
  async compact(): Promise<void> {
    this.#requireOpen("compact");
    await this.#mutex.withLock(async () => {
      await this.#requireOpen("compact").compact();
      metrics.recordCompaction(this.#path);
    });
  }

  /**
   * Register a listener called with the ids of every commit
   */
  addChangeListener(listener: ChangeListener): ListenerToken {
    this.#requireOpen("addChangeListener");
    this.#listeners.add(listener);
    return {
      remove: () => {
        this.#listeners.delete(listener);
      },
    };
  }

  /**
   * Register a listener for commits to one document
   */
  addDocumentChangeListener(id: string, listener: DocumentChangeListener): ListenerToken {
    this.#requireOpen("addDocumentChangeListener");
    let listeners = this.#documentListeners.get(id);
    if (!listeners) {
      listeners = new Set();
      this.#documentListeners.set(id, listeners);
    }
    listeners.add(listener);

    return {
      remove: () => {
        const current = this.#documentListeners.get(id);
        current?.delete(listener);
        if (current?.size === 0) {
          this.#documentListeners.delete(id);
        }
      },
    };
  }

  /**
   * Hold notifications until `sendNotifications()`; `onReady` runs each time
   * the queue goes from empty to non-empty
   */
  bufferNotifications(onReady: (db: Database) => void): void {
    this.#requireOpen("bufferNotifications");
    this.#buffer = { onReady, pending: this.#buffer?.pending ?? [] };
  }

  /**
   * Deliver queued notifications, one call per listener with de-duplicated ids
   * @returns true if anything was delivered
   */
  sendNotifications(): boolean {
    this.#requireOpen("sendNotifications");
    if (!this.#buffer || this.#buffer.pending.length === 0) {
      return false;
    }
    const ids = Array.from(new Set(this.#buffer.pending));
    this.#buffer.pending = [];
    this.#deliver(ids);
    return true;
  }

  stats(): DatabaseStats {
    const backend = this.#requireOpen("stats");
    return {
      ...metrics.snapshot(this.#path),
      count: backend.count,
      lastSequence: backend.lastSequence,
    };
  }

  /**
   * Run `fn` and close the database afterwards, whether or not it throws
   */
  async use<T>(fn: (db: this) => Promise<T> | T): Promise<T> {
    this.#requireOpen("use");
    let result: T;
    try {
      result = await fn(this);
    } catch (err) {
      await this.close().catch((closeErr: unknown) => {
        logger.warn("db.close.failed", {
          database: this.#name,
          message: closeErr instanceof Error ? closeErr.message : String(closeErr),
        });
      });
      throw err;
    }
    await this.close();
    return result;
  }

  /**
   * Release the storage handle; later operations fail with DatabaseClosedError
   */
  async close(): Promise<void> {
    await this.#mutex.withLock(async () => {
      if (this.#state === "closed") {
        return;
      }
      const wasOpen = this.#state === "open";
      this.#state = "closed";
      this.#listeners.clear();
      this.#documentListeners.clear();
      this.#buffer = null;

      const backend = this.#backend;
      const claim = this.#claim;
      this.#backend = null;
      this.#claim = null;

      try {
        await backend?.close();
      } finally {
        await claim?.release();
      }

      if (wasOpen) {
        logger.debug("db.close", { database: this.#name, message: this.#path });
      }
    });
  }

  #requireOpen(operation: string): StorageBackend {
    if (this.#state !== "open" || !this.#backend) {
      throw new DatabaseClosedError(this.#name, operation);
    }
    return this.#backend;
  }

  async #commit<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof SaveConflictError) {
        metrics.recordConflict(this.#path);
        logger.debug("db.conflict", { database: this.#name, id: err.key, message: err.message });
      }
      throw err;
    }
  }

  #notify(ids: string[]): void {
    if (this.#state !== "open") {
      return;
    }
    if (this.#buffer) {
      const buffer = this.#buffer;
      const wasEmpty = buffer.pending.length === 0;
      buffer.pending.push(...ids);
      if (wasEmpty) {
        this.#invoke(() => buffer.onReady(this));
      }
      return;
    }
    this.#deliver(ids);
  }

  #deliver(ids: string[]): void {
    for (const listener of Array.from(this.#listeners)) {
      this.#invoke(() => listener(this, ids));
    }
    for (const id of ids) {
      const listeners = this.#documentListeners.get(id);
      if (!listeners) continue;
      for (const listener of Array.from(listeners)) {
        this.#invoke(() => listener(this, id));
      }
    }
  }

  /**
   * Run a callback after a commit; what it throws is logged, not rethrown
   */
  #invoke(call: () => void): void {
    try {
      call();
    } catch (err) {
      logger.error("db.listener.failed", {
        database: this.#name,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Remove a database's file-set; a no-op if absent
 * @throws ResourceBusyError while the database is open
 */
export async function deleteDatabase(
  name: string,
  directory: string,
  backend: BackendKind = "file"
): Promise<void> {
  await Database.deleteFile(name, directory, backend);
}

export async function databaseExists(
  name: string,
  directory: string,
  backend: BackendKind = "file"
): Promise<boolean> {
  return Database.exists(name, directory, backend);
}
