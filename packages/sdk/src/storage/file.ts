/**
 * File-backed storage: a base snapshot plus an append-only journal
 *
 * Layout inside the file-set directory:
 * - snapshot.json  counters and every record as of the last compaction
 * - journal.jsonl  one line per commit since then
 *
 * Invariants:
 * - A commit is acknowledged only after its journal line is flushed
 * - The snapshot is only ever replaced atomically (write → fsync → rename)
 * - Journal lines at or below the snapshot's lastSequence are already folded in
 * - A final journal line without its newline is an unacknowledged commit and is dropped
 * - A failed append is cut back off the journal; if that fails too, the backend
 *   refuses further commits
 */

import { join } from "node:path";
import { z } from "zod";
import { OpenError, StorageIOError } from "../errors.js";
import {
  appendDurable,
  atomicWrite,
  ensureDirectory,
  pathExists,
  readFileIfExists,
  removePath,
  truncateFile,
} from "../io.js";
import { logger } from "../observability/logs.js";
import type { Mutation } from "./record-table.js";
import { RecordTable } from "./record-table.js";
import type { BackendOptions, StorageBackend, StorageBackendFactory } from "./types.js";

export const SNAPSHOT_FILE = "snapshot.json";
export const JOURNAL_FILE = "journal.jsonl";
const FORMAT_VERSION = 1;
const DEFAULT_COMPACT_THRESHOLD = 1000;

const SequenceSchema = z.number().int().positive();

const SnapshotRecordSchema = z.object({
  key: z.string(),
  seq: SequenceSchema,
  deleted: z.boolean().optional(),
  body: z.string().optional(),
});

const SnapshotSchema = z.object({
  format: z.literal(FORMAT_VERSION),
  lastSequence: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  records: z.array(SnapshotRecordSchema),
});

const JournalEntrySchema = z.object({
  op: z.enum(["put", "delete"]),
  key: z.string(),
  seq: SequenceSchema,
  body: z.string().optional(),
});

type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;
type JournalEntry = z.infer<typeof JournalEntrySchema>;

function encodeBody(body: Uint8Array): string {
  return Buffer.from(body).toString("base64");
}

function decodeBody(body: string | undefined): Uint8Array {
  return new Uint8Array(Buffer.from(body ?? "", "base64"));
}

function parseJsonLine(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export class FileBackend extends RecordTable {
  #snapshotPath: string;
  #journalPath: string;
  #fsync: boolean;
  #compactThreshold: number;
  #journalEntries = 0;
  #journalBytes = 0;
  #failure: StorageIOError | null = null;

  private constructor(path: string, options: BackendOptions) {
    super(path);
    this.#snapshotPath = join(path, SNAPSHOT_FILE);
    this.#journalPath = join(path, JOURNAL_FILE);
    this.#fsync = options.fsync ?? true;
    this.#compactThreshold = options.compactThreshold ?? DEFAULT_COMPACT_THRESHOLD;
  }

  /**
   * Open (creating if needed) the file-set at `path` and replay its journal
   * @throws OpenError if the snapshot or journal is corrupt
   * @throws StorageIOError if the files cannot be read or created
   */
  static async open(path: string, options: BackendOptions = {}): Promise<FileBackend> {
    await ensureDirectory(path);
    const backend = new FileBackend(path, options);
    await backend.#recover();
    return backend;
  }

  /**
   * Number of journal lines not yet folded into the snapshot
   */
  get pendingEntries(): number {
    return this.#journalEntries;
  }

  async compact(): Promise<void> {
    this.checkOpen("compact");

    const records: SnapshotRecord[] = this.records().map((record) =>
      record.deleted
        ? { key: record.key, seq: record.sequence, deleted: true }
        : { key: record.key, seq: record.sequence, body: encodeBody(record.body ?? new Uint8Array()) }
    );
    const snapshot: z.infer<typeof SnapshotSchema> = {
      format: FORMAT_VERSION,
      lastSequence: this.lastSequence,
      count: this.count,
      records,
    };

    await atomicWrite(this.#snapshotPath, `${JSON.stringify(snapshot)}\n`, { fsync: this.#fsync });
    await truncateFile(this.#journalPath);

    logger.debug("storage.compact", {
      message: this.path,
      details: { folded: this.#journalEntries, lastSequence: this.lastSequence },
    });
    this.#journalEntries = 0;
    this.#journalBytes = 0;
  }

  protected async persist(mutation: Mutation): Promise<void> {
    if (this.#failure) {
      throw new StorageIOError(this.path, "commit", { cause: this.#failure });
    }

    const entry: JournalEntry = { op: mutation.op, key: mutation.key, seq: mutation.sequence };
    if (mutation.body) {
      entry.body = encodeBody(mutation.body);
    }

    const line = `${JSON.stringify(entry)}\n`;
    try {
      await appendDurable(this.#journalPath, line, { fsync: this.#fsync });
    } catch (err) {
      await this.#rollbackAppend();
      throw err;
    }
    this.#journalEntries++;
    this.#journalBytes += Buffer.byteLength(line, "utf-8");
  }

  /**
   * Compaction failures leave the commit in place; the next commit retries
   */
  protected async afterCommit(): Promise<void> {
    if (this.#journalEntries < this.#compactThreshold) {
      return;
    }
    try {
      await this.compact();
    } catch (err) {
      logger.warn("storage.compact.failed", {
        message: `${this.path}: ${err instanceof Error ? err.message : String(err)}`,
        details: { pending: this.#journalEntries },
      });
    }
  }

  /**
   * Cut a failed append back off the journal so its sequence can be reused
   */
  async #rollbackAppend(): Promise<void> {
    try {
      await truncateFile(this.#journalPath, this.#journalBytes);
    } catch (err) {
      this.#failure =
        err instanceof StorageIOError ? err : new StorageIOError(this.#journalPath, "truncate", { cause: err });
      logger.error("storage.journal.rollback_failed", {
        message: `${this.path}: ${this.#failure.message}`,
      });
    }
  }

  async #recover(): Promise<void> {
    const rawSnapshot = await readFileIfExists(this.#snapshotPath);
    if (rawSnapshot !== null) {
      this.#loadSnapshot(rawSnapshot);
    }

    const journal = await readFileIfExists(this.#journalPath);
    if (journal === null || journal.length === 0) {
      return;
    }

    const lines = journal.split("\n");
    // A clean journal ends with "\n", leaving an empty final element
    const unterminated = lines[lines.length - 1] !== "";
    let replayed = 0;
    let torn = false;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      if (line === "") {
        continue;
      }

      if (unterminated && i === lines.length - 1) {
        torn = true;
        break;
      }

      const parsed = JournalEntrySchema.safeParse(parseJsonLine(line));
      if (!parsed.success) {
        throw new OpenError(this.path, `corrupt journal entry at line ${i + 1}`);
      }

      const entry = parsed.data;
      if (entry.seq <= this.lastSequence) {
        continue;
      }
      if (entry.seq !== this.lastSequence + 1) {
        throw new OpenError(
          this.path,
          `journal sequence gap at line ${i + 1}: expected ${this.lastSequence + 1}, found ${entry.seq}`
        );
      }

      this.apply({
        op: entry.op,
        key: entry.key,
        sequence: entry.seq,
        body: entry.op === "put" ? decodeBody(entry.body) : null,
      });
      replayed++;
    }

    this.#journalEntries = replayed;
    this.#journalBytes = Buffer.byteLength(journal, "utf-8");
    logger.debug("storage.replay", {
      message: this.path,
      details: { replayed, torn, lastSequence: this.lastSequence },
    });

    // Later appends must not land on the same line as a partial write
    if (torn || unterminated) {
      logger.warn("storage.replay.torn", {
        message: `${this.path}: dropped unterminated journal tail`,
      });
      await this.compact();
    }
  }

  #loadSnapshot(raw: string): void {
    const parsed = SnapshotSchema.safeParse(parseJsonLine(raw));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unreadable";
      throw new OpenError(this.path, `corrupt snapshot (${where})`);
    }

    const snapshot = parsed.data;
    for (const record of snapshot.records) {
      this.apply({
        op: record.deleted ? "delete" : "put",
        key: record.key,
        sequence: record.seq,
        body: record.deleted ? null : decodeBody(record.body),
      });
    }

    if (this.count !== snapshot.count || this.lastSequence > snapshot.lastSequence) {
      throw new OpenError(this.path, "snapshot counters do not match its records");
    }
    this.restoreSequence(snapshot.lastSequence);
  }
}

export const fileBackend: StorageBackendFactory = {
  kind: "file",

  async open(path: string, options?: BackendOptions): Promise<StorageBackend> {
    return FileBackend.open(path, options);
  },

  async exists(path: string): Promise<boolean> {
    return pathExists(path);
  },

  async destroy(path: string): Promise<void> {
    await removePath(path);
  },
};
