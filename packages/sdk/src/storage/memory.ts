/**
 * In-process storage backend
 *
 * Images live in a process-wide map keyed by path, so a memory database
 * survives close and reopen until the process exits or it is destroyed.
 */

import type { Mutation } from "./record-table.js";
import { RecordTable } from "./record-table.js";
import type { StorageBackend, StorageBackendFactory, StoredRecord } from "./types.js";

interface MemoryImage {
  records: Map<string, StoredRecord>;
  lastSequence: number;
}

const images = new Map<string, MemoryImage>();

export class MemoryBackend extends RecordTable {
  #image: MemoryImage;

  constructor(path: string, image: MemoryImage) {
    super(path);
    this.#image = image;
    for (const record of image.records.values()) {
      this.apply({
        op: record.deleted ? "delete" : "put",
        key: record.key,
        sequence: record.sequence,
        body: record.body,
      });
    }
    this.restoreSequence(image.lastSequence);
  }

  protected async persist(mutation: Mutation): Promise<void> {
    this.#image.records.set(mutation.key, {
      key: mutation.key,
      sequence: mutation.sequence,
      deleted: mutation.op === "delete",
      body: mutation.body,
    });
    this.#image.lastSequence = mutation.sequence;
  }

  async compact(): Promise<void> {
    this.checkOpen("compact");
  }
}

export const memoryBackend: StorageBackendFactory = {
  kind: "memory",

  async open(path: string): Promise<StorageBackend> {
    let image = images.get(path);
    if (!image) {
      image = { records: new Map(), lastSequence: 0 };
      images.set(path, image);
    }
    return new MemoryBackend(path, image);
  },

  async exists(path: string): Promise<boolean> {
    return images.has(path);
  },

  async destroy(path: string): Promise<void> {
    images.delete(path);
  },
};
