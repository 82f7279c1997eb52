import type { BackendKind } from "../config.js";
import { fileBackend } from "./file.js";
import { memoryBackend } from "./memory.js";
import type { StorageBackendFactory } from "./types.js";

export { FileBackend, fileBackend, JOURNAL_FILE, SNAPSHOT_FILE } from "./file.js";
export { MemoryBackend, memoryBackend } from "./memory.js";
export type { Mutation } from "./record-table.js";
export { RecordTable } from "./record-table.js";
export type {
  BackendOptions,
  CommitResult,
  StorageBackend,
  StorageBackendFactory,
  StoredRecord,
} from "./types.js";

const factories: Record<BackendKind, StorageBackendFactory> = {
  file: fileBackend,
  memory: memoryBackend,
};

/**
 * Factory for a configured backend kind
 */
export function backendFor(kind: BackendKind): StorageBackendFactory {
  return factories[kind];
}
