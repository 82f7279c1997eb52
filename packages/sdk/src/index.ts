/**
 * TallyDB SDK
 *
 * An embedded, file-backed document database with immutable snapshots,
 * mutable copies and a database-wide commit sequence
 */

// Values
export type {
  BooleanValue,
  FloatValue,
  IntValue,
  NullValue,
  PlainValue,
  PropertyPath,
  ReadonlyArrayValue,
  ReadonlyDictValue,
  ReadonlyValue,
  ScalarValue,
  StringValue,
  Value,
  ValueInput,
  ValueKind,
} from "./value.js";
export {
  ArrayValue,
  DictValue,
  asBoolean,
  asNumber,
  asString,
  isValue,
  parseJSONProperties,
  toDict,
  toJSONString,
  toNative,
  toValue,
  valueEquals,
  Values,
} from "./value.js";
export { canonicalString, decodeValue, encodeValue } from "./codec.js";

// Documents
export type { DocumentJSON, DocumentView } from "./document.js";
export { Document, MutableDocument, generateDocumentId } from "./document.js";

// Database
export type {
  ChangeListener,
  ConcurrencyControl,
  DatabaseState,
  DatabaseStats,
  DocumentChangeListener,
  ListenerToken,
  SaveOptions,
} from "./database.js";
export { Database, databaseExists, deleteDatabase } from "./database.js";
export type { BackendKind, DatabaseConfiguration, ResolvedConfiguration } from "./config.js";
export {
  DatabaseConfigurationSchema,
  FILE_SET_EXTENSION,
  databasePath,
  expandTilde,
  resolveConfiguration,
  validateDatabaseName,
} from "./config.js";

// Sessions
export type { PathClaim } from "./session.js";
export { isPathOpen, LOCK_FILE, withDatabase } from "./session.js";

// Storage
export type {
  BackendOptions,
  CommitResult,
  StorageBackend,
  StorageBackendFactory,
  StoredRecord,
} from "./storage/index.js";
export { backendFor, FileBackend, fileBackend, MemoryBackend, memoryBackend } from "./storage/index.js";

// Errors
export {
  TallyDBError,
  OpenError,
  DatabaseClosedError,
  ImmutableDocumentError,
  TypeMismatchError,
  ResourceBusyError,
  SaveConflictError,
  StorageIOError,
  InvalidValueError,
  InvalidDocumentIdError,
  CorruptValueError,
} from "./errors.js";

// Observability
export type { LogEntry, LogLevel } from "./observability/logs.js";
export { logger } from "./observability/logs.js";
export type { MetricsSnapshot } from "./observability/metrics.js";
export { metrics } from "./observability/metrics.js";
