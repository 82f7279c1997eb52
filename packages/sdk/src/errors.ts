/**
 * Error types for TallyDB operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Lookup misses are never errors; they are `null` results
 */

/**
 * Base class for all TallyDB errors
 */
export abstract class TallyDBError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a database file-set cannot be opened or created
 */
export class OpenError extends TallyDBError {
  readonly code = "OPEN_ERROR";

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Cannot open database at ${path}: ${reason}`, options);
  }
}

/**
 * Thrown when an operation is attempted on a database that is not open
 */
export class DatabaseClosedError extends TallyDBError {
  readonly code = "DB_CLOSED";

  constructor(name: string, operation: string) {
    super(`Database "${name}" is not open (attempted ${operation})`);
  }
}

/**
 * Thrown when a read-only document or one of its containers is modified
 */
export class ImmutableDocumentError extends TallyDBError {
  readonly code = "IMMUTABLE";

  constructor(detail = "properties of an immutable document cannot be modified") {
    super(`Immutable document: ${detail}`);
  }
}

/**
 * Thrown when a property write conflicts with the kind of an existing value
 */
export class TypeMismatchError extends TallyDBError {
  readonly code = "TYPE_MISMATCH";

  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Type mismatch at "${path}": expected ${expected}, found ${actual}`);
  }
}

/**
 * Thrown when a file-set is opened or deleted while another handle holds it
 */
export class ResourceBusyError extends TallyDBError {
  readonly code = "BUSY";

  constructor(
    public readonly path: string,
    holder: string,
    options?: ErrorOptions
  ) {
    super(`Database at ${path} is in use (${holder})`, options);
  }
}

/**
 * Thrown when a commit would overwrite a revision the caller has not seen
 */
export class SaveConflictError extends TallyDBError {
  readonly code = "CONFLICT";

  constructor(
    public readonly key: string,
    public readonly expectedSequence: number,
    public readonly actualSequence: number
  ) {
    super(
      `Conflict saving "${key}": expected sequence ${expectedSequence}, store has ${actualSequence}`
    );
  }
}

/**
 * Thrown when the storage substrate fails to read or write
 */
export class StorageIOError extends TallyDBError {
  readonly code = "IO_ERROR";

  constructor(target: string, action: string, options?: ErrorOptions) {
    super(`Storage ${action} failed: ${target}`, options);
  }
}

/**
 * Thrown when native input cannot be represented as a property value
 */
export class InvalidValueError extends TallyDBError {
  readonly code = "INVALID_VALUE";

  constructor(reason: string) {
    super(`Invalid property value: ${reason}`);
  }
}

/**
 * Thrown when a document identifier is empty or not a string
 */
export class InvalidDocumentIdError extends TallyDBError {
  readonly code = "INVALID_ID";

  constructor(id: unknown) {
    super(`Invalid document id: ${JSON.stringify(id) ?? String(id)}`);
  }
}

/**
 * Thrown when encoded property bytes cannot be decoded
 */
export class CorruptValueError extends TallyDBError {
  readonly code = "CORRUPT";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Corrupt encoded value: ${reason}`, options);
  }
}

/**
 * Read the `code` of a Node.js system error, if it has one
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
