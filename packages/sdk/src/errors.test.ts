import { describe, it, expect } from "vitest";
import {
  DatabaseClosedError,
  OpenError,
  SaveConflictError,
  StorageIOError,
  TallyDBError,
  errnoCode,
} from "./errors.js";

describe("errors", () => {
  it("should carry a stable name and code", () => {
    const err = new SaveConflictError("foo", 1, 2);

    expect(err).toBeInstanceOf(TallyDBError);
    expect(err.name).toBe("SaveConflictError");
    expect(err.code).toBe("CONFLICT");
    expect(err.message).toBe('Conflict saving "foo": expected sequence 1, store has 2');
  });

  it("should keep the underlying cause", () => {
    const cause = new Error("disk full");
    const err = new StorageIOError("/data/db.tallydb/journal.jsonl", "append", { cause });

    expect(err.cause).toBe(cause);
    expect(err.message).toBe("Storage append failed: /data/db.tallydb/journal.jsonl");
  });

  it("should name the operation attempted on a closed database", () => {
    expect(new DatabaseClosedError("db", "save").message).toBe(
      'Database "db" is not open (attempted save)'
    );
    expect(new OpenError("/x", "bad").message).toBe("Cannot open database at /x: bad");
  });

  it("should read errno codes only from errors", () => {
    const err = Object.assign(new Error("missing"), { code: "ENOENT" });

    expect(errnoCode(err)).toBe("ENOENT");
    expect(errnoCode({ code: "ENOENT" })).toBeUndefined();
    expect(errnoCode(new Error("plain"))).toBeUndefined();
  });
});
