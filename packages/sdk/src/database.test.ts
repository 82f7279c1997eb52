import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Database, databaseExists, deleteDatabase } from "./database.js";
import { MutableDocument } from "./document.js";
import {
  DatabaseClosedError,
  ImmutableDocumentError,
  OpenError,
  ResourceBusyError,
  SaveConflictError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { Values, asString, toDict, valueEquals } from "./value.js";

describe("Database", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "tallydb-test-"));
    logger.setEnabled(false);
    metrics.reset();
  });

  afterEach(async () => {
    logger.setEnabled(true);
    await rm(testDir, { recursive: true, force: true });
  });

  describe("open()", () => {
    it("should create an empty database", async () => {
      const db = await Database.open("db", { directory: testDir });

      expect(db.state).toBe("open");
      expect(db.count).toBe(0);
      expect(db.lastSequence).toBe(0);
      expect(db.path).toBe(join(testDir, "db.tallydb"));
      expect(await databaseExists("db", testDir)).toBe(true);
      await db.close();
    });

    it("should support construct-then-open", async () => {
      const db = new Database("db", { directory: testDir });
      expect(db.state).toBe("unopened");
      expect(() => db.count).toThrow(DatabaseClosedError);

      await db.open();
      await db.open();
      expect(db.state).toBe("open");
      await db.close();
    });

    it("should refuse a second handle on the same path", async () => {
      const db = await Database.open("db", { directory: testDir });

      await expect(Database.open("db", { directory: testDir })).rejects.toThrow(ResourceBusyError);
      await db.close();

      const again = await Database.open("db", { directory: testDir });
      await again.close();
    });

    it("should reject invalid names and configuration", async () => {
      await expect(Database.open("a/b", { directory: testDir })).rejects.toThrow(OpenError);
      await expect(
        Database.open("db", { directory: testDir, compactThreshold: -1 })
      ).rejects.toThrow(OpenError);
    });

    it("should surface corruption as OpenError and release the path", async () => {
      const db = await Database.open("db", { directory: testDir });
      await db.close();
      await writeFile(join(db.path, "snapshot.json"), "not json");

      await expect(Database.open("db", { directory: testDir })).rejects.toThrow(OpenError);
      await expect(Database.open("db", { directory: testDir })).rejects.toThrow(OpenError);
    });

    it("should not reopen a closed handle", async () => {
      const db = await Database.open("db", { directory: testDir });
      await db.close();

      await expect(db.open()).rejects.toThrow(DatabaseClosedError);
    });
  });

  describe("documents", () => {
    let db: Database;

    beforeEach(async () => {
      db = await Database.open("db", { directory: testDir });
    });

    afterEach(async () => {
      await db.close();
    });

    it("should return null for ids never saved", async () => {
      expect(await db.getDocument("nope")).toBeNull();
      expect(await db.getMutableDocument("nope")).toBeNull();
      expect(await db.getDocument("")).toBeNull();
    });

    it("should bump count and lastSequence by one on a first save", async () => {
      const doc = new MutableDocument("foo", {
        flavor: "cardamom",
        numbers: [1, 0, 3.125],
        color: "green",
      });

      await db.save(doc);

      expect(db.count).toBe(1);
      expect(db.lastSequence).toBe(1);
      expect(doc.sequence).toBe(1);
    });

    it("should round-trip properties including numeric kinds", async () => {
      const props = toDict({
        flavor: "cardamom",
        numbers: [1, 0, 3.125],
        whole: Values.float(2),
        big: 2n ** 62n,
        nested: { tags: ["a", "b"] },
      });
      await db.save(new MutableDocument("foo", props));

      const stored = await db.getDocument("foo");
      expect(stored).not.toBeNull();
      expect(valueEquals(stored?.properties() ?? toDict({}), props)).toBe(true);
      expect(stored?.get("whole").kind).toBe("float");
      expect(stored?.sequence).toBe(1);
    });

    it("should keep count but advance the sequence on overwrite", async () => {
      const doc = new MutableDocument("foo", { v: 1 });
      await db.save(doc);
      doc.set("v", 2);
      await db.save(doc);

      expect(db.count).toBe(1);
      expect(db.lastSequence).toBe(2);
      expect((await db.getDocument("foo"))?.get("v")).toMatchObject({ kind: "int", value: 2n });
    });

    it("should hand out immutable snapshots and independent mutable copies", async () => {
      await db.save(new MutableDocument("foo", { color: "green" }));

      const snapshot = await db.getDocument("foo");
      expect(() => snapshot?.set("color", "blue")).toThrow(ImmutableDocumentError);

      const copy = await db.getMutableDocument("foo");
      copy?.set("color", "blue");
      expect(asString((await db.getDocument("foo"))?.get("color") ?? Values.null())).toBe("green");
      expect(db.lastSequence).toBe(1);
    });

    it("should delete documents, consuming a sequence", async () => {
      await db.save(new MutableDocument("foo", { color: "green" }));

      expect(await db.deleteDocument("foo")).toBe(true);
      expect(db.count).toBe(0);
      expect(db.lastSequence).toBe(2);
      expect(await db.getDocument("foo")).toBeNull();

      expect(await db.deleteDocument("foo")).toBe(false);
      expect(db.lastSequence).toBe(2);
    });

    it("should overwrite stale copies under lastWriteWins", async () => {
      await db.save(new MutableDocument("foo", { v: 1 }));
      const stale = await db.getMutableDocument("foo");
      const fresh = await db.getMutableDocument("foo");
      if (!stale || !fresh) throw new Error("missing document");

      await db.save(fresh.set("v", 2));
      await db.save(stale.set("v", 3));

      expect((await db.getDocument("foo"))?.get("v")).toMatchObject({ value: 3n });
    });

    it("should reject stale copies under failOnConflict", async () => {
      await db.save(new MutableDocument("foo", { v: 1 }));
      const stale = await db.getMutableDocument("foo");
      const fresh = await db.getMutableDocument("foo");
      if (!stale || !fresh) throw new Error("missing document");

      await db.save(fresh.set("v", 2), { concurrency: "failOnConflict" });
      await expect(db.save(stale.set("v", 3), { concurrency: "failOnConflict" })).rejects.toThrow(
        SaveConflictError
      );

      expect(db.lastSequence).toBe(2);
      expect(stale.sequence).toBe(1);
      expect(db.stats().conflicts).toBe(1);
    });

    it("should reject a new document over an existing id under failOnConflict", async () => {
      await db.save(new MutableDocument("foo"));
      await expect(
        db.save(new MutableDocument("foo"), { concurrency: "failOnConflict" })
      ).rejects.toThrow(SaveConflictError);
    });

    it("should reject deleting a changed document under failOnConflict", async () => {
      await db.save(new MutableDocument("foo", { v: 1 }));
      const loaded = await db.getDocument("foo");
      if (!loaded) throw new Error("missing document");
      await db.save(loaded.toMutable().set("v", 2));

      await expect(db.deleteDocument(loaded, { concurrency: "failOnConflict" })).rejects.toThrow(
        SaveConflictError
      );
      expect(db.count).toBe(1);
    });

    it("should serialize concurrent saves", async () => {
      const docs = Array.from({ length: 10 }, (_, i) => new MutableDocument(`doc-${i}`, { i }));

      await Promise.all(docs.map((doc) => db.save(doc)));

      expect(db.count).toBe(10);
      expect(db.lastSequence).toBe(10);
      expect(new Set(docs.map((doc) => doc.sequence)).size).toBe(10);
    });

    it("should compact without changing contents", async () => {
      await db.save(new MutableDocument("foo", { v: 1 }));
      await db.compact();

      expect(db.count).toBe(1);
      expect(db.stats().compactions).toBe(1);
      expect(await readdir(db.path)).toContain("snapshot.json");
    });

    it("should report stats", async () => {
      await db.save(new MutableDocument("foo"));
      await db.getDocument("foo");
      await db.getDocument("bar");

      expect(db.stats()).toMatchObject({
        count: 1,
        lastSequence: 1,
        reads: 2,
        hitRate: 0.5,
        saves: 1,
        deletes: 0,
      });
    });
  });

  describe("close()", () => {
    it("should be idempotent", async () => {
      const db = await Database.open("db", { directory: testDir });
      await db.save(new MutableDocument("foo"));
      const before = { count: db.count, lastSequence: db.lastSequence };

      await db.close();
      await db.close();

      const reopened = await Database.open("db", { directory: testDir });
      expect({ count: reopened.count, lastSequence: reopened.lastSequence }).toEqual(before);
      await reopened.close();
    });

    it("should fail later operations with DatabaseClosedError", async () => {
      const db = await Database.open("db", { directory: testDir });
      const doc = new MutableDocument("foo");
      await db.close();

      await expect(db.getDocument("foo")).rejects.toThrow(DatabaseClosedError);
      await expect(db.getMutableDocument("foo")).rejects.toThrow(DatabaseClosedError);
      await expect(db.save(doc)).rejects.toThrow(DatabaseClosedError);
      await expect(db.deleteDocument("foo")).rejects.toThrow(DatabaseClosedError);
      await expect(db.compact()).rejects.toThrow(DatabaseClosedError);
      expect(() => db.lastSequence).toThrow('Database "db" is not open (attempted lastSequence)');
      expect(() => db.addChangeListener(() => undefined)).toThrow(DatabaseClosedError);
    });

    it("should release the lock file", async () => {
      const db = await Database.open("db", { directory: testDir });
      expect(await readdir(db.path)).toContain("LOCK");

      await db.close();
      expect(await readdir(db.path)).not.toContain("LOCK");
    });
  });

  describe("deleteFile()", () => {
    it("should be a no-op for a missing database", async () => {
      await Database.deleteFile("missing", testDir);
      expect(await databaseExists("missing", testDir)).toBe(false);
    });

    it("should remove all persisted state", async () => {
      const db = await Database.open("db", { directory: testDir });
      await db.save(new MutableDocument("foo"));
      await db.close();

      await deleteDatabase("db", testDir);
      expect(await databaseExists("db", testDir)).toBe(false);

      const fresh = await Database.open("db", { directory: testDir });
      expect(fresh.count).toBe(0);
      expect(fresh.lastSequence).toBe(0);
      await fresh.close();
    });

    it("should refuse while the database is open", async () => {
      const db = await Database.open("db", { directory: testDir });

      await expect(Database.deleteFile("db", testDir)).rejects.toThrow(ResourceBusyError);
      expect(await databaseExists("db", testDir)).toBe(true);
      await db.close();
    });
  });

  describe("persistence", () => {
    it("should keep documents across close and reopen", async () => {
      const db = await Database.open("db", { directory: testDir });
      await db.save(new MutableDocument("foo", { color: "green" }));
      await db.close();

      const reopened = await Database.open("db", { directory: testDir });
      const doc = await reopened.getDocument("foo");
      expect(asString(doc?.get("color") ?? Values.null())).toBe("green");
      expect(reopened.lastSequence).toBe(1);
      await reopened.close();
    });

    it("should keep the sequence counter after deletes and compaction", async () => {
      const db = await Database.open("db", { directory: testDir, compactThreshold: 2 });
      await db.save(new MutableDocument("a"));
      await db.save(new MutableDocument("b"));
      await db.deleteDocument("a");
      await db.close();

      const reopened = await Database.open("db", { directory: testDir });
      expect(reopened.count).toBe(1);
      expect(reopened.lastSequence).toBe(3);
      expect(await reopened.getDocument("a")).toBeNull();
      await reopened.close();
    });
  });

  describe("automatic compaction", () => {
    it("should acknowledge a save whose compaction fails", async () => {
      const db = await Database.open("db", { directory: testDir, compactThreshold: 1 });
      const snapshotPath = join(db.path, "snapshot.json");
      // A non-empty directory in the snapshot's place makes the rename fail
      await mkdir(join(snapshotPath, "blocker"), { recursive: true });

      const doc = new MutableDocument("a", { n: 1 });
      await db.save(doc);
      expect(doc.sequence).toBe(1);
      expect(db.lastSequence).toBe(1);

      await db.save(doc, { concurrency: "failOnConflict" });
      expect(doc.sequence).toBe(2);

      await rm(snapshotPath, { recursive: true });
      await db.save(new MutableDocument("b"));
      await db.close();

      const reopened = await Database.open("db", { directory: testDir });
      expect(reopened.count).toBe(2);
      expect(reopened.lastSequence).toBe(3);
      expect((await reopened.getDocument("a"))?.sequence).toBe(2);
      await reopened.close();
    });
  });

  describe("memory backend", () => {
    it("should behave like the file backend without touching disk", async () => {
      const db = await Database.open("mem", { directory: testDir, backend: "memory" });
      await db.save(new MutableDocument("foo", { v: 1 }));
      await db.close();

      expect(await readdir(testDir)).toEqual([]);

      const reopened = await Database.open("mem", { directory: testDir, backend: "memory" });
      expect(reopened.count).toBe(1);
      await reopened.close();

      await Database.deleteFile("mem", testDir, "memory");
      expect(await databaseExists("mem", testDir, "memory")).toBe(false);
    });
  });
});
