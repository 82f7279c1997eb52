import { describe, it, expect } from "vitest";
import { ASSIGN_SEQUENCE, Document, MutableDocument, type DocumentView } from "./document.js";
import { ImmutableDocumentError, InvalidDocumentIdError } from "./errors.js";
import { DictValue, Values, asString, toDict } from "./value.js";

describe("MutableDocument", () => {
  it("should start empty and unsaved", () => {
    const doc = new MutableDocument("foo");

    expect(doc.id).toBe("foo");
    expect(doc.sequence).toBe(0);
    expect(doc.properties().size).toBe(0);
    expect(doc.properties().toJSON()).toEqual({});
  });

  it("should generate an id when none is given", () => {
    const a = new MutableDocument();
    const b = new MutableDocument();

    expect(a.id).toMatch(/^-[0-9a-f]{32}$/);
    expect(a.id).not.toBe(b.id);
  });

  it("should reject an empty id", () => {
    expect(() => new MutableDocument("")).toThrow(InvalidDocumentIdError);
  });

  it("should expose live properties", () => {
    const doc = new MutableDocument("foo");
    doc.properties().set("flavor", "cardamom");
    doc.set("color", "green");

    expect(asString(doc.get("flavor"))).toBe("cardamom");
    expect(doc.propertiesAsJSON()).toBe('{"flavor":"cardamom","color":"green"}');
  });

  it("should copy initial properties", () => {
    const source = toDict({ a: 1 });
    const doc = new MutableDocument("foo", source);
    source.set("b", 2);

    expect(doc.properties().has("b")).toBe(false);
  });

  it("should replace the body from JSON", () => {
    const doc = new MutableDocument("foo", { old: true });
    doc.setPropertiesAsJSON('{"n": 2, "f": 2.5}');

    expect(doc.properties().keys()).toEqual(["n", "f"]);
    expect(doc.get("n").kind).toBe("int");
    expect(doc.get("f").kind).toBe("float");
  });

  it("should not share a body with another document", () => {
    const a = new MutableDocument("a", { color: "red" });
    const b = new MutableDocument("b");
    b.set("copy", a.properties());
    a.set("color", "blue");

    expect(asString(b.getPath("copy.color"))).toBe("red");
  });

  it("should copy a container inserted a second time", () => {
    const doc = new MutableDocument("foo");
    const shared = new DictValue({ n: 1 });
    doc.set("one", shared);
    doc.set("two", shared);
    shared.set("n", 2);

    expect(doc.getPath("one.n")).toMatchObject({ kind: "int", value: 2n });
    expect(doc.getPath("two.n")).toMatchObject({ kind: "int", value: 1n });
  });

  it("should write nested paths", () => {
    const doc = new MutableDocument("foo").setPath("a.b", 1);
    expect(doc.toJSON()).toEqual({ id: "foo", sequence: 0, properties: { a: { b: 1 } } });
  });
});

describe("Document", () => {
  it("should freeze its properties", () => {
    const doc = new Document("foo", toDict({ list: [1] }));

    expect(doc.properties().frozen).toBe(true);
    expect(doc.isMutable).toBe(false);
  });

  it("should reject set with ImmutableDocumentError", () => {
    const doc: DocumentView = new Document("foo");
    expect(() => doc.set("color", "green")).toThrow(ImmutableDocumentError);
  });

  it("should not be affected by edits to the dict it was built from", () => {
    const source = toDict({ a: 1 });
    const doc = new Document("foo", source);
    source.set("a", 2);

    expect(doc.get("a")).toMatchObject({ kind: "int", value: 1n });
  });

  it("should convert to an independent mutable copy with the same sequence", () => {
    const snapshot = new Document("foo", toDict({ color: "green" }), 4);
    const copy = snapshot.toMutable();
    copy.set("color", "blue");

    expect(copy.sequence).toBe(4);
    expect(asString(snapshot.get("color"))).toBe("green");
    expect(copy.properties().frozen).toBe(false);
  });
});

describe("equality", () => {
  it("should ignore sequence", () => {
    const mutable = new MutableDocument("foo", { color: "green" });
    mutable[ASSIGN_SEQUENCE](7);
    const snapshot = new Document("foo", toDict({ color: "green" }), 2);

    expect(snapshot.equals(mutable)).toBe(true);
    expect(mutable.equals(snapshot)).toBe(true);
  });

  it("should compare ids and numeric kinds", () => {
    const a = new MutableDocument("a", { n: 3 });

    expect(a.equals(new MutableDocument("b", { n: 3 }))).toBe(false);
    expect(a.equals(new MutableDocument("a", { n: Values.float(3) }))).toBe(false);
  });

  it("should survive a mutable round trip", () => {
    const doc = new MutableDocument("foo", { list: [1, 2], nested: { x: "y" } });
    const snapshot = doc.toImmutable();

    expect(snapshot.equals(doc)).toBe(true);
    expect(snapshot.toMutable().equals(doc)).toBe(true);
  });
});
