/**
 * Documents: an id, the sequence it was last saved at, and a property tree
 *
 * `Document` is a frozen snapshot; `MutableDocument` is an editable copy.
 * Conversion between the two is always an explicit deep copy.
 */

import { randomUUID } from "node:crypto";
import { ImmutableDocumentError, InvalidDocumentIdError } from "./errors.js";
import {
  attachRoot,
  DictValue,
  parseJSONProperties,
  toDict,
  valueEquals,
  type PropertyPath,
  type ReadonlyDictValue,
  type ReadonlyValue,
  type Value,
  type ValueInput,
} from "./value.js";

/**
 * Used by the database to record the sequence a save was committed at
 */
export const ASSIGN_SEQUENCE: unique symbol = Symbol("tallydb.assignSequence");

/**
 * Read capabilities shared by both document variants
 */
export interface DocumentView {
  /** Document identifier, never empty */
  readonly id: string;
  /** Sequence of the last known save, 0 if never saved */
  readonly sequence: number;
  /** True for MutableDocument */
  readonly isMutable: boolean;
  properties(): ReadonlyDictValue;
  get(key: string): ReadonlyValue;
  getPath(path: PropertyPath): ReadonlyValue;
  /**
   * Set a top-level property; check `isMutable` first
   * @throws ImmutableDocumentError on a snapshot
   */
  set(key: string, input: ValueInput): DocumentView;
  /** Same id and structurally equal properties; sequence is ignored */
  equals(other: DocumentView): boolean;
  propertiesAsJSON(): string;
}

/**
 * JSON shape of a document, as printed by the CLI
 */
export interface DocumentJSON {
  id: string;
  sequence: number;
  properties: Record<string, unknown>;
}

function checkId(id: unknown): string {
  if (typeof id !== "string" || id.length === 0) {
    throw new InvalidDocumentIdError(id);
  }
  return id;
}

/**
 * Generate an id for a document created without one
 */
export function generateDocumentId(): string {
  return `-${randomUUID().replaceAll("-", "")}`;
}

/**
 * Immutable snapshot of a stored document
 *
 * @example
 * ```typescript
 * const doc = await db.getDocument("foo");
 * if (doc) {
 *   console.log(asString(doc.get("color")));
 * }
 * ```
 */
export class Document implements DocumentView {
  readonly #id: string;
  readonly #sequence: number;
  readonly #properties: DictValue;

  /**
   * @param properties - Frozen dicts are shared, anything else is copied and frozen
   */
  constructor(id: string, properties: DictValue = new DictValue(), sequence = 0) {
    this.#id = checkId(id);
    this.#sequence = sequence;
    this.#properties = properties.frozen ? properties : properties.mutableCopy().freeze();
  }

  get id(): string {
    return this.#id;
  }

  get sequence(): number {
    return this.#sequence;
  }

  get isMutable(): false {
    return false;
  }

  properties(): ReadonlyDictValue {
    return this.#properties;
  }

  get(key: string): ReadonlyValue {
    return this.#properties.get(key);
  }

  getPath(path: PropertyPath): ReadonlyValue {
    return this.#properties.getPath(path);
  }

  /**
   * Snapshots are read-only
   * @throws ImmutableDocumentError always
   */
  set(key: string, _input: ValueInput): never {
    throw new ImmutableDocumentError(
      `cannot set "${key}" on snapshot "${this.#id}"; edit a mutable copy instead`
    );
  }

  equals(other: DocumentView): boolean {
    return other.id === this.#id && valueEquals(this.#properties, other.properties());
  }

  /**
   * Editable deep copy carrying this snapshot's sequence
   */
  toMutable(): MutableDocument {
    const copy = new MutableDocument(this.#id, this.#properties);
    copy[ASSIGN_SEQUENCE](this.#sequence);
    return copy;
  }

  propertiesAsJSON(): string {
    return this.#properties.toJSONString();
  }

  toJSON(): DocumentJSON {
    return { id: this.#id, sequence: this.#sequence, properties: this.#properties.toJSON() };
  }
}

/**
 * Editable document; changes are local until `Database.save`
 *
 * @example
 * ```typescript
 * const doc = new MutableDocument("foo");
 * doc.properties().set("flavor", "cardamom");
 * doc.set("color", "green");
 * await db.save(doc);
 * ```
 */
export class MutableDocument implements DocumentView {
  readonly #id: string;
  #sequence = 0;
  #properties: DictValue;

  /**
   * @param id - Omit to generate a unique id
   * @param properties - Initial body, deep-copied
   */
  constructor(id?: string, properties: ValueInput = {}) {
    this.#id = id === undefined ? generateDocumentId() : checkId(id);
    this.#properties = attachRoot(toDict(properties));
  }

  get id(): string {
    return this.#id;
  }

  get sequence(): number {
    return this.#sequence;
  }

  get isMutable(): true {
    return true;
  }

  /**
   * The live property dict; edits are visible without a separate set call
   */
  properties(): DictValue {
    return this.#properties;
  }

  get(key: string): Value {
    return this.#properties.get(key);
  }

  getPath(path: PropertyPath): Value {
    return this.#properties.getPath(path);
  }

  set(key: string, input: ValueInput): this {
    this.#properties.set(key, input);
    return this;
  }

  setPath(path: PropertyPath, input: ValueInput): this {
    this.#properties.setPath(path, input);
    return this;
  }

  remove(key: string): boolean {
    return this.#properties.remove(key);
  }

  /**
   * Replace the whole body
   */
  setProperties(input: ValueInput): this {
    this.#properties = attachRoot(toDict(input));
    return this;
  }

  setPropertiesAsJSON(json: string): this {
    this.#properties = attachRoot(parseJSONProperties(json));
    return this;
  }

  equals(other: DocumentView): boolean {
    return other.id === this.#id && valueEquals(this.#properties, other.properties());
  }

  /**
   * Frozen deep copy of the current edits
   */
  toImmutable(): Document {
    return new Document(this.#id, this.#properties.mutableCopy().freeze(), this.#sequence);
  }

  propertiesAsJSON(): string {
    return this.#properties.toJSONString();
  }

  toJSON(): DocumentJSON {
    return { id: this.#id, sequence: this.#sequence, properties: this.#properties.toJSON() };
  }

  [ASSIGN_SEQUENCE](sequence: number): void {
    this.#sequence = sequence;
  }
}
