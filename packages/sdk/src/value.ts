/**
 * Property-tree value model
 *
 * A closed, tagged variant over null, boolean, int (64-bit), float, string,
 * array and dict. Every value carries the `VALUE` brand so that plain objects
 * passed in by callers are never mistaken for values.
 *
 * Invariants:
 * - `int` and `float` are distinct kinds; int 3 never equals float 3.0
 * - Array equality is order-dependent, dict equality is order-independent
 * - Trees are acyclic: a container can never be inserted below itself
 * - Frozen containers reject every mutation with ImmutableDocumentError
 */

import { ImmutableDocumentError, InvalidValueError, TypeMismatchError } from "./errors.js";

/**
 * Brand carried by every value instance
 */
export const VALUE: unique symbol = Symbol("tallydb.value");

export type ValueKind = "null" | "boolean" | "int" | "float" | "string" | "array" | "dict";

export interface NullValue {
  readonly [VALUE]: true;
  readonly kind: "null";
}

export interface BooleanValue {
  readonly [VALUE]: true;
  readonly kind: "boolean";
  readonly value: boolean;
}

export interface IntValue {
  readonly [VALUE]: true;
  readonly kind: "int";
  readonly value: bigint;
}

export interface FloatValue {
  readonly [VALUE]: true;
  readonly kind: "float";
  readonly value: number;
}

export interface StringValue {
  readonly [VALUE]: true;
  readonly kind: "string";
  readonly value: string;
}

export type ScalarValue = NullValue | BooleanValue | IntValue | FloatValue | StringValue;

/**
 * A value whose containers may be mutable
 */
export type Value = ScalarValue | ArrayValue | DictValue;

/**
 * A value viewed through its read-only capabilities
 */
export type ReadonlyValue = ScalarValue | ReadonlyArrayValue | ReadonlyDictValue;

/**
 * Plain JavaScript view of a value (ints outside the safe range stay bigint)
 */
export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * Anything `toValue` accepts
 */
export type ValueInput =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | ReadonlyValue
  | readonly ValueInput[]
  | ReadonlyMap<string, ValueInput>
  | { readonly [key: string]: ValueInput };

/**
 * Dotted string ("a.b.c") or pre-split list of dict keys
 */
export type PropertyPath = string | readonly string[];

export interface ReadonlyArrayValue {
  readonly [VALUE]: true;
  readonly kind: "array";
  readonly length: number;
  readonly frozen: boolean;
  at(index: number): ReadonlyValue;
  items(): ReadonlyValue[];
  equals(other: ReadonlyValue): boolean;
  mutableCopy(): ArrayValue;
  toNative(): PlainValue[];
  toJSON(): unknown[];
  toJSONString(): string;
}

export interface ReadonlyDictValue {
  readonly [VALUE]: true;
  readonly kind: "dict";
  readonly size: number;
  readonly frozen: boolean;
  get(key: string): ReadonlyValue;
  has(key: string): boolean;
  keys(): string[];
  entries(): Array<[string, ReadonlyValue]>;
  getPath(path: PropertyPath): ReadonlyValue;
  equals(other: ReadonlyValue): boolean;
  mutableCopy(): DictValue;
  toNative(): { [key: string]: PlainValue };
  toJSON(): Record<string, unknown>;
  toJSONString(): string;
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const NULL: NullValue = Object.freeze({ [VALUE]: true, kind: "null" } as const);
const TRUE: BooleanValue = Object.freeze({ [VALUE]: true, kind: "boolean", value: true } as const);
const FALSE: BooleanValue = Object.freeze({ [VALUE]: true, kind: "boolean", value: false } as const);

/**
 * Check whether an unknown input is already a value
 */
export function isValue(input: unknown): input is ReadonlyValue {
  return typeof input === "object" && input !== null && VALUE in input;
}

function makeInt(value: bigint): IntValue {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new InvalidValueError(`integer ${value} is outside the 64-bit range`);
  }
  const v: IntValue = { [VALUE]: true, kind: "int", value };
  return Object.freeze(v);
}

function makeFloat(value: number): FloatValue {
  if (!Number.isFinite(value)) {
    throw new InvalidValueError(`float ${value} is not finite`);
  }
  const v: FloatValue = { [VALUE]: true, kind: "float", value };
  return Object.freeze(v);
}

function makeString(value: string): StringValue {
  const v: StringValue = { [VALUE]: true, kind: "string", value };
  return Object.freeze(v);
}

function splitPath(path: PropertyPath): readonly string[] {
  if (typeof path === "string") {
    return path.length === 0 ? [] : path.split(".");
  }
  return path;
}

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/**
 * Ordered sequence of values
 */
export class ArrayValue implements ReadonlyArrayValue {
  readonly [VALUE] = true;
  readonly kind = "array";
  #items: Value[] = [];
  #frozen = false;

  constructor(items: Iterable<ValueInput> = []) {
    for (const item of items) {
      this.#items.push(adopt(item, this));
    }
  }

  get length(): number {
    return this.#items.length;
  }

  get frozen(): boolean {
    return this.#frozen;
  }

  /**
   * Item at `index`, or the null value when out of range
   */
  at(index: number): Value {
    return this.#items[index] ?? NULL;
  }

  items(): Value[] {
    return this.#items.slice();
  }

  /**
   * Replace the item at `index`; `index === length` appends
   */
  set(index: number, input: ValueInput): this {
    this.#checkMutable();
    if (!Number.isInteger(index) || index < 0 || index > this.#items.length) {
      throw new RangeError(`Array index ${index} out of range [0, ${this.#items.length}]`);
    }
    this.#items[index] = adopt(input, this);
    return this;
  }

  append(...inputs: ValueInput[]): this {
    this.#checkMutable();
    for (const input of inputs) {
      this.#items.push(adopt(input, this));
    }
    return this;
  }

  insert(index: number, input: ValueInput): this {
    this.#checkMutable();
    if (!Number.isInteger(index) || index < 0 || index > this.#items.length) {
      throw new RangeError(`Array index ${index} out of range [0, ${this.#items.length}]`);
    }
    this.#items.splice(index, 0, adopt(input, this));
    return this;
  }

  /**
   * Remove and return the item at `index`
   */
  remove(index: number): Value {
    this.#checkMutable();
    if (!Number.isInteger(index) || index < 0 || index >= this.#items.length) {
      throw new RangeError(`Array index ${index} out of range [0, ${this.#items.length})`);
    }
    const [removed] = this.#items.splice(index, 1);
    return removed ?? NULL;
  }

  clear(): this {
    this.#checkMutable();
    this.#items = [];
    return this;
  }

  equals(other: ReadonlyValue): boolean {
    return valueEquals(this, other);
  }

  /**
   * Deep-freeze this array and every container below it
   */
  freeze(): this {
    if (!this.#frozen) {
      this.#frozen = true;
      for (const item of this.#items) {
        if (item.kind === "array" || item.kind === "dict") {
          item.freeze();
        }
      }
    }
    return this;
  }

  mutableCopy(): ArrayValue {
    return new ArrayValue(this.#items.map(copyValue));
  }

  toNative(): PlainValue[] {
    return this.#items.map(toNative);
  }

  toJSON(): unknown[] {
    return this.#items.map(toJSONCompatible);
  }

  toJSONString(): string {
    return toJSONString(this);
  }

  #checkMutable(): void {
    if (this.#frozen) {
      throw new ImmutableDocumentError("array belongs to an immutable document");
    }
  }
}

/**
 * String-keyed mapping of values, iterated in insertion order
 */
export class DictValue implements ReadonlyDictValue {
  readonly [VALUE] = true;
  readonly kind = "dict";
  #entries = new Map<string, Value>();
  #frozen = false;

  constructor(
    entries: ReadonlyMap<string, ValueInput> | { readonly [key: string]: ValueInput } = {}
  ) {
    const pairs: Iterable<[string, ValueInput]> =
      entries instanceof Map ? entries.entries() : Object.entries(entries);
    for (const [key, input] of pairs) {
      this.#entries.set(key, adopt(input, this));
    }
  }

  get size(): number {
    return this.#entries.size;
  }

  get frozen(): boolean {
    return this.#frozen;
  }

  /**
   * Value under `key`, or the null value when absent
   */
  get(key: string): Value {
    return this.#entries.get(key) ?? NULL;
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.#entries.keys());
  }

  entries(): Array<[string, Value]> {
    return Array.from(this.#entries.entries());
  }

  set(key: string, input: ValueInput): this {
    this.#checkMutable();
    this.#entries.set(key, adopt(input, this));
    return this;
  }

  remove(key: string): boolean {
    this.#checkMutable();
    return this.#entries.delete(key);
  }

  clear(): this {
    this.#checkMutable();
    this.#entries.clear();
    return this;
  }

  /**
   * Walk nested dicts; any missing step yields the null value
   */
  getPath(path: PropertyPath): Value {
    let current: Value = this;
    for (const segment of splitPath(path)) {
      if (current.kind !== "dict") {
        return NULL;
      }
      current = current.get(segment);
    }
    return current;
  }

  /**
   * Write under a nested key, creating missing intermediate dicts
   * @throws TypeMismatchError if an intermediate step holds a non-dict value
   */
  setPath(path: PropertyPath, input: ValueInput): this {
    const segments = splitPath(path);
    const last = segments[segments.length - 1];
    if (last === undefined) {
      throw new InvalidValueError("property path must not be empty");
    }

    let target: DictValue = this;
    for (let i = 0; i < segments.length - 1; i++) {
      const segment = segments[i] ?? "";
      const next = target.get(segment);
      if (next.kind === "dict") {
        target = next;
      } else if (next.kind === "null" && !target.has(segment)) {
        const created = new DictValue();
        target.set(segment, created);
        target = created;
      } else {
        throw new TypeMismatchError(segments.slice(0, i + 1).join("."), "dict", next.kind);
      }
    }

    target.set(last, input);
    return this;
  }

  equals(other: ReadonlyValue): boolean {
    return valueEquals(this, other);
  }

  /**
   * Deep-freeze this dict and every container below it
   */
  freeze(): this {
    if (!this.#frozen) {
      this.#frozen = true;
      for (const value of this.#entries.values()) {
        if (value.kind === "array" || value.kind === "dict") {
          value.freeze();
        }
      }
    }
    return this;
  }

  mutableCopy(): DictValue {
    const copy = new DictValue();
    for (const [key, value] of this.#entries) {
      copy.set(key, copyValue(value));
    }
    return copy;
  }

  toNative(): { [key: string]: PlainValue } {
    const out: { [key: string]: PlainValue } = {};
    for (const [key, value] of this.#entries) {
      Object.defineProperty(out, key, {
        value: toNative(value),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }

  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of this.#entries) {
      Object.defineProperty(out, key, {
        value: toJSONCompatible(value),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }

  toJSONString(): string {
    return toJSONString(this);
  }

  #checkMutable(): void {
    if (this.#frozen) {
      throw new ImmutableDocumentError();
    }
  }
}

function copyValue(value: ReadonlyValue): Value {
  switch (value.kind) {
    case "array":
    case "dict":
      return value.mutableCopy();
    default:
      return value;
  }
}

/**
 * True if `container` is `root` or sits anywhere below it
 */
function contains(root: ReadonlyValue, container: object): boolean {
  if (root === container) {
    return true;
  }
  if (root.kind === "array") {
    return root.items().some((item) => contains(item, container));
  }
  if (root.kind === "dict") {
    return root.entries().some(([, item]) => contains(item, container));
  }
  return false;
}

// Containers that already sit in a tree or serve as a document body
const attached = new WeakSet<object>();

/**
 * Mark `dict` as the body of a document, so inserting it elsewhere copies it
 */
export function attachRoot(dict: DictValue): DictValue {
  attached.add(dict);
  return dict;
}

/**
 * Convert input for insertion into `parent`, rejecting inputs that would form a cycle
 *
 * A detached mutable container is taken by reference and becomes attached;
 * one that is already attached is copied, so no two slots share a subtree.
 */
function adopt(input: ValueInput, parent: ArrayValue | DictValue): Value {
  if (isValue(input)) {
    if (input.kind !== "array" && input.kind !== "dict") {
      return input;
    }
    if (input.frozen || !(input instanceof ArrayValue || input instanceof DictValue)) {
      return input.mutableCopy();
    }
    if (contains(input, parent)) {
      throw new InvalidValueError("a container cannot be inserted into itself");
    }
    if (attached.has(input)) {
      return input.mutableCopy();
    }
    attached.add(input);
    return input;
  }
  return toValue(input);
}

/**
 * Build a value from native input
 * @throws InvalidValueError for unsupported kinds, non-finite numbers and circular input
 */
export function toValue(input: ValueInput): Value {
  return convert(input, new Set<object>());
}

function convert(input: ValueInput, stack: Set<object>): Value {
  if (input === null || input === undefined) {
    return NULL;
  }

  switch (typeof input) {
    case "boolean":
      return input ? TRUE : FALSE;
    case "bigint":
      return makeInt(input);
    case "number":
      return Number.isSafeInteger(input) ? makeInt(BigInt(input)) : makeFloat(input);
    case "string":
      return makeString(input);
    case "object":
      break;
    default:
      throw new InvalidValueError(`unsupported type "${typeof input}"`);
  }

  if (isValue(input)) {
    return input.kind === "array" || input.kind === "dict" ? input.mutableCopy() : input;
  }

  if (stack.has(input)) {
    throw new InvalidValueError("circular reference in input");
  }
  stack.add(input);

  try {
    if (Array.isArray(input)) {
      const array = new ArrayValue();
      for (const item of input) {
        array.append(convert(item, stack));
      }
      return array;
    }

    if (input instanceof Map) {
      const dict = new DictValue();
      for (const [key, item] of input) {
        if (typeof key !== "string") {
          throw new InvalidValueError(`dict keys must be strings, got ${typeof key}`);
        }
        dict.set(key, convert(item, stack));
      }
      return dict;
    }

    if (!isPlainObject(input)) {
      const name: unknown = input.constructor?.name;
      throw new InvalidValueError(`unsupported object type "${String(name ?? "unknown")}"`);
    }

    const dict = new DictValue();
    for (const [key, item] of Object.entries(input)) {
      dict.set(key, convert(item, stack));
    }
    return dict;
  } finally {
    stack.delete(input);
  }
}

/**
 * Build a dict from native input
 * @throws TypeMismatchError if the input is not a mapping
 */
export function toDict(input: ValueInput): DictValue {
  const value = toValue(input ?? {});
  if (value.kind !== "dict") {
    throw new TypeMismatchError("", "dict", value.kind);
  }
  return value;
}

/**
 * Explicit constructors, e.g. for integer-valued floats
 */
export const Values = {
  null(): NullValue {
    return NULL;
  },
  bool(value: boolean): BooleanValue {
    return value ? TRUE : FALSE;
  },
  int(value: number | bigint): IntValue {
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new InvalidValueError(`${value} is not a safe integer`);
    }
    return makeInt(BigInt(value));
  },
  float(value: number): FloatValue {
    return makeFloat(value);
  },
  string(value: string): StringValue {
    return makeString(value);
  },
  array(items: Iterable<ValueInput> = []): ArrayValue {
    return new ArrayValue(items);
  },
  dict(entries: ReadonlyMap<string, ValueInput> | { readonly [key: string]: ValueInput } = {}): DictValue {
    return new DictValue(entries);
  },
};

/**
 * Structural equality
 */
export function valueEquals(a: ReadonlyValue, b: ReadonlyValue): boolean {
  if (a === b) {
    return true;
  }

  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
      return b.kind === "boolean" && b.value === a.value;
    case "int":
      return b.kind === "int" && b.value === a.value;
    case "float":
      return b.kind === "float" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "array": {
      if (b.kind !== "array" || b.length !== a.length) {
        return false;
      }
      for (let i = 0; i < a.length; i++) {
        if (!valueEquals(a.at(i), b.at(i))) {
          return false;
        }
      }
      return true;
    }
    case "dict": {
      if (b.kind !== "dict" || b.size !== a.size) {
        return false;
      }
      return a.entries().every(([key, value]) => b.has(key) && valueEquals(value, b.get(key)));
    }
  }
}

/**
 * Plain JavaScript view, exact for every int
 */
export function toNative(value: ReadonlyValue): PlainValue {
  switch (value.kind) {
    case "null":
      return null;
    case "int":
      return value.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        value.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value.value)
        : value.value;
    case "boolean":
    case "float":
    case "string":
      return value.value;
    case "array":
    case "dict":
      return value.toNative();
  }
}

/**
 * Plain view safe for JSON.stringify (ints become numbers)
 */
function toJSONCompatible(value: ReadonlyValue): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "int":
      return Number(value.value);
    case "boolean":
    case "float":
    case "string":
      return value.value;
    case "array":
    case "dict":
      return value.toJSON();
  }
}

/**
 * Compact JSON text in insertion order; ints keep every digit
 */
export function toJSONString(value: ReadonlyValue): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "boolean":
      return value.value ? "true" : "false";
    case "int":
      return value.value.toString();
    case "float":
    case "string":
      return JSON.stringify(value.value);
    case "array":
      return `[${value.items().map(toJSONString).join(",")}]`;
    case "dict":
      return `{${value
        .entries()
        .map(([key, item]) => `${JSON.stringify(key)}:${toJSONString(item)}`)
        .join(",")}}`;
  }
}

/**
 * Parse JSON text into a dict
 *
 * The kind of a number follows its literal: a fraction or exponent makes a
 * float (`3.0`, `1e2`), anything else an int, kept exact beyond the safe range.
 * Keys keep their order of appearance.
 *
 * @throws InvalidValueError if the text is not a JSON object or an int
 * literal falls outside the 64-bit range
 */
export function parseJSONProperties(json: string): DictValue {
  try {
    JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidValueError(`malformed JSON (${message})`);
  }

  const scanner = new JSONScanner(json);
  const root = scanner.value();
  if (root.kind !== "dict") {
    throw new InvalidValueError("JSON properties must be an object");
  }
  return root;
}

const WHITESPACE = /[ \t\n\r]*/y;
const STRING_TOKEN = /"(?:[^"\\]|\\.)*"/y;
const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/**
 * Walks text that `JSON.parse` has already accepted
 */
class JSONScanner {
  readonly #text: string;
  #pos = 0;

  constructor(text: string) {
    this.#text = text;
  }

  value(): Value {
    this.#skipWhitespace();
    switch (this.#text[this.#pos]) {
      case "{":
        return this.#object();
      case "[":
        return this.#array();
      case '"':
        return makeString(this.#string());
      case "t":
        this.#pos += 4;
        return TRUE;
      case "f":
        this.#pos += 5;
        return FALSE;
      case "n":
        this.#pos += 4;
        return NULL;
      default:
        return this.#number();
    }
  }

  #object(): DictValue {
    const dict = new DictValue();
    this.#pos++;
    this.#skipWhitespace();
    if (this.#text[this.#pos] === "}") {
      this.#pos++;
      return dict;
    }
    for (;;) {
      this.#skipWhitespace();
      const key = this.#string();
      this.#skipWhitespace();
      this.#pos++; // ":"
      dict.set(key, this.value());
      this.#skipWhitespace();
      if (this.#text[this.#pos++] === "}") {
        return dict;
      }
    }
  }

  #array(): ArrayValue {
    const items: Value[] = [];
    this.#pos++;
    this.#skipWhitespace();
    if (this.#text[this.#pos] === "]") {
      this.#pos++;
      return new ArrayValue(items);
    }
    for (;;) {
      items.push(this.value());
      this.#skipWhitespace();
      if (this.#text[this.#pos++] === "]") {
        return new ArrayValue(items);
      }
    }
  }

  #string(): string {
    const decoded: unknown = JSON.parse(this.#match(STRING_TOKEN));
    if (typeof decoded !== "string") {
      throw new InvalidValueError(`malformed JSON string at position ${this.#pos}`);
    }
    return decoded;
  }

  #number(): Value {
    const literal = this.#match(NUMBER_TOKEN);
    if (/[.eE]/.test(literal)) {
      return makeFloat(Number(literal));
    }
    return makeInt(BigInt(literal));
  }

  #skipWhitespace(): void {
    this.#match(WHITESPACE);
  }

  #match(pattern: RegExp): string {
    pattern.lastIndex = this.#pos;
    const match = pattern.exec(this.#text);
    if (match === null) {
      throw new InvalidValueError(`malformed JSON at position ${this.#pos}`);
    }
    this.#pos = pattern.lastIndex;
    return match[0];
  }
}

/**
 * Narrowing helpers returning `undefined` for a different kind
 */
export function asString(value: ReadonlyValue): string | undefined {
  return value.kind === "string" ? value.value : undefined;
}

export function asBoolean(value: ReadonlyValue): boolean | undefined {
  return value.kind === "boolean" ? value.value : undefined;
}

export function asNumber(value: ReadonlyValue): number | undefined {
  if (value.kind === "int") {
    return Number(value.value);
  }
  return value.kind === "float" ? value.value : undefined;
}
