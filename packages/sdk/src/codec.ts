/**
 * Canonical byte encoding for property trees
 *
 * Wire form is compact UTF-8 JSON:
 * - null, booleans and strings map directly
 * - ints in the safe range are bare numbers, others `["i", "<digits>"]`
 * - floats are always `["f", n]` so 3.0 stays a float
 * - arrays are `["a", ...items]`
 * - dicts are objects with keys in code point order
 *
 * Invariants:
 * - Pure: equal values (dict order aside) always produce identical bytes
 * - decode(encode(v)) is structurally equal to v, numeric kind included
 */

import { CorruptValueError } from "./errors.js";
import { ArrayValue, DictValue, Values, type ReadonlyDictValue, type ReadonlyValue, type Value } from "./value.js";

const INT_PATTERN = /^-?\d+$/;
const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Deterministic comparison for dict keys using code point order
 */
function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function write(value: ReadonlyValue): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "boolean":
      return value.value ? "true" : "false";
    case "string":
      return JSON.stringify(value.value);
    case "int":
      return value.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        value.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? value.value.toString()
        : `["i","${value.value.toString()}"]`;
    case "float":
      return `["f",${JSON.stringify(value.value)}]`;
    case "array":
      return `["a"${value
        .items()
        .map((item) => `,${write(item)}`)
        .join("")}]`;
    case "dict": {
      const keys = value.keys().sort(compareKeys);
      return `{${keys.map((key) => `${JSON.stringify(key)}:${write(value.get(key))}`).join(",")}}`;
    }
  }
}

/**
 * Serialize a property tree to its canonical bytes
 */
export function encodeValue(properties: ReadonlyDictValue): Uint8Array {
  return encoder.encode(write(properties));
}

/**
 * Canonical text form, useful for logging and equality checks
 */
export function canonicalString(value: ReadonlyValue): string {
  return write(value);
}

function read(wire: unknown, path: string): Value {
  if (wire === null) {
    return Values.null();
  }

  switch (typeof wire) {
    case "boolean":
      return Values.bool(wire);
    case "string":
      return Values.string(wire);
    case "number":
      if (!Number.isSafeInteger(wire)) {
        throw new CorruptValueError(`bare number ${wire} at ${path} is not a safe integer`);
      }
      return Values.int(wire);
    case "object":
      break;
    default:
      throw new CorruptValueError(`unexpected ${typeof wire} at ${path}`);
  }

  if (Array.isArray(wire)) {
    return readTagged(wire, path);
  }

  const dict = new DictValue();
  for (const [key, item] of Object.entries(wire)) {
    dict.set(key, read(item, `${path}.${key}`));
  }
  return dict;
}

function readTagged(wire: unknown[], path: string): Value {
  const [tag, ...rest] = wire;

  switch (tag) {
    case "a": {
      const array = new ArrayValue();
      rest.forEach((item, index) => {
        array.append(read(item, `${path}[${index}]`));
      });
      return array;
    }
    case "f": {
      const [n] = rest;
      if (rest.length !== 1 || typeof n !== "number") {
        throw new CorruptValueError(`malformed float at ${path}`);
      }
      return Values.float(n);
    }
    case "i": {
      const [digits] = rest;
      if (rest.length !== 1 || typeof digits !== "string" || !INT_PATTERN.test(digits)) {
        throw new CorruptValueError(`malformed int at ${path}`);
      }
      try {
        return Values.int(BigInt(digits));
      } catch (err) {
        throw new CorruptValueError(`int out of range at ${path}`, { cause: err });
      }
    }
    default:
      throw new CorruptValueError(`unknown tag ${JSON.stringify(tag) ?? "undefined"} at ${path}`);
  }
}

/**
 * Deserialize canonical bytes into a fresh, mutable dict
 * @throws CorruptValueError if the bytes are not a valid encoding
 */
export function decodeValue(bytes: Uint8Array): DictValue {
  let wire: unknown;
  try {
    wire = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new CorruptValueError("not valid UTF-8 JSON", { cause: err });
  }

  if (wire === null || typeof wire !== "object" || Array.isArray(wire)) {
    throw new CorruptValueError("top-level value must be a dict");
  }

  const value = read(wire, "$");
  if (value.kind !== "dict") {
    throw new CorruptValueError("top-level value must be a dict");
  }
  return value;
}
