/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { InvalidValueError, parseJSONProperties, type DictValue } from "@tallydb/sdk";
import { CliError } from "./errors.js";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = 600000): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse document properties from JSON text
 * Integral numbers become ints and the rest floats.
 */
export function parseProperties(value: string, source: string): DictValue {
  // Strip BOM if present
  const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
  try {
    return parseJSONProperties(cleaned);
  } catch (err) {
    if (err instanceof InvalidValueError) {
      throw new CliError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
