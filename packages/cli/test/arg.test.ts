/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseNonNegativeInt, parseProperties } from "../src/lib/arg.js";
import { CliError } from "../src/lib/errors.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt(" 250 ", "test")).toBe(250);
      expect(parseNonNegativeInt("600000", "test")).toBe(600000);
    });

    it("should reject negative numbers and non-numbers", () => {
      expect(() => parseNonNegativeInt("-1", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "test")).toThrow(
        "test must be a non-negative integer"
      );
      expect(() => parseNonNegativeInt("1.5", "test")).toThrow(InvalidArgumentError);
    });

    it("should reject values above the limit", () => {
      expect(() => parseNonNegativeInt("600001", "--lock-timeout")).toThrow(
        "--lock-timeout must be <= 600000"
      );
    });

    it("should accept a custom limit", () => {
      expect(parseNonNegativeInt("9000000", "--expect-sequence", Number.MAX_SAFE_INTEGER)).toBe(
        9000000
      );
      expect(() => parseNonNegativeInt("11", "--n", 10)).toThrow("--n must be <= 10");
    });
  });

  describe("parseProperties", () => {
    it("should parse a JSON object into a dict", () => {
      const dict = parseProperties('{"name": "widget", "count": 3, "ratio": 0.5}', "--data");

      expect(dict.keys()).toEqual(["name", "count", "ratio"]);
      expect(dict.get("count").kind).toBe("int");
      expect(dict.get("ratio").kind).toBe("float");
    });

    it("should strip a byte order mark", () => {
      const dict = parseProperties('\uFEFF{"a": true}', "stdin");
      expect(dict.toJSON()).toEqual({ a: true });
    });

    it("should name the source in errors", () => {
      expect(() => parseProperties("{oops", "stdin")).toThrow(CliError);
      expect(() => parseProperties("[1, 2]", "--data")).toThrow(
        "Invalid JSON in --data: Invalid property value: JSON properties must be an object"
      );
    });
  });
});
