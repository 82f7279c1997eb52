/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import * as os from "node:os";
import * as path from "node:path";
import { isVerbose, resolveDirectory } from "../src/lib/env.js";

describe("environment resolution", () => {
  describe("resolveDirectory", () => {
    it("should use CLI option when provided", () => {
      const result = resolveDirectory("/cli/path", { TALLYDB_DIR: "/env/path" });
      expect(result).toBe(path.resolve("/cli/path"));
    });

    it("should fall back to TALLYDB_DIR", () => {
      expect(resolveDirectory(undefined, { TALLYDB_DIR: "/env/path" })).toBe(
        path.resolve("/env/path")
      );
    });

    it("should default to ./data", () => {
      expect(resolveDirectory(undefined, {})).toBe(path.resolve("./data"));
    });

    it("should resolve relative paths against the working directory", () => {
      expect(resolveDirectory("relative/dbs", {})).toBe(path.join(process.cwd(), "relative/dbs"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveDirectory("~/dbs", {})).toBe(path.join(os.homedir(), "dbs"));
    });
  });

  describe("isVerbose", () => {
    it("should only be true when TALLYDB_CLI_DEBUG is 1", () => {
      expect(isVerbose({ TALLYDB_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ TALLYDB_CLI_DEBUG: "true" })).toBe(false);
      expect(isVerbose({})).toBe(false);
    });
  });
});
