/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { ResourceBusyError, SaveConflictError } from "@tallydb/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should use the exit code of a CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("missing", { exitCode: 2 }))).toBe(2);
    });

    it("should map ResourceBusyError to exit code 3", () => {
      expect(mapSdkErrorToExitCode(new ResourceBusyError("/tmp/db.tallydb", "locked"))).toBe(3);
    });

    it("should map commander errors by their exit code", () => {
      expect(mapSdkErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "help"))).toBe(0);
      expect(mapSdkErrorToExitCode(new CommanderError(1, "commander.unknownCommand", "bad"))).toBe(1);
    });

    it("should default to exit code 1 for other errors", () => {
      expect(mapSdkErrorToExitCode(new SaveConflictError("a", 1, 2))).toBe(1);
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include the error code and cause in verbose mode", () => {
      const cause = new Error("underlying");
      const err = new ResourceBusyError("/tmp/db.tallydb", "locked", { cause });

      const formatted = formatCliError(err, true);
      expect(formatted.split("\n").slice(0, 2)).toEqual([
        "Database at /tmp/db.tallydb is in use (locked) [BUSY]",
        "  Cause: underlying",
      ]);
    });

    it("should include stack in verbose mode", () => {
      const formatted = formatCliError(new Error("test"), true);
      expect(formatted).toContain("Error: test");
    });

    it("should not include code or stack in non-verbose mode", () => {
      const err = new SaveConflictError("a", 1, 2);
      expect(formatCliError(err, false)).toBe(
        'Conflict saving "a": expected sequence 1, store has 2'
      );
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
