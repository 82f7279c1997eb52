import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { logger } from "./logs.js";

describe("logger", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-02T03:04:05.000Z"));
  });

  afterEach(() => {
    logger.setEnabled(true);
    vi.unstubAllEnvs();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("should write one line to the console method of its level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.warn("storage.compact.failed", {
      database: "/tmp/db.tallydb",
      message: "disk full",
      details: { pending: 3n },
    });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(
      '[2024-01-02T03:04:05.000Z] [WARN] [storage.compact.failed] /tmp/db.tallydb/ disk full {"pending":"3"}'
    );
  });

  it("should print nothing while disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.setEnabled(false);
    logger.error("db.listener.failed");

    expect(error).not.toHaveBeenCalled();
  });

  it("should print debug lines only with TALLYDB_DEBUG set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    vi.stubEnv("TALLYDB_DEBUG", "");
    logger.debug("db.open");
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv("TALLYDB_DEBUG", "1");
    logger.debug("db.open");
    expect(debug).toHaveBeenCalledWith("[2024-01-02T03:04:05.000Z] [DEBUG] [db.open]");
  });
});
