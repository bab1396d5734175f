/**
 * Tests for the console logger
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { logger } from "../../src/lib/logger";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("logger", () => {
  it("should tag messages with their level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.info("Found 3 debates", { total: 3 });

    expect(log).toHaveBeenCalledWith("[INFO] Found 3 debates", '{"total":3}');
  });

  it("should prefix child scopes", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger.child("db").child("sqlite").warn("slow query");

    expect(warn).toHaveBeenCalledWith("[WARN] [db] [sqlite] slow query", "");
  });

  it("should drop messages below LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should only log debug output when enabled", () => {
    vi.stubEnv("LOG_LEVEL", "");
    vi.stubEnv("DEBUG", "");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.debug("hidden");
    vi.stubEnv("DEBUG", "1");
    logger.debug("shown");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[DEBUG] shown", "");
  });

  it("should always log errors", () => {
    vi.stubEnv("LOG_LEVEL", "error");
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.error("Oracle call failed", "timeout");

    expect(error).toHaveBeenCalledWith("[ERROR] Oracle call failed", "timeout");
  });
});
