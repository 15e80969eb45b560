import { describe, test, expect, afterEach, vi } from "vitest";
import { createConsoleLogger, NOOP_LOGGER } from "../../src/shared/logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("prefixes every level and routes it to the matching console method", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createConsoleLogger("[test]");
    logger.warn("careful");
    logger.error("broken");

    expect(warn).toHaveBeenCalledWith("[test] careful");
    expect(error).toHaveBeenCalledWith("[test] broken");
  });

  test("defaults the prefix", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createConsoleLogger().log("hello");
    expect(log).toHaveBeenCalledWith("[pyscope] hello");
  });
});

describe("NOOP_LOGGER", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("writes nothing", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    NOOP_LOGGER.info("ignored");
    expect(info).not.toHaveBeenCalled();
  });
});
