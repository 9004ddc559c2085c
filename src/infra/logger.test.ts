import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, silentLogger } from "./logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes console output by level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createConsoleLogger("[test]");
    logger.info("scheduled 3 events");
    logger.warn("enhancer failed");

    expect(log).toHaveBeenCalledWith("[test] scheduled 3 events");
    expect(warn).toHaveBeenCalledWith("[test] enhancer failed");
  });

  it("stays quiet when silent", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    silentLogger.info("nothing");
    silentLogger.warn("nothing");
    expect(log).not.toHaveBeenCalled();
  });
});
