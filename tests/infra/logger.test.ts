import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger, type LogLevel, type LogSink } from "../../src/infra/logger.js";

describe("logger", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log info messages", () => {
    logger.configure({ level: "info", verbose: false });
    logger.info("test message");
    expect(console.error).toHaveBeenCalled();
  });

  it("should not log debug messages when level is info", () => {
    logger.configure({ level: "info", verbose: false });
    logger.debug("debug message");
    expect(console.error).not.toHaveBeenCalled();
  });

  it("should log debug messages when level is debug", () => {
    logger.configure({ level: "debug", verbose: true });
    logger.debug("debug message");
    expect(console.error).toHaveBeenCalled();
  });

  it("should log success messages", () => {
    logger.configure({ level: "info", verbose: false });
    logger.success("success message");
    expect(console.error).toHaveBeenCalled();
  });

  it("should log warning messages", () => {
    logger.configure({ level: "warn", verbose: false });
    logger.warn("warning message");
    expect(console.warn).toHaveBeenCalled();
  });
});

describe("logger sink", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    logger.configure({ sink: null, level: "info", verbose: false });
    vi.restoreAllMocks();
  });

  it("should mirror every level to the sink regardless of console level", () => {
    const lines: Array<{ level: LogLevel; message: string }> = [];
    const sink: LogSink = { write: (level, message) => lines.push({ level, message }) };
    logger.configure({ level: "error", sink });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");

    expect(lines).toEqual([
      { level: "debug", message: "d" },
      { level: "info", message: "i" },
      { level: "warn", message: "w" },
    ]);
    expect(console.error).not.toHaveBeenCalled();
  });

  it("should pass error details to the sink", () => {
    const write = vi.fn();
    logger.configure({ sink: { write } });

    logger.error("failed", new Error("cause"));

    expect(write).toHaveBeenCalledWith("error", "failed", expect.objectContaining({ errorMessage: "cause" }));
  });
});
