import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, readFileSync, readdirSync, rmSync, symlinkSync, utimesSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { FileLogger } from "../../src/infra/file-logger.js";
import { createTempDir, silenceLogger } from "../helpers.js";

describe("FileLogger", () => {
  let dir: string;
  let cleanup: () => void;
  let logDir: string;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
    logDir = join(dir, "logs");
    silenceLogger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  it("should create the log directory", () => {
    new FileLogger({ logDir, level: "debug" });
    expect(existsSync(logDir)).toBe(true);
  });

  it("should name files by UTC date", () => {
    const fileLogger = new FileLogger({ logDir, level: "debug" });
    expect(fileLogger.getCurrentLogFile(new Date("2026-03-04T23:59:00.000Z"))).toBe(
      join(logDir, "sessiongate-2026-03-04.log")
    );
  });

  it("should format lines with timestamp, level, run id and data", () => {
    const fileLogger = new FileLogger({ logDir, level: "debug", runId: "run-1" });
    const line = fileLogger.formatLine("warn", "slow lock", { ms: 12 }, new Date("2026-03-04T10:00:00.000Z"));
    expect(line).toBe('[2026-03-04T10:00:00.000Z] [WARN ] [run-1] slow lock {"ms":12}\n');
  });

  it("should append lines at or above its level", () => {
    const fileLogger = new FileLogger({ logDir, level: "info", runId: "run-2" });

    fileLogger.write("debug", "hidden");
    fileLogger.write("info", "shown");

    const content = readFileSync(fileLogger.getCurrentLogFile(), "utf-8");
    expect(content).toContain("[INFO ] [run-2] shown");
    expect(content).not.toContain("hidden");
  });

  it("should disable itself when writing fails", () => {
    const fileLogger = new FileLogger({ logDir, level: "debug" });
    rmSync(logDir, { recursive: true, force: true });

    fileLogger.write("info", "lost");

    expect(fileLogger.isDisabled()).toBe(true);
  });

  it("should delete only its own files past retention", () => {
    const fileLogger = new FileLogger({ logDir, level: "debug" });
    const now = new Date("2026-03-20T00:00:00.000Z");
    const old = join(logDir, "sessiongate-2026-03-01.log");
    const recent = join(logDir, "sessiongate-2026-03-19.log");
    const foreign = join(logDir, "other.log");
    for (const file of [old, recent, foreign]) writeFileSync(file, "x\n");

    const oldTime = new Date("2026-03-01T00:00:00.000Z");
    utimesSync(old, oldTime, oldTime);
    utimesSync(foreign, oldTime, oldTime);
    const recentTime = new Date("2026-03-19T00:00:00.000Z");
    utimesSync(recent, recentTime, recentTime);

    expect(fileLogger.cleanup(14, now)).toBe(1);
    expect(readdirSync(logDir).sort()).toEqual(["other.log", "sessiongate-2026-03-19.log"]);
  });

  it("should disable itself when the log directory cannot be created", () => {
    const blocker = join(dir, "not-a-dir");
    writeFileSync(blocker, "");

    const fileLogger = new FileLogger({ logDir: join(blocker, "logs"), level: "debug" });

    expect(fileLogger.isDisabled()).toBe(true);
    expect(fileLogger.cleanup(14)).toBe(0);
  });

  it("should skip log files that vanish during cleanup", () => {
    const fileLogger = new FileLogger({ logDir, level: "debug" });
    const old = join(logDir, "sessiongate-2026-03-01.log");
    writeFileSync(old, "x\n");
    const oldTime = new Date("2026-03-01T00:00:00.000Z");
    utimesSync(old, oldTime, oldTime);
    symlinkSync(join(dir, "missing"), join(logDir, "sessiongate-2020-01-01.log"));

    expect(fileLogger.cleanup(14, new Date("2026-03-20T00:00:00.000Z"))).toBe(1);
    expect(existsSync(old)).toBe(false);
    expect(fileLogger.isDisabled()).toBe(false);
  });

  it("should disable itself when the log directory cannot be listed", () => {
    const fileLogger = new FileLogger({ logDir, level: "debug" });
    rmSync(logDir, { recursive: true, force: true });
    writeFileSync(logDir, "");

    expect(fileLogger.cleanup(14)).toBe(0);
    expect(fileLogger.isDisabled()).toBe(true);
  });
});
