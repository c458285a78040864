import { mkdirSync, appendFileSync, existsSync, readdirSync, unlinkSync, statSync } from "node:fs";
import { join } from "node:path";
import { LOG_LEVELS, logger, type LogLevel, type LogSink } from "./logger.js";

const LOG_FILE_PREFIX = "sessiongate-";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

interface FileLoggerOptions {
  logDir: string;
  level: LogLevel;
  /** Tag written on every line, identifies one invocation (poll cycle, manual command) */
  runId?: string;
}

/**
 * Daily log files, `sessiongate-YYYY-MM-DD.log`.
 *
 * Poll cycles usually run from cron with nobody watching stderr, so the
 * logger mirrors everything here. A sink that cannot write turns itself off.
 */
export class FileLogger implements LogSink {
  private readonly logDir: string;
  private readonly level: LogLevel;
  private readonly runId: string;
  private disabled = false;

  constructor(options: FileLoggerOptions) {
    this.logDir = options.logDir;
    this.level = options.level;
    this.runId = options.runId ?? `${process.pid}-${Date.now().toString(36)}`;

    try {
      if (!existsSync(this.logDir)) {
        mkdirSync(this.logDir, { recursive: true });
      }
    } catch (error) {
      this.disable(error);
    }
  }

  getCurrentLogFile(now: Date = new Date()): string {
    const date = now.toISOString().slice(0, 10); // YYYY-MM-DD
    return join(this.logDir, `${LOG_FILE_PREFIX}${date}.log`);
  }

  getRunId(): string {
    return this.runId;
  }

  isDisabled(): boolean {
    return this.disabled;
  }

  formatLine(level: LogLevel, message: string, data?: Record<string, unknown>, now = new Date()): string {
    const dataStr = data ? ` ${JSON.stringify(data)}` : "";
    return `[${now.toISOString()}] [${level.toUpperCase().padEnd(5)}] [${this.runId}] ${message}${dataStr}\n`;
  }

  write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (this.disabled || LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const now = new Date();
    try {
      appendFileSync(this.getCurrentLogFile(now), this.formatLine(level, message, data, now));
    } catch (error) {
      this.disable(error);
    }
  }

  /**
   * Delete log files older than the retention window
   *
   * @returns Number of files deleted
   */
  cleanup(retentionDays: number, now: Date = new Date()): number {
    if (this.disabled) return 0;

    const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;
    let deletedCount = 0;

    try {
      for (const file of readdirSync(this.logDir)) {
        if (!file.startsWith(LOG_FILE_PREFIX) || !file.endsWith(".log")) {
          continue;
        }

        const filePath = join(this.logDir, file);
        try {
          if (statSync(filePath).mtimeMs < cutoff) {
            unlinkSync(filePath);
            deletedCount++;
          }
        } catch (error) {
          // Removed by a concurrent cleanup, or a dangling link
          if (!isMissingFile(error)) throw error;
        }
      }
    } catch (error) {
      this.disable(error);
    }

    return deletedCount;
  }

  private disable(error: unknown): void {
    this.disabled = true;
    logger.warn(`File logging disabled: ${error instanceof Error ? error.message : String(error)}`);
  }
}
