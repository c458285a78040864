import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Anything that can persist log lines next to the console output */
export interface LogSink {
  write(level: LogLevel, message: string, data?: Record<string, unknown>): void;
}

interface LoggerOptions {
  level: LogLevel;
  verbose: boolean;
  sink: LogSink | null;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private level: LogLevel = "info";
  private verbose = false;
  private sink: LogSink | null = null;

  configure(options: Partial<LoggerOptions>): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
    if (options.verbose !== undefined) {
      this.verbose = options.verbose;
    }
    if (options.sink !== undefined) {
      this.sink = options.sink;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.sink?.write("debug", message, data);
    if (!this.shouldLog("debug")) return;
    const prefix = pc.gray(`[${this.formatTimestamp()}] ${pc.dim("DEBUG")}`);
    console.error(`${prefix} ${message}`, data ? pc.gray(JSON.stringify(data)) : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.sink?.write("info", message, data);
    if (!this.shouldLog("info")) return;
    const prefix = pc.blue(`[${this.formatTimestamp()}]`) + " " + pc.cyan("INFO");
    console.error(
      `${prefix}  ${message}`,
      data && this.verbose ? pc.gray(JSON.stringify(data)) : ""
    );
  }

  success(message: string): void {
    this.sink?.write("info", message);
    if (!this.shouldLog("info")) return;
    const prefix = pc.green(`[${this.formatTimestamp()}]`) + " " + pc.green("✓");
    console.error(`${prefix} ${message}`);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.sink?.write("warn", message, data);
    if (!this.shouldLog("warn")) return;
    const prefix = pc.yellow(`[${this.formatTimestamp()}]`) + " " + pc.yellow("WARN");
    console.warn(`${prefix}  ${message}`, data ? pc.yellow(JSON.stringify(data)) : "");
  }

  error(message: string, error?: Error | unknown): void {
    this.sink?.write(
      "error",
      message,
      error instanceof Error ? { errorMessage: error.message, errorStack: error.stack } : undefined
    );
    if (!this.shouldLog("error")) return;
    const prefix = pc.red(`[${this.formatTimestamp()}]`) + " " + pc.red("ERROR");
    console.error(`${prefix} ${message}`);
    if (error instanceof Error && this.verbose) {
      console.error(pc.red(error.stack ?? error.message));
    }
  }

  // Special formatting for CLI output
  header(text: string): void {
    console.error("");
    console.error(pc.bold(pc.cyan(`═══ ${text} ═══`)));
    console.error("");
  }

  step(step: number, total: number, message: string): void {
    const prefix = pc.dim(`[${step}/${total}]`);
    console.error(`${prefix} ${message}`);
  }
}

export const logger = new Logger();
