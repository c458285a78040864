export { logger, LOG_LEVELS, type LogLevel, type LogSink } from "./logger.js";
export { FileLogger } from "./file-logger.js";
export { acquireFileLock, withFileLock, DEFAULT_LOCK_OPTIONS, type FileLockOptions } from "./file-lock.js";
export { calculateBackoff, nextRetryAt, DEFAULT_BACKOFF, type BackoffOptions } from "./retry.js";
export { runCommand, type CommandResult, type RunCommandOptions } from "./process.js";
export * from "./errors.js";
