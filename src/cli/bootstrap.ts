import { FileLogger } from "../infra/file-logger.js";
import { logger } from "../infra/logger.js";
import { loadConfig, resolvePaths } from "./config/loader.js";
import { createRuntime, type Runtime } from "./runtime.js";

/**
 * Load configuration, attach the file log and build the runtime.
 * Every command starts here.
 */
export function bootstrap(): Runtime {
  const config = loadConfig();
  const paths = resolvePaths(config);

  logger.configure({
    level: config.verbose ? "debug" : config.logging.consoleLevel,
    verbose: config.verbose,
  });

  const fileLogger = new FileLogger({ logDir: paths.logDir, level: config.logging.fileLevel });
  logger.configure({ sink: fileLogger });
  const deleted = fileLogger.cleanup(config.logging.retentionDays);
  if (deleted > 0) {
    logger.debug(`Removed ${deleted} old log file(s)`);
  }

  return createRuntime(config);
}

/** Log a failed action and exit non-zero */
export function fail(error: unknown): never {
  logger.error(error instanceof Error ? error.message : String(error), error);
  process.exit(1);
}
