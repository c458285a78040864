import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";
import { config as loadEnv } from "dotenv";
import { type Config, ConfigSchema } from "../../types/config.js";
import { ConfigurationError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

// Load .env file if it exists
loadEnv();

const DEFAULT_DATA_DIR = join(homedir(), ".sessiongate");
const CONFIG_FILE_NAME = "config.json";

export interface ResolvedPaths {
  dataDir: string;
  configFile: string;
  reposFile: string;
  pollStateDir: string;
  wipState: string;
  processed: string;
  clonesDir: string;
  logDir: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function objectAt(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? value : {};
}

export function expandPath(path: string): string {
  if (path === "~" || path.startsWith("~/")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return expandPath(env["SESSIONGATE_DATA_DIR"] ?? DEFAULT_DATA_DIR);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getDataDir(env), CONFIG_FILE_NAME);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse config file: ${configPath}`,
      error instanceof Error ? error : undefined
    );
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${configPath}`);
  }
  logger.debug(`Loaded config from ${configPath}`);
  return parsed;
}

/**
 * Load the process-wide configuration: defaults < config.json < environment.
 *
 * @throws ConfigurationError if the file is unreadable or a value is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const fileConfig = readConfigFile(getConfigPath(env));
  const merged: Record<string, unknown> = { ...fileConfig };

  if (env["SESSIONGATE_DATA_DIR"]) {
    merged["dataDir"] = env["SESSIONGATE_DATA_DIR"];
  }

  if (env["SESSIONGATE_VERBOSE"] === "true") {
    merged["verbose"] = true;
  }

  const globalMax = env["SESSIONGATE_GLOBAL_WIP_MAX"];
  if (globalMax !== undefined && globalMax !== "") {
    merged["wipLimits"] = { ...objectAt(fileConfig["wipLimits"]), globalMax: Number(globalMax) };
  }

  if (env["SESSIONGATE_DRY_RUN"] === "true") {
    merged["selfIteration"] = { ...objectAt(fileConfig["selfIteration"]), dryRun: true };
  }

  // Validate and parse with defaults
  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${errors}`);
  }

  return result.data;
}

/** Absolute locations of every file the runtime touches */
export function resolvePaths(config: Config): ResolvedPaths {
  const dataDir = expandPath(config.dataDir);
  const pollStateDir = join(dataDir, "poll-state");
  const reposFile = expandPath(config.reposFile);
  const logDir = expandPath(config.logging.dir);

  return {
    dataDir,
    configFile: join(dataDir, CONFIG_FILE_NAME),
    reposFile: isAbsolute(reposFile) ? reposFile : join(dataDir, reposFile),
    pollStateDir,
    wipState: join(pollStateDir, "wip-state.json"),
    processed: join(pollStateDir, "processed.json"),
    clonesDir: join(dataDir, "clones"),
    logDir: isAbsolute(logDir) ? logDir : join(dataDir, logDir),
  };
}
