import { existsSync, readFileSync, realpathSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import yaml from "js-yaml";
import { ConfigurationError, toError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import {
  ResolvedRepoConfigSchema,
  ReposFileSchema,
  type RepoConfigInput,
  type ResolvedRepoConfig,
} from "../../types/config.js";

/** Defaults every project inherits; see mergeDefaults for how they combine */
export const REPO_CONFIG_DEFAULTS = {
  wip_limits: {
    max_concurrent: 3,
  },
  issue_tracker: {
    type: "github",
    ready_action: { type: "add_label" },
  },
  readiness: {
    labels: {
      exclude: [],
    },
    priority: {
      labels: [],
      age_weight: 1,
    },
    dependencies: {
      check_body_references: true,
      blocking_labels: ["blocked"],
      min_tracking_checkboxes: 2,
    },
  },
} as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively lay `explicit` over `defaults`.
 *
 * Objects merge key by key at every depth; arrays and scalars from
 * `explicit` replace the default wholesale; an explicit null or undefined
 * keeps the default.
 */
export function mergeDefaults(defaults: unknown, explicit: unknown): unknown {
  if (explicit === undefined || explicit === null) {
    return structuredClone(defaults);
  }
  if (isPlainObject(defaults) && isPlainObject(explicit)) {
    const merged: Record<string, unknown> = {};
    const keys = new Set([...Object.keys(defaults), ...Object.keys(explicit)]);
    for (const key of keys) {
      merged[key] = mergeDefaults(defaults[key], explicit[key]);
    }
    return merged;
  }
  return structuredClone(explicit);
}

/** Expand `~` and make a path absolute without touching the filesystem */
export function expandPath(path: string, baseDir: string = process.cwd()): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return isAbsolute(path) ? resolve(path) : resolve(baseDir, path);
}

/** Expand, then resolve symlinks when the path exists */
export function normalizeLocalPath(path: string, baseDir?: string): string {
  const expanded = expandPath(path, baseDir);
  try {
    return realpathSync(expanded);
  } catch {
    return expanded;
  }
}

/**
 * Parse a repos.yaml document.
 *
 * A missing file means no projects are configured.
 *
 * @throws ConfigurationError when the file cannot be parsed or has the wrong shape
 */
export function loadReposFile(path: string): Record<string, RepoConfigInput> {
  if (!existsSync(path)) {
    logger.debug(`No repos file at ${path}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to parse repos file: ${path}`, toError(error));
  }

  const result = ReposFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid repos file ${path}: ${errors}`);
  }
  return result.data.repos;
}

/**
 * RepoConfigResolver - per-project configuration with layered defaults
 */
export class RepoConfigResolver {
  private readonly repos: Map<string, RepoConfigInput>;

  constructor(repos: Record<string, RepoConfigInput>) {
    this.repos = new Map(Object.entries(repos));
  }

  static fromFile(path: string): RepoConfigResolver {
    return new RepoConfigResolver(loadReposFile(path));
  }

  /** Exact lookup, no defaults applied */
  get(id: string): RepoConfigInput | undefined {
    return this.repos.get(id);
  }

  has(id: string): boolean {
    return this.repos.has(id);
  }

  /**
   * Configuration for a project with defaults filled in wherever the
   * project leaves a key out. An unknown id resolves to the defaults alone.
   *
   * @throws ConfigurationError when the merged result has invalid values
   */
  getWithDefaults(id: string): ResolvedRepoConfig {
    const merged = mergeDefaults(REPO_CONFIG_DEFAULTS, this.repos.get(id));
    const result = ResolvedRepoConfigSchema.safeParse(merged);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new ConfigurationError(`Invalid configuration for ${id}: ${errors}`);
    }
    return result.data;
  }

  list(): string[] {
    return Array.from(this.repos.keys());
  }

  /**
   * Map a filesystem location back to the project whose repo_path it is.
   * Both sides are expanded and symlink-resolved before comparing.
   */
  findByLocalPath(path: string): string | undefined {
    const target = normalizeLocalPath(path);
    for (const [id, config] of this.repos) {
      const repoPath = config["repo_path"];
      if (typeof repoPath !== "string" || repoPath === "") continue;
      if (normalizeLocalPath(repoPath) === target) {
        return id;
      }
    }
    return undefined;
  }

  /**
   * Check every project for problems a poll cycle would trip over.
   *
   * @returns Human-readable problems, empty when the configuration is usable
   */
  validate(): string[] {
    const problems: string[] = [];
    for (const id of this.repos.keys()) {
      const repoPath = this.repos.get(id)?.["repo_path"];
      if (typeof repoPath !== "string" || repoPath.trim() === "") {
        problems.push(`${id}: missing repo_path`);
      }
      try {
        this.getWithDefaults(id);
      } catch (error) {
        problems.push(toError(error).message);
      }
    }
    return problems;
  }
}
