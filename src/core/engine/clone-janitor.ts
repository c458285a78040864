import { existsSync } from "node:fs";
import { readdir, realpath, rm, rmdir } from "node:fs/promises";
import { join } from "node:path";
import { logger } from "../../infra/logger.js";
import { runCommand, type CommandResult } from "../../infra/process.js";

export interface CloneInfo {
  path: string;
  repo: string;
  branch: string;
}

export interface CloneRemoval {
  clone: CloneInfo;
  status: "removed" | "would_remove" | "skipped";
  /** Why a clone was skipped */
  reason?: string;
}

export interface RemoveCloneOptions {
  /** Remove even with uncommitted or unpushed work */
  force?: boolean;
  dryRun?: boolean;
}

export type GitRunner = (cwd: string, args: string[]) => Promise<CommandResult>;

const defaultGit: GitRunner = (cwd, args) => runCommand("git", args, { cwd, timeoutMs: 30_000 });

async function realpathOrSelf(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch {
    return path;
  }
}

async function subdirectories(path: string): Promise<string[]> {
  const entries = await readdir(path, { withFileTypes: true });
  return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
}

/**
 * CloneJanitor - removes clone directories no session uses any more
 *
 * Clones live at `<clonesDir>/<repo>/<branch>`.
 */
export class CloneJanitor {
  constructor(
    private readonly clonesDir: string,
    private readonly git: GitRunner = defaultGit
  ) {}

  /** Clones whose real path is not among trackedPaths */
  async findOrphanedClones(trackedPaths: Iterable<string>): Promise<CloneInfo[]> {
    if (!existsSync(this.clonesDir)) return [];

    const tracked = new Set<string>();
    for (const path of trackedPaths) {
      if (path !== "") tracked.add(await realpathOrSelf(path));
    }

    const orphans: CloneInfo[] = [];
    for (const repo of await subdirectories(this.clonesDir)) {
      for (const branch of await subdirectories(join(this.clonesDir, repo))) {
        const path = join(this.clonesDir, repo, branch);
        if (!tracked.has(await realpathOrSelf(path))) {
          orphans.push({ path, repo, branch });
        }
      }
    }
    return orphans;
  }

  /**
   * @returns Why the clone holds work that would be lost, or null if none
   */
  async unsavedWork(path: string): Promise<string | null> {
    if (!existsSync(join(path, ".git"))) return null;

    const status = await this.git(path, ["status", "--porcelain"]);
    if (status.code !== 0) {
      return `git status failed: ${status.stderr.trim()}`;
    }
    if (status.stdout.trim() !== "") return "uncommitted changes";

    // Commits on any local branch that no remote has
    const log = await this.git(path, ["log", "--oneline", "--branches", "--not", "--remotes"]);
    if (log.code !== 0) {
      return `git log failed: ${log.stderr.trim()}`;
    }
    if (log.stdout.trim() !== "") return "unpushed commits";

    return null;
  }

  async removeClone(clone: CloneInfo, options: RemoveCloneOptions = {}): Promise<CloneRemoval> {
    if (!options.force) {
      const reason = await this.unsavedWork(clone.path);
      if (reason) {
        logger.warn(`Skipped ${clone.path}: ${reason}`);
        return { clone, status: "skipped", reason };
      }
    }

    if (options.dryRun) {
      logger.info(`Would remove ${clone.path}`);
      return { clone, status: "would_remove" };
    }

    await rm(clone.path, { recursive: true, force: true });
    const repoDir = join(this.clonesDir, clone.repo);
    if ((await readdir(repoDir)).length === 0) {
      await rmdir(repoDir);
    }
    logger.info(`Removed ${clone.path}`);
    return { clone, status: "removed" };
  }

  async clean(trackedPaths: Iterable<string>, options: RemoveCloneOptions = {}): Promise<CloneRemoval[]> {
    const orphans = await this.findOrphanedClones(trackedPaths);
    const results: CloneRemoval[] = [];
    for (const clone of orphans) {
      results.push(await this.removeClone(clone, options));
    }
    return results;
  }
}
