import { z } from "zod";
import type { FileLockOptions } from "../../infra/file-lock.js";
import { logger } from "../../infra/logger.js";
import type { WipSession } from "../../types/session.js";
import type { RepoConfigResolver } from "../config/repo-config.js";
import { StateStore } from "../state/state-store.js";

const WipEntrySchema = z
  .object({
    repo_key: z.string(),
    priority: z.string(),
    started_at: z.string(),
  })
  .passthrough();

export const WipDocumentSchema = z
  .object({
    sessions: z.record(WipEntrySchema).default({}),
  })
  .passthrough();

type WipDocument = z.infer<typeof WipDocumentSchema>;
type WipEntry = z.infer<typeof WipEntrySchema>;

export interface WipTrackerOptions {
  /** Path of the WIP document, usually <dataDir>/poll-state/wip-state.json */
  path: string;
  /** Maximum active sessions across every project */
  globalMax: number;
  /** Supplies each project's max_concurrent */
  repoConfig: RepoConfigResolver;
  lock?: FileLockOptions;
  now?: () => Date;
}

export interface SyncResult {
  removed: string[];
  kept: number;
}

function toSession(key: string, entry: WipEntry): WipSession {
  return {
    key,
    projectId: entry.repo_key,
    priority: entry.priority,
    startedAt: new Date(entry.started_at),
  };
}

function countFor(doc: WipDocument, projectId: string): number {
  return Object.values(doc.sessions).filter((entry) => entry.repo_key === projectId).length;
}

/**
 * WipTracker - admission control against global and per-project limits
 *
 * The document is shared by every invocation of the CLI, so anything that
 * compares counts with limits reads them inside the same locked transaction.
 */
export class WipTracker {
  private readonly store: StateStore<typeof WipDocumentSchema>;
  private readonly globalMax: number;
  private readonly repoConfig: RepoConfigResolver;
  private readonly now: () => Date;

  constructor(options: WipTrackerOptions) {
    this.store = new StateStore(options.path, WipDocumentSchema, options.lock);
    this.globalMax = options.globalMax;
    this.repoConfig = options.repoConfig;
    this.now = options.now ?? (() => new Date());
  }

  get globalLimit(): number {
    return this.globalMax;
  }

  projectLimit(projectId: string): number {
    return this.repoConfig.getWithDefaults(projectId).wip_limits.max_concurrent;
  }

  /** Record a session as active. Re-adding a key overwrites it. */
  async addSession(key: string, projectId: string, priority: string): Promise<void> {
    await this.store.update((doc) => ({
      ...doc,
      sessions: {
        ...doc.sessions,
        [key]: { repo_key: projectId, priority, started_at: this.now().toISOString() },
      },
    }));
    logger.debug(`WIP session added: ${key}`, { projectId, priority });
  }

  /** Remove a session; an unknown key is a no-op */
  async removeSession(key: string): Promise<void> {
    const removed = await this.store.transact((doc) => {
      if (!(key in doc.sessions)) {
        return { result: false };
      }
      const sessions = { ...doc.sessions };
      delete sessions[key];
      return { state: { ...doc, sessions }, result: true };
    });
    if (removed) {
      logger.debug(`WIP session removed: ${key}`);
    }
  }

  async isActive(key: string): Promise<boolean> {
    const doc = await this.store.read();
    return key in doc.sessions;
  }

  async getSession(key: string): Promise<WipSession | undefined> {
    const doc = await this.store.read();
    const entry = doc.sessions[key];
    return entry ? toSession(key, entry) : undefined;
  }

  async countActive(): Promise<number> {
    const doc = await this.store.read();
    return Object.keys(doc.sessions).length;
  }

  async countForProject(projectId: string): Promise<number> {
    return countFor(await this.store.read(), projectId);
  }

  async listSessions(): Promise<WipSession[]> {
    const doc = await this.store.read();
    return Object.entries(doc.sessions).map(([key, entry]) => toSession(key, entry));
  }

  async listSessionsForProject(projectId: string): Promise<WipSession[]> {
    const sessions = await this.listSessions();
    return sessions.filter((session) => session.projectId === projectId);
  }

  async underGlobalLimit(): Promise<boolean> {
    return (await this.countActive()) < this.globalMax;
  }

  async underProjectLimit(projectId: string): Promise<boolean> {
    return (await this.countForProject(projectId)) < this.projectLimit(projectId);
  }

  /**
   * Slots a project may fill right now: the tighter of its own headroom
   * and the global headroom, never negative.
   */
  async availableSlots(projectId: string): Promise<number> {
    const projectLimit = this.projectLimit(projectId);
    return this.store.transact((doc) => ({
      result: this.slotsFrom(doc, projectId, projectLimit),
    }));
  }

  /**
   * Check for a free slot and take it in one transaction.
   *
   * A key that is already tracked is refreshed without consuming a slot.
   *
   * @returns true if the session is now tracked
   */
  async tryAdmit(key: string, projectId: string, priority: string): Promise<boolean> {
    const projectLimit = this.projectLimit(projectId);
    const admitted = await this.store.transact((doc) => {
      const alreadyTracked = key in doc.sessions;
      if (!alreadyTracked && this.slotsFrom(doc, projectId, projectLimit) === 0) {
        return { result: false };
      }
      const next: WipDocument = {
        ...doc,
        sessions: {
          ...doc.sessions,
          [key]: { repo_key: projectId, priority, started_at: this.now().toISOString() },
        },
      };
      return { state: next, result: true };
    });

    if (admitted) {
      logger.debug(`Admitted ${key}`, { projectId, priority });
    } else {
      logger.info(`No slot available for ${key}`, { projectId });
    }
    return admitted;
  }

  /**
   * Drop every tracked session whose key is not in liveKeys.
   */
  async syncWithExternal(liveKeys: Iterable<string>): Promise<SyncResult> {
    const live = new Set(liveKeys);
    const result = await this.store.transact((doc) => {
      const sessions: WipDocument["sessions"] = {};
      const removed: string[] = [];
      for (const [key, entry] of Object.entries(doc.sessions)) {
        if (live.has(key)) {
          sessions[key] = entry;
        } else {
          removed.push(key);
        }
      }
      const outcome: SyncResult = { removed, kept: Object.keys(sessions).length };
      return removed.length > 0 ? { state: { ...doc, sessions }, result: outcome } : { result: outcome };
    });

    for (const key of result.removed) {
      logger.info(`Dropped stale WIP session: ${key}`);
    }
    return result;
  }

  private slotsFrom(doc: WipDocument, projectId: string, projectLimit: number): number {
    const globalCount = Object.keys(doc.sessions).length;
    const projectCount = countFor(doc, projectId);
    return Math.max(0, Math.min(projectLimit - projectCount, this.globalMax - globalCount));
  }
}
