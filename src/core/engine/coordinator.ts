import { ConfigurationError, toError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import type { IssueTrackerType, ResolvedRepoConfig, SelfIterationConfig } from "../../types/config.js";
import type { WorkItem } from "../../types/work-item.js";
import type { RepoConfigResolver } from "../config/repo-config.js";
import { classifyError } from "../errors/error-kinds.js";
import type { ErrorRetryPolicy, ErrorState } from "../errors/error-policy.js";
import type { ReadinessEvaluator } from "../readiness/readiness-evaluator.js";
import type { SessionRegistry } from "../sessions/session-registry.js";
import type { IssueSource } from "../sources/github-source.js";
import { itemKey, normalizeItems } from "../sources/normalize.js";
import type { WipTracker } from "../wip/wip-tracker.js";

export type ProjectSkipReason =
  | "disabled"
  | "unknown_project"
  | "unsupported_tracker"
  | "no_slots"
  | "source_skipped"
  | "source_backoff"
  | "fetch_failed"
  | "failed";

export interface ItemOutcome {
  key: string;
  id: string;
  title: string;
  status: "marked" | "dry_run" | "failed";
  error?: string;
}

export interface ProjectCycleResult {
  projectId: string;
  slots: number;
  fetched: number;
  items: ItemOutcome[];
  skipped?: ProjectSkipReason;
  error?: string;
}

export interface CycleOptions {
  /** Log ready actions instead of performing them */
  dryRun?: boolean;
}

export interface ReconcileReport {
  orphans: string[];
  killed: string[];
  failed: Array<{ name: string; error: string }>;
  /** WIP keys with no live session behind them */
  staleWipKeys: string[];
}

export interface CoordinatorOptions {
  selfIteration: SelfIterationConfig;
  repoConfig: RepoConfigResolver;
  wip: WipTracker;
  readiness: ReadinessEvaluator;
  errors: ErrorRetryPolicy;
  sessions: SessionRegistry;
  sources: Partial<Record<IssueTrackerType, IssueSource>>;
}

/** Error-state key for failures of the project's source itself */
export function sourceKey(projectId: string): string {
  return `source:${projectId}`;
}

/**
 * Coordinator - one poll cycle and one reconciliation pass
 *
 * Selects ready items per project within the free WIP slots, marks them
 * ready on their tracker, and reclaims sessions whose workspace is gone.
 * A failure for one item or project is recorded and never stops the rest.
 */
export class Coordinator {
  constructor(private readonly options: CoordinatorOptions) {}

  availableSlots(projectId: string): Promise<number> {
    return this.options.wip.availableSlots(projectId);
  }

  /**
   * Items that may be marked ready: not already carrying the ready label,
   * not active, not skipped or backing off, then the best n by readiness.
   */
  async selectCandidates<TRaw>(
    items: WorkItem<TRaw>[],
    projectId: string,
    slots: number,
    config: ResolvedRepoConfig = this.options.repoConfig.getWithDefaults(projectId)
  ): Promise<WorkItem<TRaw>[]> {
    const { errors, wip, readiness, selfIteration } = this.options;
    const readyLabel = selfIteration.readyLabel.toLowerCase();

    const open: WorkItem<TRaw>[] = [];
    for (const item of items) {
      if (item.labels.some((label) => label.toLowerCase() === readyLabel)) continue;

      const key = itemKey(projectId, item);
      if (await wip.isActive(key)) continue;
      if (await errors.shouldSkip(key)) {
        logger.debug(`Skipping ${key}: permanently failed`);
        continue;
      }
      if ((await errors.isErrored(key)) && !(await errors.shouldRetry(key))) {
        logger.debug(`Skipping ${key}: waiting out backoff`);
        continue;
      }
      open.push(item);
    }

    return readiness.topEligible(open, config.readiness, slots);
  }

  async runProject(projectId: string, options: CycleOptions = {}): Promise<ProjectCycleResult> {
    const { selfIteration, repoConfig, errors, sources } = this.options;
    const result: ProjectCycleResult = { projectId, slots: 0, fetched: 0, items: [] };

    if (!selfIteration.enabled) {
      return { ...result, skipped: "disabled" };
    }
    if (!repoConfig.has(projectId)) {
      logger.warn(`No configuration for project ${projectId}`);
      return { ...result, skipped: "unknown_project" };
    }

    const config = repoConfig.getWithDefaults(projectId);
    const tracker = config.issue_tracker;
    const source = sources[tracker.type];
    if (!source) {
      logger.warn(`Unsupported issue tracker for ${projectId}: ${tracker.type}`);
      return { ...result, skipped: "unsupported_tracker" };
    }

    result.slots = await this.availableSlots(projectId);
    if (result.slots === 0) {
      logger.info(`No slots available for ${projectId}`);
      return { ...result, skipped: "no_slots" };
    }

    const srcKey = sourceKey(projectId);
    if (await errors.shouldSkip(srcKey)) {
      logger.warn(`Source for ${projectId} is failing permanently; clear ${srcKey} to resume`);
      return { ...result, skipped: "source_skipped" };
    }
    if ((await errors.isErrored(srcKey)) && !(await errors.shouldRetry(srcKey))) {
      return { ...result, skipped: "source_backoff" };
    }

    const repo = tracker.repo ?? projectId;
    let raw: unknown[];
    try {
      raw = await source.fetch(repo, tracker);
    } catch (error) {
      const err = toError(error);
      await errors.markError(srcKey, projectId, classifyError(error), err.message);
      return { ...result, skipped: "fetch_failed", error: err.message };
    }
    await errors.clear(srcKey);

    const items = normalizeItems(raw, source.source);
    result.fetched = items.length;

    const candidates = await this.selectCandidates(items, projectId, result.slots, config);
    if (candidates.length === 0) {
      logger.info(`No eligible candidates for ${projectId}`);
      return result;
    }

    const dryRun = options.dryRun ?? selfIteration.dryRun;
    const action = tracker.ready_action.type;
    logger.info(`Marking ${candidates.length} item(s) ready for ${projectId}`);

    for (const item of candidates) {
      const key = itemKey(projectId, item);
      const outcome: ItemOutcome = { key, id: item.id, title: item.title, status: "marked" };

      if (dryRun) {
        logger.info(`[dry-run] Would ${action} on ${repo}#${item.id}: ${item.title}`);
        result.items.push({ ...outcome, status: "dry_run" });
        continue;
      }

      try {
        await source.markReady(repo, item, action, selfIteration.readyLabel);
        logger.success(`${repo}#${item.id}: ${item.title}`);
        await errors.clear(key);
        result.items.push(outcome);
      } catch (error) {
        const err = toError(error);
        if (error instanceof ConfigurationError) {
          // A project-level problem; the item stays eligible once it is fixed
          logger.error(`Cannot mark ${repo}#${item.id} ready`, error);
        } else {
          await errors.markError(key, projectId, classifyError(error), err.message);
        }
        result.items.push({ ...outcome, status: "failed", error: err.message });
      }
    }

    return result;
  }

  async runAll(options: CycleOptions = {}): Promise<ProjectCycleResult[]> {
    if (!this.options.selfIteration.enabled) {
      logger.info("Self-iteration is disabled");
      return [];
    }

    const results: ProjectCycleResult[] = [];
    for (const projectId of this.options.repoConfig.list()) {
      try {
        results.push(await this.runProject(projectId, options));
      } catch (error) {
        logger.error(`Poll cycle failed for ${projectId}`, error);
        results.push({
          projectId,
          slots: 0,
          fetched: 0,
          items: [],
          skipped: "failed",
          error: toError(error).message,
        });
      }
    }
    return results;
  }

  /**
   * Called once a session for the item has been provisioned. Takes a WIP
   * slot under the item's priority label and clears any earlier failure.
   *
   * @returns false if no slot was free
   */
  async recordProvisioned(projectId: string, item: WorkItem): Promise<boolean> {
    const { wip, errors, readiness, repoConfig } = this.options;
    const key = itemKey(projectId, item);
    const priority = readiness.priorityLabelFor(item, repoConfig.getWithDefaults(projectId).readiness);
    const admitted = await wip.tryAdmit(key, projectId, priority);
    if (admitted) {
      await errors.clear(key);
    }
    return admitted;
  }

  recordProvisionFailure(projectId: string, item: WorkItem, error: unknown): Promise<ErrorState> {
    const key = itemKey(projectId, item);
    return this.options.errors.markError(key, projectId, classifyError(error), toError(error).message);
  }

  /**
   * Bring WIP in line with the live sessions and kill orphans.
   * Killing happens after the WIP document is committed.
   */
  async reconcile(options: CycleOptions = {}): Promise<ReconcileReport> {
    const { sessions, wip } = this.options;
    const managed = await sessions.listManagedSessions();
    const orphans = managed.filter((record) => sessions.isOrphanRecord(record));
    const orphanNames = new Set(orphans.map((record) => record.name));
    const liveKeys = managed
      .filter((record) => !orphanNames.has(record.name) && record.itemKey !== "")
      .map((record) => record.itemKey);

    const report: ReconcileReport = {
      orphans: orphans.map((record) => record.name),
      killed: [],
      failed: [],
      staleWipKeys: [],
    };

    if (options.dryRun) {
      const live = new Set(liveKeys);
      report.staleWipKeys = (await wip.listSessions())
        .map((session) => session.key)
        .filter((key) => !live.has(key));
      return report;
    }

    report.staleWipKeys = (await wip.syncWithExternal(liveKeys)).removed;

    for (const record of orphans) {
      try {
        await sessions.kill(record.name);
        report.killed.push(record.name);
      } catch (error) {
        logger.error(`Failed to kill orphaned session ${record.name}`, error);
        report.failed.push({ name: record.name, error: toError(error).message });
      }
    }
    return report;
  }
}
