import type { ReadinessConfig } from "../../types/config.js";
import type {
  EvaluatedItem,
  PriorityBreakdown,
  ReadinessResult,
  WorkItem,
} from "../../types/work-item.js";
import { hasDependencyReference, isUnfinishedTrackingIssue } from "./dependency-heuristics.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Inferred bonuses, used only when no priority label matched */
export const INFERRED_BONUS = {
  milestone: 20,
  perReaction: 5,
  maxReactions: 30,
  perComment: 2,
  maxComments: 20,
  assigned: 15,
} as const;

export interface ReadinessEvaluatorOptions {
  now?: () => Date;
}

/**
 * ReadinessEvaluator - gates items on labels and dependencies, then scores them
 *
 * Gating and scoring are separate stages: an item that fails a gate is
 * never scored.
 */
export class ReadinessEvaluator {
  private readonly now: () => Date;

  constructor(options: ReadinessEvaluatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /** false if the item carries an excluded or blocking label (case-insensitive) */
  checkLabels(item: WorkItem, config: ReadinessConfig): boolean {
    const gated = new Set(
      [...config.labels.exclude, ...config.dependencies.blocking_labels].map((l) => l.toLowerCase())
    );
    return !item.labels.some((label) => gated.has(label.toLowerCase()));
  }

  /** false if the body references a blocking issue or is an unfinished tracking issue */
  checkDependencies(item: WorkItem, config: ReadinessConfig): boolean {
    const deps = config.dependencies;
    if (!deps.check_body_references) return true;
    if (hasDependencyReference(item.body)) return false;
    return !isUnfinishedTrackingIssue(item.body, deps.min_tracking_checkboxes);
  }

  calculatePriority(item: WorkItem, config: ReadinessConfig): PriorityBreakdown {
    const labels = new Set(item.labels.map((l) => l.toLowerCase()));

    // Highest weight wins; matching labels never add up
    let labelScore = 0;
    for (const { label, weight } of config.priority.labels) {
      if (labels.has(label.toLowerCase()) && weight > labelScore) {
        labelScore = weight;
      }
    }

    let inferredScore = 0;
    if (labelScore === 0) {
      if (item.hasMilestone) inferredScore += INFERRED_BONUS.milestone;
      inferredScore += Math.min(
        INFERRED_BONUS.maxReactions,
        INFERRED_BONUS.perReaction * Math.max(0, item.positiveReactions)
      );
      inferredScore += Math.min(
        INFERRED_BONUS.maxComments,
        INFERRED_BONUS.perComment * Math.max(0, item.comments)
      );
      if (item.assignees > 0) inferredScore += INFERRED_BONUS.assigned;
    }

    const ageScore = this.ageInDays(item) * config.priority.age_weight;

    return {
      labelScore,
      inferredScore,
      ageScore,
      total: labelScore + inferredScore + ageScore,
    };
  }

  evaluate(item: WorkItem, config: ReadinessConfig): ReadinessResult {
    if (!this.checkLabels(item, config)) {
      return { eligible: false, score: 0, reason: "has_blocking_label" };
    }
    if (!this.checkDependencies(item, config)) {
      return { eligible: false, score: 0, reason: "has_dependency" };
    }
    return { eligible: true, score: this.calculatePriority(item, config).total, reason: null };
  }

  /**
   * Evaluate every item and order by score, highest first. Array.prototype.sort
   * is stable, so equal scores keep the source order.
   */
  evaluateBatch<TRaw>(items: WorkItem<TRaw>[], config: ReadinessConfig): EvaluatedItem<TRaw>[] {
    return items
      .map((item) => ({ item, result: this.evaluate(item, config) }))
      .sort((a, b) => b.result.score - a.result.score);
  }

  /** The first n eligible items by score */
  topEligible<TRaw>(items: WorkItem<TRaw>[], config: ReadinessConfig, n: number): WorkItem<TRaw>[] {
    if (n <= 0) return [];
    return this.evaluateBatch(items, config)
      .filter((evaluated) => evaluated.result.eligible)
      .slice(0, n)
      .map((evaluated) => evaluated.item);
  }

  /** Name of the highest-weight priority label the item carries, or "none" */
  priorityLabelFor(item: WorkItem, config: ReadinessConfig): string {
    const labels = new Set(item.labels.map((l) => l.toLowerCase()));
    let best: { label: string; weight: number } | undefined;
    for (const entry of config.priority.labels) {
      if (labels.has(entry.label.toLowerCase()) && (best === undefined || entry.weight > best.weight)) {
        best = entry;
      }
    }
    return best?.label ?? "none";
  }

  private ageInDays(item: WorkItem): number {
    if (item.createdAt === null || Number.isNaN(item.createdAt.getTime())) return 0;
    const elapsed = this.now().getTime() - item.createdAt.getTime();
    return Math.max(0, Math.floor(elapsed / DAY_MS));
  }
}
