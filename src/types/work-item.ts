/** Where a work item came from; the only source-specific fact that survives ingestion */
export type WorkItemSource = "github_issue" | "github_pr" | "linear_issue";

/**
 * Canonical work item. Every source shape is converted to this at the
 * ingestion boundary (see core/sources/normalize.ts); readiness and priority
 * code only ever sees this type.
 */
export interface WorkItem<TRaw = unknown> {
  source: WorkItemSource;
  /** Issue/PR number as a string, or the tracker identifier (e.g. "ENG-12") */
  id: string;
  number: number | null;
  title: string;
  body: string;
  /** Label names as the tracker spells them */
  labels: string[];
  createdAt: Date | null;
  comments: number;
  positiveReactions: number;
  assignees: number;
  hasMilestone: boolean;
  /** "owner/repo" when the payload carries it */
  repository: string | null;
  url: string | null;
  /** The payload exactly as the source returned it */
  raw: TRaw;
}

export type ReadinessReason = "has_blocking_label" | "has_dependency";

export interface ReadinessResult {
  eligible: boolean;
  score: number;
  reason: ReadinessReason | null;
}

export interface PriorityBreakdown {
  /** Highest matching priority label weight */
  labelScore: number;
  /** Milestone/reaction/comment/assignee bonus, only when labelScore is 0 */
  inferredScore: number;
  ageScore: number;
  total: number;
}

export interface EvaluatedItem<TRaw = unknown> {
  item: WorkItem<TRaw>;
  result: ReadinessResult;
}
