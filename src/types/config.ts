import { z } from "zod";

// === Process-wide configuration (config.json) ===

export const WipLimitsConfigSchema = z.object({
  // Maximum concurrent sessions across every project
  globalMax: z.number().int().nonnegative().default(5),
});

export const SelfIterationConfigSchema = z.object({
  // Poll cycles only mark items ready when enabled
  enabled: z.boolean().default(false),
  // Label applied to selected items; items already carrying it are never re-selected
  readyLabel: z.string().min(1).default("sessiongate:ready"),
  // Log the ready actions instead of performing them
  dryRun: z.boolean().default(false),
});

export const LockConfigSchema = z.object({
  // How long an invocation waits for a state document lock before failing
  timeoutMs: z.number().int().positive().default(10_000),
  // Locks older than this whose owner cannot be confirmed alive are reaped
  staleMs: z.number().int().positive().default(60_000),
});

export const LoggingConfigSchema = z.object({
  // Directory for log files (relative to dataDir)
  dir: z.string().default("logs"),
  // Keep logs for N days
  retentionDays: z.number().int().positive().default(14),
  // Log level for file output
  fileLevel: z.enum(["debug", "info", "warn", "error"]).default("debug"),
  // Log level for console output
  consoleLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ConfigSchema = z.object({
  dataDir: z.string().default("~/.sessiongate"),
  // Per-project configuration, relative to dataDir unless absolute
  reposFile: z.string().default("repos.yaml"),
  wipLimits: WipLimitsConfigSchema.default({}),
  selfIteration: SelfIterationConfigSchema.default({}),
  lock: LockConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  verbose: z.boolean().default(false),
});

export type WipLimitsConfig = z.infer<typeof WipLimitsConfigSchema>;
export type SelfIterationConfig = z.infer<typeof SelfIterationConfigSchema>;
export type LockConfig = z.infer<typeof LockConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

// === Per-project configuration (repos.yaml) ===

export const READY_ACTION_TYPES = ["add_label", "assign_self"] as const;
export type ReadyActionType = (typeof READY_ACTION_TYPES)[number];

export const ISSUE_TRACKER_TYPES = ["github", "linear"] as const;
export type IssueTrackerType = (typeof ISSUE_TRACKER_TYPES)[number];

export const PriorityLabelSchema = z.object({
  label: z.string().min(1),
  weight: z.number().int(),
});

/** Fully resolved per-project configuration, after defaults are merged in */
export const ResolvedRepoConfigSchema = z.object({
  repo_path: z.string().optional(),
  issue_tracker: z
    .object({
      type: z.enum(ISSUE_TRACKER_TYPES),
      // "owner/repo" the items are fetched from; defaults to the project id
      repo: z.string().optional(),
      // Extra fetch parameters passed through to the source
      fetch: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
      ready_action: z.object({
        type: z.enum(READY_ACTION_TYPES),
      }),
    })
    .passthrough(),
  readiness: z.object({
    labels: z
      .object({
        exclude: z.array(z.string()),
      })
      .passthrough(),
    priority: z.object({
      labels: z.array(PriorityLabelSchema),
      age_weight: z.number().int().nonnegative(),
    }),
    dependencies: z
      .object({
        check_body_references: z.boolean(),
        blocking_labels: z.array(z.string()),
        // A body needs at least this many checkboxes to count as a tracking issue
        min_tracking_checkboxes: z.number().int().min(1),
      })
      .passthrough(),
  }),
  wip_limits: z.object({
    max_concurrent: z.number().int().nonnegative(),
  }),
});

export type PriorityLabel = z.infer<typeof PriorityLabelSchema>;
export type ResolvedRepoConfig = z.infer<typeof ResolvedRepoConfigSchema>;
export type IssueTrackerConfig = ResolvedRepoConfig["issue_tracker"];
export type ReadinessConfig = ResolvedRepoConfig["readiness"];

/** A repos.yaml entry before defaults; any nested field may be missing */
export type RepoConfigInput = Record<string, unknown>;

export const ReposFileSchema = z.object({
  repos: z.record(z.record(z.unknown())).default({}),
});

export type ReposFile = z.infer<typeof ReposFileSchema>;
