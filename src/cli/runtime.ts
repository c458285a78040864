import { RepoConfigResolver } from "../core/config/repo-config.js";
import { CloneJanitor, type GitRunner } from "../core/engine/clone-janitor.js";
import { Coordinator } from "../core/engine/coordinator.js";
import { ErrorRetryPolicy } from "../core/errors/error-policy.js";
import { ReadinessEvaluator } from "../core/readiness/readiness-evaluator.js";
import type { SessionBackend } from "../core/sessions/session-backend.js";
import { SessionRegistry } from "../core/sessions/session-registry.js";
import { TmuxBackend } from "../core/sessions/tmux-backend.js";
import { GitHubIssueSource, type IssueSource } from "../core/sources/github-source.js";
import { WipTracker } from "../core/wip/wip-tracker.js";
import type { Config, IssueTrackerType } from "../types/config.js";
import { resolvePaths, type ResolvedPaths } from "./config/loader.js";

export interface Runtime {
  config: Config;
  paths: ResolvedPaths;
  repoConfig: RepoConfigResolver;
  wip: WipTracker;
  errors: ErrorRetryPolicy;
  readiness: ReadinessEvaluator;
  sessions: SessionRegistry;
  coordinator: Coordinator;
  janitor: CloneJanitor;
}

/** Collaborators that reach outside the process, replaceable in tests */
export interface RuntimeOverrides {
  repoConfig?: RepoConfigResolver;
  backend?: SessionBackend;
  sources?: Partial<Record<IssueTrackerType, IssueSource>>;
  git?: GitRunner;
  now?: () => Date;
  random?: () => number;
}

/**
 * Build every component for one invocation from the resolved configuration.
 */
export function createRuntime(config: Config, overrides: RuntimeOverrides = {}): Runtime {
  const paths = resolvePaths(config);
  const lock = { timeoutMs: config.lock.timeoutMs, staleMs: config.lock.staleMs };

  const repoConfig = overrides.repoConfig ?? RepoConfigResolver.fromFile(paths.reposFile);
  const wip = new WipTracker({
    path: paths.wipState,
    globalMax: config.wipLimits.globalMax,
    repoConfig,
    lock,
    now: overrides.now,
  });
  const errors = new ErrorRetryPolicy({
    path: paths.processed,
    lock,
    now: overrides.now,
    random: overrides.random,
  });
  const readiness = new ReadinessEvaluator({ now: overrides.now });
  const sessions = new SessionRegistry(overrides.backend ?? new TmuxBackend(), errors);
  const coordinator = new Coordinator({
    selfIteration: config.selfIteration,
    repoConfig,
    wip,
    readiness,
    errors,
    sessions,
    sources: overrides.sources ?? { github: new GitHubIssueSource() },
  });
  const janitor = new CloneJanitor(paths.clonesDir, overrides.git);

  return { config, paths, repoConfig, wip, errors, readiness, sessions, coordinator, janitor };
}
