import {
  AuthError,
  ConfigurationError,
  NetworkError,
  RateLimitError,
  RepoNotFoundError,
  SessionGateError,
} from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import { runCommand } from "../../infra/process.js";
import type { IssueTrackerConfig, ReadyActionType } from "../../types/config.js";
import type { WorkItem, WorkItemSource } from "../../types/work-item.js";

const GH_TIMEOUT_MS = 60_000;

/**
 * A tracker that work items are fetched from and marked ready on.
 * fetch returns raw payloads; normalization happens in the caller.
 */
export interface IssueSource {
  readonly source: WorkItemSource;
  fetch(repo: string, tracker: IssueTrackerConfig): Promise<unknown[]>;
  /** Re-marking an item that is already ready is a no-op */
  markReady(repo: string, item: WorkItem, action: ReadyActionType, readyLabel: string): Promise<void>;
}

/**
 * Map a failed gh invocation to the error class the retry policy understands.
 */
export function ghError(args: string[], stderr: string): Error {
  const detail = stderr.trim() || "no output";
  const lower = detail.toLowerCase();
  const summary = `gh ${args.join(" ")} failed: ${detail}`;

  if (lower.includes("rate limit")) {
    const retryMatch = detail.match(/retry after (\d+)/i);
    const retryAfter = retryMatch?.[1] ? parseInt(retryMatch[1], 10) : undefined;
    return new RateLimitError(summary, retryAfter);
  }
  if (
    lower.includes("http 401") ||
    lower.includes("bad credentials") ||
    lower.includes("gh auth login") ||
    lower.includes("authentication")
  ) {
    return new AuthError(summary);
  }
  if (lower.includes("could not add label") || (lower.includes("label") && lower.includes("not found"))) {
    return new ConfigurationError(`${summary} (create the label in the repository first)`);
  }
  const apiPath = args.find((a) => a.startsWith("/repos/"));
  if (lower.includes("could not resolve to a repository") || (lower.includes("http 404") && apiPath !== undefined)) {
    const repoFlag = args.indexOf("--repo");
    const repo =
      (repoFlag >= 0 ? args[repoFlag + 1] : undefined) ?? apiPath?.split("/").slice(2, 4).join("/") ?? "";
    return new RepoNotFoundError(summary, repo);
  }
  if (
    lower.includes("network") ||
    lower.includes("connection") ||
    lower.includes("timeout") ||
    lower.includes("timed out")
  ) {
    return new NetworkError(summary);
  }
  return new SessionGateError(summary, "GH_ERROR");
}

/**
 * GitHubIssueSource - open issues of a repository via the gh CLI
 */
export class GitHubIssueSource implements IssueSource {
  readonly source = "github_issue" as const;

  async fetch(repo: string, tracker: IssueTrackerConfig): Promise<unknown[]> {
    const params: Record<string, string> = { state: "open", per_page: "100" };
    for (const [key, value] of Object.entries(tracker.fetch ?? {})) {
      params[key] = String(value);
    }

    const args = ["api", "-X", "GET", `/repos/${repo}/issues`];
    for (const [key, value] of Object.entries(params)) {
      args.push("-f", `${key}=${value}`);
    }

    const stdout = await this.gh(args);
    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (error) {
      throw new SessionGateError(
        `Unexpected response from gh for ${repo}`,
        "GH_ERROR",
        error instanceof Error ? error : undefined
      );
    }
    if (!Array.isArray(parsed)) {
      throw new SessionGateError(`Expected an array of issues for ${repo}`, "GH_ERROR");
    }

    // The issues endpoint also lists pull requests
    const issues = parsed.filter(
      (entry: unknown) =>
        !(typeof entry === "object" && entry !== null && "pull_request" in entry && entry.pull_request != null)
    );
    logger.debug(`Fetched ${issues.length} open issues from ${repo}`);
    return issues;
  }

  async markReady(repo: string, item: WorkItem, action: ReadyActionType, readyLabel: string): Promise<void> {
    if (item.number === null) {
      throw new SessionGateError(`Cannot mark ${item.id} ready: item has no issue number`, "GH_ERROR");
    }

    const args = ["issue", "edit", String(item.number), "--repo", repo];
    switch (action) {
      case "add_label":
        args.push("--add-label", readyLabel);
        break;
      case "assign_self":
        args.push("--add-assignee", "@me");
        break;
    }
    await this.gh(args);
  }

  private async gh(args: string[]): Promise<string> {
    const result = await runCommand("gh", args, { timeoutMs: GH_TIMEOUT_MS });
    if (result.code !== 0) {
      throw ghError(args, result.stderr);
    }
    return result.stdout;
  }
}
