import { logger } from "../../infra/logger.js";
import type { WorkItem, WorkItemSource } from "../../types/work-item.js";

export type RawItem = Record<string, unknown>;

function isRecord(value: unknown): value is RawItem {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOf(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function countOf(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

/** Arrays, or GraphQL connections of the form `{ nodes: [...] }` */
function listOf(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (isRecord(value)) {
    const nodes = value["nodes"];
    if (Array.isArray(nodes)) return nodes;
  }
  return [];
}

function labelsOf(raw: RawItem): string[] {
  const names: string[] = [];
  for (const label of listOf(raw["labels"])) {
    const name = typeof label === "string" ? label : isRecord(label) ? stringOf(label["name"]) : null;
    if (name) names.push(name);
  }
  return names;
}

function dateOf(value: unknown): Date | null {
  const text = stringOf(value);
  if (!text) return null;
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** `comments` is an array from the gh CLI and a count from the REST API */
function commentsOf(raw: RawItem): number {
  const comments = raw["comments"];
  if (typeof comments === "number") return countOf(comments);
  return listOf(comments).length;
}

function positiveReactionsOf(raw: RawItem): number {
  // gh CLI: reactionGroups: [{ content: "THUMBS_UP", users: { totalCount } }]
  const groups = raw["reactionGroups"];
  if (Array.isArray(groups)) {
    for (const group of groups) {
      if (isRecord(group) && group["content"] === "THUMBS_UP") {
        const users = group["users"];
        return isRecord(users) ? countOf(users["totalCount"]) : 0;
      }
    }
    return 0;
  }
  // REST: reactions: { "+1": n, ... }
  const reactions = raw["reactions"];
  return isRecord(reactions) ? countOf(reactions["+1"]) : 0;
}

function assigneesOf(raw: RawItem): number {
  const many = listOf(raw["assignees"]).length;
  if (many > 0) return many;
  // Linear, and older REST payloads, carry a single assignee
  return isRecord(raw["assignee"]) ? 1 : 0;
}

function repositoryOf(raw: RawItem): string | null {
  const repository = raw["repository"];
  if (isRecord(repository)) {
    return stringOf(repository["nameWithOwner"]) ?? stringOf(repository["full_name"]);
  }
  // REST: https://api.github.com/repos/<owner>/<repo>
  const match = stringOf(raw["repository_url"])?.match(/\/repos\/([^/]+\/[^/]+)$/);
  return match?.[1] ?? null;
}

function idOf(raw: RawItem, number: number | null): string {
  const identifier = stringOf(raw["identifier"]);
  if (identifier) return identifier;
  if (number !== null) return String(number);
  const id = raw["id"];
  return typeof id === "string" || typeof id === "number" ? String(id) : "";
}

/**
 * Convert a raw tracker payload to a WorkItem.
 *
 * Accepts gh CLI (camelCase), REST (snake_case) and Linear shapes. Missing or
 * null fields become empty values. Nothing downstream looks at the raw shape.
 */
export function normalizeItem(raw: RawItem, source: WorkItemSource): WorkItem<RawItem> {
  const rawNumber = raw["number"];
  const number = typeof rawNumber === "number" && Number.isInteger(rawNumber) ? rawNumber : null;

  return {
    source,
    id: idOf(raw, number),
    number,
    title: stringOf(raw["title"]) ?? "",
    body: stringOf(raw["body"]) ?? stringOf(raw["description"]) ?? "",
    labels: labelsOf(raw),
    createdAt: dateOf(raw["createdAt"] ?? raw["created_at"]),
    comments: commentsOf(raw),
    positiveReactions: positiveReactionsOf(raw),
    assignees: assigneesOf(raw),
    hasMilestone: isRecord(raw["milestone"]),
    repository: repositoryOf(raw),
    url: stringOf(raw["html_url"]) ?? stringOf(raw["url"]),
    raw,
  };
}

/** Normalize a fetched list, skipping entries that are not objects */
export function normalizeItems(raw: unknown[], source: WorkItemSource): WorkItem<RawItem>[] {
  const items: WorkItem<RawItem>[] = [];
  raw.forEach((entry, index) => {
    if (!isRecord(entry)) {
      logger.warn(`Skipping malformed ${source} payload at index ${index}`);
      return;
    }
    items.push(normalizeItem(entry, source));
  });
  return items;
}

const KEY_SEGMENT: Record<WorkItemSource, string> = {
  github_issue: "issue",
  github_pr: "pr",
  linear_issue: "linear",
};

/** Stable key for an item within a project, e.g. "acme/api-issue-42" */
export function itemKey(projectId: string, item: Pick<WorkItem, "source" | "id">): string {
  return `${projectId}-${KEY_SEGMENT[item.source]}-${item.id}`;
}
