/**
 * Shared fakes and fixtures for tests
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import { SessionNotFoundError } from "../src/infra/errors.js";
import type { SessionBackend } from "../src/core/sessions/session-backend.js";
import type { IssueSource } from "../src/core/sources/github-source.js";
import type { IssueTrackerConfig, ReadyActionType } from "../src/types/config.js";
import type { WorkItem } from "../src/types/work-item.js";

export function createTempDir(prefix = "sessiongate-test-"): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/** Silence console output from the logger for the current test */
export function silenceLogger(): void {
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
}

export function makeItem(overrides: Partial<WorkItem> = {}): WorkItem {
  return {
    source: "github_issue",
    id: "1",
    number: 1,
    title: "Test item",
    body: "",
    labels: [],
    createdAt: null,
    comments: 0,
    positiveReactions: 0,
    assignees: 0,
    hasMilestone: false,
    repository: null,
    url: null,
    raw: {},
    ...overrides,
  };
}

/**
 * In-memory stand-in for tmux
 */
export class InMemorySessionBackend implements SessionBackend {
  private readonly sessions = new Map<string, { env: Record<string, string>; created: number }>();
  readonly killed: string[] = [];

  add(name: string, env: Record<string, string>, created = 1_700_000_000): this {
    this.sessions.set(name, { env, created });
    return this;
  }

  async listSessions(): Promise<string[]> {
    return Array.from(this.sessions.keys());
  }

  async hasSession(name: string): Promise<boolean> {
    return this.sessions.has(name);
  }

  async getEnvironment(name: string): Promise<Record<string, string>> {
    const session = this.sessions.get(name);
    if (!session) throw new SessionNotFoundError(name);
    return { ...session.env };
  }

  async getCreated(name: string): Promise<number> {
    return this.sessions.get(name)?.created ?? 0;
  }

  async killSession(name: string): Promise<void> {
    if (!this.sessions.delete(name)) throw new SessionNotFoundError(name);
    this.killed.push(name);
  }
}

export interface MarkReadyCall {
  repo: string;
  id: string;
  action: ReadyActionType;
  readyLabel: string;
}

/**
 * IssueSource returning canned payloads
 */
export class FakeIssueSource implements IssueSource {
  readonly source = "github_issue" as const;
  readonly marked: MarkReadyCall[] = [];
  readonly fetchedRepos: string[] = [];
  fetchError: Error | null = null;
  /** Item ids whose markReady call fails with the given error */
  readonly markErrors = new Map<string, Error>();

  constructor(public items: unknown[] = []) {}

  async fetch(repo: string, _tracker: IssueTrackerConfig): Promise<unknown[]> {
    this.fetchedRepos.push(repo);
    if (this.fetchError) throw this.fetchError;
    return this.items;
  }

  async markReady(repo: string, item: WorkItem, action: ReadyActionType, readyLabel: string): Promise<void> {
    const error = this.markErrors.get(item.id);
    if (error) throw error;
    this.marked.push({ repo, id: item.id, action, readyLabel });
  }
}
