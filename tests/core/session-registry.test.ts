import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { ErrorRetryPolicy } from "../../src/core/errors/error-policy.js";
import { SESSION_ENV } from "../../src/core/sessions/session-backend.js";
import { SessionRegistry } from "../../src/core/sessions/session-registry.js";
import { SessionNotFoundError } from "../../src/infra/errors.js";
import { InMemorySessionBackend, createTempDir, silenceLogger } from "../helpers.js";

describe("SessionRegistry", () => {
  let dir: string;
  let cleanup: () => void;
  let backend: InMemorySessionBackend;
  let errors: ErrorRetryPolicy;
  let registry: SessionRegistry;

  function managedEnv(workspace: string, itemKey = ""): Record<string, string> {
    return {
      [SESSION_ENV.workspace]: workspace,
      [SESSION_ENV.pollConfig]: "acme/api",
      [SESSION_ENV.itemKey]: itemKey,
      [SESSION_ENV.branch]: "fix/issue-1",
      [SESSION_ENV.sourceUrl]: "https://example.test/acme/api/issues/1",
      [SESSION_ENV.sourceType]: "github_issue",
    };
  }

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
    silenceLogger();
    backend = new InMemorySessionBackend();
    errors = new ErrorRetryPolicy({ path: join(dir, "processed.json") });
    registry = new SessionRegistry(backend, errors);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  it("should list only sessions carrying a poll config", async () => {
    backend
      .add("managed", managedEnv(dir, "acme/api-issue-1"), 1_700_000_100)
      .add("personal", { SHELL: "/bin/zsh" });

    const sessions = await registry.listManagedSessions();

    expect(sessions).toEqual([
      {
        name: "managed",
        workspace: dir,
        pollConfig: "acme/api",
        itemKey: "acme/api-issue-1",
        branch: "fix/issue-1",
        sourceUrl: "https://example.test/acme/api/issues/1",
        sourceType: "github_issue",
        created: 1_700_000_100,
      },
    ]);
  });

  it("should fill unset metadata with empty strings", async () => {
    backend.add("bare", { [SESSION_ENV.pollConfig]: "acme/api" });

    const record = await registry.getMetadata("bare");

    expect(record.workspace).toBe("");
    expect(record.itemKey).toBe("");
    expect(registry.isOrphanRecord(record)).toBe(true);
  });

  it("should throw for an unknown session name", async () => {
    await expect(registry.getMetadata("ghost")).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(registry.kill("ghost")).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("should track the workspace directory for orphan status", async () => {
    const workspace = join(dir, "clones", "api", "fix-1");
    backend.add("s1", managedEnv(workspace));

    expect(await registry.isOrphan("s1")).toBe(true);

    mkdirSync(workspace, { recursive: true });
    expect(await registry.isOrphan("s1")).toBe(false);
  });

  it("should list orphans among managed sessions only", async () => {
    backend
      .add("live", managedEnv(dir))
      .add("gone", managedEnv(join(dir, "missing")))
      .add("personal", { [SESSION_ENV.workspace]: join(dir, "missing") });

    expect((await registry.listOrphans()).map((s) => s.name)).toEqual(["gone"]);
  });

  it("should clear the item's error state when killing", async () => {
    await errors.markError("acme/api-issue-1", "acme/api", "clone_failed", "exit 128");
    backend.add("s1", managedEnv(dir, "acme/api-issue-1"));

    const result = await registry.kill("s1");

    expect(result).toEqual({ name: "s1", itemKey: "acme/api-issue-1", errorCleared: true });
    expect(backend.killed).toEqual(["s1"]);
    expect(await errors.isErrored("acme/api-issue-1")).toBe(false);
  });

  it("should still report the kill when clearing fails", async () => {
    backend.add("s1", managedEnv(dir, "acme/api-issue-1"));
    vi.spyOn(errors, "clear").mockRejectedValue(new Error("disk full"));

    const result = await registry.kill("s1");

    expect(result.errorCleared).toBe(false);
    expect(backend.killed).toEqual(["s1"]);
  });

  it("should not touch error state for a session without an item key", async () => {
    backend.add("s1", managedEnv(dir));
    const clear = vi.spyOn(errors, "clear");

    expect(await registry.kill("s1")).toEqual({ name: "s1", itemKey: "", errorCleared: false });
    expect(clear).not.toHaveBeenCalled();
  });
});
