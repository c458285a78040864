/**
 * Tests for the wired runtime: one poll cycle through real state files
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createRuntime } from "../../src/cli/runtime.js";
import { ConfigSchema } from "../../src/types/config.js";
import { FakeIssueSource, InMemorySessionBackend, createTempDir, silenceLogger } from "../helpers.js";

describe("createRuntime", () => {
  let dir: string;
  let cleanup: () => void;
  const now = new Date("2026-05-01T12:00:00.000Z");

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
    silenceLogger();
    writeFileSync(
      join(dir, "repos.yaml"),
      [
        "repos:",
        "  acme/api:",
        `    repo_path: ${join(dir, "api")}`,
        "    wip_limits:",
        "      max_concurrent: 1",
        "    readiness:",
        "      priority:",
        "        labels:",
        "          - label: urgent",
        "            weight: 50",
        "",
      ].join("\n")
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  it("should resolve every file under the data directory", () => {
    const runtime = createRuntime(ConfigSchema.parse({ dataDir: dir }));

    expect(runtime.paths.reposFile).toBe(join(dir, "repos.yaml"));
    expect(runtime.errors.path).toBe(join(dir, "poll-state", "processed.json"));
    expect(runtime.repoConfig.list()).toEqual(["acme/api"]);
    expect(runtime.wip.globalLimit).toBe(5);
  });

  it("should run a poll cycle end to end", async () => {
    const source = new FakeIssueSource([
      { number: 10, title: "routine", labels: [] },
      { number: 11, title: "urgent fix", labels: [{ name: "urgent" }] },
    ]);
    const runtime = createRuntime(ConfigSchema.parse({ dataDir: dir, selfIteration: { enabled: true } }), {
      backend: new InMemorySessionBackend(),
      sources: { github: source },
      now: () => now,
      random: () => 0.5,
    });

    const results = await runtime.coordinator.runAll();

    expect(results).toEqual([
      {
        projectId: "acme/api",
        slots: 1,
        fetched: 2,
        items: [{ key: "acme/api-issue-11", id: "11", title: "urgent fix", status: "marked" }],
      },
    ]);
    expect(source.marked).toEqual([
      { repo: "acme/api", id: "11", action: "add_label", readyLabel: "sessiongate:ready" },
    ]);
    // A clean fetch clears nothing that was never written
    expect(existsSync(join(dir, "poll-state", "processed.json"))).toBe(false);
  });

  it("should persist a source failure for the next invocation", async () => {
    const source = new FakeIssueSource();
    source.fetchError = new Error("socket hang up");
    const config = ConfigSchema.parse({ dataDir: dir, selfIteration: { enabled: true } });
    const overrides = { backend: new InMemorySessionBackend(), sources: { github: source }, now: () => now };

    await createRuntime(config, overrides).coordinator.runProject("acme/api");
    const second = await createRuntime(config, overrides).coordinator.runProject("acme/api");

    expect(second.skipped).toBe("source_backoff");
    const doc = JSON.parse(readFileSync(join(dir, "poll-state", "processed.json"), "utf-8"));
    expect(doc["source:acme/api"].error.type).toBe("network_timeout");
  });
});
