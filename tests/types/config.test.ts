import { describe, it, expect } from "vitest";
import {
  ConfigSchema,
  LockConfigSchema,
  ResolvedRepoConfigSchema,
  ReposFileSchema,
} from "../../src/types/config.js";

describe("ConfigSchema", () => {
  it("should parse empty config with defaults", () => {
    const result = ConfigSchema.parse({});

    expect(result.dataDir).toBe("~/.sessiongate");
    expect(result.reposFile).toBe("repos.yaml");
    expect(result.wipLimits.globalMax).toBe(5);
    expect(result.selfIteration).toEqual({ enabled: false, readyLabel: "sessiongate:ready", dryRun: false });
    expect(result.logging.retentionDays).toBe(14);
  });

  it("should parse partial config", () => {
    const result = ConfigSchema.parse({
      selfIteration: {
        enabled: true,
      },
    });

    expect(result.selfIteration.enabled).toBe(true);
    expect(result.selfIteration.readyLabel).toBe("sessiongate:ready"); // default
  });

  it("should reject a negative global limit", () => {
    expect(() =>
      ConfigSchema.parse({
        wipLimits: { globalMax: -1 },
      })
    ).toThrow();
  });

  it("should reject an empty ready label", () => {
    expect(() => ConfigSchema.parse({ selfIteration: { readyLabel: "" } })).toThrow();
  });
});

describe("LockConfigSchema", () => {
  it("should parse with defaults", () => {
    expect(LockConfigSchema.parse({})).toEqual({ timeoutMs: 10_000, staleMs: 60_000 });
  });
});

describe("ResolvedRepoConfigSchema", () => {
  const resolved = {
    issue_tracker: { type: "github", ready_action: { type: "add_label" } },
    readiness: {
      labels: { exclude: [] },
      priority: { labels: [], age_weight: 1 },
      dependencies: { check_body_references: true, blocking_labels: ["blocked"], min_tracking_checkboxes: 2 },
    },
    wip_limits: { max_concurrent: 3 },
  };

  it("should accept a complete configuration", () => {
    expect(ResolvedRepoConfigSchema.parse(resolved).wip_limits.max_concurrent).toBe(3);
  });

  it("should reject an unknown ready action", () => {
    const input = { ...resolved, issue_tracker: { type: "github", ready_action: { type: "close" } } };
    expect(ResolvedRepoConfigSchema.safeParse(input).success).toBe(false);
  });

  it("should reject a fractional age weight", () => {
    const input = { ...resolved, readiness: { ...resolved.readiness, priority: { labels: [], age_weight: 1.5 } } };
    expect(ResolvedRepoConfigSchema.safeParse(input).success).toBe(false);
  });

  it("should keep unknown tracker keys", () => {
    const input = { ...resolved, issue_tracker: { ...resolved.issue_tracker, team: "ENG" } };
    expect(ResolvedRepoConfigSchema.parse(input).issue_tracker["team"]).toBe("ENG");
  });
});

describe("ReposFileSchema", () => {
  it("should default to no projects", () => {
    expect(ReposFileSchema.parse({})).toEqual({ repos: {} });
  });

  it("should reject a project that is not a mapping", () => {
    expect(ReposFileSchema.safeParse({ repos: { "acme/api": "yes" } }).success).toBe(false);
  });
});
