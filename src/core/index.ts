export * from "./state/state-store.js";
export * from "./config/repo-config.js";
export * from "./wip/wip-tracker.js";
export * from "./readiness/dependency-heuristics.js";
export * from "./readiness/readiness-evaluator.js";
export * from "./errors/error-kinds.js";
export * from "./errors/error-policy.js";
export * from "./sessions/session-backend.js";
export * from "./sessions/tmux-backend.js";
export * from "./sessions/session-registry.js";
export * from "./sources/normalize.js";
export * from "./sources/github-source.js";
export * from "./engine/coordinator.js";
export * from "./engine/clone-janitor.js";
