// sessiongate - public API for programmatic usage

export * from "./types/index.js";
export * from "./infra/index.js";
export * from "./core/index.js";
export { loadConfig, resolvePaths, getDataDir, type ResolvedPaths } from "./cli/config/loader.js";
export { createRuntime, type Runtime, type RuntimeOverrides } from "./cli/runtime.js";
