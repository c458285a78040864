import {
  AuthError,
  NetworkError,
  ProvisioningError,
  RateLimitError,
  RepoNotFoundError,
  TimeoutError,
} from "../../infra/errors.js";

export const ERROR_KINDS = [
  "rate_limited",
  "auth_failed",
  "network_timeout",
  "repo_not_found",
  "clone_failed",
  "devcontainer_failed",
  "unknown",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface ErrorKindPolicy {
  retryable: boolean;
  /** 0 means no cap; retries are gated by backoff alone */
  maxAttempts: number;
}

export const ERROR_KIND_POLICIES: Record<ErrorKind, ErrorKindPolicy> = {
  rate_limited: { retryable: true, maxAttempts: 0 },
  auth_failed: { retryable: false, maxAttempts: 0 },
  network_timeout: { retryable: true, maxAttempts: 0 },
  repo_not_found: { retryable: false, maxAttempts: 0 },
  clone_failed: { retryable: true, maxAttempts: 3 },
  devcontainer_failed: { retryable: true, maxAttempts: 3 },
  unknown: { retryable: false, maxAttempts: 0 },
};

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

/** Map a stored kind string to the taxonomy; anything unrecognized is "unknown" */
export function parseErrorKind(value: string): ErrorKind {
  return isErrorKind(value) ? value : "unknown";
}

/**
 * Classify a thrown error into an ErrorKind.
 * Typed errors map directly; plain errors fall back to message matching.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof RateLimitError) return "rate_limited";
  if (error instanceof NetworkError || error instanceof TimeoutError) return "network_timeout";
  if (error instanceof AuthError) return "auth_failed";
  if (error instanceof RepoNotFoundError) return "repo_not_found";
  if (error instanceof ProvisioningError) return error.stage;

  if (!(error instanceof Error)) return "unknown";
  const msg = error.message.toLowerCase();

  if (msg.includes("rate limit") || msg.includes("429")) return "rate_limited";
  if (
    msg.includes("401") ||
    msg.includes("bad credentials") ||
    msg.includes("authentication") ||
    msg.includes("not logged in")
  ) {
    return "auth_failed";
  }
  if (
    msg.includes("etimedout") ||
    msg.includes("econnreset") ||
    msg.includes("econnrefused") ||
    msg.includes("timed out") ||
    msg.includes("socket hang up")
  ) {
    return "network_timeout";
  }
  if (msg.includes("could not resolve to a repository") || msg.includes("repository not found")) {
    return "repo_not_found";
  }
  return "unknown";
}
