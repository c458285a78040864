export class SessionGateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "SessionGateError";
  }
}

export class ConfigurationError extends SessionGateError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

/** A shared state document could not be read, parsed or written */
export class StateError extends SessionGateError {
  constructor(
    message: string,
    public readonly documentPath: string,
    cause?: Error
  ) {
    super(`${message} (${documentPath})`, "STATE_ERROR", cause);
    this.name = "StateError";
  }
}

export class LockTimeoutError extends SessionGateError {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms acquiring lock: ${lockPath}`, "LOCK_TIMEOUT");
    this.name = "LockTimeoutError";
  }
}

export class SessionNotFoundError extends SessionGateError {
  constructor(public readonly sessionName: string) {
    super(`Session not found: ${sessionName}`, "SESSION_NOT_FOUND");
    this.name = "SessionNotFoundError";
  }
}

export class RateLimitError extends SessionGateError {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message, "RATE_LIMIT_ERROR");
    this.name = "RateLimitError";
  }
}

export class NetworkError extends SessionGateError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", cause);
    this.name = "NetworkError";
  }
}

export class TimeoutError extends SessionGateError {
  constructor(
    message: string,
    public readonly operationType: string,
    public readonly timeoutMs: number
  ) {
    super(message, "TIMEOUT_ERROR");
    this.name = "TimeoutError";
  }
}

export class AuthError extends SessionGateError {
  constructor(message: string, cause?: Error) {
    super(message, "AUTH_ERROR", cause);
    this.name = "AuthError";
  }
}

export class RepoNotFoundError extends SessionGateError {
  constructor(
    message: string,
    public readonly repo: string
  ) {
    super(message, "REPO_NOT_FOUND");
    this.name = "RepoNotFoundError";
  }
}

export type ProvisioningStage = "clone_failed" | "devcontainer_failed";

/** Raised by provisioning collaborators (clone, devcontainer) */
export class ProvisioningError extends SessionGateError {
  constructor(
    message: string,
    public readonly stage: ProvisioningStage,
    cause?: Error
  ) {
    super(message, "PROVISIONING_ERROR", cause);
    this.name = "ProvisioningError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
