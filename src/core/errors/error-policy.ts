import { z } from "zod";
import { StateError } from "../../infra/errors.js";
import type { FileLockOptions } from "../../infra/file-lock.js";
import { logger } from "../../infra/logger.js";
import { nextRetryAt, type BackoffOptions } from "../../infra/retry.js";
import { StateStore, type JsonDocument } from "../state/state-store.js";
import { ERROR_KIND_POLICIES, parseErrorKind, type ErrorKind } from "./error-kinds.js";

/**
 * The processed document is shared with other record types; only entries
 * whose state is "error" belong to this policy, the rest pass through.
 */
const ProcessedDocumentSchema = z.record(z.unknown());

const ErrorEntrySchema = z
  .object({
    state: z.literal("error"),
    config: z.string(),
    error: z
      .object({
        type: z.string(),
        message: z.string(),
        occurred_at: z.string(),
        attempts: z.number().int().nonnegative(),
        max_attempts: z.number().int().nonnegative(),
        next_retry: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

type ErrorEntry = z.infer<typeof ErrorEntrySchema>;

export interface ErrorState {
  key: string;
  projectId: string;
  kind: ErrorKind;
  message: string;
  occurredAt: Date;
  attempts: number;
  /** 0 = uncapped */
  maxAttempts: number;
  nextRetry: Date;
}

export interface ErrorRetryPolicyOptions {
  /** Path of the processed document, usually <dataDir>/poll-state/processed.json */
  path: string;
  lock?: FileLockOptions;
  backoff?: Omit<BackoffOptions, "random">;
  now?: () => Date;
  random?: () => number;
}

function toErrorState(key: string, entry: ErrorEntry): ErrorState {
  return {
    key,
    projectId: entry.config,
    kind: parseErrorKind(entry.error.type),
    message: entry.error.message,
    occurredAt: new Date(entry.error.occurred_at),
    attempts: entry.error.attempts,
    maxAttempts: entry.error.max_attempts,
    nextRetry: new Date(entry.error.next_retry),
  };
}

function isErrorRecord(value: unknown): boolean {
  return typeof value === "object" && value !== null && "state" in value && value.state === "error";
}

/**
 * ErrorRetryPolicy - records failures per item key and decides when to retry
 *
 * Retryability comes from the kind; it is never stored separately.
 */
export class ErrorRetryPolicy {
  private readonly store: StateStore<typeof ProcessedDocumentSchema>;
  private readonly backoff: Omit<BackoffOptions, "random">;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(options: ErrorRetryPolicyOptions) {
    this.store = new StateStore(options.path, ProcessedDocumentSchema, options.lock);
    this.backoff = options.backoff ?? {};
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  get path(): string {
    return this.store.path;
  }

  /**
   * Record a failure. Attempts carry over only from an existing error of the
   * same kind; a different kind starts again at 1.
   */
  async markError(key: string, projectId: string, kind: ErrorKind, message: string): Promise<ErrorState> {
    const state = await this.store.transact((doc) => {
      const previous = this.entryFrom(doc, key);
      const carried = previous !== undefined && parseErrorKind(previous.error.type) === kind;
      const attempts = (carried ? previous.error.attempts : 0) + 1;

      const now = this.now();
      const retryAt = nextRetryAt(attempts, now, { ...this.backoff, random: this.random });
      const entry: ErrorEntry = {
        state: "error",
        config: projectId,
        error: {
          type: kind,
          message,
          occurred_at: now.toISOString(),
          attempts,
          max_attempts: ERROR_KIND_POLICIES[kind].maxAttempts,
          next_retry: retryAt.toISOString(),
        },
      };
      return { state: { ...doc, [key]: entry }, result: toErrorState(key, entry) };
    });

    logger.warn(`Marked ${key} as ${kind} (attempt ${state.attempts})`, {
      projectId,
      message,
      nextRetry: state.nextRetry.toISOString(),
    });
    return state;
  }

  /** Retryable, under its cap, and past its backoff */
  async shouldRetry(key: string): Promise<boolean> {
    const state = await this.info(key);
    if (!state) return false;
    if (!ERROR_KIND_POLICIES[state.kind].retryable) return false;
    if (state.maxAttempts > 0 && state.attempts >= state.maxAttempts) return false;
    return this.now().getTime() >= state.nextRetry.getTime();
  }

  /** Not retryable, or a capped kind that has used up its attempts */
  async shouldSkip(key: string): Promise<boolean> {
    const state = await this.info(key);
    if (!state) return false;
    if (!ERROR_KIND_POLICIES[state.kind].retryable) return true;
    return state.maxAttempts > 0 && state.attempts >= state.maxAttempts;
  }

  /** Remove the key's record; an absent key is a no-op */
  async clear(key: string): Promise<boolean> {
    const removed = await this.store.transact((doc) => {
      if (!(key in doc)) return { result: false };
      const next = { ...doc };
      delete next[key];
      return { state: next, result: true };
    });
    if (removed) {
      logger.debug(`Cleared error state for ${key}`);
    }
    return removed;
  }

  async isErrored(key: string): Promise<boolean> {
    return (await this.info(key)) !== undefined;
  }

  async info(key: string): Promise<ErrorState | undefined> {
    const doc = await this.store.read();
    const entry = this.entryFrom(doc, key);
    return entry ? toErrorState(key, entry) : undefined;
  }

  async list(): Promise<ErrorState[]> {
    const doc = await this.store.read();
    const states: ErrorState[] = [];
    for (const key of Object.keys(doc)) {
      const entry = this.entryFrom(doc, key);
      if (entry) states.push(toErrorState(key, entry));
    }
    return states;
  }

  /**
   * @throws StateError when the key is marked as an error but the record is malformed
   */
  private entryFrom(doc: JsonDocument, key: string): ErrorEntry | undefined {
    const raw = doc[key];
    if (!isErrorRecord(raw)) return undefined;
    const result = ErrorEntrySchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new StateError(`Malformed error record for ${key}: ${issues}`, this.store.path);
    }
    return result.data;
  }
}
