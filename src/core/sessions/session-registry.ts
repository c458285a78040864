import { existsSync } from "node:fs";
import { SessionNotFoundError, toError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import type { SessionRecord } from "../../types/session.js";
import type { ErrorRetryPolicy } from "../errors/error-policy.js";
import { SESSION_ENV, type SessionBackend } from "./session-backend.js";

export interface KillResult {
  name: string;
  itemKey: string;
  /** false when there was no item key or clearing its error state failed */
  errorCleared: boolean;
}

function toRecord(name: string, env: Record<string, string>, created: number): SessionRecord {
  return {
    name,
    workspace: env[SESSION_ENV.workspace] ?? "",
    pollConfig: env[SESSION_ENV.pollConfig] ?? "",
    itemKey: env[SESSION_ENV.itemKey] ?? "",
    branch: env[SESSION_ENV.branch] ?? "",
    sourceUrl: env[SESSION_ENV.sourceUrl] ?? "",
    sourceType: env[SESSION_ENV.sourceType] ?? "",
    created,
  };
}

/**
 * SessionRegistry - observes and reclaims managed sessions
 *
 * A session is managed when it carries the poll-config variable; anything
 * else in the backend belongs to someone else and is never touched.
 */
export class SessionRegistry {
  constructor(
    private readonly backend: SessionBackend,
    private readonly errorPolicy: ErrorRetryPolicy
  ) {}

  async listManagedSessions(): Promise<SessionRecord[]> {
    const records: SessionRecord[] = [];
    for (const name of await this.backend.listSessions()) {
      let env: Record<string, string>;
      try {
        env = await this.backend.getEnvironment(name);
      } catch (error) {
        // Ended between listing and inspection
        if (error instanceof SessionNotFoundError) continue;
        throw error;
      }
      if (!env[SESSION_ENV.pollConfig]) continue;
      records.push(toRecord(name, env, await this.backend.getCreated(name)));
    }
    return records;
  }

  /**
   * @throws SessionNotFoundError if no session has this name
   */
  async getMetadata(name: string): Promise<SessionRecord> {
    if (!(await this.backend.hasSession(name))) {
      throw new SessionNotFoundError(name);
    }
    const env = await this.backend.getEnvironment(name);
    return toRecord(name, env, await this.backend.getCreated(name));
  }

  /** Orphaned when the declared workspace is empty or missing on disk */
  async isOrphan(name: string): Promise<boolean> {
    return this.isOrphanRecord(await this.getMetadata(name));
  }

  isOrphanRecord(record: SessionRecord): boolean {
    return record.workspace === "" || !existsSync(record.workspace);
  }

  async listOrphans(): Promise<SessionRecord[]> {
    const sessions = await this.listManagedSessions();
    return sessions.filter((record) => this.isOrphanRecord(record));
  }

  /**
   * Terminate a session, then clear its item's error state. The clear is
   * best-effort: a failure is logged and the kill still counts.
   */
  async kill(name: string): Promise<KillResult> {
    const record = await this.getMetadata(name);
    await this.backend.killSession(name);
    logger.info(`Killed session ${name}`, { itemKey: record.itemKey || undefined });

    if (record.itemKey === "") {
      return { name, itemKey: "", errorCleared: false };
    }

    try {
      await this.errorPolicy.clear(record.itemKey);
      return { name, itemKey: record.itemKey, errorCleared: true };
    } catch (error) {
      logger.warn(`Killed ${name} but could not clear error state for ${record.itemKey}`, {
        error: toError(error).message,
      });
      return { name, itemKey: record.itemKey, errorCleared: false };
    }
  }
}
