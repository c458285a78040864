/** Environment variables that identify a managed session */
export const SESSION_ENV = {
  workspace: "SESSIONGATE_WORKSPACE",
  pollConfig: "SESSIONGATE_POLL_CONFIG",
  itemKey: "SESSIONGATE_ITEM_KEY",
  branch: "SESSIONGATE_BRANCH",
  sourceUrl: "SESSIONGATE_SOURCE_URL",
  sourceType: "SESSIONGATE_SOURCE_TYPE",
} as const;

/**
 * The external process registry sessions live in. The registry only
 * observes and terminates; it never creates sessions.
 */
export interface SessionBackend {
  /** Names of every session, managed or not */
  listSessions(): Promise<string[]>;
  hasSession(name: string): Promise<boolean>;
  /** Session-scoped environment variables that are set */
  getEnvironment(name: string): Promise<Record<string, string>>;
  /** Creation time in epoch seconds, 0 when unknown */
  getCreated(name: string): Promise<number>;
  killSession(name: string): Promise<void>;
}
