import { SessionNotFoundError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import { runCommand, type CommandResult } from "../../infra/process.js";
import type { SessionBackend } from "./session-backend.js";

const TMUX_TIMEOUT_MS = 10_000;

/**
 * Parse `tmux show-environment` output. Lines are `NAME=value`; a leading
 * `-` marks a variable removed from the session, which is skipped.
 */
export function parseEnvironment(output: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const line of output.split("\n")) {
    if (line === "" || line.startsWith("-")) continue;
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    env[line.slice(0, eq)] = line.slice(eq + 1);
  }
  return env;
}

/**
 * TmuxBackend - SessionBackend over the tmux CLI
 */
export class TmuxBackend implements SessionBackend {
  constructor(private readonly binary: string = "tmux") {}

  async listSessions(): Promise<string[]> {
    let result: CommandResult;
    try {
      result = await this.tmux(["list-sessions", "-F", "#{session_name}"]);
    } catch (error) {
      // No tmux binary means no sessions to manage
      logger.debug("tmux unavailable", { error: String(error) });
      return [];
    }
    // Exits non-zero when no server is running
    if (result.code !== 0) return [];
    return result.stdout.split("\n").filter(Boolean);
  }

  async hasSession(name: string): Promise<boolean> {
    const result = await this.tmux(["has-session", "-t", name]);
    return result.code === 0;
  }

  async getEnvironment(name: string): Promise<Record<string, string>> {
    const result = await this.tmux(["show-environment", "-t", name]);
    if (result.code !== 0) {
      throw new SessionNotFoundError(name);
    }
    return parseEnvironment(result.stdout);
  }

  async getCreated(name: string): Promise<number> {
    const result = await this.tmux(["display-message", "-t", name, "-p", "#{session_created}"]);
    if (result.code !== 0) return 0;
    const created = parseInt(result.stdout.trim(), 10);
    return Number.isNaN(created) ? 0 : created;
  }

  async killSession(name: string): Promise<void> {
    const result = await this.tmux(["kill-session", "-t", name]);
    if (result.code !== 0) {
      throw new SessionNotFoundError(name);
    }
  }

  private tmux(args: string[]): Promise<CommandResult> {
    return runCommand(this.binary, args, { timeoutMs: TMUX_TIMEOUT_MS });
  }
}
