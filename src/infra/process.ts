import { spawn } from "node:child_process";
import { TimeoutError } from "./errors.js";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  /** Kill the child and reject with TimeoutError after this long */
  timeoutMs?: number;
}

/**
 * Run an external command, collecting its output.
 *
 * A non-zero exit resolves with its code; callers decide what it means.
 * Rejects only when the command could not be started or timed out.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timer: NodeJS.Timeout | undefined;

    if (options.timeoutMs !== undefined) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        proc.kill("SIGTERM");
        reject(new TimeoutError(`${command} ${args.join(" ")} timed out`, command, timeoutMs));
      }, timeoutMs);
    }

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", (code) => {
      if (timer) clearTimeout(timer);
      resolve({ code: code ?? 1, stdout, stderr });
    });

    proc.on("error", (err) => {
      if (timer) clearTimeout(timer);
      reject(new Error(`Failed to spawn ${command}: ${err.message}`));
    });
  });
}
