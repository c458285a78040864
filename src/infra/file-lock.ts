/**
 * FileLock - advisory exclusive lock shared between processes
 *
 * Every poll cycle and manual command is its own OS process, so an
 * in-memory mutex is not enough. The lock is a sibling file created with
 * O_EXCL; whoever creates it owns it until it is unlinked. The file records
 * the owner's pid and acquisition time so a lock left behind by a crashed
 * process can be reaped. Reaping and release both check that the file still
 * holds the lock they looked at, so neither removes a newer owner's lock.
 */

import { randomUUID } from "node:crypto";
import { link, open, readFile, rename, stat, unlink } from "node:fs/promises";
import { LockTimeoutError, toError } from "./errors.js";
import { logger } from "./logger.js";

export interface FileLockOptions {
  /** Give up after this long (default: 10000) */
  timeoutMs?: number;
  /** A lock held longer than this is considered abandoned (default: 60000) */
  staleMs?: number;
  /** Delay between acquisition attempts (default: 25) */
  pollIntervalMs?: number;
}

export const DEFAULT_LOCK_OPTIONS: Required<FileLockOptions> = {
  timeoutMs: 10_000,
  staleMs: 60_000,
  pollIntervalMs: 25,
};

interface LockOwner {
  /** null when the file is still empty or was half-written */
  pid: number | null;
  acquiredAtMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return hasCode(error, "EPERM");
  }
}

function parseOwner(raw: string): { pid: number | null; acquiredAtMs?: number } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { pid: null };
  }
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "pid" in parsed &&
    "acquiredAtMs" in parsed &&
    typeof parsed.pid === "number" &&
    typeof parsed.acquiredAtMs === "number"
  ) {
    return { pid: parsed.pid, acquiredAtMs: parsed.acquiredAtMs };
  }
  return { pid: null };
}

interface LockSnapshot {
  raw: string;
  mtimeMs: number;
}

async function readLockFile(path: string): Promise<LockSnapshot | null> {
  try {
    const [raw, stats] = await Promise.all([readFile(path, "utf-8"), stat(path)]);
    return { raw, mtimeMs: stats.mtimeMs };
  } catch (error) {
    if (hasCode(error, "ENOENT")) return null;
    throw error;
  }
}

function ownerOf(snapshot: LockSnapshot): LockOwner {
  const owner = parseOwner(snapshot.raw);
  return { pid: owner.pid, acquiredAtMs: owner.acquiredAtMs ?? snapshot.mtimeMs };
}

function sameLock(a: LockSnapshot, b: LockSnapshot): boolean {
  return a.raw === b.raw && a.mtimeMs === b.mtimeMs;
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (!hasCode(error, "ENOENT")) throw error;
  }
}

/** Put a lock that was moved aside by mistake back in place */
async function restoreLock(aside: string, lockPath: string): Promise<void> {
  try {
    await link(aside, lockPath);
  } catch (error) {
    if (!hasCode(error, "EEXIST")) throw error;
    logger.warn(`Lock ${lockPath} was taken again before a live lock could be restored`);
  }
  await unlinkIfPresent(aside);
}

/**
 * Remove the lock file if its owner is gone or it is older than staleMs.
 *
 * The file is first renamed to a unique sibling and compared with what was
 * inspected. If another contender reaped and re-acquired the lock in the
 * meantime, the renamed file is the new owner's and goes back.
 *
 * @returns true if the lock was reaped and acquisition can be retried at once
 */
async function tryReapStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  const observed = await readLockFile(lockPath);
  if (observed === null) return true;

  const owner = ownerOf(observed);
  const age = Date.now() - owner.acquiredAtMs;
  const dead = owner.pid !== null && !isProcessAlive(owner.pid);
  if (!dead && age < staleMs) return false;

  const aside = `${lockPath}.${process.pid}.${randomUUID()}.stale`;
  try {
    await rename(lockPath, aside);
  } catch (error) {
    if (hasCode(error, "ENOENT")) return true;
    throw error;
  }

  const moved = await readLockFile(aside);
  if (moved !== null && !sameLock(moved, observed)) {
    await restoreLock(aside, lockPath);
    return false;
  }

  await unlinkIfPresent(aside);
  logger.warn(`Reaped stale lock ${lockPath}`, { pid: owner.pid, ageMs: age });
  return true;
}

/**
 * Acquire an exclusive lock at lockPath, waiting up to timeoutMs.
 *
 * @returns A function that releases the lock
 * @throws LockTimeoutError if the lock could not be acquired in time
 */
export async function acquireFileLock(
  lockPath: string,
  options: FileLockOptions = {}
): Promise<() => Promise<void>> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options };
  const deadline = Date.now() + opts.timeoutMs;

  for (;;) {
    try {
      const handle = await open(lockPath, "wx", 0o600);
      const owner = { pid: process.pid, acquiredAtMs: Date.now(), token: randomUUID() };
      const content = `${JSON.stringify(owner)}\n`;
      try {
        await handle.writeFile(content, "utf-8");
      } finally {
        await handle.close();
      }

      return async () => {
        const current = await readLockFile(lockPath);
        if (current === null) {
          logger.warn(`Lock ${lockPath} was already removed before release`);
          return;
        }
        if (current.raw !== content) {
          logger.warn(`Lock ${lockPath} was reaped and taken by another owner; leaving it in place`);
          return;
        }
        await unlinkIfPresent(lockPath);
      };
    } catch (error) {
      if (!hasCode(error, "EEXIST")) throw toError(error);
    }

    if (await tryReapStaleLock(lockPath, opts.staleMs)) continue;
    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, opts.timeoutMs);
    }
    await sleep(opts.pollIntervalMs);
  }
}

/**
 * Execute a function while holding the lock at lockPath.
 * The lock is released when the function completes (or throws).
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const release = await acquireFileLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
