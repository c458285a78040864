import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomBytes } from "node:crypto";
import type { z } from "zod";
import { withFileLock, type FileLockOptions } from "../../infra/file-lock.js";
import { StateError, toError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

export type JsonDocument = Record<string, unknown>;

/** Outcome of a locked transaction; omit `state` to leave the document untouched */
export interface TransactionOutcome<T, R> {
  state?: T;
  result: R;
}

function isPlainObject(value: unknown): value is JsonDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON document. A missing or empty file reads as `{}`.
 *
 * @throws StateError if the file exists but is not a JSON object
 */
export async function readJsonDocument(path: string): Promise<JsonDocument> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw new StateError("Failed to read state document", path, toError(error));
  }

  if (raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StateError("Malformed state document", path, toError(error));
  }
  if (!isPlainObject(parsed)) {
    throw new StateError("State document is not a JSON object", path);
  }
  return parsed;
}

/**
 * Write a document so readers only ever see the old or the new content:
 * write a temp file in the same directory, then rename over the target.
 */
export async function writeJsonAtomic(path: string, document: unknown): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);

  try {
    await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
    await rename(tmpPath, path);
  } catch (error) {
    await unlink(tmpPath).catch((unlinkError: unknown) => {
      logger.debug(`Could not remove temp file ${tmpPath}`, { error: String(unlinkError) });
    });
    throw new StateError("Failed to write state document", path, toError(error));
  }
}

async function lockedTransaction<R>(
  path: string,
  fn: (document: JsonDocument) => TransactionOutcome<unknown, R> | Promise<TransactionOutcome<unknown, R>>,
  options: FileLockOptions
): Promise<R> {
  await mkdir(dirname(path), { recursive: true });
  return withFileLock(
    `${path}.lock`,
    async () => {
      const current = await readJsonDocument(path);
      const outcome = await fn(current);
      if (outcome.state !== undefined) {
        await writeJsonAtomic(path, outcome.state);
      }
      return outcome.result;
    },
    options
  );
}

/**
 * Read-modify-write a JSON document under an exclusive lock on `path.lock`.
 *
 * fn receives the current document (`{}` when the file is absent) and
 * returns the document to write. The lock is released even if fn throws, in
 * which case nothing is written.
 *
 * @returns The document that was written
 */
export async function withLock(
  path: string,
  fn: (document: JsonDocument) => JsonDocument | Promise<JsonDocument>,
  options: FileLockOptions = {}
): Promise<JsonDocument> {
  return lockedTransaction(
    path,
    async (document) => {
      const next = await fn(document);
      return { state: next, result: next };
    },
    options
  );
}

/**
 * StateStore - typed, lock-guarded JSON document
 *
 * The schema is applied on every read, so a document another process
 * corrupted is reported (with its path) instead of being silently
 * overwritten.
 */
export class StateStore<S extends z.ZodTypeAny> {
  constructor(
    readonly path: string,
    private readonly schema: S,
    private readonly lockOptions: FileLockOptions = {}
  ) {}

  private parse(document: JsonDocument): z.output<S> {
    const result = this.schema.safeParse(document);
    if (!result.success) {
      const issues = result.error.errors
        .map((e) => `${e.path.join(".") || "<root>"}: ${e.message}`)
        .join(", ");
      throw new StateError(`Invalid state document: ${issues}`, this.path);
    }
    return result.data;
  }

  /** Unlocked read; may be stale, fine for display */
  async read(): Promise<z.output<S>> {
    return this.parse(await readJsonDocument(this.path));
  }

  async update(fn: (state: z.output<S>) => z.output<S>): Promise<z.output<S>> {
    return this.transact((state) => {
      const next = fn(state);
      return { state: next, result: next };
    });
  }

  /**
   * Run fn against a fresh copy of the document while holding the lock.
   * Counts computed inside fn cannot be invalidated by another process
   * until the transaction ends.
   */
  async transact<R>(fn: (state: z.output<S>) => TransactionOutcome<z.output<S>, R>): Promise<R> {
    return lockedTransaction(
      this.path,
      (document) => fn(this.parse(document)),
      this.lockOptions
    );
  }
}
