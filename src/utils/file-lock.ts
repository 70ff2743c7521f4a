/**
 * Cross-process advisory lock
 *
 * A lock on `<target>` is the sidecar file `<target>.lock`, created with
 * exclusive-create semantics and holding the owner's pid. Waiters poll with
 * backoff until the owner removes it; a lock whose owner process is gone is
 * taken over. Locks still held when the process exits, or is stopped by a
 * termination signal, are removed.
 */

import { readFileSync, rmSync } from "node:fs";
import { mkdir, open, readFile, rm, stat, type FileHandle } from "fs/promises";
import path from "node:path";
import { StorageError } from "../types/errors";
import { errorCode } from "./fs";

export interface FileLockOptions {
  timeoutMs?: number;
  initialPollMs?: number;
  maxPollMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const DEFAULT_INITIAL_POLL_MS = 25;
const DEFAULT_MAX_POLL_MS = 1000;
// A lock file without a readable pid is only reclaimed once it is this old
const UNREADABLE_LOCK_GRACE_MS = 5000;

const CLEANUP_SIGNALS = ["SIGINT", "SIGTERM", "SIGQUIT", "SIGABRT"] as const;
type CleanupSignal = (typeof CLEANUP_SIGNALS)[number];

const heldLocks = new Set<string>();
const signalHandlers = new Map<CleanupSignal, () => void>();
let exitHandlerRegistered = false;

/**
 * Remove every lock file this process holds; exit handlers cannot await
 */
function releaseAllLocksSync(): void {
  for (const lockPath of heldLocks) {
    try {
      rmSync(lockPath, { force: true });
    } catch {
      // Process is going away; a leftover lock is reclaimed once our pid is dead
    }
  }
  heldLocks.clear();
}

function handleTerminationSignal(signal: CleanupSignal): void {
  releaseAllLocksSync();
  // Only ours is listening: restore the default action so the process still dies
  if (process.listenerCount(signal) === 1) {
    const handler = signalHandlers.get(signal);
    if (handler) {
      process.off(signal, handler);
      signalHandlers.delete(signal);
    }
    process.kill(process.pid, signal);
  }
}

function registerCleanupHandlers(): void {
  if (!exitHandlerRegistered) {
    exitHandlerRegistered = true;
    process.on("exit", releaseAllLocksSync);
  }

  for (const signal of CLEANUP_SIGNALS) {
    if (signalHandlers.has(signal)) continue;
    const handler = () => handleTerminationSignal(signal);
    signalHandlers.set(signal, handler);
    process.on(signal, handler);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === "EPERM";
  }
}

function parseOwnerPid(contents: string): number | null {
  const firstLine = contents.split(/\r?\n/, 1)[0]?.trim();
  if (!firstLine || !/^\d+$/.test(firstLine)) return null;
  const pid = Number.parseInt(firstLine, 10);
  return pid > 0 ? pid : null;
}

/**
 * Pid recorded in a lock file, for diagnostics
 */
function readLockOwner(lockPath: string): number | null {
  try {
    return parseOwnerPid(readFileSync(lockPath, "utf-8"));
  } catch {
    return null;
  }
}

async function isStale(lockPath: string): Promise<boolean> {
  let contents: string;
  try {
    contents = await readFile(lockPath, "utf-8");
  } catch (error) {
    // Released between our create attempt and now
    if (errorCode(error) === "ENOENT") return false;
    throw new StorageError(`Cannot read lock file ${lockPath}`, { cause: error });
  }

  const pid = parseOwnerPid(contents);
  if (pid === null) {
    try {
      const info = await stat(lockPath);
      return Date.now() - info.mtimeMs > UNREADABLE_LOCK_GRACE_MS;
    } catch {
      return false;
    }
  }
  if (pid === process.pid) {
    // Left behind by an earlier process that had our pid
    return !heldLocks.has(lockPath);
  }
  return !isProcessAlive(pid);
}

export class FileLock {
  private released = false;

  private constructor(
    readonly lockPath: string,
    private readonly handle: FileHandle,
  ) {}

  /**
   * Block until the exclusive lock on `target` is ours
   *
   * @throws StorageError when the lock file cannot be created or the wait times out
   */
  static async acquire(
    target: string,
    options: FileLockOptions = {},
  ): Promise<FileLock> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const maxPollMs = options.maxPollMs ?? DEFAULT_MAX_POLL_MS;
    let pollMs = options.initialPollMs ?? DEFAULT_INITIAL_POLL_MS;

    const lockPath = `${path.resolve(target)}.lock`;
    const deadline = Date.now() + timeoutMs;
    registerCleanupHandlers();

    try {
      await mkdir(path.dirname(lockPath), { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create lock directory for ${target}`, {
        cause: error,
      });
    }

    for (;;) {
      let handle: FileHandle | undefined;
      try {
        handle = await open(lockPath, "wx");
      } catch (error) {
        if (errorCode(error) !== "EEXIST") {
          throw new StorageError(`Cannot create lock file ${lockPath}`, {
            cause: error,
          });
        }
      }

      if (handle) {
        try {
          await handle.writeFile(`${process.pid}\n${new Date().toISOString()}\n`);
        } catch (error) {
          await handle.close();
          await rm(lockPath, { force: true });
          throw new StorageError(`Cannot write lock file ${lockPath}`, {
            cause: error,
          });
        }
        heldLocks.add(lockPath);
        return new FileLock(lockPath, handle);
      }

      if (await isStale(lockPath)) {
        await rm(lockPath, { force: true });
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        const owner = readLockOwner(lockPath);
        throw new StorageError(
          `Timed out after ${timeoutMs}ms waiting for lock ${lockPath} (held by pid ${owner ?? "unknown"})`,
        );
      }
      await sleep(Math.min(pollMs, remaining));
      pollMs = Math.min(maxPollMs, pollMs * 2);
    }
  }

  get isHeld(): boolean {
    return !this.released;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    heldLocks.delete(this.lockPath);
    try {
      await this.handle.close();
      await rm(this.lockPath, { force: true });
    } catch (error) {
      throw new StorageError(`Cannot release lock ${this.lockPath}`, {
        cause: error,
      });
    }
  }
}

/**
 * Run `fn` while holding the lock on `target`; the lock is released on every exit path
 */
export async function withFileLock<T>(
  target: string,
  options: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const lock = await FileLock.acquire(target, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

export const __testing = {
  cleanupSignals: [...CLEANUP_SIGNALS],
  handleTerminationSignal,
};
