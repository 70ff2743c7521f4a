import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileLock, withFileLock, __testing } from "./file-lock";
import { fileExists } from "./fs";
import { StorageError } from "../types/errors";

// Far above any real pid_max, so never a live process
const DEAD_PID = 2147483646;

function settlesWithin<T>(promise: Promise<T>, ms: number): Promise<boolean> {
  return Promise.race([
    promise.then(() => true),
    new Promise<boolean>((resolve) => setTimeout(() => resolve(false), ms)),
  ]);
}

describe("FileLock", () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "randimg-lock-"));
    target = path.join(dir, "resource.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates a sidecar lock file holding our pid and removes it on release", async () => {
    const lock = await FileLock.acquire(target);
    const contents = await readFile(`${target}.lock`, "utf-8");
    expect(contents.split("\n")[0]).toBe(String(process.pid));

    await lock.release();
    expect(lock.isHeld).toBe(false);
    expect(await fileExists(`${target}.lock`)).toBe(false);
  });

  it("removes held lock files on a termination signal", async () => {
    const lock = await FileLock.acquire(target);
    // A second listener keeps the handler from re-raising the signal at the test runner
    const keepAlive = () => {};
    process.on("SIGTERM", keepAlive);
    try {
      expect(process.listeners("SIGTERM").length).toBeGreaterThanOrEqual(2);
      __testing.handleTerminationSignal("SIGTERM");
      expect(await fileExists(`${target}.lock`)).toBe(false);
    } finally {
      process.off("SIGTERM", keepAlive);
      await lock.release();
    }
  });

  it("registers cleanup for the usual termination signals", async () => {
    const lock = await FileLock.acquire(target);
    await lock.release();
    for (const signal of __testing.cleanupSignals) {
      expect(process.listenerCount(signal)).toBeGreaterThanOrEqual(1);
    }
  });

  it("makes a second acquirer wait for the release", async () => {
    const first = await FileLock.acquire(target);
    const second = FileLock.acquire(target, { initialPollMs: 10, maxPollMs: 20 });

    expect(await settlesWithin(second, 150)).toBe(false);
    await first.release();

    const lock = await second;
    expect(lock.isHeld).toBe(true);
    await lock.release();
  });

  it("gives up with a storage error after the timeout", async () => {
    const first = await FileLock.acquire(target);
    try {
      await expect(
        FileLock.acquire(target, { timeoutMs: 100, initialPollMs: 10 }),
      ).rejects.toBeInstanceOf(StorageError);
    } finally {
      await first.release();
    }
  });

  it("takes over a lock left by a dead process", async () => {
    await writeFile(`${target}.lock`, `${DEAD_PID}\n2020-01-01T00:00:00.000Z\n`);

    const lock = await FileLock.acquire(target, { timeoutMs: 1000 });
    const contents = await readFile(`${target}.lock`, "utf-8");
    expect(contents.split("\n")[0]).toBe(String(process.pid));
    await lock.release();
  });

  it("does not block locks on other targets", async () => {
    const first = await FileLock.acquire(target);
    const other = await FileLock.acquire(path.join(dir, "other.json"), { timeoutMs: 100 });
    await other.release();
    await first.release();
  });
});

describe("withFileLock", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "randimg-lock-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("releases the lock when the callback throws", async () => {
    const target = path.join(dir, "marker");
    await expect(
      withFileLock(target, {}, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await fileExists(`${target}.lock`)).toBe(false);
  });

  it("returns the callback's value", async () => {
    const value = await withFileLock(path.join(dir, "marker"), {}, async () => 42);
    expect(value).toBe(42);
  });
});
