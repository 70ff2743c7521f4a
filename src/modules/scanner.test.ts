import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FILE_LIST_CACHE_NAME, scan } from "./scanner";
import { createContext } from "../test/fixtures";

describe("scan", () => {
  let root: string;
  let cacheRoot: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "randimg-scan-"));
    cacheRoot = await mkdtemp(path.join(tmpdir(), "randimg-scan-cache-"));
    await mkdir(path.join(root, "2024"));
    await writeFile(path.join(root, "2024", "beach.jpg"), "");
    await writeFile(path.join(root, "cover.png"), "");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    await rm(cacheRoot, { recursive: true, force: true });
  });

  it("enumerates the directory and writes the file list cache", async () => {
    const ctx = await createContext(root, cacheRoot);
    ctx.source = { kind: "directory", path: root };

    try {
      await scan(ctx);
    } finally {
      await ctx.fileListCache?.close();
    }

    const expected = [path.join(root, "2024", "beach.jpg"), path.join(root, "cover.png")];
    expect(ctx.candidates).toEqual(expected);
    expect(ctx.directory).toBe(root);

    const record = JSON.parse(await readFile(path.join(cacheRoot, FILE_LIST_CACHE_NAME), "utf-8"));
    expect(record.directory).toBe(root);
    expect(record.files).toEqual([path.join("2024", "beach.jpg"), "cover.png"]);
  });

  it("reuses the cached list on the next run", async () => {
    const first = await createContext(root, cacheRoot);
    first.source = { kind: "directory", path: root };
    await scan(first);
    await first.fileListCache?.close();

    // Not seen by the second run, which trusts the cache
    await writeFile(path.join(root, "new.gif"), "");

    const second = await createContext(root, cacheRoot);
    second.source = { kind: "directory", path: root };
    await scan(second);
    await second.fileListCache?.close();

    expect(second.candidates).toEqual(first.candidates);
    expect(second.tracker.getStats().cacheHit).toBe(true);
  });

  it("bypasses the cache when caching is disabled", async () => {
    const ctx = await createContext(root, cacheRoot);
    ctx.source = { kind: "directory", path: root };
    ctx.config.cache.enabled = false;

    await scan(ctx);

    expect(ctx.fileListCache).toBeUndefined();
    expect(ctx.candidates).toHaveLength(2);
  });

  it("lists a mirrored feed directory without the cache", async () => {
    const ctx = await createContext("https://example.com/rss", cacheRoot);
    const feedDir = path.join(cacheRoot, "feeds", "abc");
    await mkdir(feedDir, { recursive: true });
    await writeFile(path.join(feedDir, ".timestamp"), "");
    await writeFile(path.join(feedDir, "0a1b.jpg"), "");
    ctx.source = { kind: "feed", url: "https://example.com/rss" };
    ctx.directory = feedDir;

    await scan(ctx);

    expect(ctx.candidates).toEqual([path.join(feedDir, "0a1b.jpg")]);
    expect(ctx.fileListCache).toBeUndefined();
  });
});
