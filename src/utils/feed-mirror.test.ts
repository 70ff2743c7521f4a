import { mkdir, mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  feedDirectory,
  invalidateFeed,
  MARKER_NAME,
  syncFeed,
  type FeedMirrorOptions,
} from "./feed-mirror";
import type { Fetcher } from "./fetch-url";
import { fileExists } from "./fs";
import { hashText } from "./hash";
import { Logger } from "./logger";
import { NoDataError } from "../types/errors";

const FEED_URL = "https://example.com/photos.rss";
const TTL = 60 * 60 * 1000;

function rss(items: Array<{ id: string; url: string }>): string {
  const body = items
    .map(
      (item) =>
        `<item><guid>${item.id}</guid><enclosure url="${item.url}" type="image/jpeg"/></item>`,
    )
    .join("");
  return `<?xml version="1.0"?><rss version="2.0"><channel>${body}</channel></rss>`;
}

function fakeFetcher(feed: string | Error, failing: string[] = []) {
  const fetchText = vi.fn(async (_url: string): Promise<string> => {
    if (feed instanceof Error) throw feed;
    return feed;
  });
  const fetchBinary = vi.fn(async (url: string): Promise<Uint8Array> => {
    if (failing.includes(url)) throw new Error(`HTTP 404 for ${url}`);
    return new TextEncoder().encode(`image bytes of ${url}`);
  });
  const fetcher: Fetcher = { fetchText, fetchBinary };
  return { fetcher, fetchText, fetchBinary };
}

describe("syncFeed", () => {
  let cacheRoot: string;
  let directory: string;
  let logger: Logger;

  beforeEach(async () => {
    cacheRoot = await mkdtemp(path.join(tmpdir(), "randimg-feed-"));
    directory = feedDirectory(cacheRoot, FEED_URL);
    logger = new Logger("error");
  });

  afterEach(async () => {
    await rm(cacheRoot, { recursive: true, force: true });
  });

  function options(fetcher: Fetcher, overrides: Partial<FeedMirrorOptions> = {}): FeedMirrorOptions {
    return {
      cacheRoot,
      ttlMs: TTL,
      cacheEnabled: true,
      extensions: ["jpg", "png", "gif"],
      fetcher,
      logger,
      ...overrides,
    };
  }

  async function images(): Promise<string[]> {
    const names = await readdir(directory);
    return names.filter((name) => !name.startsWith(".")).sort();
  }

  it("downloads every image into a directory named after the feed", async () => {
    const { fetcher, fetchBinary } = fakeFetcher(
      rss([
        { id: "one", url: "https://example.com/1.jpg" },
        { id: "two", url: "https://example.com/2.png" },
      ]),
    );

    const result = await syncFeed(FEED_URL, options(fetcher));

    expect(result).toEqual({ directory, polled: true, images: 2, downloaded: 2, pruned: 0 });
    expect(directory).toBe(path.join(cacheRoot, "feeds", hashText(FEED_URL)));
    expect(await images()).toEqual([`${hashText("one")}.jpg`, `${hashText("two")}.png`].sort());
    expect(await fileExists(path.join(directory, MARKER_NAME))).toBe(true);
    expect(fetchBinary).toHaveBeenCalledTimes(2);
  });

  it("does not poll again within the TTL", async () => {
    const { fetcher, fetchText } = fakeFetcher(rss([{ id: "one", url: "https://example.com/1.jpg" }]));
    await syncFeed(FEED_URL, options(fetcher));

    const result = await syncFeed(FEED_URL, options(fetcher));

    expect(result.polled).toBe(false);
    expect(fetchText).toHaveBeenCalledTimes(1);
  });

  it("lets concurrent syncs of one feed share a single poll", async () => {
    const { fetcher, fetchText, fetchBinary } = fakeFetcher(
      rss([
        { id: "one", url: "https://example.com/1.jpg" },
        { id: "two", url: "https://example.com/2.png" },
      ]),
    );

    const results = await Promise.all([
      syncFeed(FEED_URL, options(fetcher)),
      syncFeed(FEED_URL, options(fetcher)),
    ]);

    expect(results.map((result) => result.polled).sort()).toEqual([false, true]);
    expect(results.map((result) => result.images)).toEqual([2, 2]);
    expect(fetchText).toHaveBeenCalledTimes(1);
    expect(fetchBinary).toHaveBeenCalledTimes(2);
    expect(await fileExists(path.join(directory, `${MARKER_NAME}.lock`))).toBe(false);
  });

  it("polls again when caching is disabled", async () => {
    const { fetcher, fetchText, fetchBinary } = fakeFetcher(
      rss([{ id: "one", url: "https://example.com/1.jpg" }]),
    );
    await syncFeed(FEED_URL, options(fetcher));

    const result = await syncFeed(FEED_URL, options(fetcher, { cacheEnabled: false }));

    expect(result.polled).toBe(true);
    expect(fetchText).toHaveBeenCalledTimes(2);
    // Present files are not downloaded again
    expect(fetchBinary).toHaveBeenCalledTimes(1);
  });

  it("prunes images that left the feed once the TTL has passed", async () => {
    const first = fakeFetcher(
      rss([
        { id: "one", url: "https://example.com/1.jpg" },
        { id: "two", url: "https://example.com/2.jpg" },
      ]),
    );
    await syncFeed(FEED_URL, options(first.fetcher));

    const second = fakeFetcher(
      rss([
        { id: "two", url: "https://example.com/2.jpg" },
        { id: "three", url: "https://example.com/3.jpg" },
      ]),
    );
    const result = await syncFeed(
      FEED_URL,
      options(second.fetcher, { now: () => Date.now() + 2 * TTL }),
    );

    expect(result).toMatchObject({ polled: true, images: 2, downloaded: 1, pruned: 1 });
    expect(await images()).toEqual([`${hashText("three")}.jpg`, `${hashText("two")}.jpg`].sort());
    expect(second.fetchBinary).toHaveBeenCalledWith("https://example.com/3.jpg");
  });

  it("skips failed downloads and disallowed extensions", async () => {
    const info = vi.spyOn(logger, "info");
    const { fetcher } = fakeFetcher(
      rss([
        { id: "ok", url: "https://example.com/ok.jpg" },
        { id: "gone", url: "https://example.com/gone.jpg" },
        { id: "vector", url: "https://example.com/vector.svg" },
      ]),
      ["https://example.com/gone.jpg"],
    );

    const result = await syncFeed(FEED_URL, options(fetcher));

    expect(result.images).toBe(1);
    expect(await images()).toEqual([`${hashText("ok")}.jpg`]);
    expect(info).toHaveBeenCalledWith(
      "Cannot download https://example.com/gone.jpg: HTTP 404 for https://example.com/gone.jpg",
    );
    expect(info).toHaveBeenCalledWith(
      "Skipping https://example.com/vector.svg: not an allowed image extension",
    );
  });

  it("fetches the large variant of Flickr thumbnails", async () => {
    const { fetcher, fetchBinary } = fakeFetcher(
      rss([{ id: "flickr", url: "https://live.staticflickr.com/65535/123_abc_m.jpg" }]),
    );

    await syncFeed(FEED_URL, options(fetcher));

    expect(fetchBinary).toHaveBeenCalledWith("https://live.staticflickr.com/65535/123_abc_b.jpg");
    expect(await images()).toEqual([`${hashText("flickr")}.jpg`]);
  });

  it("keeps a non-empty cache untouched when the feed yields no images", async () => {
    const warn = vi.spyOn(logger, "warn");
    await mkdir(directory, { recursive: true });
    await writeFile(path.join(directory, "old.jpg"), "old");
    const { fetcher } = fakeFetcher(rss([]));

    const result = await syncFeed(FEED_URL, options(fetcher));

    expect(result).toEqual({ directory, polled: true, images: 1, downloaded: 0, pruned: 0 });
    expect(await images()).toEqual(["old.jpg"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(await fileExists(path.join(directory, MARKER_NAME))).toBe(false);
  });

  it("keeps a non-empty cache when the feed cannot be fetched", async () => {
    const warn = vi.spyOn(logger, "warn");
    await mkdir(directory, { recursive: true });
    await writeFile(path.join(directory, "old.jpg"), "old");
    const { fetcher } = fakeFetcher(new Error("connect ECONNREFUSED"));

    const result = await syncFeed(FEED_URL, options(fetcher));

    expect(result.images).toBe(1);
    expect(await images()).toEqual(["old.jpg"]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("fails when there is nothing cached and the feed yields no images", async () => {
    const { fetcher } = fakeFetcher(rss([]));
    await expect(syncFeed(FEED_URL, options(fetcher))).rejects.toBeInstanceOf(NoDataError);
  });

  it("fails when there is nothing cached and the feed cannot be fetched", async () => {
    const { fetcher } = fakeFetcher(new Error("connect ECONNREFUSED"));
    await expect(syncFeed(FEED_URL, options(fetcher))).rejects.toBeInstanceOf(NoDataError);
    expect(await fileExists(path.join(directory, `${MARKER_NAME}.lock`))).toBe(false);
  });

  it("polls again after invalidation", async () => {
    const { fetcher, fetchText } = fakeFetcher(rss([{ id: "one", url: "https://example.com/1.jpg" }]));
    await syncFeed(FEED_URL, options(fetcher));

    await invalidateFeed(FEED_URL, { cacheRoot });
    const result = await syncFeed(FEED_URL, options(fetcher));

    expect(result.polled).toBe(true);
    expect(fetchText).toHaveBeenCalledTimes(2);
  });
});
