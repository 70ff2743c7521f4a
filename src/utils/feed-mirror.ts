/**
 * Feed Mirror
 * Keeps one local directory per feed in step with the feed's current images
 *
 * Layout: <cacheRoot>/feeds/<sha1(feed url)>/
 *   .timestamp          marker; its mtime is the last successful poll
 *   <sha1(item id)>.ext one file per feed image
 *
 * The marker's lock is held for the whole inspect-poll-prune-touch span, so
 * concurrent runs on one feed poll it once.
 */

import { mkdir, readdir, rm, stat, utimes, writeFile } from "fs/promises";
import path from "node:path";
import { NoDataError, PickerError, StorageError } from "../types/errors";
import type { FeedItem } from "../types";
import { parseFeed } from "../parsers/feed";
import { withFileLock } from "./file-lock";
import { errorCode, fileExists, writeFileAtomic } from "./fs";
import { hashText } from "./hash";
import { extensionOf, largeVariantUrl } from "./image-url";
import type { Fetcher } from "./fetch-url";
import type { Logger } from "./logger";
import type { Tracker } from "./tracker";

export const MARKER_NAME = ".timestamp";

export interface FeedMirrorOptions {
  cacheRoot: string;
  ttlMs: number;
  // When false the feed is polled regardless of the marker's age
  cacheEnabled: boolean;
  extensions: readonly string[];
  fetcher: Fetcher;
  lockTimeoutMs?: number;
  logger?: Logger;
  tracker?: Tracker;
  now?: () => number;
}

export interface FeedSyncResult {
  directory: string;
  polled: boolean;
  images: number; // Image files present after the sync
  downloaded: number;
  pruned: number;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function feedDirectory(cacheRoot: string, url: string): string {
  return path.join(cacheRoot, "feeds", hashText(url));
}

/**
 * Image files of a feed directory; the marker, lock and temp files all start with a dot
 */
export async function listFeedImages(directory: string): Promise<string[]> {
  try {
    const names = await readdir(directory);
    return names.filter((name) => !name.startsWith(".")).sort();
  } catch (error) {
    throw new StorageError(`Cannot list feed cache ${directory}`, { cause: error });
  }
}

async function markerAge(marker: string, now: number): Promise<number> {
  try {
    const info = await stat(marker);
    return now - info.mtimeMs;
  } catch (error) {
    if (errorCode(error) === "ENOENT") return Number.POSITIVE_INFINITY;
    throw new StorageError(`Cannot read feed marker ${marker}`, { cause: error });
  }
}

async function touchMarker(marker: string, now: number): Promise<void> {
  const time = new Date(now);
  try {
    await writeFile(marker, `${time.toISOString()}\n`, "utf-8");
    await utimes(marker, time, time);
  } catch (error) {
    throw new StorageError(`Cannot update feed marker ${marker}`, { cause: error });
  }
}

/**
 * Download whatever is missing; returns the file names that belong to the feed now
 */
async function downloadItems(
  items: readonly FeedItem[],
  directory: string,
  options: FeedMirrorOptions,
): Promise<{ refreshed: Set<string>; downloaded: number }> {
  const { fetcher, logger, tracker } = options;
  const allowed = new Set(options.extensions.map((e) => e.toLowerCase()));
  const refreshed = new Set<string>();
  let downloaded = 0;

  for (const item of items) {
    const ext = extensionOf(item.url);
    if (!ext || !allowed.has(ext)) {
      logger?.info(`Skipping ${item.url}: not an allowed image extension`);
      tracker?.trackImageIssue(item.url, "unsupported-extension", ext || "none");
      continue;
    }

    const name = `${hashText(item.id)}.${ext}`;
    const file = path.join(directory, name);

    // Present means fresh; images are never re-fetched
    if (await fileExists(file)) {
      refreshed.add(name);
      tracker?.incrementImagesCached();
      continue;
    }

    const source = largeVariantUrl(item.url);
    try {
      const bytes = await fetcher.fetchBinary(source);
      await writeFileAtomic(file, bytes);
      refreshed.add(name);
      downloaded++;
      tracker?.incrementImagesDownloaded();
      logger?.debug(`Downloaded ${source}`);
    } catch (error) {
      logger?.info(`Cannot download ${source}: ${describe(error)}`);
      tracker?.trackError(source, error, "image");
      tracker?.incrementImagesFailed();
    }
  }

  return { refreshed, downloaded };
}

async function poll(
  url: string,
  directory: string,
  marker: string,
  existing: readonly string[],
  options: FeedMirrorOptions,
): Promise<FeedSyncResult> {
  const { fetcher, logger, tracker } = options;
  const kept: FeedSyncResult = {
    directory,
    polled: true,
    images: existing.length,
    downloaded: 0,
    pruned: 0,
  };

  let items: FeedItem[];
  try {
    const body = await fetcher.fetchText(url);
    items = await parseFeed(body, {
      extensions: options.extensions,
      baseUrl: url,
      logger,
      tracker,
      fetchText: (link) => fetcher.fetchText(link),
    });
  } catch (error) {
    tracker?.trackFeedIssue(
      url,
      error instanceof PickerError ? "parse-error" : "fetch-error",
      describe(error),
    );
    if (existing.length === 0) {
      if (error instanceof PickerError) throw error;
      throw new NoDataError(`Cannot fetch feed ${url}: ${describe(error)}`, {
        cause: error,
      });
    }
    logger?.warn(
      `Cannot read feed ${url} (${describe(error)}); keeping ${existing.length} cached images`,
    );
    return kept;
  }

  tracker?.setFeedItems(items.length);
  const { refreshed, downloaded } = await downloadItems(items, directory, options);

  if (refreshed.size === 0) {
    if (existing.length === 0) {
      throw new NoDataError(`Feed ${url} has no usable images`);
    }
    logger?.warn(
      `Feed ${url} yielded no usable images; keeping ${existing.length} cached images`,
    );
    return kept;
  }

  let pruned = 0;
  for (const name of existing) {
    if (refreshed.has(name)) continue;
    try {
      await rm(path.join(directory, name), { force: true });
      pruned++;
      tracker?.incrementImagesPruned();
    } catch (error) {
      logger?.info(`Cannot remove stale image ${name}: ${describe(error)}`);
    }
  }

  const survivors = await listFeedImages(directory);
  if (survivors.length === 0) {
    throw new NoDataError(`Feed cache for ${url} is empty after polling`);
  }

  await touchMarker(marker, options.now ? options.now() : Date.now());
  logger?.debug(
    `Polled ${url}: ${items.length} items, ${downloaded} downloaded, ${pruned} pruned`,
  );

  return { directory, polled: true, images: survivors.length, downloaded, pruned };
}

/**
 * Bring the feed's cache directory up to date and return it
 *
 * The feed is polled when the marker is missing or older than the TTL, when
 * caching is disabled, or when the directory holds no image.
 *
 * @throws NoDataError when neither the poll nor the cache leaves an image
 * @throws StorageError when the directory or marker cannot be used
 */
export async function syncFeed(
  url: string,
  options: FeedMirrorOptions,
): Promise<FeedSyncResult> {
  const directory = feedDirectory(options.cacheRoot, url);
  const marker = path.join(directory, MARKER_NAME);

  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw new StorageError(`Cannot create feed cache ${directory}`, { cause: error });
  }

  return withFileLock(marker, { timeoutMs: options.lockTimeoutMs }, async () => {
    const existing = await listFeedImages(directory);
    const now = options.now ? options.now() : Date.now();
    const age = await markerAge(marker, now);

    if (options.cacheEnabled && existing.length > 0 && age <= options.ttlMs) {
      options.logger?.debug(`Feed cache for ${url} is fresh`);
      return { directory, polled: false, images: existing.length, downloaded: 0, pruned: 0 };
    }

    return poll(url, directory, marker, existing, options);
  });
}

/**
 * Forget the last poll so the next run fetches the feed again
 */
export async function invalidateFeed(
  url: string,
  options: Pick<FeedMirrorOptions, "cacheRoot" | "lockTimeoutMs">,
): Promise<void> {
  const marker = path.join(feedDirectory(options.cacheRoot, url), MARKER_NAME);
  await withFileLock(marker, { timeoutMs: options.lockTimeoutMs }, async () => {
    try {
      await rm(marker, { force: true });
    } catch (error) {
      throw new StorageError(`Cannot remove feed marker ${marker}`, { cause: error });
    }
  });
}
