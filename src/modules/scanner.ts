/**
 * Scanner Module
 * Builds the candidate list, through the file list cache for directories
 */

import path from "node:path";
import { enumerate } from "../utils/enumerate";
import { FileListCache } from "../utils/file-list-cache";
import type { PickContext } from "../types";

export const FILE_LIST_CACHE_NAME = "filelist.json";

/**
 * Writes to context:
 * - candidates: absolute image paths
 * - directory: the directory they were listed from
 * - fileListCache: open (and locked) cache; the caller closes it when the run ends
 * - invalidate: drops the cached list
 */
export async function scan(ctx: PickContext): Promise<void> {
  const { source, config, tracker, logger } = ctx;
  if (!source) {
    throw new Error("scan() needs a resolved source");
  }

  const options = {
    extensions: config.images.extensions,
    skipExtensions: config.scan.skipExtensions,
    tracker,
    logger,
  };

  // Feed images are listed straight from the mirror directory
  if (source.kind === "feed") {
    if (!ctx.directory) {
      throw new Error("scan() needs the mirrored feed directory");
    }
    const { files } = await enumerate(ctx.directory, options);
    ctx.candidates = files;
    tracker.setCandidates(files.length);
    return;
  }

  ctx.directory = source.path;

  if (!config.cache.enabled) {
    const { files } = await enumerate(source.path, options);
    ctx.candidates = files;
    tracker.setCandidates(files.length);
    return;
  }

  const cache = new FileListCache(path.join(ctx.cacheRoot, FILE_LIST_CACHE_NAME), {
    ttlMs: config.cache.fileListTtl * 1000,
    lockTimeoutMs: config.cache.lockTimeout,
    logger,
  });
  await cache.open();
  ctx.fileListCache = cache;
  ctx.invalidate = () => cache.invalidate();

  const cached = await cache.load(source.path);
  if (cached) {
    logger.debug(`Using ${cached.length} cached candidates for ${source.path}`);
    tracker.markCacheHit();
    ctx.candidates = cached;
    tracker.setCandidates(cached.length);
    return;
  }

  const { files } = await enumerate(source.path, options);
  await cache.store(source.path, files);
  ctx.candidates = files;
  tracker.setCandidates(files.length);
}
