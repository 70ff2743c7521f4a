/**
 * Mirror Module
 * Syncs a feed source into its local cache directory
 */

import { createFetcher, type Fetcher } from "../utils/fetch-url";
import { invalidateFeed, syncFeed } from "../utils/feed-mirror";
import type { PickContext } from "../types";

/**
 * Writes to context:
 * - directory: the feed's cache directory, ready to be scanned
 * - invalidate: forgets the last poll
 *
 * Directory sources are left alone.
 */
export async function mirror(
  ctx: PickContext,
  fetcher: Fetcher = createFetcher(ctx.config.network),
): Promise<void> {
  const { source, config } = ctx;
  if (source?.kind !== "feed") return;

  const lockTimeoutMs = config.cache.lockTimeout;
  const result = await syncFeed(source.url, {
    cacheRoot: ctx.cacheRoot,
    ttlMs: config.cache.feedTtl * 1000,
    cacheEnabled: config.cache.enabled,
    extensions: config.images.extensions,
    fetcher,
    lockTimeoutMs,
    logger: ctx.logger,
    tracker: ctx.tracker,
  });

  ctx.directory = result.directory;
  ctx.invalidate = () =>
    invalidateFeed(source.url, { cacheRoot: ctx.cacheRoot, lockTimeoutMs });
}
