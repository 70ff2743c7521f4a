/**
 * Resolver Module
 * Decides whether the target is a feed URL or a local directory
 */

import { stat } from "fs/promises";
import path from "node:path";
import { UsageError } from "../types/errors";
import type { PickContext, Source } from "../types";

const FEED_ALIAS = /^feed:\/\//i;
const HTTP_URL = /^https?:\/\//i;

/**
 * Classify a command-line target
 *
 * @example
 * await resolveTarget("feed://example.com/rss") // { kind: "feed", url: "http://example.com/rss" }
 * await resolveTarget("photos")                 // { kind: "directory", path: "<cwd>/photos" }
 */
export async function resolveTarget(input: string): Promise<Source> {
  const target = input.trim();
  if (!target) {
    throw new UsageError("No directory or feed URL given");
  }

  if (FEED_ALIAS.test(target) || HTTP_URL.test(target)) {
    const candidate = target.replace(FEED_ALIAS, "http://");
    try {
      return { kind: "feed", url: new URL(candidate).toString() };
    } catch (error) {
      throw new UsageError(`Invalid feed URL: ${target}`, { cause: error });
    }
  }

  const directory = path.resolve(target);
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch (error) {
    throw new UsageError(`No such file or directory: ${directory}`, { cause: error });
  }
  if (!isDirectory) {
    throw new UsageError(`Not a directory: ${directory}`);
  }

  return { kind: "directory", path: directory };
}

/**
 * Writes to context:
 * - source: feed URL or absolute directory
 */
export async function resolve(ctx: PickContext): Promise<void> {
  ctx.source = await resolveTarget(ctx.target);
  ctx.logger.debug(
    ctx.source.kind === "feed"
      ? `Target is feed ${ctx.source.url}`
      : `Target is directory ${ctx.source.path}`,
  );
}
