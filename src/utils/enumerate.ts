/**
 * Directory Enumerator
 * Recursive walk that lists image candidates while avoiding stat calls
 */

import type { Stats } from "node:fs";
import { readdir, stat } from "fs/promises";
import path from "node:path";
import { UsageError } from "../types/errors";
import type { Tracker } from "./tracker";
import type { Logger } from "./logger";
import { errorCode } from "./fs";
import { extensionOf } from "./image-url";

export interface EnumerateOptions {
  // Accepted as files without a stat call
  extensions: readonly string[];
  // Skipped without a stat call
  skipExtensions: readonly string[];
  tracker?: Tracker;
  logger?: Logger;
}

export interface EnumerationResult {
  root: string;
  files: string[]; // Absolute paths, in walk order
  statCalls: number;
  skipped: number;
  cycles: number;
}

/**
 * Traversal state; passed down the recursion instead of living in module scope
 */
interface Walk {
  allow: Set<string>;
  deny: Set<string>;
  visited: Set<string>; // "dev:ino" of every directory entered
  result: EnumerationResult;
  tracker?: Tracker;
  logger?: Logger;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function walkDirectory(walk: Walk, dir: string): Promise<void> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    walk.logger?.info(`Cannot read directory ${dir}: ${describe(error)}`);
    walk.tracker?.trackError(dir, error, "file");
    return;
  }

  names.sort();

  for (const name of names) {
    if (name.startsWith(".")) continue;

    const entry = path.join(dir, name);
    const ext = extensionOf(name);
    walk.tracker?.incrementScanned();

    if (ext && walk.allow.has(ext)) {
      walk.result.files.push(entry);
      continue;
    }
    if (ext && walk.deny.has(ext)) {
      walk.result.skipped++;
      continue;
    }

    walk.result.statCalls++;
    walk.tracker?.incrementStatCalls();
    let info: Stats;
    try {
      info = await stat(entry);
    } catch (error) {
      const reason = errorCode(error) === "ENOENT" ? "dangling symlink" : describe(error);
      walk.logger?.info(`Skipping ${entry}: ${reason}`);
      walk.tracker?.trackError(entry, error, "file");
      continue;
    }

    if (!info.isDirectory()) {
      walk.result.skipped++;
      continue;
    }

    const key = `${info.dev}:${info.ino}`;
    if (walk.visited.has(key)) {
      walk.result.cycles++;
      walk.logger?.info(`Skipping ${entry}: already visited (symlink cycle)`);
      walk.tracker?.trackFileIssue(entry, "cycle", `directory ${key} already visited`);
      continue;
    }
    walk.visited.add(key);
    await walkDirectory(walk, entry);
  }
}

/**
 * Recursively list the image files under `root`
 *
 * Dotfiles are ignored. Unreadable entries and subdirectories are logged and
 * skipped, so the result may be partial.
 *
 * @throws UsageError if `root` is not a readable directory
 */
export async function enumerate(
  root: string,
  options: EnumerateOptions,
): Promise<EnumerationResult> {
  const absoluteRoot = path.resolve(root);

  let rootInfo: Stats;
  try {
    rootInfo = await stat(absoluteRoot);
  } catch (error) {
    throw new UsageError(`Cannot open ${absoluteRoot}: ${describe(error)}`, {
      cause: error,
    });
  }
  if (!rootInfo.isDirectory()) {
    throw new UsageError(`Not a directory: ${absoluteRoot}`);
  }

  const walk: Walk = {
    allow: new Set(options.extensions.map((e) => e.toLowerCase())),
    deny: new Set(options.skipExtensions.map((e) => e.toLowerCase())),
    visited: new Set([`${rootInfo.dev}:${rootInfo.ino}`]),
    result: { root: absoluteRoot, files: [], statCalls: 0, skipped: 0, cycles: 0 },
    tracker: options.tracker,
    logger: options.logger,
  };

  await walkDirectory(walk, absoluteRoot);
  return walk.result;
}
