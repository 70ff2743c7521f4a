/**
 * Selector Module
 * Draws random candidates until one meets the minimum size
 */

import { stat } from "fs/promises";
import { NoDataError } from "../types/errors";
import {
  readImageDimensions,
  DEFAULT_SNIFF_BYTES,
  type SniffResult,
} from "../parsers/image-header";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";
import type { PickContext } from "../types";

export interface PickOptions {
  minWidth: number;
  minHeight: number;
  maxAttempts: number;
  sniffBytes?: number;
  // Returns a number in [0, 1)
  random?: () => number;
  logger?: Logger;
  tracker?: Tracker;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fail-open policy: a header we cannot read says nothing about the size, so
 * the file is accepted
 */
function acceptUnknownDimensions(file: string, logger?: Logger): boolean {
  logger?.debug(`No dimensions for ${file}; accepting it`);
  return true;
}

/**
 * Pick a random candidate of at least minWidth x minHeight pixels
 *
 * Every draw is independent, so a candidate may be drawn more than once.
 * A file that cannot be stat-ed or read is never picked.
 *
 * @throws NoDataError when the list is empty or every attempt is rejected
 */
export async function pickCandidate(
  candidates: readonly string[],
  options: PickOptions,
): Promise<string> {
  const { minWidth, minHeight, logger, tracker } = options;
  const random = options.random ?? Math.random;

  if (candidates.length === 0) {
    throw new NoDataError("No image candidates found");
  }

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    const index = Math.min(candidates.length - 1, Math.floor(random() * candidates.length));
    const file = candidates[index];
    tracker?.incrementAttempts();

    try {
      const info = await stat(file);
      if (!info.isFile()) {
        logger?.info(`Skipping ${file}: not a regular file`);
        tracker?.incrementRejected();
        continue;
      }
    } catch (error) {
      logger?.info(`Skipping ${file}: ${describe(error)}`);
      tracker?.trackError(file, error, "file");
      tracker?.incrementRejected();
      continue;
    }

    let dimensions: SniffResult | null;
    try {
      dimensions = await readImageDimensions(file, options.sniffBytes ?? DEFAULT_SNIFF_BYTES);
    } catch (error) {
      logger?.info(`Skipping ${file}: ${describe(error)}`);
      tracker?.trackError(file, error, "file");
      tracker?.incrementRejected();
      continue;
    }

    if (!dimensions) {
      if (acceptUnknownDimensions(file, logger)) return file;
      continue;
    }

    if (dimensions.width >= minWidth && dimensions.height >= minHeight) {
      return file;
    }

    logger?.debug(
      `Skipping ${file}: ${dimensions.width}x${dimensions.height} is below ${minWidth}x${minHeight}`,
    );
    tracker?.incrementRejected();
  }

  throw new NoDataError(
    `No image of at least ${minWidth}x${minHeight} found in ${options.maxAttempts} attempts`,
  );
}

/**
 * Writes to context:
 * - selected: the picked path
 *
 * When nothing qualifies the backing cache is invalidated so the next run
 * lists the source again.
 */
export async function select(
  ctx: PickContext,
  random?: () => number,
): Promise<void> {
  const { config } = ctx;

  try {
    ctx.selected = await pickCandidate(ctx.candidates ?? [], {
      minWidth: config.images.minWidth,
      minHeight: config.images.minHeight,
      maxAttempts: config.selection.maxAttempts,
      sniffBytes: config.images.sniffBytes,
      random,
      logger: ctx.logger,
      tracker: ctx.tracker,
    });
  } catch (error) {
    if (error instanceof NoDataError && ctx.invalidate) {
      ctx.logger.debug("Invalidating cached candidates");
      await ctx.invalidate();
    }
    throw error;
  }
}
