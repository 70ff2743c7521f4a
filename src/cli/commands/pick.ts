/**
 * Pick command - Loads config and runs the pick pipeline
 */

import ora, { type Ora, type Options as SpinnerOptions } from "ora";
import { z, ZodError } from "zod";
import { getCacheRoot, loadConfig } from "../../utils/load-config";
import { Logger } from "../../utils/logger";
import { Tracker } from "../../utils/tracker";
import * as modules from "../../modules";
import { PickerError, UsageError, type PickContext } from "../../types";

const PickOptionsSchema = z.object({
  minSize: z.string().optional(),
  attempts: z.string().optional(),
  config: z.string().optional(),
  cache: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof PickOptionsSchema>;

/**
 * Parse "WxH" (or a single number for a square) into pixel minimums
 *
 * @example
 * parseMinSize("1024x768") // { width: 1024, height: 768 }
 * parseMinSize("800")      // { width: 800, height: 800 }
 */
export function parseMinSize(value: string): { width: number; height: number } {
  const match = value.trim().match(/^(\d+)(?:\s*[xX×]\s*(\d+))?$/);
  if (!match) {
    throw new UsageError(`Invalid --min-size "${value}"; expected WIDTHxHEIGHT`);
  }
  const width = Number.parseInt(match[1], 10);
  const height = match[2] === undefined ? width : Number.parseInt(match[2], 10);
  return { width, height };
}

export function parseAttempts(value: string): number {
  const attempts = Number(value);
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new UsageError(`Invalid --attempts "${value}"; expected a positive integer`);
  }
  return attempts;
}

function describeConfigError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print an error and return the exit code for it
 */
function reportError(error: unknown, logger: Logger): number {
  if (error instanceof PickerError) {
    logger.error(error.message);
    return error.exitCode;
  }
  logger.error(
    "Unexpected failure",
    error instanceof Error ? error : new Error(String(error)),
  );
  return 1;
}

/**
 * The spinner shares stderr with the logger, so it only runs on an interactive
 * terminal when nothing else writes there. Otherwise it stays silent instead
 * of printing its text as plain lines.
 */
export function spinnerOptions(verbose: boolean, interactive: boolean): SpinnerOptions {
  const enabled = !verbose && interactive;
  return {
    text: "Initializing...",
    indent: 2,
    stream: process.stderr,
    isEnabled: enabled,
    isSilent: !enabled,
  };
}

export async function pickCommand(
  target: string | undefined,
  opts: Options,
): Promise<void> {
  const logger = new Logger();
  let spinner: Ora | undefined;
  let ctx: PickContext | undefined;
  let exitCode = 0;

  try {
    // Validate CLI options
    const options = PickOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    logger.setLevel(options.verbose ? "debug" : config.logging.level);
    for (const err of errors) {
      logger.warn(`Ignoring config ${err.path}: ${describeConfigError(err.error)}`);
    }

    // Override with CLI options
    if (options.minSize) {
      const { width, height } = parseMinSize(options.minSize);
      config.images.minWidth = width;
      config.images.minHeight = height;
    }
    if (options.attempts) {
      config.selection.maxAttempts = parseAttempts(options.attempts);
    }
    if (options.cache === false) {
      config.cache.enabled = false;
    }

    ctx = {
      config,
      target: target ?? "",
      cacheRoot: getCacheRoot(config),
      tracker: new Tracker(),
      logger,
      verbose: options.verbose,
    };

    spinner = ora(spinnerOptions(options.verbose === true, process.stderr.isTTY === true));
    spinner.start();

    spinner.text = "Resolving target...";
    await modules.resolve(ctx);

    if (ctx.source?.kind === "feed") {
      spinner.text = "Syncing feed...";
      await modules.mirror(ctx);
    }

    spinner.text = "Scanning files...";
    await modules.scan(ctx);

    spinner.text = "Picking an image...";
    await modules.select(ctx);
  } catch (error) {
    spinner?.stop();
    exitCode = reportError(error, logger);
  }

  // Release the file list cache lock on every path
  try {
    await ctx?.fileListCache?.close();
  } catch (error) {
    exitCode = exitCode || reportError(error, logger);
  }

  spinner?.stop();
  if (ctx) {
    modules.stats(ctx);
  }

  if (exitCode === 0 && ctx?.selected) {
    process.stdout.write(`${ctx.selected}\n`);
  } else {
    process.exitCode = exitCode || 1;
  }
}
