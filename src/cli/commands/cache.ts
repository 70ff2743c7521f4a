/**
 * Cache command - Show or clear the cache directory
 */

import { rm } from "fs/promises";
import chalk from "chalk";
import { z } from "zod";
import { getCacheRoot, loadConfig } from "../../utils/load-config";

const CacheOptionsSchema = z.object({
  config: z.string().optional(),
  clear: z.boolean().optional(),
});

type Options = z.infer<typeof CacheOptionsSchema>;

export async function cacheCommand(opts: Options): Promise<void> {
  const options = CacheOptionsSchema.parse(opts);
  const { config } = await loadConfig(options.config);
  const root = getCacheRoot(config);

  if (!options.clear) {
    console.log(root);
    return;
  }

  try {
    await rm(root, { recursive: true, force: true });
    console.log(`Removed ${root}`);
  } catch (error) {
    console.error(chalk.red(`Cannot remove ${root}:`), error);
    process.exitCode = 1;
  }
}
