/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConfigError, PartialPickerConfig, PickerConfig } from "../types";
import { PickerConfigSchema, PartialPickerConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("randimg", { suffix: "" });

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<PickerConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return PickerConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(configPath: string): Promise<PartialPickerConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialPickerConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: PickerConfig,
  override: PartialPickerConfig,
): PickerConfig {
  return {
    cache: { ...base.cache, ...override.cache },
    images: { ...base.images, ...override.images },
    scan: { ...base.scan, ...override.scan },
    selection: { ...base.selection, ...override.selection },
    network: { ...base.network, ...override.network },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: PickerConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 *
 * An invalid user or custom file is reported in `errors` and skipped.
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/randimg or ~/.config/randimg
 * - macOS: ~/Library/Preferences/randimg
 * - Windows: %APPDATA%\randimg
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}

/**
 * Cache root: the configured directory, else the OS cache directory
 */
export function getCacheRoot(config: PickerConfig): string {
  return config.cache.directory ?? paths.cache;
}
