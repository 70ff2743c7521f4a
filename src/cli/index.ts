#!/usr/bin/env node

/**
 * CLI entry point for randimg
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { pickCommand } from "./commands/pick";
import { configCommand } from "./commands/config";
import { cacheCommand } from "./commands/cache";

const program = new Command();

program
  .name("randimg")
  .description("Print the path of a random image from a directory tree or an RSS/Atom feed")
  .version("0.1.0");

// Main pick command (default action)
program
  .argument("[target]", "Directory, or http(s):// / feed:// URL of an RSS or Atom feed")
  .option("-s, --min-size <WxH>", "Minimum image size, e.g. 1024x768 (or 800 for 800x800)")
  .option("-a, --attempts <n>", "Maximum number of random draws")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--no-cache", "Ignore the file list cache and re-poll feeds")
  .option("-v, --verbose", "Log skipped files and print a run summary to stderr")
  .action(pickCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

// Cache command - show or clear the cache directory
program
  .command("cache")
  .description("Show the cache directory")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--clear", "Delete the file list cache and every mirrored feed")
  .action(cacheCommand);

await program.parseAsync();
