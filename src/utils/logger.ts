/**
 * Logger Utility
 * Writes leveled diagnostics to stderr; stdout is reserved for the picked path
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private level: LogLevel = "warn") {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.error(`${chalk.dim("[DEBUG]")} ${message}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.error(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.error(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }

  error(message: string, error?: Error): void {
    console.error(`${chalk.red("[ERROR]")} ${message}`);
    if (error) {
      console.error(error);
    }
  }
}
