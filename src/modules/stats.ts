/**
 * Stats Module
 * Prints a run summary to stderr in verbose mode
 */

import chalk from "chalk";
import type { Issue, PickContext, RunStats } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Section Displays
// ============================================================================

function displayCandidatesSection(stats: RunStats): string[] {
  const lines = [sectionHeader("Candidates")];
  lines.push(statRow(chalk.green("◉"), "Candidates", stats.candidates, chalk.green));
  if (stats.cacheHit) {
    lines.push(statRow(chalk.cyan("◉"), "Source", "file list cache", chalk.cyan));
  } else if (stats.scannedEntries > 0) {
    lines.push(statRow(chalk.cyan("◉"), "Entries scanned", stats.scannedEntries));
    lines.push(statRow(chalk.cyan("◉"), "Stat calls", stats.statCalls));
  }
  return lines;
}

function displayFeedSection(stats: RunStats): string[] {
  const total = stats.downloadedImages + stats.cachedImages + stats.failedImages;
  if (stats.feedItems === 0 && total === 0 && stats.prunedImages === 0) {
    return [];
  }

  const lines = [sectionHeader("Feed")];
  lines.push(statRow(chalk.cyan("◉"), "Items", stats.feedItems));
  if (stats.downloadedImages > 0) {
    lines.push(statRow(chalk.green("◉"), "Downloaded", stats.downloadedImages, chalk.green));
  }
  if (stats.cachedImages > 0) {
    lines.push(statRow(chalk.cyan("◉"), "Cached", stats.cachedImages, chalk.cyan));
  }
  if (stats.failedImages > 0) {
    lines.push(statRow(chalk.red("◉"), "Failed", stats.failedImages, chalk.red));
  }
  if (stats.prunedImages > 0) {
    lines.push(statRow(chalk.yellow("◉"), "Pruned", stats.prunedImages, chalk.yellow));
  }
  return lines;
}

function displaySelectionSection(stats: RunStats): string[] {
  if (stats.attempts === 0) return [];
  return [
    sectionHeader("Selection"),
    statRow(chalk.cyan("◉"), "Attempts", stats.attempts),
    statRow(chalk.yellow("◉"), "Rejected", stats.rejectedCandidates, chalk.yellow),
  ];
}

function displayIssuesSection(issues: Issue[]): string[] {
  if (issues.length === 0) return [];
  const lines = [sectionHeader(chalk.yellow("Issues"))];
  for (const issue of issues) {
    lines.push(`      ${chalk.dim("·")} ${chalk.yellow(issue.reason)} ${issue.path}`);
    if (issue.details) {
      lines.push(`        ${chalk.dim(issue.details)}`);
    }
  }
  return lines;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Summary lines for a finished (or failed) run
 */
export function formatStats(ctx: PickContext): string[] {
  const stats = ctx.tracker.getStats();
  const statusIcon = ctx.selected ? chalk.green("✔") : chalk.red("✖");
  const title = ctx.selected ? "Image picked" : "No image picked";

  return [
    "",
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
    ...displayCandidatesSection(stats),
    ...displayFeedSection(stats),
    ...displaySelectionSection(stats),
    ...displayIssuesSection(stats.issues),
    "",
  ];
}

/**
 * Display run statistics on stderr when verbose
 */
export function stats(ctx: PickContext): void {
  if (!ctx.verbose) return;
  for (const line of formatStats(ctx)) {
    console.error(line);
  }
}
