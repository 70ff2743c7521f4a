/**
 * Run Tracker
 * Unified tracking for stats and recoverable issues
 */

import axios from "axios";

export type FileIssueReason = "stat-error" | "read-error" | "cycle" | "dangling-link";
export type ImageIssueReason =
  | "timeout"
  | "invalid-response"
  | "download-failed"
  | "unsupported-extension"
  | "write-error";
export type FeedIssueReason = "duplicate-id" | "fetch-error" | "parse-error";

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details: string;
}

export interface ImageIssue {
  type: "image";
  path: string; // Source URL
  reason: ImageIssueReason;
  details: string;
}

export interface FeedIssue {
  type: "feed";
  path: string; // Feed URL or entry id
  reason: FeedIssueReason;
  details: string;
}

export type Issue = FileIssue | ImageIssue | FeedIssue;
export type IssueType = Issue["type"];

export interface RunStats {
  scannedEntries: number;
  statCalls: number;
  candidates: number;
  cacheHit: boolean;
  feedItems: number;
  downloadedImages: number;
  cachedImages: number;
  failedImages: number;
  prunedImages: number;
  attempts: number;
  rejectedCandidates: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapImageError(error: unknown): IssueInfo<ImageIssueReason> {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return { reason: "timeout", details: error.message };
    }
    if (error.response) {
      return {
        reason: "invalid-response",
        details: `HTTP ${error.response.status}`,
      };
    }
    return { reason: "download-failed", details: error.message };
  }
  if (error instanceof Error) {
    if ("code" in error && (error.code === "EACCES" || error.code === "ENOSPC")) {
      return { reason: "write-error", details: error.message };
    }
    return { reason: "download-failed", details: error.message };
  }
  return { reason: "download-failed", details: String(error) };
}

function mapFileError(error: unknown): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);
  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "dangling-link", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return { reason: "read-error", details };
    }
  }
  return { reason: "stat-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private scannedEntries = 0;
  private statCalls = 0;
  private candidates = 0;
  private cacheHit = false;
  private feedItems = 0;
  private downloadedImages = 0;
  private cachedImages = 0;
  private failedImages = 0;
  private prunedImages = 0;
  private attempts = 0;
  private rejectedCandidates = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementScanned(): void {
    this.scannedEntries++;
  }

  incrementStatCalls(): void {
    this.statCalls++;
  }

  setCandidates(count: number): void {
    this.candidates = count;
  }

  markCacheHit(): void {
    this.cacheHit = true;
  }

  setFeedItems(count: number): void {
    this.feedItems = count;
  }

  incrementImagesDownloaded(): void {
    this.downloadedImages++;
  }

  incrementImagesCached(): void {
    this.cachedImages++;
  }

  incrementImagesFailed(): void {
    this.failedImages++;
  }

  incrementImagesPruned(): void {
    this.prunedImages++;
  }

  incrementAttempts(): void {
    this.attempts++;
  }

  incrementRejected(): void {
    this.rejectedCandidates++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(path: string, error: unknown, type: "file" | "image"): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "image": {
        const { reason, details } = mapImageError(error);
        this.issues.push({ type: "image", path, reason, details });
        break;
      }
    }
  }

  trackFileIssue(path: string, reason: FileIssueReason, details: string): void {
    this.issues.push({ type: "file", path, reason, details });
  }

  trackImageIssue(path: string, reason: ImageIssueReason, details: string): void {
    this.issues.push({ type: "image", path, reason, details });
  }

  trackFeedIssue(path: string, reason: FeedIssueReason, details: string): void {
    this.issues.push({ type: "feed", path, reason, details });
  }

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      scannedEntries: this.scannedEntries,
      statCalls: this.statCalls,
      candidates: this.candidates,
      cacheHit: this.cacheHit,
      feedItems: this.feedItems,
      downloadedImages: this.downloadedImages,
      cachedImages: this.cachedImages,
      failedImages: this.failedImages,
      prunedImages: this.prunedImages,
      attempts: this.attempts,
      rejectedCandidates: this.rejectedCandidates,
      issues: this.issues,
      duration,
    };
  }
}
