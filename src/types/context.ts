/**
 * Pick context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { PickerConfig } from "./config";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { FileListCache } from "../utils/file-list-cache";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ImageIssue,
  FeedIssue,
  FileIssueReason,
  ImageIssueReason,
  FeedIssueReason,
  RunStats,
} from "../utils/tracker";

export type Source =
  | { kind: "directory"; path: string }
  | { kind: "feed"; url: string };

export interface PickContext {
  // Input - provided at initialization
  config: PickerConfig;
  target: string;
  cacheRoot: string;

  tracker: Tracker;
  logger: Logger;
  verbose?: boolean;

  source?: Source; // Resolver
  directory?: string; // Directory the candidates were listed from (scanner or mirror)
  fileListCache?: FileListCache; // Scanner; held open until the run ends
  candidates?: string[]; // Scanner
  invalidate?: () => Promise<void>; // Drops whatever backs the candidate list
  selected?: string; // Selector
}
