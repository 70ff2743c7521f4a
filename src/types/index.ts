/**
 * Central type exports
 */

// Configuration
export type {
  PickerConfig,
  PartialPickerConfig,
  CacheConfig,
  ImagesConfig,
  ScanConfig,
  SelectionConfig,
  NetworkConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { PickerConfigSchema, PartialPickerConfigSchema } from "./config";

// Context
export type {
  PickContext,
  Source,
  Issue,
  IssueType,
  FileIssue,
  ImageIssue,
  FeedIssue,
  FileIssueReason,
  ImageIssueReason,
  FeedIssueReason,
  RunStats,
} from "./context";

// Feeds and images
export type { FeedItem, ImageDimensions, ImageFormat } from "./feed";

// Errors
export {
  PickerError,
  UsageError,
  NoDataError,
  StorageError,
} from "./errors";
export type { PickerErrorKind } from "./errors";
