/**
 * Utility exports
 */

// Crypto utilities
export { generateShortId } from "./crypto";
// Errors
export {
  CachetteError,
  ConfigError,
  type DecryptionFailure,
  DecryptionError,
  errnoCode,
  errorMessage,
  ExternalToolError,
  isCachetteError,
  NotFoundError,
  PassphraseMismatchError,
  type ToolFailureDetails,
  UsageError,
} from "./errors";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
// Logger
export { debug, error, getLogLevel, info, logger, setLogLevel, warn } from "./logger";
// Naming utilities
export {
  ARCHIVE_NAME_PATTERN,
  ARCHIVE_SUFFIX,
  formatArchiveName,
  formatArchiveNameFromTimestamp,
  formatTimestamp,
  isArchiveFileName,
  parseArchiveName,
} from "./naming";
// Path utilities
export {
  type ExpansionContext,
  expandHome,
  expandPath,
  expandVariables,
  isPathWithinDir,
  relativeDisplay,
} from "./path";
