/**
 * Utility exports for todo-progress
 */

// Logger
export {
  createLogger,
  createChildLogger,
  levelToNumber,
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
} from "./logger.js";

// Errors
export {
  TodoProgressError,
  StatFailureError,
  ChecklistSyntaxError,
  MalformedLineError,
  OrphanSubEntryError,
  DuplicateSubEntryError,
  EmptyChecklistError,
  FileSystemError,
  ConfigError,
  isTodoProgressError,
  formatError,
  toError,
  type ConfigIssue,
} from "./errors.js";

// Async utilities
export { sleep } from "./async.js";
