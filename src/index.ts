/**
 * todo-progress: checklist completion watcher
 *
 * Polls a plain-text checklist, shows its completion percentage and
 * keeps the file in canonical form.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Checklist model
export type {
  ChecklistEntry,
  ChecklistTree,
  CheckStatus,
  SubEntryPolicy,
  EmptyChecklistPolicy,
  ProgressCount,
  ProgressResult,
} from "./types/checklist.js";
export {
  parseChecklist,
  parseLine,
  serializeChecklist,
  calculateProgress,
  countProgress,
  propagateRestDone,
  toPercentage,
  DONE_MARKER,
  UNDONE_MARKER,
} from "./checklist/index.js";

// Watching
export {
  Channel,
  ChangeDetector,
  ProgressProcessor,
  watchChecklist,
  DEFAULT_INTERVAL_MS,
} from "./watcher/index.js";
export type {
  ChangeEvent,
  ChannelResult,
  StatFile,
  ProcessResult,
  WatchOptions,
} from "./watcher/index.js";

// Display
export {
  createTerminalDisplay,
  formatProgress,
  renderProgress,
  type ProgressDisplay,
  type ProgressUpdate,
} from "./display/progress-display.js";

// Configuration
export { loadConfig, createDefaultConfig } from "./config/index.js";
export type { TodoProgressConfig } from "./config/index.js";

// Utilities
export { createLogger, formatError, isTodoProgressError } from "./utils/index.js";
export {
  TodoProgressError,
  StatFailureError,
  MalformedLineError,
  OrphanSubEntryError,
  DuplicateSubEntryError,
  EmptyChecklistError,
  FileSystemError,
  ConfigError,
} from "./utils/index.js";
