/**
 * Watcher exports
 */

export { Channel, type ChannelResult } from "./channel.js";
export {
  ChangeDetector,
  DEFAULT_INTERVAL_MS,
  type ChangeDetectorOptions,
  type ChangeEvent,
  type StatFile,
} from "./change-detector.js";
export {
  ProgressProcessor,
  type ProgressProcessorOptions,
  type ProcessResult,
} from "./processor.js";
export { watchChecklist, type WatchOptions } from "./watch.js";
