/**
 * Watch command - keep the progress of a checklist file on screen
 */

import path from "node:path";
import { Command, Option } from "commander";
import { loadConfig } from "../../config/loader.js";
import { createTerminalDisplay, type ProgressDisplay } from "../../display/progress-display.js";
import { watchChecklist } from "../../watcher/watch.js";
import { createLogger, type LogLevel } from "../../utils/logger.js";
import type { EmptyChecklistPolicy, SubEntryPolicy } from "../../types/checklist.js";

export interface WatchCommandOptions {
  interval?: number;
  subEntries?: SubEntryPolicy;
  empty?: EmptyChecklistPolicy;
  config?: string;
  logLevel?: LogLevel;
  /** Stops the watch; SIGINT is used when absent */
  signal?: AbortSignal;
  display?: ProgressDisplay;
}

export function parseInterval(value: string): number {
  return Number.parseInt(value, 10);
}

export function registerWatchCommand(program: Command): void {
  program
    .command("watch <file>", { isDefault: true })
    .description("Watch a checklist file and show its completion percentage")
    .option("-i, --interval <ms>", "Delay between modification checks", parseInterval)
    .addOption(
      new Option("--sub-entries <policy>", "Repeated sub-entries under one parent").choices([
        "replace",
        "reject",
      ]),
    )
    .addOption(
      new Option("--empty <policy>", "Percentage of a checklist without entries").choices([
        "zero",
        "error",
      ]),
    )
    .option("-c, --config <path>", "Configuration file")
    .option("--log-level <level>", "Log level (silly, trace, debug, info, warn, error, fatal)")
    .action(async (file: string, options: WatchCommandOptions) => {
      await runWatch(file, options);
    });
}

export async function runWatch(file: string, options: WatchCommandOptions = {}): Promise<void> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      intervalMs: options.interval,
      subEntryPolicy: options.subEntries,
      emptyChecklist: options.empty,
      logLevel: options.logLevel,
    },
  });

  const logger = createLogger({
    level: config.logLevel,
    logFile: config.logFile,
    prettyPrint: process.stderr.isTTY ?? false,
  });

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  const signal = options.signal ?? controller.signal;
  if (!options.signal) {
    process.once("SIGINT", onSigint);
  }

  const display = options.display ?? createTerminalDisplay();
  const filePath = path.resolve(file);
  logger.info({ event: "watch", path: filePath, intervalMs: config.intervalMs });

  try {
    await watchChecklist({
      filePath,
      display,
      intervalMs: config.intervalMs,
      subEntryPolicy: config.subEntryPolicy,
      emptyChecklist: config.emptyChecklist,
      logger,
      signal,
    });
  } finally {
    process.off("SIGINT", onSigint);
    display.done?.();
  }
}
