/**
 * Watch coordinator
 *
 * Runs the change detector and the progress processor side by side,
 * linked by two unbuffered channels (changes, fatal errors). The first
 * fatal error stops both loops and rejects; aborting the signal stops
 * them and resolves.
 */

import type { ILogObj, Logger } from "tslog";
import type { EmptyChecklistPolicy, SubEntryPolicy } from "../types/checklist.js";
import type { ProgressDisplay } from "../display/progress-display.js";
import { Channel } from "./channel.js";
import { ChangeDetector, type ChangeEvent, type StatFile } from "./change-detector.js";
import { ProgressProcessor } from "./processor.js";
import { createChildLogger } from "../utils/logger.js";

export interface WatchOptions {
  filePath: string;
  display: ProgressDisplay;
  intervalMs?: number;
  subEntryPolicy?: SubEntryPolicy;
  emptyChecklist?: EmptyChecklistPolicy;
  logger?: Logger<ILogObj>;
  signal?: AbortSignal;
  stat?: StatFile;
}

export async function watchChecklist(options: WatchOptions): Promise<void> {
  const { filePath, signal, logger } = options;

  const changes = new Channel<ChangeEvent>();
  const errors = new Channel<Error>();

  const detector = new ChangeDetector(filePath, {
    intervalMs: options.intervalMs,
    changes,
    errors,
    stat: options.stat,
    logger: logger ? createChildLogger(logger, "detector") : undefined,
  });
  const processor = new ProgressProcessor(filePath, {
    display: options.display,
    subEntryPolicy: options.subEntryPolicy,
    emptyChecklist: options.emptyChecklist,
    logger: logger ? createChildLogger(logger, "processor") : undefined,
  });

  const shutdown = (): void => {
    detector.stop();
    changes.close();
    errors.close();
  };

  if (signal?.aborted) return;
  signal?.addEventListener("abort", shutdown, { once: true });

  const detecting = detector.run();
  const processing = (async () => {
    for await (const event of changes) {
      logger?.trace({ event: "changed", path: event.path, mtimeMs: event.mtimeMs });
      await processor.process();
    }
  })();
  const failing = errors.receive().then((result) => {
    if (result.ok) throw result.value;
  });

  try {
    await Promise.race([processing, failing]);
  } finally {
    signal?.removeEventListener("abort", shutdown);
    shutdown();
    await Promise.allSettled([detecting, processing, failing]);
  }
}
