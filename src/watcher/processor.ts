/**
 * Progress processor
 *
 * One cycle per change event: read, parse, calculate, display, and
 * rewrite the file in canonical form when the percentage moved since the
 * last cycle.
 */

import { readFile, writeFile } from "node:fs/promises";
import type { ILogObj, Logger } from "tslog";
import type {
  EmptyChecklistPolicy,
  ProgressCount,
  SubEntryPolicy,
} from "../types/checklist.js";
import type { ProgressDisplay } from "../display/progress-display.js";
import { parseChecklist } from "../checklist/parser.js";
import { calculateProgress } from "../checklist/progress.js";
import { serializeChecklist } from "../checklist/serializer.js";
import { FileSystemError, toError } from "../utils/errors.js";

export interface ProgressProcessorOptions {
  display: ProgressDisplay;
  subEntryPolicy?: SubEntryPolicy;
  emptyChecklist?: EmptyChecklistPolicy;
  /** Write the canonical form back when the percentage changes (default: true) */
  rewrite?: boolean;
  logger?: Logger<ILogObj>;
}

export interface ProcessResult extends ProgressCount {
  percentage: number;
  rewritten: boolean;
}

export class ProgressProcessor {
  private filePath: string;
  private display: ProgressDisplay;
  private subEntryPolicy: SubEntryPolicy;
  private emptyChecklist: EmptyChecklistPolicy;
  private rewrite: boolean;
  private logger: Logger<ILogObj> | undefined;
  private lastPercentage: number | undefined;

  constructor(filePath: string, options: ProgressProcessorOptions) {
    this.filePath = filePath;
    this.display = options.display;
    this.subEntryPolicy = options.subEntryPolicy ?? "replace";
    this.emptyChecklist = options.emptyChecklist ?? "zero";
    this.rewrite = options.rewrite ?? true;
    this.logger = options.logger;
  }

  async process(): Promise<ProcessResult> {
    const text = await this.read();
    const tree = parseChecklist(text, { subEntryPolicy: this.subEntryPolicy });
    const { done, total, percentage, tree: propagated } = calculateProgress(tree, {
      emptyChecklist: this.emptyChecklist,
    });

    this.logger?.debug({ event: "progress", path: this.filePath, done, total, percentage });
    this.display.show({ percentage, done, total });

    if (percentage === this.lastPercentage) {
      return { done, total, percentage, rewritten: false };
    }
    this.lastPercentage = percentage;

    if (!this.rewrite) {
      return { done, total, percentage, rewritten: false };
    }

    await this.write(serializeChecklist(propagated));
    this.logger?.info({ event: "rewrite", path: this.filePath, percentage });
    return { done, total, percentage, rewritten: true };
  }

  /**
   * Percentage of the last cycle, undefined before the first one
   */
  getLastPercentage(): number | undefined {
    return this.lastPercentage;
  }

  private async read(): Promise<string> {
    try {
      return await readFile(this.filePath, "utf-8");
    } catch (error) {
      throw new FileSystemError(`Cannot read checklist file ${this.filePath}`, {
        path: this.filePath,
        operation: "read",
        cause: toError(error),
      });
    }
  }

  private async write(content: string): Promise<void> {
    try {
      await writeFile(this.filePath, content, "utf-8");
    } catch (error) {
      throw new FileSystemError(`Cannot rewrite checklist file ${this.filePath}`, {
        path: this.filePath,
        operation: "write",
        cause: toError(error),
      });
    }
  }
}
