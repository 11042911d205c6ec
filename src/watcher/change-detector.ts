/**
 * Change detector
 *
 * Polls the checklist's modification time and publishes a change event
 * whenever it moves. Publishing blocks until the consumer takes the
 * event, so the detector stalls while the checklist is being processed.
 */

import { stat } from "node:fs/promises";
import type { ILogObj, Logger } from "tslog";
import type { Channel } from "./channel.js";
import { StatFailureError, toError } from "../utils/errors.js";
import { sleep } from "../utils/async.js";

export interface ChangeEvent {
  path: string;
  mtimeMs: number;
}

export type StatFile = (path: string) => Promise<{ mtimeMs: number }>;

export interface ChangeDetectorOptions {
  /** Delay between two checks in ms (default: 1000) */
  intervalMs?: number;
  changes: Channel<ChangeEvent>;
  errors: Channel<Error>;
  stat?: StatFile;
  logger?: Logger<ILogObj>;
}

export const DEFAULT_INTERVAL_MS = 1000;

export class ChangeDetector {
  private filePath: string;
  private intervalMs: number;
  private changes: Channel<ChangeEvent>;
  private errors: Channel<Error>;
  private statFile: StatFile;
  private logger: Logger<ILogObj> | undefined;
  private abortController = new AbortController();
  // unset until the first publish, so the first successful stat always counts
  private lastModTime: number | undefined;
  private running = false;

  constructor(filePath: string, options: ChangeDetectorOptions) {
    this.filePath = filePath;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.changes = options.changes;
    this.errors = options.errors;
    this.statFile = options.stat ?? ((path) => stat(path));
    this.logger = options.logger;
  }

  /**
   * Poll until stopped or until a publish hits a closed channel
   */
  async run(): Promise<void> {
    if (this.running) return;
    this.running = true;

    const signal = this.abortController.signal;
    try {
      while (!signal.aborted) {
        let mtimeMs: number;
        try {
          mtimeMs = (await this.statFile(this.filePath)).mtimeMs;
        } catch (error) {
          const failure = new StatFailureError(this.filePath, toError(error));
          this.logger?.debug({ event: "stat-failure", path: this.filePath, error: failure.message });
          if (!(await this.errors.send(failure))) break;
          // no sleep: the next check follows right away
          continue;
        }

        if (this.lastModTime === undefined || mtimeMs !== this.lastModTime) {
          this.logger?.debug({ event: "change", path: this.filePath, mtimeMs });
          if (!(await this.changes.send({ path: this.filePath, mtimeMs }))) break;
          // from the same stat, never a fresh one: our own rewrite must show up as a change
          this.lastModTime = mtimeMs;
        }

        await sleep(this.intervalMs, signal);
      }
    } finally {
      this.running = false;
    }
  }

  /**
   * Stop polling. A publish already waiting for a receiver only ends
   * when its channel is closed.
   */
  stop(): void {
    this.abortController.abort();
  }

  isActive(): boolean {
    return this.running;
  }

  get lastModified(): number | undefined {
    return this.lastModTime;
  }
}
