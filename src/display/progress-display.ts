/**
 * Terminal progress display
 *
 * Uses log-update so each update replaces the previous frame.
 *
 * @module display/progress-display
 */

import logUpdate from "log-update";
import chalk from "chalk";

export interface ProgressUpdate {
  percentage: number;
  done: number;
  total: number;
}

export interface ProgressDisplay {
  show(update: ProgressUpdate): void;
  /** Keep the last frame on screen and release the terminal */
  done?(): void;
}

/**
 * Plain line, two decimals: "progress: 66.67"
 */
export function formatProgress(update: ProgressUpdate): string {
  return `progress: ${update.percentage.toFixed(2)}`;
}

function colorFor(percentage: number): (text: string) => string {
  if (percentage >= 100) return chalk.green;
  if (percentage >= 50) return chalk.yellow;
  return chalk.red;
}

export function renderProgress(update: ProgressUpdate): string {
  const color = colorFor(update.percentage);
  return `${color(formatProgress(update))} ${chalk.dim(`(${update.done}/${update.total})`)}`;
}

export function createTerminalDisplay(): ProgressDisplay {
  return {
    show(update) {
      logUpdate(renderProgress(update));
    },
    done() {
      logUpdate.done();
    },
  };
}
