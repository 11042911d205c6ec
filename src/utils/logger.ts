/**
 * Structured logging on tslog
 *
 * Interactive sessions get pretty lines; anything else gets one JSON
 * object per log call. Console output goes to stderr, leaving stdout to
 * the progress display. `logFile` adds a JSON-lines sink on top.
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";
import { formatWithOptions } from "node:util";

/** tslog's minLevel is the index in this list */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
  /** Append every log object as a JSON line to this file */
  logFile?: string;
}

const DEFAULTS: LoggerConfig = {
  name: "todo-progress",
  level: "warn",
  prettyPrint: true,
};

export function levelToNumber(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const { name, level, prettyPrint, logFile } = { ...DEFAULTS, ...config };

  const logger = new Logger<ILogObj>({
    name,
    type: prettyPrint ? "pretty" : "json",
    minLevel: levelToNumber(level),
    prettyLogTemplate: prettyPrint ? "{{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] " : undefined,
    stylePrettyLogs: prettyPrint,
    overwrite: {
      transportFormatted: (logMetaMarkup, logArgs, logErrors) => {
        const separator = logErrors.length > 0 && logArgs.length > 0 ? "\n" : "";
        const args = formatWithOptions({ colors: prettyPrint }, ...logArgs);
        console.error(logMetaMarkup + args + separator + logErrors.join("\n"));
      },
      transportJSON: (json) => {
        console.error(JSON.stringify(json));
      },
    },
  });

  if (logFile) {
    appendToFile(logger, logFile);
  }
  return logger;
}

function appendToFile(logger: Logger<ILogObj>, logFile: string): void {
  const dir = path.dirname(logFile);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  logger.attachTransport((logObj) => {
    fs.appendFileSync(logFile, `${JSON.stringify(logObj)}\n`);
  });
}

/**
 * Sub-logger whose name is appended to the parent's, e.g. `todo-progress:detector`
 */
export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}
