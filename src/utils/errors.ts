/**
 * Error handling for todo-progress
 * Custom error types with context and a suggested fix
 */

/**
 * Base error class for todo-progress
 */
export class TodoProgressError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "TodoProgressError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, TodoProgressError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * The watched file could not be stat'ed while polling
 */
export class StatFailureError extends TodoProgressError {
  readonly path: string;

  constructor(path: string, cause?: Error) {
    super(`Cannot stat checklist file ${path}${cause ? `: ${cause.message}` : ""}`, {
      code: "STAT_FAILURE",
      context: { path },
      suggestion: "Check that the file still exists and is readable",
      cause,
    });
    this.name = "StatFailureError";
    this.path = path;
  }
}

/**
 * Base class for errors pointing at a line of the checklist
 */
export class ChecklistSyntaxError extends TodoProgressError {
  readonly line: number;

  constructor(
    message: string,
    options: { code: string; line: number; context?: Record<string, unknown>; suggestion: string },
  ) {
    super(`${message} [line ${options.line}]`, {
      code: options.code,
      context: { line: options.line, ...options.context },
      suggestion: options.suggestion,
    });
    this.name = "ChecklistSyntaxError";
    this.line = options.line;
  }
}

/**
 * A non-blank line does not start with a checkbox marker
 */
export class MalformedLineError extends ChecklistSyntaxError {
  constructor(line: number, text: string) {
    super("Line is not a checklist entry", {
      code: "MALFORMED_LINE",
      line,
      context: { text },
      suggestion: 'Entries must start with "- [ ]" or "- [X]", optionally indented with spaces',
    });
    this.name = "MalformedLineError";
  }
}

/**
 * An indented line appears before any top-level entry
 */
export class OrphanSubEntryError extends ChecklistSyntaxError {
  constructor(line: number) {
    super("Found a sub-entry without a parent entry", {
      code: "ORPHAN_SUB_ENTRY",
      line,
      suggestion: "Remove the indentation or add a top-level entry above it",
    });
    this.name = "OrphanSubEntryError";
  }
}

/**
 * A parent already owns a sub-entry and the parser rejects replacements
 */
export class DuplicateSubEntryError extends ChecklistSyntaxError {
  readonly previousLine: number;

  constructor(line: number, previousLine: number) {
    super(`Entry already has a sub-entry on line ${previousLine}`, {
      code: "DUPLICATE_SUB_ENTRY",
      line,
      context: { previousLine },
      suggestion: "Each entry can own a single sub-entry; move the extra one to the top level",
    });
    this.name = "DuplicateSubEntryError";
    this.previousLine = previousLine;
  }
}

/**
 * The checklist holds no entry, so no percentage can be computed
 */
export class EmptyChecklistError extends TodoProgressError {
  constructor() {
    super("Checklist has no entries", {
      code: "EMPTY_CHECKLIST",
      suggestion: 'Add an entry, or set "emptyChecklist" to "zero" to report 0%',
    });
    this.name = "EmptyChecklistError";
  }
}

/**
 * File system error
 */
export class FileSystemError extends TodoProgressError {
  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "FILESYSTEM_ERROR",
      context: { path: options.path, operation: options.operation },
      suggestion: `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "FileSystemError";
  }
}

/**
 * Configuration error
 */
export class ConfigError extends TodoProgressError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      suggestion: "Check your .todo-progress.json and TODO_PROGRESS_* variables",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export function isTodoProgressError(error: unknown): error is TodoProgressError {
  return error instanceof TodoProgressError;
}

/**
 * Wrap a non-Error thrown value
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof TodoProgressError) {
    let message = `[${error.code}] ${error.message}`;
    if (error instanceof ConfigError && error.issues.length > 0) {
      message += `\n${error.formatIssues()}`;
    }
    if (error.suggestion) {
      message += `\n  Suggestion: ${error.suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
