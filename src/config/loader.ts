/**
 * Configuration loader for todo-progress
 *
 * Priority, lowest first:
 * 1. Built-in defaults
 * 2. Config file (<cwd>/.todo-progress.json, or an explicit path)
 * 3. Environment variables (TODO_PROGRESS_*)
 * 4. Command-line overrides
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import { TodoProgressConfigSchema, type TodoProgressConfig } from "./schema.js";
import { ConfigError } from "../utils/errors.js";

export const CONFIG_FILE_NAME = ".todo-progress.json";

export const ENV_VARS = {
  intervalMs: "TODO_PROGRESS_INTERVAL_MS",
  logLevel: "TODO_PROGRESS_LOG_LEVEL",
} as const;

export interface LoadConfigOptions {
  /** Explicit config file; unlike the default one it must exist */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<TodoProgressConfig>;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<TodoProgressConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : path.join(cwd, CONFIG_FILE_NAME);

  const fileConfig = await loadConfigFile(configPath, {
    required: options.configPath !== undefined,
  });

  const merged = {
    ...fileConfig,
    ...readEnv(options.env ?? process.env),
    ...definedOnly(options.overrides ?? {}),
  };

  const result = TodoProgressConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    throw new ConfigError("Invalid configuration", { issues, configPath });
  }

  return result.data;
}

/**
 * Load a config file, returning an empty object if not found and not required
 */
async function loadConfigFile(
  configPath: string,
  options: { required: boolean },
): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFound(error) && !options.required) {
      return {};
    }
    throw new ConfigError("Failed to read configuration", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }
  return parsed;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};

  const interval = env[ENV_VARS.intervalMs];
  if (interval !== undefined && interval !== "") {
    values["intervalMs"] = Number(interval);
  }

  const logLevel = env[ENV_VARS.logLevel];
  if (logLevel !== undefined && logLevel !== "") {
    values["logLevel"] = logLevel;
  }

  return values;
}

function definedOnly(values: Partial<TodoProgressConfig>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
