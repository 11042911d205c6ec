/**
 * Tests for configuration loader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, CONFIG_FILE_NAME } from "./loader.js";
import { ConfigError } from "../utils/errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "todo-progress-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should return defaults without a config file", async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config).toEqual({
      intervalMs: 1000,
      subEntryPolicy: "replace",
      emptyChecklist: "zero",
      logLevel: "warn",
    });
  });

  it("should read the project file as JSON5", async () => {
    await writeFile(
      join(dir, CONFIG_FILE_NAME),
      "{\n  // poll faster\n  intervalMs: 250,\n  subEntryPolicy: 'reject',\n}\n",
    );

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.intervalMs).toBe(250);
    expect(config.subEntryPolicy).toBe("reject");
    expect(config.emptyChecklist).toBe("zero");
  });

  it("should read an explicit path relative to cwd", async () => {
    await writeFile(join(dir, "custom.json"), '{ "emptyChecklist": "error", "logFile": "log.jsonl" }');

    const config = await loadConfig({ cwd: dir, configPath: "custom.json", env: {} });

    expect(config.emptyChecklist).toBe("error");
    expect(config.logFile).toBe("log.jsonl");
  });

  it("should let environment variables override the file", async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), '{ "intervalMs": 250, "logLevel": "info" }');

    const config = await loadConfig({
      cwd: dir,
      env: { TODO_PROGRESS_INTERVAL_MS: "500", TODO_PROGRESS_LOG_LEVEL: "debug" },
    });

    expect(config.intervalMs).toBe(500);
    expect(config.logLevel).toBe("debug");
  });

  it("should let overrides win and ignore undefined ones", async () => {
    const config = await loadConfig({
      cwd: dir,
      env: { TODO_PROGRESS_INTERVAL_MS: "500" },
      overrides: { intervalMs: 100, subEntryPolicy: undefined },
    });

    expect(config.intervalMs).toBe(100);
    expect(config.subEntryPolicy).toBe("replace");
  });

  it("should list invalid values", async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), '{ "intervalMs": 5 }');

    try {
      await loadConfig({ cwd: dir, env: {} });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.message).toBe("Invalid configuration");
        expect(error.issues.map((issue) => issue.path)).toEqual(["intervalMs"]);
      }
    }
  });

  it("should reject a non-numeric interval from the environment", async () => {
    await expect(
      loadConfig({ cwd: dir, env: { TODO_PROGRESS_INTERVAL_MS: "soon" } }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("should fail when an explicit file is missing", async () => {
    await expect(
      loadConfig({ cwd: dir, configPath: "nope.json", env: {} }),
    ).rejects.toMatchObject({ message: "Failed to read configuration", code: "CONFIG_ERROR" });
  });

  it("should fail on a file that is not an object", async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), "[1, 2]");

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toMatchObject({
      message: "Invalid configuration: expected an object",
    });
  });

  it("should fail on a file that does not parse", async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), "{ intervalMs: ");

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toMatchObject({
      message: "Configuration is not valid JSON5",
    });
  });
});
