/**
 * Tests for the progress processor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ProgressProcessor } from "./processor.js";
import {
  EmptyChecklistError,
  FileSystemError,
  MalformedLineError,
} from "../utils/errors.js";

const SAMPLE = "- [X] Task 1\n  - [X] Sub 1\n- [ ] Task 2\n";
const SAMPLE_CANONICAL = "- [X] Task 1\n  - [X] Sub 1\n\n- [ ] Task 2\n\n";

describe("ProgressProcessor", () => {
  let dir: string;
  let file: string;
  const display = { show: vi.fn() };

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), "todo-progress-"));
    file = join(dir, "todo.md");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should display the percentage and rewrite on the first cycle", async () => {
    await writeFile(file, SAMPLE);
    const processor = new ProgressProcessor(file, { display });

    const result = await processor.process();

    expect(result.done).toBe(2);
    expect(result.total).toBe(3);
    expect(result.percentage.toFixed(2)).toBe("66.67");
    expect(result.rewritten).toBe(true);
    expect(display.show).toHaveBeenCalledWith({
      percentage: result.percentage,
      done: 2,
      total: 3,
    });
    expect(await readFile(file, "utf-8")).toBe(SAMPLE_CANONICAL);
    expect(processor.getLastPercentage()).toBe(result.percentage);
  });

  it("should not touch the file when the percentage is unchanged", async () => {
    await writeFile(file, SAMPLE);
    const processor = new ProgressProcessor(file, { display });
    await processor.process();

    const edited = "- [X] Task 1\n      - [X] Sub 1\n- [ ] Task 2";
    await writeFile(file, edited);
    const past = new Date("2024-01-02T03:04:05Z");
    await utimes(file, past, past);

    const result = await processor.process();

    expect(result.rewritten).toBe(false);
    expect(display.show).toHaveBeenCalledTimes(2);
    expect(await readFile(file, "utf-8")).toBe(edited);
    expect((await stat(file)).mtimeMs).toBe(past.getTime());
  });

  it("should rewrite again when the percentage changes", async () => {
    await writeFile(file, "- [ ] A\n- [ ] B\n");
    const processor = new ProgressProcessor(file, { display });
    await processor.process();

    await writeFile(file, "- [X] A\n- [ ] B\n");
    const result = await processor.process();

    expect(result.percentage).toBe(50);
    expect(result.rewritten).toBe(true);
    expect(await readFile(file, "utf-8")).toBe("- [X] A\n\n- [ ] B\n\n");
  });

  it("should persist propagated sub-entries", async () => {
    await writeFile(file, "- [X] A\n  - [ ] a\n");
    const processor = new ProgressProcessor(file, { display });

    const result = await processor.process();

    expect(result.percentage).toBe(100);
    expect(await readFile(file, "utf-8")).toBe("- [X] A\n  - [X] a\n\n");
  });

  it("should keep its last percentage per instance", async () => {
    await writeFile(file, SAMPLE);
    await new ProgressProcessor(file, { display }).process();

    const other = new ProgressProcessor(file, { display });

    expect(other.getLastPercentage()).toBeUndefined();
    await expect(other.process()).resolves.toMatchObject({ rewritten: true });
  });

  it("should leave the file alone when rewriting is off", async () => {
    await writeFile(file, SAMPLE);
    const processor = new ProgressProcessor(file, { display, rewrite: false });

    const result = await processor.process();

    expect(result.rewritten).toBe(false);
    expect(await readFile(file, "utf-8")).toBe(SAMPLE);
  });

  it("should fail on a malformed line without displaying", async () => {
    await writeFile(file, "- [X] ok\n- [x] lower\n");
    const processor = new ProgressProcessor(file, { display });

    await expect(processor.process()).rejects.toBeInstanceOf(MalformedLineError);
    expect(display.show).not.toHaveBeenCalled();
  });

  it("should apply the sub-entry policy", async () => {
    await writeFile(file, "- [ ] A\n  - [ ] B\n  - [X] C\n");

    const replacing = new ProgressProcessor(file, { display, rewrite: false });
    await expect(replacing.process()).resolves.toMatchObject({ done: 1, total: 2 });

    const rejecting = new ProgressProcessor(file, { display, subEntryPolicy: "reject" });
    await expect(rejecting.process()).rejects.toMatchObject({
      code: "DUPLICATE_SUB_ENTRY",
      line: 3,
    });
  });

  describe("empty checklist", () => {
    it("should report 0% by default", async () => {
      await writeFile(file, "\n\n");
      const processor = new ProgressProcessor(file, { display });

      const result = await processor.process();

      expect(result).toEqual({ done: 0, total: 0, percentage: 0, rewritten: true });
      expect(await readFile(file, "utf-8")).toBe("");
    });

    it("should fail with the error policy", async () => {
      await writeFile(file, "");
      const processor = new ProgressProcessor(file, { display, emptyChecklist: "error" });

      await expect(processor.process()).rejects.toBeInstanceOf(EmptyChecklistError);
    });
  });

  it("should wrap read failures", async () => {
    const processor = new ProgressProcessor(join(dir, "missing.md"), { display });

    await expect(processor.process()).rejects.toBeInstanceOf(FileSystemError);
    await expect(processor.process()).rejects.toMatchObject({
      code: "FILESYSTEM_ERROR",
      context: { path: join(dir, "missing.md"), operation: "read" },
    });
  });
});
