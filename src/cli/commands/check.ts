/**
 * Check command - print the completion percentage once
 */

import path from "node:path";
import { Command, Option } from "commander";
import chalk from "chalk";
import { loadConfig } from "../../config/loader.js";
import { renderProgress, type ProgressDisplay } from "../../display/progress-display.js";
import { ProgressProcessor, type ProcessResult } from "../../watcher/processor.js";
import type { EmptyChecklistPolicy, SubEntryPolicy } from "../../types/checklist.js";

export interface CheckOptions {
  json?: boolean;
  fix?: boolean;
  subEntries?: SubEntryPolicy;
  empty?: EmptyChecklistPolicy;
  config?: string;
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check <file>")
    .description("Print the completion percentage of a checklist file once")
    .option("--json", "Output as JSON")
    .option("--fix", "Rewrite the file in canonical form")
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
    .action(async (file: string, options: CheckOptions) => {
      await runCheck(file, options);
    });
}

export async function runCheck(file: string, options: CheckOptions = {}): Promise<ProcessResult> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      subEntryPolicy: options.subEntries,
      emptyChecklist: options.empty,
    },
  });

  const display: ProgressDisplay = {
    show(update) {
      if (!options.json) {
        console.log(renderProgress(update));
      }
    },
  };

  const filePath = path.resolve(file);
  const processor = new ProgressProcessor(filePath, {
    display,
    subEntryPolicy: config.subEntryPolicy,
    emptyChecklist: config.emptyChecklist,
    rewrite: options.fix ?? false,
  });
  const result = await processor.process();

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          file: filePath,
          done: result.done,
          total: result.total,
          percentage: result.percentage,
        },
        null,
        2,
      ),
    );
  } else if (result.rewritten) {
    console.log(chalk.dim(`Rewrote ${file} in canonical form`));
  }

  return result;
}
