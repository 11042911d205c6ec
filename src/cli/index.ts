#!/usr/bin/env node

/**
 * todo-progress CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerWatchCommand } from "./commands/watch.js";
import { registerCheckCommand } from "./commands/check.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("todo-progress")
  .description("Watch a checklist file and keep its completion percentage on screen")
  .version(VERSION, "-v, --version", "Output the current version");

registerWatchCommand(program);
registerCheckCommand(program);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
