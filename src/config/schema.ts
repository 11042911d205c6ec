/**
 * Configuration schema for todo-progress
 */

import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";

export const TodoProgressConfigSchema = z.object({
  /** Delay between two modification-time checks */
  intervalMs: z.number().int().min(10).default(1000),
  subEntryPolicy: z.enum(["replace", "reject"]).default("replace"),
  emptyChecklist: z.enum(["zero", "error"]).default("zero"),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
  logFile: z.string().min(1).optional(),
});

export type TodoProgressConfig = z.infer<typeof TodoProgressConfigSchema>;

/**
 * Built-in defaults
 */
export function createDefaultConfig(): TodoProgressConfig {
  return TodoProgressConfigSchema.parse({});
}
