/**
 * Configuration exports
 */

export {
  TodoProgressConfigSchema,
  createDefaultConfig,
  type TodoProgressConfig,
} from "./schema.js";
export { loadConfig, CONFIG_FILE_NAME, ENV_VARS, type LoadConfigOptions } from "./loader.js";
