/**
 * Configuration Module
 */

export {
  FileMetaConfigSchema,
  LogLevelSchema,
  CONFIG_FILE_NAMES,
  loadConfigFile,
  findConfig,
} from "./config-file.js";

export type { FileMetaConfig } from "./config-file.js";

export {
  resolveSettings,
  createFileInfoContext,
} from "./context.js";

export type {
  ContextOverrides,
  Settings,
  ConfiguredContext,
} from "./context.js";
