/**
 * Context Assembly
 *
 * Merges command-line options, the configuration file and the
 * environment into a FileInfoContext. Earlier sources win:
 * command line, then config, then environment, then defaults.
 */

import {
  DEFAULT_TERMINAL_COMMAND,
  languageNames,
  normalizeLocales,
  type LogLevel,
  type Logger,
} from "@filemeta/core";
import { createContentTypeDatabase, type ContentTypeDatabase } from "../content-types/index.js";
import type { FileInfoContext } from "../fileinfo/index.js";
import { createConsoleLogger, type LogSink } from "../logging/index.js";
import { LogLevelSchema, type FileMetaConfig } from "./config-file.js";

/**
 * Options given on the command line.
 */
export interface ContextOverrides {
  locales?: string[];
  logLevel?: LogLevel;
  /** Use this logger instead of one writing to the console */
  logger?: Logger;
  /** Where the console logger writes; stderr by default */
  logSink?: LogSink;
}

export interface Settings {
  locales: string[];
  terminalCommand: string[];
  display: string | undefined;
  logLevel: LogLevel;
  mimeOverrides: Record<string, string>;
}

/**
 * A context whose database the caller must shut down.
 */
export interface ConfiguredContext extends FileInfoContext {
  database: ContentTypeDatabase;
  logLevel: LogLevel;
}

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function envLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const result = LogLevelSchema.safeParse(env.FILEMETA_LOG_LEVEL);
  return result.success ? result.data : undefined;
}

/**
 * Work out the effective settings without creating anything.
 */
export function resolveSettings(
  config: FileMetaConfig,
  env: NodeJS.ProcessEnv,
  overrides: ContextOverrides = {}
): Settings {
  let locales: string[];
  if (overrides.locales && overrides.locales.length > 0) {
    locales = normalizeLocales(overrides.locales);
  } else if (config.locales && config.locales.length > 0) {
    locales = normalizeLocales(config.locales);
  } else {
    locales = languageNames(env);
  }

  return {
    locales,
    terminalCommand: config.terminal ?? [...DEFAULT_TERMINAL_COMMAND],
    display: config.display ?? (env.DISPLAY || undefined),
    logLevel: overrides.logLevel ?? config.logLevel ?? envLogLevel(env) ?? DEFAULT_LOG_LEVEL,
    mimeOverrides: config.mimeOverrides ?? {},
  };
}

/**
 * Create a context, and the content-type database behind it, from
 * configuration and environment.
 */
export function createFileInfoContext(
  config: FileMetaConfig,
  env: NodeJS.ProcessEnv,
  overrides: ContextOverrides = {}
): ConfiguredContext {
  const settings = resolveSettings(config, env, overrides);
  const logger = overrides.logger ?? createConsoleLogger(settings.logLevel, overrides.logSink);

  return {
    database: createContentTypeDatabase({ overrides: settings.mimeOverrides, logger }),
    locales: settings.locales,
    logger,
    terminalCommand: settings.terminalCommand,
    display: settings.display,
    logLevel: settings.logLevel,
  };
}
