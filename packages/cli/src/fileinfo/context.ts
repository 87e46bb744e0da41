/**
 * File Info Context
 *
 * Everything the resolver, rename engine and launch-plan builder need
 * besides the path itself. Passed explicitly instead of living in
 * process-wide state.
 */

import {
  DEFAULT_TERMINAL_COMMAND,
  silentLogger,
  type ContentTypeSource,
  type Logger,
} from "@filemeta/core";

export interface FileInfoContext {
  /** Content-type database used for classification */
  database: ContentTypeSource;
  /** Locale names in preference order, used for `Name[locale]` keys */
  locales: readonly string[];
  logger: Logger;
  /** Prefix for launchers with `Terminal=true` */
  terminalCommand: readonly string[];
  /** Display the launched program should appear on */
  display: string | undefined;
}

export type FileInfoContextOptions = Partial<Omit<FileInfoContext, "database">>;

/**
 * Build a context with defaults for everything but the database.
 */
export function createContext(
  database: ContentTypeSource,
  options: FileInfoContextOptions = {}
): FileInfoContext {
  return {
    database,
    locales: options.locales ?? ["C"],
    logger: options.logger ?? silentLogger,
    terminalCommand: options.terminalCommand ?? DEFAULT_TERMINAL_COMMAND,
    display: options.display,
  };
}
