/**
 * Logger
 *
 * Minimal logging surface threaded through the resolver context.
 *
 * @module @filemeta/core/logger
 */

/**
 * Log levels, quietest first.
 * - silent: nothing
 * - warn: recoverable problems (unreadable config, ignored files)
 * - info: operations performed (renames, rewrites)
 * - debug: diagnostic detail (best-effort failures, lookups)
 */
export type LogLevel = 'silent' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'warn', 'info', 'debug'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};

/**
 * Whether a message at `level` is shown when the threshold is `threshold`.
 */
export function isLevelEnabled(threshold: LogLevel, level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}
