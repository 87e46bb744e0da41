/**
 * Console Logger
 *
 * Writes log messages to stderr with colored level prefixes.
 */

import pc from "picocolors";
import { isLevelEnabled, type Logger, type LogLevel } from "@filemeta/core";

/**
 * Where formatted lines go. Defaults to `console.error` so that command
 * output on stdout stays machine-readable.
 */
export type LogSink = (line: string) => void;

/**
 * Create a logger that prints messages at or above `level`.
 */
export function createConsoleLogger(
  level: LogLevel,
  sink: LogSink = (line) => console.error(line)
): Logger {
  return {
    debug(message) {
      if (isLevelEnabled(level, "debug")) sink(`${pc.dim("[debug]")} ${pc.dim(message)}`);
    },
    info(message) {
      if (isLevelEnabled(level, "info")) sink(`${pc.cyan("[info]")} ${message}`);
    },
    warn(message) {
      if (isLevelEnabled(level, "warn")) sink(`${pc.yellow("[warn]")} ${message}`);
    },
  };
}
