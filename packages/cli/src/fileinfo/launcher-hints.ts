/**
 * Launcher Hints
 *
 * Reads the icon and display name of a desktop entry, and whether the
 * entry describes a launchable application.
 */

import { readFileSync } from "fs";
import {
  DESKTOP_ENTRY_GROUP,
  KeyFile,
  isDesktopEntry,
  silentLogger,
  type ContentTypeHandle,
  type LauncherHints,
  type Logger,
} from "@filemeta/core";

export interface LauncherData {
  hints: LauncherHints;
  /** `Type=Application` with a non-empty `Exec` */
  launchable: boolean;
}

/**
 * Whether an `Exec` value names a command.
 */
export function hasExecCommand(exec: string | undefined): exec is string {
  return exec !== undefined && exec.trim() !== "";
}

/**
 * Launcher data of a desktop entry, or undefined when `contentType` is not
 * the desktop entry type or the file cannot be read or parsed.
 */
export function extractLauncherHints(
  path: string,
  contentType: ContentTypeHandle,
  locales: readonly string[],
  logger: Logger = silentLogger
): LauncherData | undefined {
  if (!isDesktopEntry(contentType)) {
    return undefined;
  }

  let keyFile: KeyFile;
  try {
    keyFile = KeyFile.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    logger.debug(
      `Ignoring desktop entry ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
    return undefined;
  }

  if (!keyFile.hasGroup(DESKTOP_ENTRY_GROUP)) {
    return { hints: { icon: undefined, name: undefined }, launchable: false };
  }

  const type = keyFile.getString(DESKTOP_ENTRY_GROUP, "Type") ?? "Application";
  return {
    hints: {
      icon: keyFile.getString(DESKTOP_ENTRY_GROUP, "Icon"),
      name: keyFile.getLocaleString(DESKTOP_ENTRY_GROUP, "Name", locales),
    },
    launchable: type === "Application" && hasExecCommand(keyFile.getString(DESKTOP_ENTRY_GROUP, "Exec")),
  };
}
