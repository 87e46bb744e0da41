/**
 * Launch Plans
 *
 * Turns a descriptor and a list of files to open into the command line,
 * working directory and display a launcher should use. Nothing is
 * spawned here.
 */

import { readFileSync } from "fs";
import * as path from "path";
import {
  DESKTOP_ENTRY_GROUP,
  KeyFile,
  MissingExecFieldError,
  UnreadableLauncherError,
  expandExecTemplate,
  isDesktopEntry,
  quoteExecArgument,
  type ExecTarget,
  type FileInfo,
} from "@filemeta/core";
import type { FileInfoContext } from "./context.js";
import { hasExecCommand } from "./launcher-hints.js";

export interface LaunchPlan {
  /** Directory of the first target, or of the launched file itself */
  workingDirectory: string;
  argv: string[];
  /** Display target, undefined to inherit the launcher's own */
  display: string | undefined;
}

function readDesktopEntry(filePath: string): KeyFile {
  try {
    return KeyFile.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new UnreadableLauncherError(
      filePath,
      error instanceof Error ? error.message : String(error)
    );
  }
}

function desktopEntryCommand(
  info: FileInfo,
  targets: readonly ExecTarget[],
  context: FileInfoContext
): string[] {
  const keyFile = readDesktopEntry(info.path);
  const exec = keyFile.getString(DESKTOP_ENTRY_GROUP, "Exec");
  if (!hasExecCommand(exec)) {
    throw new MissingExecFieldError(info.path);
  }

  return expandExecTemplate(exec, {
    targets,
    icon: keyFile.getString(DESKTOP_ENTRY_GROUP, "Icon"),
    name: keyFile.getLocaleString(DESKTOP_ENTRY_GROUP, "Name", context.locales),
    desktopFile: info.path,
    terminal: keyFile.getBoolean(DESKTOP_ENTRY_GROUP, "Terminal", false),
    terminalCommand: context.terminalCommand,
  });
}

/**
 * Describe how to run the file behind `info` with `targets` as arguments.
 * Desktop entries run their `Exec` command; any other file is run
 * directly with the targets appended.
 *
 * @throws UnreadableLauncherError, MissingExecFieldError or TemplateParseError
 */
export function buildLaunchPlan(
  info: FileInfo,
  targets: readonly ExecTarget[],
  context: FileInfoContext
): LaunchPlan {
  const argv = isDesktopEntry(info.contentType)
    ? desktopEntryCommand(info, targets, context)
    : expandExecTemplate(`${quoteExecArgument(info.path)} %F`, { targets });

  const first = targets[0];
  return {
    workingDirectory: path.dirname(first ? first.path : info.path),
    argv,
    display: context.display,
  };
}
