/**
 * Classifier
 *
 * Maps resolved attributes to a file kind and a content type, and decides
 * whether a regular file may be executed.
 */

import { accessSync, constants } from "fs";
import {
  EXECUTABLE_TYPES,
  kindFromMode,
  silentLogger,
  type ContentTypeHandle,
  type ContentTypeSource,
  type FileKind,
  type Logger,
} from "@filemeta/core";
import type { ResolvedAttributes } from "./resolver.js";

export interface Classification {
  kind: FileKind;
  /** Counted reference owned by the caller */
  contentType: ContentTypeHandle;
  /** Read permission and an execute access check both passed */
  executePermitted: boolean;
  /** Execution is permitted and the type is an allow-listed executable type */
  executable: boolean;
}

/**
 * Content type name for every kind except regular files.
 */
export function syntheticTypeName(kind: Exclude<FileKind, "regular">): string {
  switch (kind) {
    case "socket":
      return "inode/socket";
    case "symlink":
      return "inode/symlink";
    case "block-device":
      return "inode/blockdevice";
    case "directory":
      return "inode/directory";
    case "char-device":
      return "inode/chardevice";
    case "fifo":
      return "inode/fifo";
    case "unknown":
      return "application/octet-stream";
    default: {
      const unhandled: never = kind;
      throw new Error(`Unhandled file kind: ${String(unhandled)}`);
    }
  }
}

/**
 * Whether `mode` grants read to someone and the process may execute `path`.
 * The access check sees mount options and ACLs the mode bits do not.
 */
export function isExecutePermitted(path: string, mode: number): boolean {
  if ((mode & 0o444) === 0) {
    return false;
  }
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether `contentType` or one of its ancestors is an executable type.
 * A failed ancestry lookup counts as no match.
 */
export function isExecutableType(
  contentType: ContentTypeHandle,
  database: ContentTypeSource,
  logger: Logger = silentLogger
): boolean {
  try {
    return database.ancestorsOf(contentType).some((name) => EXECUTABLE_TYPES.includes(name));
  } catch (error) {
    logger.debug(
      `Cannot list parents of ${contentType.name}: ${error instanceof Error ? error.message : String(error)}`
    );
    return false;
  }
}

/**
 * Classify a regular file by name and contents and check its executable status.
 */
export function classifyRegularFile(
  path: string,
  displayName: string,
  mode: number,
  database: ContentTypeSource,
  logger: Logger = silentLogger
): Omit<Classification, "kind"> {
  const contentType = database.lookupForFile(path, displayName);
  const executePermitted = isExecutePermitted(path, mode);
  return {
    contentType,
    executePermitted,
    executable: executePermitted && isExecutableType(contentType, database, logger),
  };
}

export function classifyAttributes(
  path: string,
  displayName: string,
  resolved: ResolvedAttributes,
  database: ContentTypeSource,
  logger: Logger = silentLogger
): Classification {
  const kind: FileKind = resolved.link === "dangling" ? "symlink" : kindFromMode(resolved.stats.mode);

  if (kind === "regular") {
    return { kind, ...classifyRegularFile(path, displayName, resolved.stats.mode, database, logger) };
  }

  return {
    kind,
    contentType: database.lookupByName(syntheticTypeName(kind)),
    executePermitted: false,
    executable: false,
  };
}
