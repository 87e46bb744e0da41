/**
 * Rename Engine
 *
 * Desktop entries are renamed by rewriting their `Name` key; the file
 * keeps its path. Everything else is renamed on disk, and regular files
 * are classified again since their type may depend on the name.
 *
 * The descriptor is only changed once every step that can fail has
 * succeeded.
 */

import { lstatSync, readFileSync, renameSync, type Stats } from "fs";
import {
  AlreadyExistsError,
  DESKTOP_ENTRY_GROUP,
  EncodingError,
  FileFlags,
  InvalidFormatError,
  InvalidNameError,
  KeyFile,
  isDesktopEntry,
  toIoError,
  type FileInfo,
} from "@filemeta/core";
import { replaceFileContents } from "./atomic-write.js";
import { classifyRegularFile } from "./classifier.js";
import type { FileInfoContext } from "./context.js";
import { extractLauncherHints } from "./launcher-hints.js";
import { computeFlags } from "./resolve.js";

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Reject names that cannot name a single directory entry.
 *
 * @throws InvalidNameError for an empty name, a name containing `/`, or
 *   a string with unpaired surrogates (not representable as UTF-8)
 */
export function validateFileName(name: string): void {
  if (name === "" || name.includes("/") || LONE_SURROGATE.test(name)) {
    throw new InvalidNameError(name);
  }
}

/**
 * Convert a validated display name to the name written to disk.
 *
 * @throws EncodingError when the name contains a NUL character
 */
export function encodeFileName(name: string): string {
  if (name.includes("\0")) {
    throw new EncodingError(`Cannot convert "${name.replace(/\0/g, "\\0")}" to the filesystem encoding`);
  }
  return name;
}

/**
 * Rename the file described by `info` to `newName`.
 *
 * @throws InvalidNameError, EncodingError, AlreadyExistsError,
 *   InvalidFormatError, KeyFileParseError, DisposedError (the database was
 *   shut down) or IoError; `info` and the file are unchanged
 *   when anything is thrown
 */
export function renameFileInfo(info: FileInfo, newName: string, context: FileInfoContext): void {
  validateFileName(newName);

  if (isDesktopEntry(info.contentType)) {
    renameDesktopEntry(info, newName, context);
  } else {
    renamePath(info, newName, context);
  }
}

function renameDesktopEntry(info: FileInfo, newName: string, context: FileInfoContext): void {
  const filePath = info.path;

  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error) {
    throw toIoError(error, filePath);
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new InvalidFormatError("Desktop entry is not valid UTF-8", filePath);
  }

  const keyFile = KeyFile.parse(text);
  if (!keyFile.hasGroup(DESKTOP_ENTRY_GROUP)) {
    throw new InvalidFormatError(`Missing [${DESKTOP_ENTRY_GROUP}] group`, filePath);
  }

  const key = context.locales
    .map((locale) => `Name[${locale}]`)
    .find((candidate) => keyFile.hasKey(DESKTOP_ENTRY_GROUP, candidate)) ?? "Name";
  keyFile.setString(DESKTOP_ENTRY_GROUP, key, newName);

  replaceFileContents(filePath, keyFile.toString());
  context.logger.debug(`Set ${key} of ${filePath} to "${newName}"`);

  const hints = info.hints;
  if (hints) {
    info.applyChange({ hints: { ...hints, name: newName } });
  }
}

function renamePath(info: FileInfo, newName: string, context: FileInfoContext): void {
  const fileName = encodeFileName(newName);
  const source = info.identity;
  const destination = source.sibling(fileName);

  let existing: Stats | undefined;
  try {
    existing = lstatSync(destination.path, { throwIfNoEntry: false });
  } catch (error) {
    throw toIoError(error, destination.path);
  }
  if (existing) {
    throw new AlreadyExistsError(destination.path);
  }

  if (info.kind !== "regular") {
    moveEntry(source.path, destination.path, context);
    info.applyChange({ identity: destination, displayName: newName });
    return;
  }

  // Everything that can throw runs before the move
  const classification = classifyRegularFile(
    source.path,
    newName,
    info.mode,
    context.database,
    context.logger
  );
  const launcher = extractLauncherHints(
    source.path,
    classification.contentType,
    context.locales,
    context.logger
  );

  try {
    moveEntry(source.path, destination.path, context);
  } catch (error) {
    classification.contentType.unref();
    throw error;
  }

  const link = (info.flags & FileFlags.SYMLINK) !== 0 ? "followed" : "none";
  info.applyChange({
    identity: destination,
    displayName: newName,
    contentType: classification.contentType,
    flags: computeFlags(link, classification, launcher),
    hints: launcher?.hints ?? null,
  });
}

function moveEntry(from: string, to: string, context: FileInfoContext): void {
  try {
    renameSync(from, to);
  } catch (error) {
    throw toIoError(error, from);
  }
  context.logger.debug(`Renamed ${from} to ${to}`);
}
