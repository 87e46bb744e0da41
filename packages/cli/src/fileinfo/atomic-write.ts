/**
 * Atomic File Replacement
 */

import { randomBytes } from "crypto";
import { chmodSync, renameSync, rmSync, statSync, writeFileSync } from "fs";
import * as path from "path";
import { toIoError } from "@filemeta/core";

/**
 * Replace the contents of `filePath` by writing a sibling temporary file
 * and renaming it over the original. The original permission bits are
 * kept. On failure the temporary file is removed and the original is
 * left untouched.
 *
 * @throws IoError when the original cannot be stat'ed or the write fails
 */
export function replaceFileContents(filePath: string, content: string): void {
  let mode: number;
  try {
    mode = statSync(filePath).mode & 0o7777;
  } catch (error) {
    throw toIoError(error, filePath);
  }

  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`
  );

  try {
    writeFileSync(tempPath, content, { encoding: "utf-8", flag: "wx", mode });
    // The umask applies to the mode given at creation, not to chmod
    chmodSync(tempPath, mode);
    renameSync(tempPath, filePath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw toIoError(error, filePath);
  }
}
