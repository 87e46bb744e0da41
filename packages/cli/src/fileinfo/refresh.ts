/**
 * Change Detection
 */

import { matches, type FileInfo } from "@filemeta/core";
import type { FileInfoContext } from "./context.js";
import { resolveFileInfo } from "./resolve.js";

export interface RefreshResult {
  changed: boolean;
  /** The original descriptor when unchanged, else a new one */
  info: FileInfo;
}

/**
 * Resolve the path of `info` again. When nothing observable changed the
 * same descriptor is returned and the fresh one is released; otherwise
 * the caller receives the fresh descriptor and owns its reference.
 * `info` itself is never modified.
 *
 * @throws IoError when the path can no longer be stat'ed
 */
export function refreshFileInfo(info: FileInfo, context: FileInfoContext): RefreshResult {
  const fresh = resolveFileInfo(info.path, context);
  if (matches(info, fresh)) {
    fresh.unref();
    return { changed: false, info };
  }
  return { changed: true, info: fresh };
}
