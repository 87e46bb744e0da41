/**
 * Resolve File Info
 *
 * Builds a FileInfo from a path: attributes, then classification, then
 * launcher hints.
 */

import { FileFlags, FileIdentity, FileInfo } from "@filemeta/core";
import type { Classification } from "./classifier.js";
import { classifyAttributes } from "./classifier.js";
import type { FileInfoContext } from "./context.js";
import type { LauncherData } from "./launcher-hints.js";
import { extractLauncherHints } from "./launcher-hints.js";
import type { LinkState } from "./resolver.js";
import { resolveAttributes } from "./resolver.js";

/**
 * Flag bits for a classified file. A launchable desktop entry counts as
 * executable when its permissions allow execution.
 */
export function computeFlags(
  link: LinkState,
  classification: Pick<Classification, "executable" | "executePermitted">,
  launcher: LauncherData | undefined
): number {
  let flags: number = FileFlags.NONE;
  if (link !== "none") {
    flags |= FileFlags.SYMLINK;
  }
  if (
    classification.executable
    || (classification.executePermitted && launcher?.launchable === true)
  ) {
    flags |= FileFlags.EXECUTABLE;
  }
  return flags;
}

/**
 * Resolve `path` into a new descriptor with one reference.
 *
 * @throws IoError when the path cannot be stat'ed
 */
export function resolveFileInfo(path: string, context: FileInfoContext): FileInfo {
  const identity = FileIdentity.forPath(path);
  const resolved = resolveAttributes(identity.path);
  const classification = classifyAttributes(
    identity.path,
    identity.displayName,
    resolved,
    context.database,
    context.logger
  );
  const launcher = extractLauncherHints(
    identity.path,
    classification.contentType,
    context.locales,
    context.logger
  );

  return new FileInfo({
    identity,
    kind: classification.kind,
    attributes: resolved.stats,
    flags: computeFlags(resolved.link, classification, launcher),
    contentType: classification.contentType,
    hints: launcher?.hints,
  });
}
