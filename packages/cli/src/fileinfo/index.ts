/**
 * File Info Module
 *
 * Node.js resolution, rename and launch planning for FileInfo descriptors.
 */

export { resolveAttributes } from "./resolver.js";
export type { LinkState, ResolvedAttributes } from "./resolver.js";

export {
  classifyAttributes,
  classifyRegularFile,
  isExecutableType,
  isExecutePermitted,
  syntheticTypeName,
} from "./classifier.js";
export type { Classification } from "./classifier.js";

export { extractLauncherHints, hasExecCommand } from "./launcher-hints.js";
export type { LauncherData } from "./launcher-hints.js";

export { createContext } from "./context.js";
export type { FileInfoContext, FileInfoContextOptions } from "./context.js";

export { computeFlags, resolveFileInfo } from "./resolve.js";
export { renameFileInfo, validateFileName, encodeFileName } from "./rename.js";
export { replaceFileContents } from "./atomic-write.js";
export { buildLaunchPlan } from "./launch-plan.js";
export type { LaunchPlan } from "./launch-plan.js";
export { refreshFileInfo } from "./refresh.js";
export type { RefreshResult } from "./refresh.js";
