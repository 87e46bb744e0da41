/**
 * CLI Application
 */

export { runCLI } from "./run.js";
export type { CLIEnvironment } from "./run.js";

export {
  describeFileInfo,
  formatFileInfoPanel,
  formatFileInfoJson,
  formatLaunchPlan,
} from "./format.js";
