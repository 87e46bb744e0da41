export { createConsoleLogger } from "./console-logger.js";
export type { LogSink } from "./console-logger.js";
