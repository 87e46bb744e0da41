/**
 * filemeta - Node.js file metadata resolution, rename and launch planning
 */

// Content-type database
export * from "./content-types/index.js";

// Resolver, rename engine, launch plans
export * from "./fileinfo/index.js";

// Configuration
export * from "./config/index.js";

// Logging
export * from "./logging/index.js";

// Command line
export * from "./cli/index.js";
