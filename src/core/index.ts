/**
 * Core module - crawl pipeline shared by the CLI and library consumers
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./identity/index.js";
export * from "./fetch/index.js";
export * from "./store/index.js";
export * from "./extractors/index.js";
export * from "./workers/index.js";
export * from "./resolve/index.js";
export * from "./assembly/index.js";
export * from "./pipeline/index.js";
export * from "./output/index.js";

// Re-export types
export * from "../types/index.js";
export * from "../types/result.js";
