/**
 * Shared utilities
 */

import * as fs from "node:fs";

export * from "./logger.js";
export * from "./paths.js";
export * from "./fs.js";

// =============================================================================
// Basic File Operations
// =============================================================================

/**
 * Reads and parses a JSON file. Returns null when the file is missing;
 * malformed content is an error for the caller to handle.
 */
export function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const content = fs.readFileSync(filePath, "utf-8");
  return JSON.parse(content);
}
