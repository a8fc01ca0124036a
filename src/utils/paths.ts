/**
 * Configuration and data directory paths
 */

import * as path from "node:path";

export const CONFIG_DIR = ".directory-graph";
export const CONFIG_FILE = "config.json";

export const DEFAULT_DATA_DIR = "data";
export const DEFAULT_OUTPUT_DIR = path.join("data", "processed");

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

/** Raw fetched artifacts live here, one file per artifact key */
export function getRawDir(dataDir: string): string {
  return path.join(dataDir, "raw");
}

/** Checkpoints and the failure log */
export function getStateDir(dataDir: string): string {
  return path.join(dataDir, "state");
}
