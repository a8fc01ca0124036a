/**
 * File System Utilities
 * Atomic writes and tolerant reads for the artifact store and state files
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import fg from "fast-glob";

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Reads a UTF-8 file, returning null when it does not exist.
 * Other I/O errors propagate.
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fsPromises.readFile(filePath, { encoding: "utf-8" });
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Writes a file through a temporary sibling and a rename, so readers never
 * observe a half-written file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
  try {
    await fsPromises.writeFile(tmpPath, content, { encoding: "utf-8" });
    await fsPromises.rename(tmpPath, filePath);
  } catch (error) {
    await fsPromises.rm(tmpPath, { force: true });
    throw error;
  }
}

export interface GlobOptions {
  patterns: string[];
  cwd: string;
}

/**
 * Finds files matching glob patterns, relative to `cwd` and sorted. A
 * missing `cwd` yields an empty list.
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const files = await fg(options.patterns, {
    cwd: options.cwd,
    onlyFiles: true,
    dot: false,
  });
  return files.sort();
}
