/**
 * Path utilities
 */

import { mkdir, stat } from "node:fs/promises";
import * as path from "node:path";

/**
 * Create a directory (and parents) if it does not exist yet
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolve a possibly relative path against a base directory
 */
export function resolveFrom(baseDir: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(baseDir, target);
}
