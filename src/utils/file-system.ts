/**
 * File system operations - reading, writing, stat and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Write content through a uniquely named staging file and rename it into place.
 * Readers see either the previous file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const stagingPath = `${filePath}.${process.pid}.${randomUUID()}.part`;
  await ensureDir(path.dirname(filePath));

  try {
    await fs.promises.writeFile(stagingPath, content, 'utf-8');
    await fs.promises.rename(stagingPath, filePath);
  } catch (error) {
    await fs.promises.rm(stagingPath, { force: true });
    throw error;
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 * Safe to call concurrently for the same path.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Ensure a directory exists and the process may write into it.
 */
export async function ensureWritableDir(dirPath: string): Promise<void> {
  await ensureDir(dirPath);
  await fs.promises.access(dirPath, fs.constants.W_OK);
}

/**
 * Modification time in epoch milliseconds, or null when the path cannot be stat'ed.
 */
export async function getModifiedTime(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.mtimeMs;
  } catch { /* path not found or not accessible */ }
  return null;
}

/**
 * Delete a file. Missing files are not an error.
 */
export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || [],
    absolute: options.absolute ?? true,
    onlyFiles: true,
    dot: true,
  });
}

/**
 * Normalize and resolve a path relative to a base.
 */
export function resolvePath(basePath: string, ...segments: string[]): string {
  return path.resolve(basePath, ...segments);
}
