/**
 * File system operations: reading, globbing, path normalization.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/** Directories never scanned, whatever the configured patterns say. */
export const DEFAULT_IGNORES = ['**/node_modules/**', '**/.git/**'];

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
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
 * Find files matching glob patterns. Results are relative POSIX paths,
 * sorted so repeated runs over an unchanged tree agree.
 */
export async function globFiles(
  patterns: string[],
  options: {
    cwd: string;
    ignore?: string[];
  }
): Promise<string[]> {
  if (patterns.length === 0) return [];
  const files = await fg(patterns, {
    cwd: options.cwd,
    ignore: [...DEFAULT_IGNORES, ...(options.ignore ?? [])],
    absolute: false,
    onlyFiles: true,
    dot: false,
    unique: true,
  });
  return files.map(toPosix).sort();
}

/**
 * Convert a path to forward slashes.
 */
export function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Project-relative POSIX path for an absolute or relative path.
 */
export function relativeTo(projectRoot: string, filePath: string): string {
  const absolute = path.isAbsolute(filePath) ? filePath : path.resolve(projectRoot, filePath);
  return toPosix(path.relative(projectRoot, absolute));
}

/**
 * Lowercased extension including the dot ('' when there is none).
 */
export function extname(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Split text into lines, tolerating CRLF line endings.
 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}
