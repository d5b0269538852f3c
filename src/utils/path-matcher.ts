/**
 * Glob include/exclude matching for individual paths.
 * Used where a file list is not being globbed from disk: classifying test
 * files and filtering watcher events.
 */
import { minimatch } from 'minimatch';
import { toPosix } from './file-system.js';

/**
 * PathMatcher instance for filtering project-relative file paths.
 */
export interface PathMatcher {
  /**
   * True when the path matches an include pattern and no exclude pattern.
   * @param filePath - Relative path from project root
   */
  matches(filePath: string): boolean;

  /**
   * Filter an array of file paths, returning only matching ones.
   */
  filter(filePaths: string[]): string[];
}

/**
 * Create a PathMatcher. Exclude always wins over include; an empty include
 * list matches nothing.
 */
export function createPathMatcher(include: string[], exclude: string[] = []): PathMatcher {
  const options = { dot: false };
  const matchesAny = (filePath: string, patterns: string[]): boolean =>
    patterns.some((pattern) => minimatch(filePath, stripDotSlash(pattern), options));

  return {
    matches(filePath: string): boolean {
      const normalized = stripDotSlash(toPosix(filePath));
      if (!matchesAny(normalized, include)) return false;
      return !matchesAny(normalized, exclude);
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter((fp) => this.matches(fp));
    },
  };
}

/**
 * The directory part of a glob before its first magic segment
 * (`src/lib/**\/*.ts` → `src/lib`, `*.md` → `.`).
 */
export function globBase(pattern: string): string {
  const segments = stripDotSlash(toPosix(pattern)).split('/');
  const base: string[] = [];
  for (const segment of segments.slice(0, -1)) {
    if (/[*?[\]{}()!+@]/.test(segment)) break;
    base.push(segment);
  }
  return base.length > 0 ? base.join('/') : '.';
}

function stripDotSlash(value: string): string {
  return value.startsWith('./') ? value.slice(2) : value;
}
