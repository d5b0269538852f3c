/**
 * .gitignore support for the file watcher.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile, toPosix } from './file-system.js';

const GITIGNORE_FILENAME = '.gitignore';

/**
 * Gitignore filter over project-relative paths.
 */
export interface GitIgnore {
  ignores(filePath: string): boolean;
}

/**
 * Load .gitignore from the project root. `.git/` is always ignored.
 */
export async function loadGitIgnore(projectRoot: string): Promise<GitIgnore> {
  const patterns = ['.git/'];
  const gitignorePath = join(projectRoot, GITIGNORE_FILENAME);

  if (await fileExists(gitignorePath)) {
    const content = await readFile(gitignorePath);
    patterns.push(...parseGitIgnore(content));
  }

  return createGitIgnore(patterns);
}

/**
 * Create a GitIgnore from explicit patterns.
 */
export function createGitIgnore(patterns: string[]): GitIgnore {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      const normalized = toPosix(filePath);
      if (!normalized || normalized.startsWith('..')) return false;
      return ig.ignores(normalized);
    },
  };
}

/**
 * Parse gitignore content: blank lines and `#` comments are dropped.
 */
export function parseGitIgnore(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
