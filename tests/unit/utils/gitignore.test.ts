import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { createGitIgnore, loadGitIgnore, parseGitIgnore } from '../../../src/utils/gitignore.js';

describe('gitignore', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `tracemark-gitignore-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should drop comments and blank lines', () => {
    expect(parseGitIgnore('# build\n\ndist/\n  *.log  \n')).toEqual(['dist/', '*.log']);
  });

  it('should always ignore .git', async () => {
    const gitignore = await loadGitIgnore(testDir);

    expect(gitignore.ignores('.git/config')).toBe(true);
    expect(gitignore.ignores('src/a.ts')).toBe(false);
  });

  it('should load patterns from .gitignore', async () => {
    await writeFile(join(testDir, '.gitignore'), 'dist/\n*.log\n');

    const gitignore = await loadGitIgnore(testDir);

    expect(gitignore.ignores('dist/index.js')).toBe(true);
    expect(gitignore.ignores('logs/app.log')).toBe(true);
    expect(gitignore.ignores('.git/HEAD')).toBe(true);
    expect(gitignore.ignores('src/app.ts')).toBe(false);
  });

  it('should not judge paths outside the root', () => {
    const gitignore = createGitIgnore(['*']);

    expect(gitignore.ignores('../other/file.ts')).toBe(false);
    expect(gitignore.ignores('')).toBe(false);
  });
});
