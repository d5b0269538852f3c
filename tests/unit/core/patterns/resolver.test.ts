import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { resolvePatterns } from '../../../../src/core/patterns/resolver.js';
import { defineConfig } from '../../../../src/core/config/loader.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

describe('resolvePatterns', () => {
  let testDir: string;

  async function touch(...files: string[]): Promise<void> {
    for (const file of files) {
      await mkdir(join(testDir, dirname(file)), { recursive: true });
      await writeFile(join(testDir, file), '');
    }
  }

  beforeEach(async () => {
    testDir = join(tmpdir(), `tracemark-resolve-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await touch('docs/b.md', 'docs/a.md', 'src/x.ts', 'src/y.ts', 'src/gen/z.ts', 'test/x.test.ts');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should resolve documents and pairings', async () => {
    const config = defineConfig({
      specs: [
        {
          name: 'core',
          prefix: 'r',
          source_url: 'https://example.test/spec',
          include: ['docs/*.md'],
          impls: [
            { name: 'ts', include: ['src/**/*.ts'], exclude: ['src/gen/**'], test_include: ['test/**/*.ts'] },
          ],
        },
      ],
    });

    const resolved = await resolvePatterns(config, testDir);

    expect(resolved.problems).toEqual([]);
    expect(resolved.specs).toEqual([
      {
        name: 'core',
        prefix: 'r',
        sourceUrl: 'https://example.test/spec',
        documents: ['docs/a.md', 'docs/b.md'],
        impls: [
          {
            spec: 'core',
            impl: 'ts',
            files: ['src/x.ts', 'src/y.ts', 'test/x.test.ts'],
            testFiles: ['test/x.test.ts'],
          },
        ],
      },
    ]);
  });

  it('should give the same result for the same tree', async () => {
    const config = defineConfig({
      specs: [
        {
          name: 'core',
          prefix: 'r',
          include: ['docs/*.md'],
          impls: [{ name: 'ts', include: ['src/**/*.ts', 'test/**/*.ts'], test_include: ['test/**/*.ts'] }],
        },
      ],
    });

    const first = await resolvePatterns(config, testDir);
    const second = await resolvePatterns(config, testDir);

    expect(second).toEqual(first);
    expect(second.specs[0]?.impls[0]?.files).toEqual(['src/gen/z.ts', 'src/x.ts', 'src/y.ts', 'test/x.test.ts']);
  });

  it('should exclude a spec whose documents are missing', async () => {
    const config = defineConfig({ specs: [{ name: 'ghost', prefix: 'g', include: ['nope/*.md'] }] });

    const resolved = await resolvePatterns(config, testDir);

    expect(resolved.specs).toEqual([]);
    expect(resolved.problems).toEqual([
      {
        code: ErrorCodes.NO_SPEC_DOCUMENTS,
        spec: 'ghost',
        impl: null,
        message: 'spec "ghost" include patterns matched no documents: nope/*.md',
      },
    ]);
  });

  it('should exclude only the broken pairing', async () => {
    const config = defineConfig({
      specs: [
        {
          name: 'core',
          prefix: 'r',
          include: ['docs/*.md'],
          impls: [
            { name: 'empty' },
            { name: 'none', include: ['lib/**/*.rs'] },
            { name: 'ok', include: ['src/*.ts'] },
          ],
        },
      ],
    });

    const resolved = await resolvePatterns(config, testDir);

    expect(resolved.specs[0]?.impls.map((i) => i.impl)).toEqual(['ok']);
    expect(resolved.problems.map((p) => [p.code, p.impl])).toEqual([
      [ErrorCodes.EMPTY_INCLUDE, 'empty'],
      [ErrorCodes.NO_FILES, 'none'],
    ]);
  });

  it('should let a file belong to several pairings', async () => {
    const config = defineConfig({
      specs: [
        {
          name: 'core',
          prefix: 'r',
          include: ['docs/a.md'],
          impls: [
            { name: 'one', include: ['src/x.ts'] },
            { name: 'two', include: ['src/*.ts'] },
          ],
        },
      ],
    });

    const resolved = await resolvePatterns(config, testDir);

    expect(resolved.specs[0]?.impls.map((i) => i.files)).toEqual([['src/x.ts'], ['src/x.ts', 'src/y.ts']]);
  });

  it('should warn when specs share a prefix', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = defineConfig({
      specs: [
        { name: 'a', prefix: 'r', include: ['docs/a.md'] },
        { name: 'b', prefix: 'r', include: ['docs/b.md'] },
      ],
    });

    const resolved = await resolvePatterns(config, testDir);

    expect(resolved.specs).toHaveLength(2);
    expect(String(warn.mock.calls[0]?.[0])).toContain('Prefix "r" is shared by specs a, b');
  });
});
