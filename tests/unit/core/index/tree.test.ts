import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  buildCoverageTree,
  coveragePercent,
  isWithin,
  normalizeScope,
  type CoverageNode,
} from '../../../../src/core/index/tree.js';
import type { FileEntry } from '../../../../src/core/index/types.js';

const entry = (file: string, totalUnits: number, coveredUnits: number): FileEntry => ({
  file,
  language: 'javascript',
  owners: [],
  units: [],
  totalUnits,
  coveredUnits,
});

const files = [entry('src/a.ts', 2, 1), entry('src/lib/b.ts', 3, 3), entry('test/c.ts', 0, 0), entry('root.ts', 1, 0)];

describe('coveragePercent', () => {
  it('should round to one decimal', () => {
    expect(coveragePercent(1, 3)).toBe(33.3);
    expect(coveragePercent(2, 3)).toBe(66.7);
    expect(coveragePercent(4, 5)).toBe(80);
  });

  it('should report 100 for no units', () => {
    expect(coveragePercent(0, 0)).toBe(100);
  });
});

describe('buildCoverageTree', () => {
  it('should aggregate bottom-up with sorted children', () => {
    const tree = buildCoverageTree(files);

    expect(tree).toMatchObject({ path: '', type: 'directory', totalUnits: 6, coveredUnits: 4, percent: 66.7 });
    expect(tree.children.map((c) => [c.name, c.totalUnits, c.coveredUnits, c.percent])).toEqual([
      ['root.ts', 1, 0, 0],
      ['src', 5, 4, 80],
      ['test', 0, 0, 100],
    ]);
    expect(tree.children[1]?.children.map((c) => c.path)).toEqual(['src/a.ts', 'src/lib']);
  });

  it('should root the tree at a scope', () => {
    const tree = buildCoverageTree(files, 'src/lib');

    expect(tree.path).toBe('src/lib');
    expect(tree.name).toBe('lib');
    expect(tree.children.map((c) => c.path)).toEqual(['src/lib/b.ts']);
    expect(tree.percent).toBe(100);
  });

  it('should return a file node when the scope is a file', () => {
    expect(buildCoverageTree(files, 'src/a.ts')).toEqual({
      path: 'src/a.ts',
      name: 'a.ts',
      type: 'file',
      totalUnits: 2,
      coveredUnits: 1,
      percent: 50,
      children: [],
    });
  });

  it('should give every directory the sum of its children', () => {
    const segment = fc.constantFrom('a', 'b', 'c');
    const fileEntry = fc
      .tuple(fc.array(segment, { minLength: 1, maxLength: 4 }), fc.nat(5), fc.nat(5))
      .map(([parts, total, covered]) => entry(`${parts.join('/')}.ts`, total, Math.min(total, covered)));

    fc.assert(
      fc.property(fc.uniqueArray(fileEntry, { selector: (e) => e.file, maxLength: 20 }), (entries) => {
        const check = (node: CoverageNode): void => {
          if (node.type === 'file') return;
          node.children.forEach(check);
          expect(node.totalUnits).toBe(node.children.reduce((sum, c) => sum + c.totalUnits, 0));
          expect(node.coveredUnits).toBe(node.children.reduce((sum, c) => sum + c.coveredUnits, 0));
        };
        const tree = buildCoverageTree(entries);
        check(tree);
        expect(tree.totalUnits).toBe(entries.reduce((sum, e) => sum + e.totalUnits, 0));
      })
    );
  });
});

describe('scope helpers', () => {
  it('should normalize scopes', () => {
    expect(normalizeScope('./src/')).toBe('src');
    expect(normalizeScope('.')).toBe('');
    expect(normalizeScope('src\\lib')).toBe('src/lib');
  });

  it('should respect path segments', () => {
    expect(isWithin('src/a.ts', 'src')).toBe(true);
    expect(isWithin('src/ab.ts', 'src/a')).toBe(false);
    expect(isWithin('anything', '')).toBe(true);
  });
});
