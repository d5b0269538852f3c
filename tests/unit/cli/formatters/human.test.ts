import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { formatJson } from '../../../../src/cli/formatters/json.js';
import { buildCoverageTree } from '../../../../src/core/index/tree.js';
import type { FileEntry } from '../../../../src/core/index/types.js';
import type { Finding } from '../../../../src/core/validation/types.js';

const formatter = new HumanFormatter({ colors: false });

const finding = (overrides: Partial<Finding>): Finding => ({
  kind: 'BrokenReference',
  severity: 'error',
  message: 'm',
  file: 'src/a.ts',
  line: 1,
  column: 1,
  spec: null,
  impl: null,
  ruleId: null,
  locations: [],
  ...overrides,
});

describe('HumanFormatter', () => {
  it('should format status per pairing', () => {
    const output = formatter.formatStatus({
      version: 2,
      builtAt: '2024-01-01T00:00:00.000Z',
      pairs: [
        {
          spec: 'auth',
          impl: 'server',
          totalRules: 2,
          implCovered: 1,
          verifyCovered: 2,
          implPercent: 50,
          verifyPercent: 100,
          staleCount: 1,
          brokenCount: 0,
        },
      ],
      errors: 0,
      warnings: 1,
    });

    expect(output.split('\n')).toEqual([
      'Coverage (version 2)',
      '',
      'auth/server  2 rules',
      '   impl:    50.0%  (1/2)',
      '   verify: 100.0%  (2/2)',
      '   stale:  1',
      '',
      '0 error(s), 1 warning(s)',
    ]);
  });

  it('should group gaps by pairing', () => {
    const output = formatter.formatGaps(
      [
        {
          spec: 'auth',
          impl: 'server',
          ruleId: 'auth.logout',
          level: 'should',
          text: 'Sessions SHOULD expire.',
          sourceFile: 'docs/auth.md',
          line: 4,
        },
        { spec: 'auth', impl: 'server', ruleId: 'auth.note', level: null, text: '', sourceFile: 'docs/auth.md', line: 7 },
      ],
      'uncovered'
    );

    expect(output.split('\n')).toEqual([
      'auth/server',
      '   SHOULD auth.logout  docs/auth.md:4',
      '          auth.note  docs/auth.md:7',
      '',
      '2 uncovered rule(s)',
    ]);
  });

  it('should report empty results', () => {
    expect(formatter.formatGaps([], 'untested')).toBe('✓ No untested rules');
    expect(formatter.formatFindings([])).toBe('✓ No findings');
    expect(formatter.formatStale([])).toBe('✓ No stale references');
  });

  it('should format findings with a summary', () => {
    const output = formatter.formatFindings([
      finding({ kind: 'ConfigError', file: null, line: null, message: 'no files' }),
      finding({ message: 'r[impl a.b]: no rule "a.b" in spec "s"' }),
      finding({ kind: 'Stale', severity: 'warning', file: 'src/b.ts', line: 2, message: 'old' }),
    ]);

    expect(output.split('\n')).toEqual([
      'ConfigError  (config)  no files',
      'BrokenReference  src/a.ts:1  r[impl a.b]: no rule "a.b" in spec "s"',
      'Stale  src/b.ts:2  old',
      '',
      '2 error(s), 1 warning(s)',
    ]);
  });

  it('should indent the coverage tree', () => {
    const entry = (file: string, totalUnits: number, coveredUnits: number): FileEntry => ({
      file,
      language: 'typescript',
      owners: [],
      units: [],
      totalUnits,
      coveredUnits,
    });
    const tree = buildCoverageTree([entry('src/a.ts', 1, 1), entry('web/b.ts', 2, 1)]);

    expect(formatter.formatTree(tree).split('\n')).toEqual([
      '.   66.7%  (2/3)',
      '  src/  100.0%  (1/1)',
      '    a.ts  100.0%  (1/1)',
      '  web/   50.0%  (1/2)',
      '    b.ts   50.0%  (1/2)',
    ]);
  });
});

describe('formatJson', () => {
  it('should pretty-print with two spaces', () => {
    expect(formatJson({ a: 1 })).toBe('{\n  "a": 1\n}');
  });
});
