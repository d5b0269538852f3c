import { describe, it, expect } from 'vitest';
import { buildFixtureIndex, lines, type Fixture } from '../../../helpers/index-fixture.js';

const authDoc = lines('r[auth.login]', 'Users MUST authenticate.', '', 'r[auth.logout]', 'Sessions SHOULD expire.');

const authFixture: Fixture = {
  specs: [
    {
      name: 'auth',
      prefix: 'r',
      documents: { 'docs/auth.md': authDoc },
      impls: [
        {
          name: 'server',
          files: {
            'src/login.ts': lines(
              '// r[impl auth.login]',
              'export function login() {',
              '  return true;',
              '}',
              '',
              '// r[impl auth.missing]',
              'export function other() {',
              '  return 1;',
              '}'
            ),
            'test/login.test.ts': lines('// r[verify auth.login]', "it('works', () => {", '  login();', '});'),
          },
          tests: ['test/login.test.ts'],
        },
      ],
    },
  ],
};

describe('buildIndex', () => {
  it('should index rules in document order', () => {
    const index = buildFixtureIndex(authFixture);
    const spec = index.specs[0];

    expect(spec?.name).toBe('auth');
    expect([...(spec?.rules.keys() ?? [])]).toEqual(['auth.login', 'auth.logout']);
    expect(spec?.rules.get('auth.login')).toMatchObject({ level: 'must', sourceFile: 'docs/auth.md', line: 1 });
  });

  it('should attach impl and verify references per implementation', () => {
    const rule = buildFixtureIndex(authFixture).specs[0]?.rules.get('auth.login');

    expect(rule?.implRefs).toEqual([{ file: 'src/login.ts', line: 1, impl: 'server' }]);
    expect(rule?.verifyRefs).toEqual([{ file: 'test/login.test.ts', line: 1, impl: 'server' }]);
    expect(rule?.dependsRefs).toEqual([]);
  });

  it('should mark references to unknown ids as broken', () => {
    const index = buildFixtureIndex(authFixture);

    expect(index.references.map((r) => [r.file, r.line, r.ruleId, r.status])).toEqual([
      ['src/login.ts', 1, 'auth.login', 'resolved'],
      ['src/login.ts', 6, 'auth.missing', 'broken'],
      ['test/login.test.ts', 1, 'auth.login', 'resolved'],
    ]);
  });

  it('should build the reverse index with unit coverage', () => {
    const entry = buildFixtureIndex(authFixture).files.get('src/login.ts');

    expect(entry?.owners).toEqual([{ spec: 'auth', impl: 'server', isTest: false }]);
    expect(entry?.units).toEqual([
      {
        key: 'src/login.ts:1-4',
        file: 'src/login.ts',
        startLine: 1,
        endLine: 4,
        kind: 'function',
        name: 'login',
        ruleRefs: ['auth.login'],
      },
      {
        key: 'src/login.ts:6-9',
        file: 'src/login.ts',
        startLine: 6,
        endLine: 9,
        kind: 'function',
        name: 'other',
        ruleRefs: [],
      },
    ]);
    expect(entry?.totalUnits).toBe(2);
    expect(entry?.coveredUnits).toBe(1);
  });

  it('should mark test files in owners', () => {
    const entry = buildFixtureIndex(authFixture).files.get('test/login.test.ts');

    expect(entry?.owners[0]?.isTest).toBe(true);
  });

  it('should credit a shared file to every owning implementation', () => {
    const shared = lines('// r[impl auth.login]', 'export function login() {', '}');
    const index = buildFixtureIndex({
      specs: [
        {
          name: 'auth',
          prefix: 'r',
          documents: { 'docs/auth.md': authDoc },
          impls: [
            { name: 'a', files: { 'src/shared.ts': shared } },
            { name: 'b', files: { 'src/shared.ts': shared } },
          ],
        },
      ],
    });

    expect(index.specs[0]?.rules.get('auth.login')?.implRefs.map((ref) => ref.impl)).toEqual(['a', 'b']);
    expect(index.references[0]?.impls).toEqual(['a', 'b']);
  });

  it('should flag a prefix that no owning spec uses as a mismatch', () => {
    const index = buildFixtureIndex({
      specs: [
        {
          name: 'auth',
          prefix: 'r',
          documents: { 'docs/auth.md': authDoc },
          impls: [{ name: 'server', files: { 'src/a.ts': lines('// d[impl db.conn]', 'f();') } }],
        },
        {
          name: 'db',
          prefix: 'd',
          documents: { 'docs/db.md': lines('d[db.conn]', 'Pools MUST be bounded.') },
          impls: [{ name: 'server', files: { 'src/db.ts': 'connect();' } }],
        },
      ],
    });

    expect(index.references).toHaveLength(1);
    expect(index.references[0]).toMatchObject({ status: 'mismatch', spec: null, impls: [] });
    expect(index.specs[1]?.rules.get('db.conn')?.implRefs).toEqual([]);
  });

  it('should keep the first declaration of a duplicated id', () => {
    const index = buildFixtureIndex({
      specs: [
        {
          name: 's',
          prefix: 'r',
          documents: { 'docs/a.md': 'r[x.dup]\nFirst.', 'docs/b.md': 'r[x.dup]\nSecond.' },
          impls: [],
        },
      ],
    });
    const rule = index.specs[0]?.rules.get('x.dup');

    expect(rule?.text).toBe('First.');
    expect(rule?.declarations.map((d) => [d.sourceFile, d.line, d.column, d.text])).toEqual([
      ['docs/a.md', 1, 1, 'First.'],
      ['docs/b.md', 1, 1, 'Second.'],
    ]);
  });

  it('should carry marker and annotation problems with their origin', () => {
    const index = buildFixtureIndex({
      specs: [
        {
          name: 's',
          prefix: 'r',
          documents: { 'docs/a.md': 'r[bad!]' },
          impls: [{ name: 'i', files: { 'src/a.ts': '// r[impl]\nf();' } }],
        },
      ],
    });

    expect(index.markerProblems.map((p) => [p.spec, p.token])).toEqual([['s', 'r[bad!]']]);
    expect(index.annotationProblems.map((p) => [p.file, p.kind, p.message])).toEqual([
      ['src/a.ts', 'malformed', 'missing rule id after "impl"'],
    ]);
  });

  it('should keep source lines for search', () => {
    expect(buildFixtureIndex(authFixture).sources.get('src/login.ts')?.[1]).toBe('export function login() {');
  });
});
