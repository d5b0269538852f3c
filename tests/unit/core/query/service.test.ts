import { describe, it, expect } from 'vitest';
import { QueryService, matchesIdPrefix } from '../../../../src/core/query/service.js';
import { fingerprintRule } from '../../../../src/core/requirements/levels.js';
import { NotFoundError } from '../../../../src/utils/errors.js';
import type { Snapshot } from '../../../../src/core/index/types.js';
import { buildFixtureSnapshot, lines, type Fixture } from '../../../helpers/index-fixture.js';

const authDoc = lines(
  'r[auth.login]',
  'Users MUST authenticate.',
  '',
  'r[auth.logout]',
  'Sessions SHOULD expire.',
  '',
  'r[billing.charge]',
  'Charges MAY be retried.'
);

const project: Fixture = {
  specs: [
    {
      name: 'auth',
      prefix: 'r',
      documents: { 'docs/auth.md': authDoc },
      impls: [
        {
          name: 'server',
          files: {
            'src/login.ts': lines('// r[impl auth.login]', 'export function login() {', '  return true;', '}'),
            'test/login.test.ts': lines(
              '// r[verify auth.login]',
              "it('logs in', () => {",
              '  expect(login()).toBe(true);',
              '});'
            ),
          },
          tests: ['test/login.test.ts'],
        },
        {
          name: 'web',
          files: { 'web/app.ts': lines('export function render() {', '  return null;', '}') },
        },
      ],
    },
  ],
};

function serviceFor(snapshot: Snapshot): QueryService {
  return new QueryService({ current: () => snapshot });
}

describe('QueryService', () => {
  const query = serviceFor(buildFixtureSnapshot(project, 3));

  describe('status', () => {
    it('should report coverage per pairing', () => {
      expect(query.status()).toEqual({
        version: 3,
        builtAt: '2024-01-01T00:00:00.000Z',
        pairs: [
          {
            spec: 'auth',
            impl: 'server',
            totalRules: 3,
            implCovered: 1,
            verifyCovered: 1,
            implPercent: 33.3,
            verifyPercent: 33.3,
            staleCount: 0,
            brokenCount: 0,
          },
          {
            spec: 'auth',
            impl: 'web',
            totalRules: 3,
            implCovered: 0,
            verifyCovered: 0,
            implPercent: 0,
            verifyPercent: 0,
            staleCount: 0,
            brokenCount: 0,
          },
        ],
        errors: 0,
        warnings: 0,
      });
    });
  });

  describe('uncovered and untested', () => {
    it('should list rules without impl references for one pairing', () => {
      expect(query.uncovered('auth/server').map((gap) => gap.ruleId)).toEqual(['auth.logout', 'billing.charge']);
    });

    it('should cover every impl of a spec when only the spec is given', () => {
      expect(query.uncovered('auth').map((gap) => `${gap.impl}:${gap.ruleId}`)).toEqual([
        'server:auth.logout',
        'server:billing.charge',
        'web:auth.login',
        'web:auth.logout',
        'web:billing.charge',
      ]);
    });

    it('should filter by id prefix', () => {
      expect(query.uncovered('auth/server', 'auth').map((gap) => gap.ruleId)).toEqual(['auth.logout']);
      expect(query.untested(undefined, 'billing').map((gap) => gap.impl)).toEqual(['server', 'web']);
    });

    it('should carry the rule text and level', () => {
      expect(query.untested('auth/server')[0]).toEqual({
        spec: 'auth',
        impl: 'server',
        ruleId: 'auth.logout',
        level: 'should',
        text: 'Sessions SHOULD expire.',
        sourceFile: 'docs/auth.md',
        line: 4,
      });
    });

    it('should reject unknown specs and impls', () => {
      expect(() => query.uncovered('nope')).toThrow(NotFoundError);
      expect(() => query.untested('auth/nope')).toThrow('Unknown impl "auth/nope"');
    });
  });

  describe('unmapped', () => {
    it('should list units without resolved annotations', () => {
      expect(query.unmapped()).toEqual([
        { file: 'web/app.ts', startLine: 1, endLine: 3, kind: 'function', name: 'render' },
      ]);
    });

    it('should restrict to a path', () => {
      expect(query.unmapped('src')).toEqual([]);
      expect(query.unmapped('./web/')).toHaveLength(1);
    });

    it('should reject a path with no indexed files', () => {
      expect(() => query.unmapped('lib')).toThrow(NotFoundError);
    });
  });

  describe('ruleDetail', () => {
    it('should return declarations and references', () => {
      const detail = query.ruleDetail('auth.login');

      expect(detail).toMatchObject({
        spec: 'auth',
        prefix: 'r',
        id: 'auth.login',
        level: 'must',
        explicitLevel: false,
        fingerprint: fingerprintRule('Users MUST authenticate.'),
        declarations: [{ sourceFile: 'docs/auth.md', line: 1, column: 1 }],
        implRefs: [{ file: 'src/login.ts', line: 1, impl: 'server' }],
        verifyRefs: [{ file: 'test/login.test.ts', line: 1, impl: 'server' }],
      });
      expect(detail.references.map((ref) => [ref.verb, ref.file, ref.stale])).toEqual([
        ['impl', 'src/login.ts', false],
        ['verify', 'test/login.test.ts', false],
      ]);
    });

    it('should keep the content of every declaration of a duplicated id', () => {
      const duplicated = serviceFor(
        buildFixtureSnapshot(
          {
            specs: [
              {
                name: 'dup',
                prefix: 'r',
                documents: {
                  'docs/a.md': lines('r[x.y]', 'First text MUST hold.'),
                  'docs/b.md': lines('r[x.y]', 'Second text MAY hold.'),
                },
                impls: [],
              },
            ],
          },
          1
        )
      );

      const detail = duplicated.ruleDetail('x.y');

      expect(detail.text).toBe('First text MUST hold.');
      expect(detail.declarations).toEqual([
        {
          sourceFile: 'docs/a.md',
          line: 1,
          column: 1,
          text: 'First text MUST hold.',
          level: 'must',
          explicitLevel: false,
          fingerprint: fingerprintRule('First text MUST hold.'),
        },
        {
          sourceFile: 'docs/b.md',
          line: 1,
          column: 1,
          text: 'Second text MAY hold.',
          level: 'may',
          explicitLevel: false,
          fingerprint: fingerprintRule('Second text MAY hold.'),
        },
      ]);
    });

    it('should throw NotFoundError for unknown rules and specs', () => {
      expect(() => query.ruleDetail('auth.nope')).toThrow('Rule "auth.nope" not found');
      expect(() => query.ruleDetail('auth.login', 'billing')).toThrow('Unknown spec "billing"');
    });
  });

  describe('tree', () => {
    it('should aggregate unit coverage', () => {
      const tree = query.tree();

      expect([tree.totalUnits, tree.coveredUnits, tree.percent]).toEqual([3, 2, 66.7]);
      expect(tree.children.map((child) => child.name)).toEqual(['src', 'test', 'web']);
    });

    it('should scope to a directory', () => {
      expect(query.tree('web')).toMatchObject({ path: 'web', name: 'web', totalUnits: 1, coveredUnits: 0 });
    });
  });

  describe('config', () => {
    it('should summarize specs and impls', () => {
      expect(query.config()).toEqual({
        version: 3,
        specs: [
          {
            name: 'auth',
            prefix: 'r',
            sourceUrl: null,
            documents: ['docs/auth.md'],
            rules: 3,
            impls: [
              { name: 'server', files: 2, testFiles: 1 },
              { name: 'web', files: 1, testFiles: 0 },
            ],
          },
        ],
      });
    });
  });

  it('should answer repeated queries on one snapshot identically', () => {
    const first = [query.uncovered(), query.unmapped(), query.search('login')];
    const second = [query.uncovered(), query.unmapped(), query.search('login')];

    expect(second).toEqual(first);
    expect(first[1]).toEqual([{ file: 'web/app.ts', startLine: 1, endLine: 3, kind: 'function', name: 'render' }]);
  });

  it('should read the version of the live snapshot', () => {
    let snapshot = buildFixtureSnapshot(project, 1);
    const live = new QueryService({ current: () => snapshot });

    expect(live.getVersion()).toBe(1);
    snapshot = buildFixtureSnapshot(project, 2);
    expect(live.getVersion()).toBe(2);
  });
});

describe('QueryService stale', () => {
  const captured = fingerprintRule('Users MUST sign in.').slice(0, 8);
  const query = serviceFor(
    buildFixtureSnapshot({
      specs: [
        {
          name: 'auth',
          prefix: 'r',
          documents: { 'docs/auth.md': lines('r[auth.login]', 'Users MUST authenticate.') },
          impls: [{ name: 'server', files: { 'src/login.ts': `f(); // r[impl auth.login@${captured}]` } }],
        },
      ],
    })
  );

  it('should list stale references and count them in status', () => {
    expect(query.stale().map((s) => [s.ruleId, s.capturedFingerprint])).toEqual([['auth.login', captured]]);
    expect(query.stale('auth/server', 'billing')).toEqual([]);
    expect(query.status().pairs[0]?.staleCount).toBe(1);
    expect(query.status().warnings).toBe(1);
  });

  it('should mark the reference stale in the rule detail', () => {
    expect(query.ruleDetail('auth.login').references[0]?.stale).toBe(true);
  });
});

describe('QueryService validate', () => {
  const query = serviceFor(
    buildFixtureSnapshot({
      specs: [
        {
          name: 'auth',
          prefix: 'r',
          documents: { 'docs/auth.md': lines('r[auth.login]', 'Users MUST authenticate.') },
          impls: [{ name: 'server', files: { 'src/a.ts': 'f(); // r[impl auth.gone]' } }],
        },
        {
          name: 'db',
          prefix: 'd',
          documents: { 'docs/db.md': lines('d[db.conn]', 'Pools MUST be bounded.') },
          impls: [{ name: 'core', files: { 'src/b.ts': 'g(); // d[impl db.gone]' } }],
        },
      ],
      problems: [{ code: 'NO_FILES', spec: 'db', impl: 'extra', message: 'impl "db/extra" include patterns matched no files: x/**' }],
    })
  );

  it('should return every finding without a filter', () => {
    expect(query.validate().map((f) => `${f.kind}:${f.file ?? '-'}`)).toEqual([
      'ConfigError:-',
      'BrokenReference:src/a.ts',
      'BrokenReference:src/b.ts',
    ]);
  });

  it('should filter findings by spec', () => {
    expect(query.validate('auth').map((f) => f.file)).toEqual(['src/a.ts']);
    expect(query.validate('db').map((f) => f.kind)).toEqual(['ConfigError', 'BrokenReference']);
  });

  it('should filter findings by spec and impl', () => {
    expect(query.validate('db/core').map((f) => f.file)).toEqual(['src/b.ts']);
  });
});

describe('matchesIdPrefix', () => {
  it.each([
    ['auth.login', 'auth', true],
    ['auth', 'auth', true],
    ['auth.login', 'auth.', true],
    ['authz.read', 'auth', false],
    ['auth.login', '', true],
    ['auth.login', undefined, true],
  ])('%s with prefix %s -> %s', (id, prefix, expected) => {
    expect(matchesIdPrefix(id, prefix)).toBe(expected);
  });
});
