/**
 * Adding an annotation to a source file and reloading moves a rule from
 * uncovered to covered.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { IndexController } from '../../src/core/engine/controller.js';
import { QueryService } from '../../src/core/query/service.js';
import { DEFAULT_CONFIG_PATH } from '../../src/core/config/loader.js';
import { logger } from '../../src/utils/logger.js';
import { createTempProject, removeTempProject, writeProjectFiles } from '../helpers/temp-project.js';

function loginSource(marker: string): string {
  return [
    "import * as db from './db';",
    '',
    'interface User {',
    '  name: string;',
    '}',
    'const LIMIT = 3;',
    '',
    'export async function login(user: User): Promise<boolean> {',
    '  const ok = await db.check(user.name, LIMIT);',
    `  // ${marker}`,
    '  const session = ok ? await db.open(user) : null;',
    '  db.audit(user.name);',
    '  db.track(session);',
    '  return session !== null;',
    '}',
    '',
  ].join('\n');
}

describe('coverage round trip', () => {
  let root: string;
  let controller: IndexController;
  let query: QueryService;

  beforeAll(async () => {
    logger.setLevel('silent');
    root = await createTempProject('roundtrip', {
      [DEFAULT_CONFIG_PATH]: [
        'specs:',
        '  - name: auth',
        '    prefix: r',
        '    include: ["docs/**/*.md"]',
        '    impls:',
        '      - name: server',
        '        include: ["src/**/*.ts"]',
        '',
      ].join('\n'),
      'docs/auth.md': 'r[auth.login]\nUsers MUST authenticate before access.\n',
      'src/auth.ts': loginSource('open a session'),
    });

    controller = new IndexController({ projectRoot: root });
    await controller.start();
    query = new QueryService(controller);
  });

  afterAll(async () => {
    logger.setLevel('info');
    await removeTempProject(root);
  });

  it('should pick up a new annotation on reload', async () => {
    expect(query.ruleDetail('auth.login').level).toBe('must');
    expect(query.uncovered().map((gap) => gap.ruleId)).toEqual(['auth.login']);

    await writeProjectFiles(root, { 'src/auth.ts': loginSource('r[impl auth.login]') });
    await expect(controller.reload()).resolves.toBe(2);

    expect(query.uncovered()).toEqual([]);
    expect(query.ruleDetail('auth.login').implRefs).toEqual([{ file: 'src/auth.ts', line: 10, impl: 'server' }]);

    const unit = controller
      .current()
      .files.get('src/auth.ts')
      ?.units.find((candidate) => candidate.startLine === 8);
    expect(unit).toMatchObject({ endLine: 15, kind: 'function', name: 'login', ruleRefs: ['auth.login'] });
  });
});
