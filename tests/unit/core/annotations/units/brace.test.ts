import { describe, it, expect } from 'vitest';
import { BraceStrategy, classifyHeader } from '../../../../../src/core/annotations/units/brace.js';
import { lexLines } from '../../../../../src/core/annotations/lexer.js';
import { LanguageTable } from '../../../../../src/core/annotations/languages.js';

const languages = new LanguageTable();

function analyze(source: string[], file = 'a.ts') {
  return new BraceStrategy().analyze(lexLines(source, languages.styleFor(file)));
}

function summarize(source: string[], file?: string) {
  return analyze(source, file).units.map((u) => `${u.kind}:${u.name ?? '-'}:${u.startLine}-${u.endLine}`);
}

describe('BraceStrategy', () => {
  it('should find functions, classes, methods and arrows with their doc comments', () => {
    const source = [
      "import x from 'y';",
      '',
      '/**',
      ' * Docs.',
      ' */',
      'export function login(user: string): boolean {',
      '  if (user) {',
      '    return true;',
      '  }',
      '  return false;',
      '}',
      '',
      'class Session {',
      '  @decorated()',
      '  start(): void {',
      '    const cb = () => {',
      '      run();',
      '    };',
      '  }',
      '}',
    ];

    expect(summarize(source)).toEqual([
      'function:login:3-11',
      'type:Session:13-20',
      'function:start:14-19',
      'function:cb:16-18',
    ]);
  });

  it('should handle a brace on its own line', () => {
    const source = ['int add(int a, int b)', '{', '  return a + b;', '}'];

    expect(summarize(source, 'math.c')).toEqual(['function:add:1-4']);
  });

  it('should follow multi-line parameter lists', () => {
    const source = ['function build(', '  a: string,', '  b: number,', ') {', '  return a;', '}'];

    expect(summarize(source)).toEqual(['function:build:1-6']);
  });

  it('should skip object literals and control blocks', () => {
    const source = ['const cfg = {', '  a: 1,', '};', 'for (const x of xs) {', '  use(x);', '}'];

    expect(summarize(source)).toEqual([]);
  });

  it('should ignore braces in strings and comments', () => {
    const source = ['function f() {', '  const s = "}";', '  // }', '  return s;', '}'];

    expect(summarize(source)).toEqual(['function:f:1-5']);
  });

  it('should name Go methods and types', () => {
    const source = [
      'type Server struct {',
      '  addr string',
      '}',
      '',
      'func (s *Server) Start() error {',
      '  return nil',
      '}',
    ];

    expect(summarize(source, 'server.go')).toEqual(['type:Server:1-3', 'function:Start:5-7']);
  });

  it('should name Rust impl blocks after their target and include attributes', () => {
    const source = ['#[derive(Debug)]', 'struct Point {', '  x: i32,', '}', '', 'impl Display for Point {', '}'];

    expect(summarize(source, 'lib.rs')).toEqual(['type:Point:1-4', 'type:Point:6-7']);
  });

  it('should report spans of blocks opened on a line', () => {
    const source = ['function f() {', '  if (x) {', '    y();', '  }', '  else', '  {', '    z();', '  }', '}'];
    const analysis = analyze(source);

    expect(analysis.blockOpenedAt(2)).toEqual({ startLine: 2, endLine: 4 });
    expect(analysis.blockOpenedAt(5)).toEqual({ startLine: 5, endLine: 8 });
    expect(analysis.blockOpenedAt(3)).toBeNull();
  });
});

describe('classifyHeader', () => {
  it.each([
    ['if (x)', null],
    ['else', null],
    ['interface Props', { kind: 'type', name: 'Props' }],
    ['export type Props =', { kind: 'type', name: 'Props' }],
    ['export default class', { kind: 'type', name: null }],
    ['async function* stream()', { kind: 'function', name: 'stream' }],
    ['onClick: () =>', { kind: 'function', name: 'onClick' }],
    ['items.forEach((item) =>', { kind: 'function', name: 'items.forEach' }],
    ['public async Task<int> Run(string x)', { kind: 'function', name: 'Run' }],
    ['fn parse(input: &str) -> Result<Ast, Error>', { kind: 'function', name: 'parse' }],
    ['const x = foo(bar)', null],
    ['return build(x)', null],
  ])('should classify %j', (header, expected) => {
    expect(classifyHeader(header)).toEqual(expected);
  });
});
