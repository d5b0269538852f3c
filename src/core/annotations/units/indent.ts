/**
 * Unit detection for indentation-scoped languages: `def` and `class`
 * headers, with the body running until the first code line at or left of
 * the header's indentation.
 */
import { indentOf, type LexedLine } from '../lexer.js';
import type { DetectedUnit, SourceSpan } from '../types.js';
import { enforceNesting, type UnitAnalysis, type UnitStrategy } from './types.js';

const MAX_HEADER_LINES = 30;
const FUNCTION_HEADER = /^(?:async\s+)?def\s+([A-Za-z_]\w*)/;
const CLASS_HEADER = /^class\s+([A-Za-z_]\w*)/;
const ONE_LINE_HEADER = /^(?:async\s+)?(?:def|class)\b[^:]*(?:->[^:]*)?:\s*\S/;

export class IndentStrategy implements UnitStrategy {
  readonly family = 'indent' as const;

  analyze(lines: readonly LexedLine[]): UnitAnalysis {
    const units: DetectedUnit[] = [];

    lines.forEach((line, index) => {
      if (line.kind !== 'code') return;
      const code = line.code.trim();
      const fn = FUNCTION_HEADER.exec(code);
      const cls = fn ? null : CLASS_HEADER.exec(code);
      if (!fn && !cls) return;

      const headerEnd = findHeaderEnd(lines, index);
      if (headerEnd === -1) return;
      const indent = indentOf(line);

      units.push({
        startLine: extendUpward(lines, index, indent) + 1,
        endLine: bodyEnd(lines, headerEnd, indent) + 1,
        kind: fn ? 'function' : 'type',
        name: (fn ?? cls)?.[1] ?? null,
      });
    });

    return {
      units: enforceNesting(units),
      blockOpenedAt(lineNumber: number): SourceSpan | null {
        const index = lineNumber - 1;
        const line = lines[index];
        if (!line || line.kind !== 'code') return null;
        const headerEnd = findHeaderEnd(lines, index);
        if (headerEnd === -1) return null;
        return { startLine: lineNumber, endLine: bodyEnd(lines, headerEnd, indentOf(line)) + 1 };
      },
    };
  }
}

/**
 * Line on which a header's parentheses balance and its code ends with `:`.
 */
function findHeaderEnd(lines: readonly LexedLine[], start: number): number {
  let balance = 0;
  for (let i = start; i < lines.length && i - start < MAX_HEADER_LINES; i++) {
    const line = lines[i];
    if (!line || line.kind !== 'code') continue;
    for (const ch of line.code) {
      if (ch === '(' || ch === '[') balance++;
      else if (ch === ')' || ch === ']') balance--;
    }
    if (balance > 0) continue;

    const code = line.code.trim();
    if (code.endsWith(':')) return i;
    // One-line body: `def f(): return 1`
    if (i === start && ONE_LINE_HEADER.test(code)) return i;
    return -1;
  }
  return -1;
}

function bodyEnd(lines: readonly LexedLine[], headerEnd: number, indent: number): number {
  let end = headerEnd;
  for (let i = headerEnd + 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line || line.kind === 'blank') continue;
    if (indentOf(line) > indent) {
      end = i;
    } else if (line.kind === 'code') {
      break;
    }
  }
  return end;
}

/**
 * Decorators and same-or-lower-indented comments directly above a header.
 */
function extendUpward(lines: readonly LexedLine[], headerLine: number, indent: number): number {
  let start = headerLine;
  for (let i = headerLine - 1; i >= 0; i--) {
    const line = lines[i];
    if (!line) break;
    const decorator = line.kind === 'code' && line.code.trim().startsWith('@');
    const comment = line.kind === 'comment' && indentOf(line) <= indent;
    if (!decorator && !comment) break;
    start = i;
  }
  return start;
}
