/**
 * Unit detection for curly-brace languages.
 *
 * Braces are matched on the lexed code (comments and string contents
 * already blanked out). Each block's header is the code before its `{`,
 * walked back over multi-line parameter lists, and classified by shape.
 */
import type { LexedLine } from '../lexer.js';
import type { DetectedUnit, SourceSpan, UnitKind } from '../types.js';
import { enforceNesting, type UnitAnalysis, type UnitStrategy } from './types.js';

/** How far back a header may start from its opening brace. */
const MAX_HEADER_LINES = 30;

const CONTROL_PATTERN =
  /^(?:if|else|for|foreach|while|do|switch|match|try|catch|finally|with|loop|select|defer|synchronized|lock|using|case|default|return|throw|yield|await|when|guard|repeat)\b/;

const NOT_A_NAME = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'new', 'function', 'typeof', 'sizeof', 'await', 'super', 'this']);

const GO_TYPE_PATTERN = /\btype\s+([A-Za-z_]\w*)\s+(?:struct|interface)\b/;
const TYPE_PATTERN =
  /\b(class|struct|enum|interface|trait|union|impl|namespace|module|object|record|protocol|extension|mod)\b(?:\s*<[^>]*>)?\s+([A-Za-z_$][\w$]*)/;
const ANONYMOUS_TYPE_PATTERN = /\b(?:class|struct|enum|interface|trait|union|impl|namespace|module|object)\b/;
const TYPE_ALIAS_PATTERN = /\btype\s+([A-Za-z_$][\w$]*)(?:\s*<[^>]*>)?\s*=\s*$/;
const FUNCTION_KEYWORD_PATTERN = /\b(?:function|fn|func|fun|def|sub|proc)\b\s*\*?\s*(?:\([^)]*\)\s*)?([A-Za-z_$][\w$]*)?/;
const ARROW_NAME_PATTERNS = [
  /\b(?:const|let|var)\s+([A-Za-z_$][\w$]*)/,
  /^(?:(?:public|private|protected|static|readonly)\s+)*([A-Za-z_$][\w$]*)\s*[:=]/,
  /^([A-Za-z_$][\w$.]*)\s*\(/,
];
const SIGNATURE_SUFFIX_PATTERN =
  /^\s*(?:const\b\s*)?(?:(?::|->)\s*[^=;]+|throws\s+[\w.,\s]+|noexcept|override|where\s+.+)?\s*$/;
const SIGNATURE_NAME_PATTERN = /([A-Za-z_$~][\w$]*)\s*(?:<[^()]*>)?\s*$/;

interface BracePair {
  /** 0-based */
  openLine: number;
  openColumn: number;
  closeLine: number;
}

interface Classification {
  kind: Exclude<UnitKind, 'block' | 'line'>;
  name: string | null;
}

export class BraceStrategy implements UnitStrategy {
  readonly family = 'brace' as const;

  analyze(lines: readonly LexedLine[]): UnitAnalysis {
    const pairs = matchBraces(lines);
    const units: DetectedUnit[] = [];

    for (const pair of pairs) {
      const header = headerFor(lines, pair);
      if (!header) continue;
      const classification = classifyHeader(header.text);
      if (!classification) continue;
      units.push({
        startLine: extendUpward(lines, header.startLine) + 1,
        endLine: pair.closeLine + 1,
        kind: classification.kind,
        name: classification.name,
      });
    }

    const firstPairOnLine = new Map<number, BracePair>();
    for (const pair of pairs) {
      const existing = firstPairOnLine.get(pair.openLine);
      if (!existing || pair.openColumn < existing.openColumn) {
        firstPairOnLine.set(pair.openLine, pair);
      }
    }

    return {
      units: enforceNesting(units),
      blockOpenedAt(line: number): SourceSpan | null {
        const index = line - 1;
        const pair = firstPairOnLine.get(index) ?? allmanPair(lines, index, firstPairOnLine);
        return pair ? { startLine: line, endLine: pair.closeLine + 1 } : null;
      },
    };
  }
}

function matchBraces(lines: readonly LexedLine[]): BracePair[] {
  const stack: Array<{ line: number; column: number }> = [];
  const pairs: BracePair[] = [];

  lines.forEach((line, index) => {
    for (let column = 0; column < line.code.length; column++) {
      const ch = line.code.charAt(column);
      if (ch === '{') {
        stack.push({ line: index, column });
      } else if (ch === '}') {
        const open = stack.pop();
        if (open) pairs.push({ openLine: open.line, openColumn: open.column, closeLine: index });
      }
    }
  });

  return pairs;
}

/** A brace alone on the line after `index`. */
function allmanPair(
  lines: readonly LexedLine[],
  index: number,
  firstPairOnLine: ReadonlyMap<number, BracePair>
): BracePair | undefined {
  const next = lines[index + 1];
  if (!next || !next.code.trim().startsWith('{')) return undefined;
  return firstPairOnLine.get(index + 1);
}

function headerFor(
  lines: readonly LexedLine[],
  pair: BracePair
): { text: string; startLine: number } | null {
  const openLine = lines[pair.openLine];
  if (!openLine) return null;

  let text = statementTail(openLine.code.slice(0, pair.openColumn));
  let startLine = pair.openLine;

  if (!text.trim()) {
    // Brace on its own line: the header is the previous code line.
    const previous = previousCodeLine(lines, pair.openLine);
    if (previous === -1) return null;
    const previousCode = (lines[previous]?.code ?? '').trimEnd();
    if (/[;{},]$/.test(previousCode)) return null;
    text = statementTail(previousCode);
    startLine = previous;
  }

  let balance = parenBalance(text);
  let cursor = startLine;
  while (balance > 0 && cursor > 0 && pair.openLine - cursor < MAX_HEADER_LINES) {
    cursor--;
    const line = lines[cursor];
    if (!line || line.kind !== 'code') continue;
    text = `${line.code.trim()} ${text.trim()}`;
    balance += parenBalance(line.code);
    startLine = cursor;
  }

  return { text: text.trim(), startLine };
}

function previousCodeLine(lines: readonly LexedLine[], index: number): number {
  for (let i = index - 1; i >= 0; i--) {
    const kind = lines[i]?.kind;
    if (kind === 'code') return i;
    if (kind === 'blank') return -1;
  }
  return -1;
}

/**
 * The part of a line after the last top-level `;`, `{` or `}`.
 */
function statementTail(text: string): string {
  let depth = 0;
  for (let i = text.length - 1; i >= 0; i--) {
    const ch = text.charAt(i);
    if (ch === ')') depth++;
    else if (ch === '(') depth--;
    else if (depth === 0 && (ch === ';' || ch === '{' || ch === '}')) return text.slice(i + 1);
  }
  return text;
}

function parenBalance(text: string): number {
  let balance = 0;
  for (const ch of text) {
    if (ch === ')') balance++;
    else if (ch === '(') balance--;
  }
  return balance;
}

/**
 * Classify a block header as a function or type declaration. Anything else
 * (control flow, object literals, bare blocks) is not a unit.
 */
export function classifyHeader(header: string): Classification | null {
  const text = header.trim();
  if (!text || CONTROL_PATTERN.test(text)) return null;

  const goType = GO_TYPE_PATTERN.exec(text);
  if (goType) return { kind: 'type', name: goType[1] ?? null };

  const typeAlias = TYPE_ALIAS_PATTERN.exec(text);
  if (typeAlias) return { kind: 'type', name: typeAlias[1] ?? null };

  const functionKeyword = FUNCTION_KEYWORD_PATTERN.exec(text);
  if (functionKeyword) return { kind: 'function', name: functionKeyword[1] ?? null };

  const type = TYPE_PATTERN.exec(text);
  if (type) {
    if (type[1] === 'impl') {
      const target = /\bfor\s+([A-Za-z_]\w*)/.exec(text);
      if (target) return { kind: 'type', name: target[1] ?? null };
    }
    return { kind: 'type', name: type[2] ?? null };
  }
  if (ANONYMOUS_TYPE_PATTERN.test(text)) return { kind: 'type', name: null };

  if (text.endsWith('=>')) {
    for (const pattern of ARROW_NAME_PATTERNS) {
      const match = pattern.exec(text);
      if (match?.[1]) return { kind: 'function', name: match[1] };
    }
    return { kind: 'function', name: null };
  }

  return classifySignature(text);
}

/** `name(params) suffix` as in methods, C functions and constructors. */
function classifySignature(text: string): Classification | null {
  const close = text.lastIndexOf(')');
  if (close === -1 || !SIGNATURE_SUFFIX_PATTERN.test(text.slice(close + 1))) return null;

  let depth = 0;
  let open = -1;
  for (let i = close; i >= 0; i--) {
    const ch = text.charAt(i);
    if (ch === ')') depth++;
    else if (ch === '(' && --depth === 0) {
      open = i;
      break;
    }
  }
  if (open === -1) return null;

  const before = text.slice(0, open);
  const nameMatch = SIGNATURE_NAME_PATTERN.exec(before);
  const name = nameMatch?.[1];
  if (!name || NOT_A_NAME.has(name)) return null;

  const qualifiers = before.slice(0, before.length - (nameMatch?.[0].length ?? 0));
  if (/[=(.]\s*$/.test(qualifiers) || qualifiers.includes('=')) return null;

  return { kind: 'function', name };
}

/**
 * Move a unit's start up over the comments, attributes and decorators
 * directly above its header. Returns a 0-based line index.
 */
function extendUpward(lines: readonly LexedLine[], headerLine: number): number {
  let start = headerLine;
  for (let i = headerLine - 1; i >= 0; i--) {
    const line = lines[i];
    if (!line || !(line.kind === 'comment' || isAttributeLine(line))) break;
    start = i;
  }
  return start;
}

function isAttributeLine(line: LexedLine): boolean {
  const code = line.code.trim();
  return code.startsWith('@') || code.startsWith('#[') || (code.startsWith('[') && code.endsWith(']'));
}
