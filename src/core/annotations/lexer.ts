/**
 * Line lexer: separates code from comment text, tracking block comments and
 * string literals across lines.
 */
import type { CommentStyle } from './types.js';

export type LineKind = 'blank' | 'comment' | 'code';

export interface CommentSegment {
  text: string;
  /** 1-based column of the first character of `text` */
  column: number;
}

export interface LexedLine {
  raw: string;
  /**
   * The line with comments and string contents replaced by spaces, so
   * columns still line up with `raw`.
   */
  code: string;
  comments: CommentSegment[];
  kind: LineKind;
}

const CHAR_LITERAL = /^'(?:\\(?:u\{[0-9a-fA-F]{1,6}\}|x[0-9a-fA-F]{2}|.)|[^\\'])'/;

/**
 * Lex every line of a file with the given comment style.
 */
export function lexLines(lines: readonly string[], style: CommentStyle): LexedLine[] {
  const lineTokens = [...style.line].sort((a, b) => b.length - a.length);
  const blocks = [...style.block].sort((a, b) => b[0].length - a[0].length);

  let blockClose: string | null = null;
  let openQuote: string | null = null;

  return lines.map((raw) => {
    let code = '';
    let sawCode = false;
    const comments: CommentSegment[] = [];
    let i = 0;

    const pushComment = (text: string, offset: number): void => {
      if (text.trim()) comments.push({ text, column: offset + 1 });
    };

    while (i < raw.length) {
      if (blockClose !== null) {
        const end = raw.indexOf(blockClose, i);
        const stop = end === -1 ? raw.length : end;
        pushComment(raw.slice(i, stop), i);
        const next = end === -1 ? raw.length : end + blockClose.length;
        code += ' '.repeat(next - i);
        if (end !== -1) blockClose = null;
        i = next;
        continue;
      }

      if (openQuote !== null) {
        const end = findClosingQuote(raw, i, openQuote);
        const stop = end === -1 ? raw.length : end;
        if (stop > i) sawCode = true;
        code += ' '.repeat(stop - i);
        if (end === -1) {
          i = raw.length;
        } else {
          code += openQuote;
          sawCode = true;
          openQuote = null;
          i = end + 1;
        }
        continue;
      }

      const block = blocks.find(([open]) => raw.startsWith(open, i));
      if (block) {
        code += ' '.repeat(block[0].length);
        blockClose = block[1];
        i += block[0].length;
        continue;
      }

      const lineToken = lineTokens.find((token) => raw.startsWith(token, i));
      if (lineToken) {
        pushComment(raw.slice(i + lineToken.length), i + lineToken.length);
        code += ' '.repeat(raw.length - i);
        i = raw.length;
        continue;
      }

      const ch = raw.charAt(i);
      if (style.charLiterals && ch === "'") {
        const literal = CHAR_LITERAL.exec(raw.slice(i));
        if (literal) {
          code += `'${' '.repeat(literal[0].length - 2)}'`;
          sawCode = true;
          i += literal[0].length;
          continue;
        }
      } else if (style.quotes.includes(ch)) {
        code += ch;
        sawCode = true;
        openQuote = ch;
        i++;
        continue;
      }

      if (ch.trim()) sawCode = true;
      code += ch;
      i++;
    }

    // Only template-style strings continue onto the next line.
    if (openQuote !== null && openQuote !== '`') openQuote = null;

    const kind: LineKind = !raw.trim() ? 'blank' : sawCode ? 'code' : 'comment';
    return { raw, code, comments, kind };
  });
}

function findClosingQuote(raw: string, from: number, quote: string): number {
  for (let i = from; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (ch === '\\') {
      i++;
    } else if (ch === quote) {
      return i;
    }
  }
  return -1;
}

/**
 * Indentation width of a line, counting a tab as four columns.
 */
export function indentOf(line: LexedLine): number {
  const leading = /^[ \t]*/.exec(line.raw)?.[0] ?? '';
  let width = 0;
  for (const ch of leading) width += ch === '\t' ? 4 : 1;
  return width;
}
