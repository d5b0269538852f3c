/**
 * Spec document parser: finds `prefix[rule.id]` markers in markdown and
 * collects each rule's body text.
 */
import { splitLines } from '../../utils/file-system.js';
import { inferLevel, parseLevel, fingerprintRule } from './levels.js';
import {
  RULE_ID_PATTERN,
  type MarkerProblem,
  type ParsedSpecDocument,
  type RuleDeclaration,
  type RuleLevel,
} from './types.js';

const HEADING_PATTERN = /^ {0,3}#{1,6}(?:\s|$)/;
const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

export interface SpecParseOptions {
  /** Prefix of the spec owning this document */
  prefix: string;
  /** Project-relative path, recorded on every declaration */
  sourceFile: string;
}

interface OpenRule {
  id: string;
  line: number;
  column: number;
  explicitLevel: RuleLevel | null;
  body: string[];
}

/**
 * Parse one markdown document into rule declarations. Duplicate ids are all
 * returned; deciding what a duplicate means is the validator's job.
 */
export function parseSpecDocument(content: string, options: SpecParseOptions): ParsedSpecDocument {
  const lines = splitLines(content);
  const markerPattern = new RegExp(`^( {0,3})(${escapeRegExp(options.prefix)}\\[([^\\]\\n]*)\\])(.*)$`);
  const declarations: RuleDeclaration[] = [];
  const problems: MarkerProblem[] = [];

  let open: OpenRule | null = null;
  let fence: string | null = null;

  const close = (): void => {
    if (!open) return;
    const text = open.body.join('\n').trim();
    declarations.push({
      id: open.id,
      text,
      level: open.explicitLevel ?? inferLevel(text),
      explicitLevel: open.explicitLevel !== null,
      fingerprint: fingerprintRule(text),
      sourceFile: options.sourceFile,
      line: open.line,
      column: open.column,
    });
    open = null;
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';

    const fenceMatch = line.match(FENCE_PATTERN);
    if (fence !== null) {
      if (fenceMatch?.[1] && fenceMatch[1][0] === fence[0] && fenceMatch[1].length >= fence.length) {
        fence = null;
      }
      open?.body.push(line);
      continue;
    }
    if (fenceMatch?.[1]) {
      fence = fenceMatch[1];
      open?.body.push(line);
      continue;
    }

    if (HEADING_PATTERN.test(line)) {
      close();
      continue;
    }

    const atBoundary = i === 0 || (lines[i - 1] ?? '').trim() === '';
    const marker = atBoundary ? line.match(markerPattern) : null;
    if (marker) {
      close();
      const indent = marker[1] ?? '';
      const token = marker[2] ?? '';
      const inner = marker[3] ?? '';
      const rest = marker[4] ?? '';
      const parsed = parseMarkerContent(inner);

      if (parsed.problem) {
        problems.push({
          sourceFile: options.sourceFile,
          line: i + 1,
          column: indent.length + 1,
          token,
          message: parsed.problem,
        });
      }
      if (parsed.id !== null) {
        open = {
          id: parsed.id,
          line: i + 1,
          column: indent.length + 1,
          explicitLevel: parsed.level,
          body: rest.trim() ? [rest.trim()] : [],
        };
      }
      continue;
    }

    open?.body.push(line);
  }

  close();
  return { declarations, problems };
}

/**
 * Parse the inside of a marker: `rule.id` optionally followed by
 * `level=must|should|may`.
 */
function parseMarkerContent(inner: string): {
  id: string | null;
  level: RuleLevel | null;
  problem: string | null;
} {
  const [id = '', ...attributes] = inner.trim().split(/\s+/).filter(Boolean);

  if (!id) {
    return { id: null, level: null, problem: 'empty rule id' };
  }
  if (!RULE_ID_PATTERN.test(id)) {
    return { id: null, level: null, problem: `invalid rule id "${id}"` };
  }

  let level: RuleLevel | null = null;
  for (const attribute of attributes) {
    const [key, value = ''] = attribute.split('=', 2);
    const parsedLevel = key === 'level' ? parseLevel(value) : null;
    if (!parsedLevel) {
      return { id, level, problem: `unrecognized marker attribute "${attribute}"` };
    }
    level = parsedLevel;
  }

  return { id, level, problem: null };
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
