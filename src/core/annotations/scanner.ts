/**
 * Annotation scanner: finds annotation groups in comments and attributes
 * each group to the innermost code unit around it.
 */
import * as path from 'node:path';
import { computeChecksum } from '../../utils/checksum.js';
import { readFile, splitLines } from '../../utils/file-system.js';
import type { ScanCache } from './cache.js';
import { classifyTokens } from './grammar.js';
import type { LanguageTable } from './languages.js';
import { lexLines, type LexedLine } from './lexer.js';
import { compareUnits, spansNest, strategyFor, type UnitAnalysis } from './units/index.js';
import type {
  AnnotationProblem,
  CommentStyle,
  DetectedUnit,
  FileScan,
  ScannedAnnotation,
} from './types.js';

export interface ScanOptions {
  /** Project-relative path */
  file: string;
  style: CommentStyle;
  /** Prefixes of every configured spec */
  prefixes: ReadonlySet<string>;
}

type PendingAnnotation = Omit<ScannedAnnotation, 'unitIndex'>;

interface AnnotationGroup {
  /** First and last line holding an annotation */
  startLine: number;
  endLine: number;
  /** Code line the group documents, when there is one */
  target: number | null;
  annotations: PendingAnnotation[];
  problems: AnnotationProblem[];
}

/**
 * Scan one file's content.
 */
export function scanSource(content: string, options: ScanOptions): FileScan {
  const lines = splitLines(content);
  const lexed = lexLines(lines, options.style);
  const analysis = strategyFor(options.style.family).analyze(lexed);

  const units: DetectedUnit[] = [...analysis.units];
  const placed: Array<{ annotation: PendingAnnotation; unit: DetectedUnit }> = [];
  const problems: AnnotationProblem[] = [];

  for (const group of collectGroups(lexed, options.prefixes)) {
    problems.push(...group.problems);
    if (group.annotations.length === 0) continue;

    const chosen = attribute(group, analysis, units);
    let unit = units.find((u) => u.startLine === chosen.startLine && u.endLine === chosen.endLine);
    if (!unit) {
      unit = chosen;
      units.push(unit);
    }
    for (const annotation of group.annotations) {
      placed.push({ annotation, unit });
    }
  }

  units.sort(compareUnits);

  return {
    file: options.file,
    language: options.style.id,
    checksum: computeChecksum(content),
    units,
    annotations: placed.map(({ annotation, unit }) => ({ ...annotation, unitIndex: units.indexOf(unit) })),
    problems,
    lines,
  };
}

/**
 * Read and scan a file, reusing the cached scan when neither the content
 * nor the language style changed.
 */
export async function scanFile(
  projectRoot: string,
  file: string,
  context: { languages: LanguageTable; prefixes: ReadonlySet<string>; cache?: ScanCache }
): Promise<FileScan> {
  const content = await readFile(path.join(projectRoot, file));
  const style = context.languages.styleFor(file);
  const key = `${computeChecksum(content)}:${context.languages.styleKey(file)}:${[...context.prefixes].sort().join(',')}`;

  const cached = context.cache?.lookup(file, key);
  if (cached) return cached;

  const scan = scanSource(content, { file, style, prefixes: context.prefixes });
  context.cache?.store(file, key, scan);
  return scan;
}

function collectGroups(lexed: readonly LexedLine[], prefixes: ReadonlySet<string>): AnnotationGroup[] {
  const groups: AnnotationGroup[] = [];

  let i = 0;
  while (i < lexed.length) {
    const line = lexed[i];
    if (!line) break;

    if (line.kind === 'comment') {
      const group = emptyGroup();
      let j = i;
      while (j < lexed.length && lexed[j]?.kind === 'comment') {
        collectTokens(group, lexed[j], j + 1, prefixes);
        j++;
      }
      group.target = lexed[j]?.kind === 'code' ? j + 1 : null;
      if (group.annotations.length > 0 || group.problems.length > 0) groups.push(group);
      i = j;
      continue;
    }

    if (line.kind === 'code' && line.comments.length > 0) {
      const group = emptyGroup();
      collectTokens(group, line, i + 1, prefixes);
      group.target = i + 1;
      if (group.annotations.length > 0 || group.problems.length > 0) groups.push(group);
    }
    i++;
  }

  return groups;
}

function emptyGroup(): AnnotationGroup {
  return { startLine: 0, endLine: 0, target: null, annotations: [], problems: [] };
}

function collectTokens(
  group: AnnotationGroup,
  line: LexedLine | undefined,
  lineNumber: number,
  prefixes: ReadonlySet<string>
): void {
  if (!line) return;
  for (const segment of line.comments) {
    for (const token of classifyTokens(segment.text, prefixes)) {
      const column = segment.column + token.offset;
      if (token.type === 'problem') {
        group.problems.push({
          kind: token.kind,
          prefix: token.prefix,
          token: token.token,
          line: lineNumber,
          column,
          message: token.message,
        });
        continue;
      }
      if (group.annotations.length === 0) group.startLine = lineNumber;
      group.endLine = lineNumber;
      group.annotations.push({
        prefix: token.prefix,
        verb: token.verb,
        ruleId: token.ruleId,
        capturedFingerprint: token.fingerprint,
        line: lineNumber,
        column,
        token: token.token,
      });
    }
  }
}

/**
 * Innermost unit containing the group. Units already placed (declared or
 * synthesized for an earlier group) are the candidates; an unclassified
 * block right after the group is added when it nests with all of them.
 * Without any candidate the group gets a line unit through its target line.
 */
function attribute(group: AnnotationGroup, analysis: UnitAnalysis, placed: readonly DetectedUnit[]): DetectedUnit {
  const candidates: DetectedUnit[] = placed.filter(
    (unit) => unit.startLine <= group.startLine && unit.endLine >= group.endLine
  );

  if (group.target !== null) {
    const block = analysis.blockOpenedAt(group.target);
    const declared =
      block !== null &&
      analysis.units.some((unit) => unit.endLine === block.endLine && unit.startLine <= group.startLine);
    if (block && !declared) {
      const synthesized: DetectedUnit = { startLine: group.startLine, endLine: block.endLine, kind: 'block', name: null };
      if (placed.every((unit) => spansNest(unit, synthesized))) candidates.push(synthesized);
    }
  }

  const best = candidates.sort(
    (a, b) => a.endLine - a.startLine - (b.endLine - b.startLine) || b.startLine - a.startLine
  )[0];
  if (best) return best;

  const line: DetectedUnit = {
    startLine: group.startLine,
    endLine: Math.max(group.endLine, group.target ?? group.endLine),
    kind: 'line',
    name: null,
  };
  if (placed.every((unit) => spansNest(unit, line))) return line;
  return { ...line, endLine: group.endLine };
}
