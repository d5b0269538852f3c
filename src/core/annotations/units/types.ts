/**
 * Unit detection strategy interface.
 */
import type { UnitFamily } from '../../config/schema.js';
import type { LexedLine } from '../lexer.js';
import type { DetectedUnit, SourceSpan } from '../types.js';

/**
 * Units found in one file.
 */
export interface UnitAnalysis {
  /** Declaration-like units, properly nested */
  units: DetectedUnit[];
  /**
   * Span of a block opened on the given 1-based line (or, for brace
   * languages, on the next line when the brace sits alone there).
   */
  blockOpenedAt(line: number): SourceSpan | null;
}

export interface UnitStrategy {
  readonly family: UnitFamily;
  analyze(lines: readonly LexedLine[]): UnitAnalysis;
}

/**
 * Drop units that partially overlap an earlier one, so that every pair of
 * remaining units is either disjoint or nested.
 */
export function enforceNesting(units: DetectedUnit[]): DetectedUnit[] {
  const sorted = [...units].sort(compareUnits);
  const kept: DetectedUnit[] = [];
  const stack: DetectedUnit[] = [];

  for (const unit of sorted) {
    while (stack.length > 0 && (stack[stack.length - 1]?.endLine ?? 0) < unit.startLine) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];
    if (parent && unit.endLine > parent.endLine) continue;
    if (parent && parent.startLine === unit.startLine && parent.endLine === unit.endLine) continue;
    kept.push(unit);
    stack.push(unit);
  }

  return kept;
}

/** Start ascending, then end descending: parents before children. */
export function compareUnits(a: SourceSpan, b: SourceSpan): number {
  return a.startLine - b.startLine || b.endLine - a.endLine;
}

/** True when two spans are disjoint or one contains the other. */
export function spansNest(a: SourceSpan, b: SourceSpan): boolean {
  const disjoint = a.endLine < b.startLine || b.endLine < a.startLine;
  const aInB = a.startLine >= b.startLine && a.endLine <= b.endLine;
  const bInA = b.startLine >= a.startLine && b.endLine <= a.endLine;
  return disjoint || aInB || bInA;
}
