/**
 * Annotation scanner types.
 */
import type { UnitFamily } from '../config/schema.js';

export const VERBS = ['impl', 'verify', 'depends', 'related'] as const;

/** How an annotation relates code to a rule. */
export type Verb = (typeof VERBS)[number];

export const DEFAULT_VERB: Verb = 'impl';

export function isVerb(value: string): value is Verb {
  return VERBS.some((verb) => verb === value);
}

/** Best-effort classification of a code unit. */
export type UnitKind = 'function' | 'type' | 'block' | 'line';

/**
 * Comment syntax and unit-detection family for one language.
 */
export interface CommentStyle {
  /** Language tag, e.g. "typescript" */
  id: string;
  family: UnitFamily;
  /** Line comment tokens, e.g. ["//"] */
  line: readonly string[];
  /** Block comment delimiter pairs, e.g. [["/*", "*\/"]] */
  block: ReadonlyArray<readonly [string, string]>;
  /** String delimiters; a backtick may span lines, the others end at end of line */
  quotes: readonly string[];
  /** `'x'` is a character literal and a lone `'` is code (Rust lifetimes) */
  charLiterals?: boolean;
}

/** Inclusive 1-based line range. */
export interface SourceSpan {
  startLine: number;
  endLine: number;
}

/**
 * A code unit as found by the scanner, before any rule is resolved.
 */
export interface DetectedUnit extends SourceSpan {
  kind: UnitKind;
  name: string | null;
}

/**
 * A well-formed `prefix[verb id]` annotation.
 */
export interface ScannedAnnotation {
  prefix: string;
  verb: Verb;
  ruleId: string;
  /** Fingerprint written after `@` in the annotation, lowercased */
  capturedFingerprint: string | null;
  line: number;
  column: number;
  /** The raw token, e.g. `r[verify auth.login]` */
  token: string;
  /** Index into FileScan.units */
  unitIndex: number;
}

export type AnnotationProblemKind = 'malformed' | 'unknown-prefix';

/**
 * A token that looks like an annotation but cannot be used as one.
 */
export interface AnnotationProblem {
  kind: AnnotationProblemKind;
  prefix: string;
  token: string;
  line: number;
  column: number;
  message: string;
}

/**
 * Everything the scanner extracts from one file.
 */
export interface FileScan {
  file: string;
  language: string;
  checksum: string;
  units: DetectedUnit[];
  annotations: ScannedAnnotation[];
  problems: AnnotationProblem[];
  lines: string[];
}
