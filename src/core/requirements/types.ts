/**
 * Rule declaration types.
 */

export const RULE_LEVELS = ['must', 'should', 'may'] as const;

/** RFC-2119 requirement level. */
export type RuleLevel = (typeof RULE_LEVELS)[number];

/**
 * Dot-segmented rule id: `auth.login`, `data.required-fields`.
 */
export const RULE_ID_PATTERN = /^[A-Za-z0-9_-]+(?:\.[A-Za-z0-9_-]+)*$/;

/**
 * One `prefix[id]` declaration found in a spec document.
 */
export interface RuleDeclaration {
  /** Rule id without prefix */
  id: string;
  /** Body text, trimmed; empty for a bare marker */
  text: string;
  /** Explicit or inferred level; null when undeterminable */
  level: RuleLevel | null;
  /** Whether the level came from a `level=` attribute */
  explicitLevel: boolean;
  /** Fingerprint of the normalized text */
  fingerprint: string;
  /** Project-relative path of the document */
  sourceFile: string;
  /** 1-based line of the marker */
  line: number;
  /** 1-based column of the marker */
  column: number;
}

/**
 * A marker carrying the spec prefix whose content could not be parsed.
 */
export interface MarkerProblem {
  sourceFile: string;
  line: number;
  column: number;
  /** The raw marker text, e.g. `r[bad id!]` */
  token: string;
  message: string;
}

export interface ParsedSpecDocument {
  declarations: RuleDeclaration[];
  problems: MarkerProblem[];
}
