/**
 * Validation finding types.
 */

export const FINDING_KINDS = [
  'ConfigError',
  'DuplicateRuleId',
  'MalformedAnnotation',
  'PrefixMismatch',
  'BrokenReference',
  'ImplInTestFile',
  'Stale',
] as const;

export type FindingKind = (typeof FINDING_KINDS)[number];

export type FindingSeverity = 'error' | 'warning';

/**
 * Severity per kind. Stale references and impl annotations in tests are
 * worth a look but do not make the index inconsistent.
 */
export const FINDING_SEVERITY: Record<FindingKind, FindingSeverity> = {
  ConfigError: 'error',
  DuplicateRuleId: 'error',
  MalformedAnnotation: 'error',
  PrefixMismatch: 'error',
  BrokenReference: 'error',
  ImplInTestFile: 'warning',
  Stale: 'warning',
};

export interface FindingLocation {
  file: string;
  line: number;
  column: number;
}

/**
 * One validation finding. Findings describe the data; they are never
 * thrown.
 */
export interface Finding {
  kind: FindingKind;
  severity: FindingSeverity;
  message: string;
  /** null for findings about configuration */
  file: string | null;
  line: number | null;
  column: number | null;
  spec: string | null;
  impl: string | null;
  ruleId: string | null;
  /** Every site involved, e.g. each declaration of a duplicated id */
  locations: FindingLocation[];
  /** Error code for ConfigError findings */
  code?: string;
  /** Annotation or marker text that triggered the finding */
  token?: string;
}
