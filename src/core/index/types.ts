/**
 * Index data model: forward index (spec → rules → references) and reverse
 * index (file → units).
 */
import type { Config } from '../config/schema.js';
import type { ConfigProblem } from '../patterns/types.js';
import type { MarkerProblem, RuleLevel } from '../requirements/types.js';
import type { AnnotationProblem, UnitKind, Verb } from '../annotations/types.js';
import type { Finding } from '../validation/types.js';
import type { StaleReference } from '../staleness/tracker.js';

/** Where a rule is referenced from, per implementation. */
export interface RefLocation {
  file: string;
  line: number;
  impl: string;
}

/** One declaration of a rule id, with the content it carried there. */
export interface RuleSite {
  sourceFile: string;
  line: number;
  column: number;
  text: string;
  level: RuleLevel | null;
  explicitLevel: boolean;
  fingerprint: string;
}

export interface Rule {
  id: string;
  text: string;
  level: RuleLevel | null;
  explicitLevel: boolean;
  fingerprint: string;
  sourceFile: string;
  line: number;
  column: number;
  /** Every declaration of the id, in document order */
  declarations: RuleSite[];
  implRefs: RefLocation[];
  verifyRefs: RefLocation[];
  dependsRefs: RefLocation[];
  relatedRefs: RefLocation[];
}

export interface ImplEntry {
  name: string;
  files: string[];
  testFiles: string[];
}

export interface SpecEntry {
  name: string;
  prefix: string;
  sourceUrl: string | null;
  documents: string[];
  impls: ImplEntry[];
  /** Keyed by rule id, in document order */
  rules: Map<string, Rule>;
}

export type ReferenceStatus = 'resolved' | 'broken' | 'mismatch';

export interface Reference {
  verb: Verb;
  prefix: string;
  ruleId: string;
  file: string;
  line: number;
  column: number;
  token: string;
  capturedFingerprint: string | null;
  status: ReferenceStatus;
  /** Spec the prefix resolved to; null on a mismatch */
  spec: string | null;
  /** Impls of `spec` owning the file */
  impls: string[];
  unitKey: string;
}

export interface CodeUnit {
  /** `file:start-end` */
  key: string;
  file: string;
  startLine: number;
  endLine: number;
  kind: UnitKind;
  name: string | null;
  /** Resolved rule ids, sorted and unique */
  ruleRefs: string[];
}

export interface FileOwner {
  spec: string;
  impl: string;
  isTest: boolean;
}

export interface FileEntry {
  file: string;
  language: string;
  owners: FileOwner[];
  units: CodeUnit[];
  totalUnits: number;
  coveredUnits: number;
}

/**
 * Output of the merge step, before validation.
 */
export interface IndexData {
  /** In config order */
  specs: SpecEntry[];
  /** Keyed by project-relative path, sorted */
  files: Map<string, FileEntry>;
  /** In file order, then document order */
  references: Reference[];
  markerProblems: Array<MarkerProblem & { spec: string }>;
  annotationProblems: Array<AnnotationProblem & { file: string }>;
  configProblems: ConfigProblem[];
  /** Source lines per scanned file, for search */
  sources: Map<string, string[]>;
}

/**
 * One immutable, fully validated view of the project.
 */
export interface Snapshot extends IndexData {
  version: number;
  builtAt: string;
  config: Config;
  stale: StaleReference[];
  findings: Finding[];
}

export function unitKey(file: string, startLine: number, endLine: number): string {
  return `${file}:${startLine}-${endLine}`;
}
