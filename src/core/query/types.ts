/**
 * Query result shapes. Every result is plain, JSON-serializable data.
 */
import type { UnitKind, Verb } from '../annotations/types.js';
import type { RuleLevel } from '../requirements/types.js';
import type { RefLocation, RuleSite } from '../index/types.js';

export interface PairStatus {
  spec: string;
  impl: string;
  totalRules: number;
  implCovered: number;
  verifyCovered: number;
  implPercent: number;
  verifyPercent: number;
  staleCount: number;
  brokenCount: number;
}

export interface StatusResult {
  version: number;
  builtAt: string;
  pairs: PairStatus[];
  errors: number;
  warnings: number;
}

/** A rule missing impl (or verify) references for one implementation. */
export interface RuleGap {
  spec: string;
  impl: string;
  ruleId: string;
  level: RuleLevel | null;
  text: string;
  sourceFile: string;
  line: number;
}

export interface UnmappedUnit {
  file: string;
  startLine: number;
  endLine: number;
  kind: UnitKind;
  name: string | null;
}

export interface ReferenceView {
  verb: Verb;
  file: string;
  line: number;
  column: number;
  impls: string[];
  capturedFingerprint: string | null;
  stale: boolean;
}

export interface RuleDetail {
  spec: string;
  prefix: string;
  id: string;
  text: string;
  level: RuleLevel | null;
  explicitLevel: boolean;
  fingerprint: string;
  sourceFile: string;
  line: number;
  column: number;
  declarations: RuleSite[];
  implRefs: RefLocation[];
  verifyRefs: RefLocation[];
  dependsRefs: RefLocation[];
  relatedRefs: RefLocation[];
  references: ReferenceView[];
}

export type SearchKind = 'rule' | 'source';

export interface SearchResult {
  kind: SearchKind;
  /** Rule id, or unit key / file path for source matches */
  id: string;
  /** Spec of a rule match */
  spec: string | null;
  file: string;
  line: number;
  content: string;
  score: number;
}

export interface ImplSummary {
  name: string;
  files: number;
  testFiles: number;
}

export interface SpecSummary {
  name: string;
  prefix: string;
  sourceUrl: string | null;
  documents: string[];
  rules: number;
  impls: ImplSummary[];
}

export interface ConfigSummary {
  version: number;
  specs: SpecSummary[];
}
