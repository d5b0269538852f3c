/**
 * Resolved file sets for specs and their implementations.
 */
import type { ErrorCode } from '../../utils/errors.js';

/** Pairing-level configuration problems that exclude a spec or pairing. */
export type ConfigProblemCode = Extract<ErrorCode, 'EMPTY_INCLUDE' | 'NO_FILES' | 'NO_SPEC_DOCUMENTS'>;

export interface ConfigProblem {
  code: ConfigProblemCode;
  spec: string;
  /** null when the whole spec is excluded */
  impl: string | null;
  message: string;
}

/**
 * One (spec, impl) pairing and the files it covers.
 */
export interface ResolvedImpl {
  spec: string;
  impl: string;
  /** Every file of the pairing, tests included, sorted */
  files: string[];
  /** Subset of `files` matched by `test_include` */
  testFiles: string[];
}

export interface ResolvedSpec {
  name: string;
  prefix: string;
  sourceUrl: string | null;
  /** Markdown documents declaring the spec's rules, sorted */
  documents: string[];
  impls: ResolvedImpl[];
}

export interface ResolvedPatterns {
  specs: ResolvedSpec[];
  problems: ConfigProblem[];
}
