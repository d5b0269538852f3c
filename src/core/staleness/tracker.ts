/**
 * Staleness tracker: compares fingerprints captured in annotations with the
 * current fingerprint of the rule they reference.
 */
import type { Verb } from '../annotations/types.js';
import type { IndexData } from '../index/types.js';

export interface StaleReference {
  spec: string;
  ruleId: string;
  verb: Verb;
  file: string;
  line: number;
  column: number;
  impls: string[];
  capturedFingerprint: string;
  currentFingerprint: string;
}

/**
 * A captured fingerprint may be a shortened prefix of the full one.
 */
export function isStale(capturedFingerprint: string, currentFingerprint: string): boolean {
  return !currentFingerprint.toLowerCase().startsWith(capturedFingerprint.toLowerCase());
}

/**
 * Every resolved reference whose captured fingerprint no longer matches.
 * References without a captured fingerprint are never checked.
 */
export function findStaleReferences(index: Pick<IndexData, 'specs' | 'references'>): StaleReference[] {
  const specs = new Map(index.specs.map((spec) => [spec.name, spec]));
  const stale: StaleReference[] = [];

  for (const reference of index.references) {
    if (reference.status !== 'resolved' || reference.spec === null) continue;
    if (reference.capturedFingerprint === null) continue;

    const rule = specs.get(reference.spec)?.rules.get(reference.ruleId);
    if (!rule || !isStale(reference.capturedFingerprint, rule.fingerprint)) continue;

    stale.push({
      spec: reference.spec,
      ruleId: reference.ruleId,
      verb: reference.verb,
      file: reference.file,
      line: reference.line,
      column: reference.column,
      impls: reference.impls,
      capturedFingerprint: reference.capturedFingerprint,
      currentFingerprint: rule.fingerprint,
    });
  }

  return stale;
}
