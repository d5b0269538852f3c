/**
 * Requirement level inference and rule fingerprints.
 */
import { computeChecksum } from '../../utils/checksum.js';
import { RULE_LEVELS, type RuleLevel } from './types.js';

// Tiers are checked in order and the first hit wins. "MUST NOT" and
// "NOT RECOMMENDED" are covered by their positive keyword.
const LEVEL_TIERS: ReadonlyArray<readonly [RuleLevel, RegExp]> = [
  ['must', /\b(?:must|shall|required)\b/i],
  ['should', /\b(?:should|recommended)\b/i],
  ['may', /\b(?:may|optional)\b/i],
];

/**
 * Infer the level of a rule from RFC-2119 keywords in its text.
 */
export function inferLevel(text: string): RuleLevel | null {
  for (const [level, pattern] of LEVEL_TIERS) {
    if (pattern.test(text)) return level;
  }
  return null;
}

/**
 * Narrow an attribute value to a level.
 */
export function parseLevel(value: string): RuleLevel | null {
  const lowered = value.toLowerCase();
  return RULE_LEVELS.find((level) => level === lowered) ?? null;
}

/**
 * Collapse whitespace so re-wrapping a paragraph keeps its fingerprint.
 */
export function normalizeRuleText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Fingerprint of a rule's text.
 */
export function fingerprintRule(text: string): string {
  return computeChecksum(normalizeRuleText(text));
}
