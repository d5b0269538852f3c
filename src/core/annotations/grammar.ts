/**
 * Annotation token grammar: `prefix[verb? rule.id(@fingerprint)?]`.
 */
import { RULE_ID_PATTERN } from '../requirements/types.js';
import { DEFAULT_VERB, VERBS, isVerb, type AnnotationProblemKind, type Verb } from './types.js';

// The prefix must not be glued to a preceding identifier: `arr[i]` is
// matched as prefix "arr", never as "r".
const TOKEN_PATTERN = /(?<![A-Za-z0-9_-])([A-Za-z][A-Za-z0-9_-]*)\[([^[\]\n]*)\]/g;
const FINGERPRINT_PATTERN = /^[0-9a-fA-F]{4,16}$/;

export type BodyParse =
  | { ok: true; verb: Verb; explicitVerb: boolean; ruleId: string; fingerprint: string | null }
  | { ok: false; message: string };

export type ClassifiedToken =
  | {
      type: 'annotation';
      prefix: string;
      verb: Verb;
      ruleId: string;
      fingerprint: string | null;
      token: string;
      offset: number;
    }
  | {
      type: 'problem';
      kind: AnnotationProblemKind;
      prefix: string;
      token: string;
      offset: number;
      message: string;
    };

/**
 * Parse the part between the brackets.
 */
export function parseAnnotationBody(body: string): BodyParse {
  const words = body.trim().split(/\s+/).filter(Boolean);

  if (words.length === 0) {
    return { ok: false, message: 'empty rule id' };
  }
  if (words.length > 2) {
    return { ok: false, message: `unexpected content "${words.slice(2).join(' ')}"` };
  }

  let verb: Verb = DEFAULT_VERB;
  let explicitVerb = false;
  let target = words[0] ?? '';

  if (words.length === 2) {
    const [first = '', second = ''] = words;
    if (!isVerb(first)) {
      return { ok: false, message: `unknown verb "${first}" (expected one of ${VERBS.join(', ')})` };
    }
    verb = first;
    explicitVerb = true;
    target = second;
  } else if (isVerb(target)) {
    return { ok: false, message: `missing rule id after "${target}"` };
  }

  const at = target.indexOf('@');
  const ruleId = at === -1 ? target : target.slice(0, at);
  const fingerprint = at === -1 ? null : target.slice(at + 1);

  if (!ruleId) {
    return { ok: false, message: 'empty rule id' };
  }
  if (!RULE_ID_PATTERN.test(ruleId)) {
    return { ok: false, message: `invalid rule id "${ruleId}"` };
  }
  if (fingerprint !== null && !FINGERPRINT_PATTERN.test(fingerprint)) {
    return { ok: false, message: `invalid fingerprint "${fingerprint}" (expected 4-16 hex characters)` };
  }

  return { ok: true, verb, explicitVerb, ruleId, fingerprint: fingerprint?.toLowerCase() ?? null };
}

/**
 * Find and classify every annotation-shaped token in a piece of comment
 * text. Tokens with an unconfigured prefix are only reported when they
 * look deliberate: an explicit verb, or a dotted rule id.
 */
export function classifyTokens(text: string, prefixes: ReadonlySet<string>): ClassifiedToken[] {
  const tokens: ClassifiedToken[] = [];

  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    const prefix = match[1] ?? '';
    const body = match[2] ?? '';
    const offset = match.index ?? 0;
    const parsed = parseAnnotationBody(body);

    if (prefixes.has(prefix)) {
      if (parsed.ok) {
        tokens.push({
          type: 'annotation',
          prefix,
          verb: parsed.verb,
          ruleId: parsed.ruleId,
          fingerprint: parsed.fingerprint,
          token,
          offset,
        });
      } else {
        tokens.push({ type: 'problem', kind: 'malformed', prefix, token, offset, message: parsed.message });
      }
      continue;
    }

    if (parsed.ok && (parsed.explicitVerb || parsed.ruleId.includes('.'))) {
      tokens.push({
        type: 'problem',
        kind: 'unknown-prefix',
        prefix,
        token,
        offset,
        message: `prefix "${prefix}" does not belong to any configured spec`,
      });
    }
  }

  return tokens;
}
