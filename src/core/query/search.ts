/**
 * Ranked search over rule ids and text and over source units.
 */
import type { CodeUnit, Snapshot } from '../index/types.js';
import type { SearchResult } from './types.js';

/** Score tiers, highest first. */
export const SEARCH_SCORES = {
  exact: 100,
  nameSubstring: 80,
  contentSubstring: 60,
  fuzzy: 30,
} as const;

export const DEFAULT_SEARCH_LIMIT = 20;
const MAX_CONTENT_LENGTH = 200;

interface Scored extends SearchResult {
  /** Length of the field that matched, for tie-breaking */
  matchLength: number;
}

/**
 * Search a snapshot. Results are sorted by score, then shorter matched
 * field, then id, then line.
 */
export function searchSnapshot(snapshot: Snapshot, query: string, limit = DEFAULT_SEARCH_LIMIT): SearchResult[] {
  const needle = query.trim().toLowerCase();
  if (!needle || limit <= 0) return [];

  const results: Scored[] = [...searchRules(snapshot, needle), ...searchSources(snapshot, needle)];

  return results
    .sort(
      (a, b) =>
        b.score - a.score ||
        a.matchLength - b.matchLength ||
        compareText(a.id, b.id) ||
        a.line - b.line
    )
    .slice(0, limit)
    .map((result) => ({
      kind: result.kind,
      id: result.id,
      spec: result.spec,
      file: result.file,
      line: result.line,
      content: result.content,
      score: result.score,
    }));
}

function searchRules(snapshot: Snapshot, needle: string): Scored[] {
  const results: Scored[] = [];

  for (const spec of snapshot.specs) {
    for (const rule of spec.rules.values()) {
      const id = rule.id.toLowerCase();
      const text = rule.text.toLowerCase();
      const base = {
        kind: 'rule' as const,
        id: rule.id,
        spec: spec.name,
        file: rule.sourceFile,
        line: rule.line,
        content: truncate(rule.text),
      };

      if (id === needle) {
        results.push({ ...base, score: SEARCH_SCORES.exact, matchLength: id.length });
      } else if (id.includes(needle)) {
        results.push({ ...base, score: SEARCH_SCORES.nameSubstring, matchLength: id.length });
      } else if (text.includes(needle)) {
        results.push({ ...base, score: SEARCH_SCORES.contentSubstring, matchLength: text.length });
      } else if (isSubsequence(needle, id)) {
        results.push({ ...base, score: SEARCH_SCORES.fuzzy, matchLength: id.length });
      }
    }
  }

  return results;
}

function searchSources(snapshot: Snapshot, needle: string): Scored[] {
  const results: Scored[] = [];

  for (const entry of snapshot.files.values()) {
    const lines = snapshot.sources.get(entry.file) ?? [];
    const seen = new Set<string>();

    for (const unit of entry.units) {
      if (!unit.name) continue;
      const name = unit.name.toLowerCase();
      const score =
        name === needle
          ? SEARCH_SCORES.exact
          : name.includes(needle)
            ? SEARCH_SCORES.nameSubstring
            : isSubsequence(needle, name)
              ? SEARCH_SCORES.fuzzy
              : 0;
      if (score === 0) continue;
      seen.add(unit.key);
      results.push({
        kind: 'source',
        id: unit.key,
        spec: null,
        file: entry.file,
        line: unit.startLine,
        content: unit.name,
        score,
        matchLength: name.length,
      });
    }

    lines.forEach((text, index) => {
      const lineNumber = index + 1;
      const content = text.trim();
      if (!content.toLowerCase().includes(needle)) return;

      const unit = innermostUnit(entry.units, lineNumber);
      const id = unit ? unit.key : entry.file;
      if (seen.has(id)) return;
      seen.add(id);

      results.push({
        kind: 'source',
        id,
        spec: null,
        file: entry.file,
        line: lineNumber,
        content: truncate(content),
        score: SEARCH_SCORES.contentSubstring,
        matchLength: content.length,
      });
    });
  }

  return results;
}

function innermostUnit(units: readonly CodeUnit[], line: number): CodeUnit | undefined {
  let best: CodeUnit | undefined;
  for (const unit of units) {
    if (unit.startLine > line || unit.endLine < line) continue;
    if (!best || unit.endLine - unit.startLine < best.endLine - best.startLine) best = unit;
  }
  return best;
}

/**
 * True when every character of `needle` appears in `haystack` in order.
 */
export function isSubsequence(needle: string, haystack: string): boolean {
  let position = 0;
  for (const ch of haystack) {
    if (ch === needle[position]) position++;
    if (position === needle.length) return true;
  }
  return position === needle.length;
}

function truncate(text: string): string {
  const firstLine = text.split('\n')[0] ?? '';
  return firstLine.length > MAX_CONTENT_LENGTH ? `${firstLine.slice(0, MAX_CONTENT_LENGTH - 1)}…` : firstLine;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
