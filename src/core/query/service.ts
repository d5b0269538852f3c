/**
 * QueryService - read-only operations over the current snapshot.
 *
 * Every method reads the snapshot once, so a rebuild swapping in a new one
 * mid-call never mixes two versions in one result.
 */
import { NotFoundError } from '../../utils/errors.js';
import { buildCoverageTree, coveragePercent, isWithin, normalizeScope, type CoverageNode } from '../index/tree.js';
import type { FileEntry, Rule, Snapshot, SpecEntry } from '../index/types.js';
import type { StaleReference } from '../staleness/tracker.js';
import type { Finding } from '../validation/types.js';
import { searchSnapshot, DEFAULT_SEARCH_LIMIT } from './search.js';
import type {
  ConfigSummary,
  PairStatus,
  RuleDetail,
  RuleGap,
  SearchResult,
  StatusResult,
  UnmappedUnit,
} from './types.js';

/**
 * Anything that can hand out the live snapshot (the index controller, or a
 * fixed snapshot in tests).
 */
export interface SnapshotSource {
  current(): Snapshot;
}

interface Pair {
  spec: SpecEntry;
  impl: string;
}

export class QueryService {
  constructor(private readonly source: SnapshotSource) {}

  status(): StatusResult {
    const snapshot = this.source.current();
    const pairs: PairStatus[] = this.pairs(snapshot).map(({ spec, impl }) => {
      const rules = [...spec.rules.values()];
      const implCovered = rules.filter((rule) => rule.implRefs.some((ref) => ref.impl === impl)).length;
      const verifyCovered = rules.filter((rule) => rule.verifyRefs.some((ref) => ref.impl === impl)).length;
      return {
        spec: spec.name,
        impl,
        totalRules: rules.length,
        implCovered,
        verifyCovered,
        implPercent: coveragePercent(implCovered, rules.length),
        verifyPercent: coveragePercent(verifyCovered, rules.length),
        staleCount: snapshot.stale.filter((s) => s.spec === spec.name && s.impls.includes(impl)).length,
        brokenCount: snapshot.references.filter(
          (ref) => ref.status === 'broken' && ref.spec === spec.name && ref.impls.includes(impl)
        ).length,
      };
    });

    return {
      version: snapshot.version,
      builtAt: snapshot.builtAt,
      pairs,
      errors: snapshot.findings.filter((f) => f.severity === 'error').length,
      warnings: snapshot.findings.filter((f) => f.severity === 'warning').length,
    };
  }

  /**
   * Rules without an impl reference from the given implementation(s).
   */
  uncovered(specImpl?: string, prefix?: string): RuleGap[] {
    return this.gaps('implRefs', specImpl, prefix);
  }

  /**
   * Rules without a verify reference from the given implementation(s).
   */
  untested(specImpl?: string, prefix?: string): RuleGap[] {
    return this.gaps('verifyRefs', specImpl, prefix);
  }

  stale(specImpl?: string, prefix?: string): StaleReference[] {
    const snapshot = this.source.current();
    const pairs = this.pairs(snapshot, specImpl);
    return snapshot.stale.filter(
      (stale) =>
        pairs.some(({ spec, impl }) => spec.name === stale.spec && stale.impls.includes(impl)) &&
        matchesIdPrefix(stale.ruleId, prefix)
    );
  }

  /**
   * Units that no resolved annotation points at, optionally under a path.
   */
  unmapped(scope?: string): UnmappedUnit[] {
    const snapshot = this.source.current();
    const files = this.filesIn(snapshot, scope);

    return files.flatMap((entry) =>
      entry.units
        .filter((unit) => unit.ruleRefs.length === 0)
        .map((unit) => ({
          file: unit.file,
          startLine: unit.startLine,
          endLine: unit.endLine,
          kind: unit.kind,
          name: unit.name,
        }))
    );
  }

  /**
   * A rule with every declaration and reference. Without `specName`, the
   * first spec in config order that declares the id wins.
   */
  ruleDetail(id: string, specName?: string): RuleDetail {
    const snapshot = this.source.current();
    const specs = specName === undefined ? snapshot.specs : snapshot.specs.filter((s) => s.name === specName);
    if (specs.length === 0 && specName !== undefined) {
      throw new NotFoundError(`Unknown spec "${specName}"`, { spec: specName });
    }

    for (const spec of specs) {
      const rule = spec.rules.get(id);
      if (rule) return this.detail(snapshot, spec, rule);
    }

    throw new NotFoundError(`Rule "${id}" not found`, { id, spec: specName ?? null });
  }

  /**
   * Current findings, optionally only those concerning one spec/impl.
   */
  validate(specImpl?: string): Finding[] {
    const snapshot = this.source.current();
    if (specImpl === undefined) return [...snapshot.findings];

    const pairs = this.pairs(snapshot, specImpl);
    const specNames = new Set(pairs.map((pair) => pair.spec.name));
    const implNames = new Set(pairs.map((pair) => `${pair.spec.name}/${pair.impl}`));
    const onlySpec = !specImpl.includes('/');

    return snapshot.findings.filter((finding) => {
      if (finding.spec !== null) {
        if (!specNames.has(finding.spec)) return false;
        return onlySpec || finding.impl === null || implNames.has(`${finding.spec}/${finding.impl}`);
      }
      if (finding.file === null) return false;
      const owners = snapshot.files.get(finding.file)?.owners ?? [];
      return owners.some((owner) => implNames.has(`${owner.spec}/${owner.impl}`));
    });
  }

  search(query: string, limit: number = DEFAULT_SEARCH_LIMIT): SearchResult[] {
    return searchSnapshot(this.source.current(), query, limit);
  }

  /**
   * Directory coverage aggregates under a path (the project root by default).
   */
  tree(scope?: string): CoverageNode {
    const snapshot = this.source.current();
    return buildCoverageTree(this.filesIn(snapshot, scope), scope ?? '');
  }

  config(): ConfigSummary {
    const snapshot = this.source.current();
    return {
      version: snapshot.version,
      specs: snapshot.specs.map((spec) => ({
        name: spec.name,
        prefix: spec.prefix,
        sourceUrl: spec.sourceUrl,
        documents: [...spec.documents],
        rules: spec.rules.size,
        impls: spec.impls.map((impl) => ({
          name: impl.name,
          files: impl.files.length,
          testFiles: impl.testFiles.length,
        })),
      })),
    };
  }

  getVersion(): number {
    return this.source.current().version;
  }

  private gaps(field: 'implRefs' | 'verifyRefs', specImpl?: string, prefix?: string): RuleGap[] {
    const snapshot = this.source.current();
    const gaps: RuleGap[] = [];

    for (const { spec, impl } of this.pairs(snapshot, specImpl)) {
      for (const rule of spec.rules.values()) {
        if (!matchesIdPrefix(rule.id, prefix)) continue;
        if (rule[field].some((ref) => ref.impl === impl)) continue;
        gaps.push({
          spec: spec.name,
          impl,
          ruleId: rule.id,
          level: rule.level,
          text: rule.text,
          sourceFile: rule.sourceFile,
          line: rule.line,
        });
      }
    }

    return gaps;
  }

  /**
   * Pairings selected by `"spec/impl"`, `"spec"`, or all of them.
   */
  private pairs(snapshot: Snapshot, specImpl?: string): Pair[] {
    const all = snapshot.specs.flatMap((spec) => spec.impls.map((impl) => ({ spec, impl: impl.name })));
    if (specImpl === undefined || specImpl === '') return all;

    const slash = specImpl.indexOf('/');
    const specName = slash === -1 ? specImpl : specImpl.slice(0, slash);
    const implName = slash === -1 ? null : specImpl.slice(slash + 1);

    if (!snapshot.specs.some((spec) => spec.name === specName)) {
      throw new NotFoundError(`Unknown spec "${specName}"`, { spec: specName });
    }
    const selected = all.filter(
      (pair) => pair.spec.name === specName && (implName === null || pair.impl === implName)
    );
    if (implName !== null && selected.length === 0) {
      throw new NotFoundError(`Unknown impl "${specImpl}"`, { spec: specName, impl: implName });
    }
    return selected;
  }

  private filesIn(snapshot: Snapshot, scope?: string): FileEntry[] {
    const files = [...snapshot.files.values()];
    if (scope === undefined || normalizeScope(scope) === '') return files;

    const inScope = files.filter((entry) => isWithin(entry.file, scope));
    if (inScope.length === 0) {
      throw new NotFoundError(`No indexed files under "${scope}"`, { path: scope });
    }
    return inScope;
  }

  private detail(snapshot: Snapshot, spec: SpecEntry, rule: Rule): RuleDetail {
    const stale = new Set(
      snapshot.stale
        .filter((s) => s.spec === spec.name && s.ruleId === rule.id)
        .map((s) => `${s.file}:${s.line}:${s.column}`)
    );

    return {
      spec: spec.name,
      prefix: spec.prefix,
      id: rule.id,
      text: rule.text,
      level: rule.level,
      explicitLevel: rule.explicitLevel,
      fingerprint: rule.fingerprint,
      sourceFile: rule.sourceFile,
      line: rule.line,
      column: rule.column,
      declarations: rule.declarations.map((site) => ({ ...site })),
      implRefs: rule.implRefs.map((ref) => ({ ...ref })),
      verifyRefs: rule.verifyRefs.map((ref) => ({ ...ref })),
      dependsRefs: rule.dependsRefs.map((ref) => ({ ...ref })),
      relatedRefs: rule.relatedRefs.map((ref) => ({ ...ref })),
      references: snapshot.references
        .filter((ref) => ref.status === 'resolved' && ref.spec === spec.name && ref.ruleId === rule.id)
        .map((ref) => ({
          verb: ref.verb,
          file: ref.file,
          line: ref.line,
          column: ref.column,
          impls: [...ref.impls],
          capturedFingerprint: ref.capturedFingerprint,
          stale: stale.has(`${ref.file}:${ref.line}:${ref.column}`),
        })),
    };
  }
}

/**
 * Segment-aware id prefix: `auth` matches `auth` and `auth.login` but not
 * `authz.read`.
 */
export function matchesIdPrefix(id: string, prefix?: string): boolean {
  if (prefix === undefined) return true;
  const trimmed = prefix.replace(/\.+$/, '');
  if (!trimmed) return true;
  return id === trimmed || id.startsWith(`${trimmed}.`);
}
