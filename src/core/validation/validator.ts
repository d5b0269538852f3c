/**
 * Index validator: turns the inconsistencies recorded while building the
 * index into findings. Never throws on bad data.
 */
import type { IndexData, Reference } from '../index/types.js';
import type { StaleReference } from '../staleness/tracker.js';
import {
  FINDING_KINDS,
  FINDING_SEVERITY,
  type Finding,
  type FindingKind,
  type FindingLocation,
} from './types.js';

interface FindingInput {
  message: string;
  file?: string | null;
  line?: number | null;
  column?: number | null;
  spec?: string | null;
  impl?: string | null;
  ruleId?: string | null;
  locations?: FindingLocation[];
  code?: string;
  token?: string;
}

export class IndexValidator {
  private findings: Finding[] = [];

  constructor(
    private readonly index: IndexData,
    private readonly stale: readonly StaleReference[]
  ) {}

  /**
   * All findings, sorted by file, line and kind.
   */
  validate(): Finding[] {
    this.findings = [];
    this.checkConfig();
    this.checkDuplicates();
    this.checkMarkers();
    this.checkAnnotations();
    this.checkReferences();
    this.checkStale();
    return this.findings.sort(compareFindings);
  }

  private checkConfig(): void {
    for (const problem of this.index.configProblems) {
      this.add('ConfigError', {
        message: problem.message,
        spec: problem.spec,
        impl: problem.impl,
        code: problem.code,
      });
    }
  }

  private checkDuplicates(): void {
    for (const spec of this.index.specs) {
      for (const rule of spec.rules.values()) {
        if (rule.declarations.length < 2) continue;
        const sites = rule.declarations
          .map((site) => `${site.sourceFile}:${site.line}`)
          .join(', ');
        this.add('DuplicateRuleId', {
          message: `rule "${rule.id}" is declared ${rule.declarations.length} times in spec "${spec.name}" (${sites})`,
          file: rule.sourceFile,
          line: rule.line,
          column: rule.column,
          spec: spec.name,
          ruleId: rule.id,
          locations: rule.declarations.map((site) => ({
            file: site.sourceFile,
            line: site.line,
            column: site.column,
          })),
        });
      }
    }
  }

  private checkMarkers(): void {
    for (const problem of this.index.markerProblems) {
      this.add('MalformedAnnotation', {
        message: `malformed rule marker ${problem.token}: ${problem.message}`,
        file: problem.sourceFile,
        line: problem.line,
        column: problem.column,
        spec: problem.spec,
        token: problem.token,
      });
    }
  }

  private checkAnnotations(): void {
    for (const problem of this.index.annotationProblems) {
      this.add(problem.kind === 'malformed' ? 'MalformedAnnotation' : 'PrefixMismatch', {
        message: `${problem.token}: ${problem.message}`,
        file: problem.file,
        line: problem.line,
        column: problem.column,
        token: problem.token,
      });
    }
  }

  private checkReferences(): void {
    const testFiles = new Set(
      [...this.index.files.values()]
        .filter((entry) => entry.owners.some((owner) => owner.isTest))
        .map((entry) => entry.file)
    );

    for (const reference of this.index.references) {
      if (reference.status === 'broken') {
        this.add('BrokenReference', {
          message: `${reference.token}: no rule "${reference.ruleId}" in spec "${reference.spec ?? ''}"`,
          ...this.referenceFields(reference),
        });
      } else if (reference.status === 'mismatch') {
        this.add('PrefixMismatch', {
          message: this.mismatchMessage(reference),
          ...this.referenceFields(reference),
        });
      }

      if (reference.verb === 'impl' && testFiles.has(reference.file)) {
        this.add('ImplInTestFile', {
          message: `${reference.token}: impl annotation in a test file; use "verify" for tests`,
          ...this.referenceFields(reference),
        });
      }
    }
  }

  private checkStale(): void {
    for (const stale of this.stale) {
      this.add('Stale', {
        message:
          `${stale.verb} reference to "${stale.ruleId}" was written against ` +
          `${stale.capturedFingerprint}; the rule is now ${stale.currentFingerprint}`,
        file: stale.file,
        line: stale.line,
        column: stale.column,
        spec: stale.spec,
        impl: stale.impls.length === 1 ? (stale.impls[0] ?? null) : null,
        ruleId: stale.ruleId,
      });
    }
  }

  private mismatchMessage(reference: Reference): string {
    const owning = new Set(
      (this.index.files.get(reference.file)?.owners ?? []).map((owner) => owner.spec)
    );
    const matching = this.index.specs.filter(
      (spec) => spec.prefix === reference.prefix && owning.has(spec.name)
    );
    if (matching.length > 1) {
      return `${reference.token}: prefix "${reference.prefix}" is ambiguous (${matching.map((s) => s.name).join(', ')})`;
    }
    return `${reference.token}: prefix "${reference.prefix}" does not belong to a spec that owns this file`;
  }

  private referenceFields(reference: Reference): Omit<FindingInput, 'message'> {
    return {
      file: reference.file,
      line: reference.line,
      column: reference.column,
      spec: reference.spec,
      impl: reference.impls.length === 1 ? (reference.impls[0] ?? null) : null,
      ruleId: reference.ruleId,
      token: reference.token,
    };
  }

  private add(kind: FindingKind, input: FindingInput): void {
    const file = input.file ?? null;
    const line = input.line ?? null;
    const column = input.column ?? null;
    const finding: Finding = {
      kind,
      severity: FINDING_SEVERITY[kind],
      message: input.message,
      file,
      line,
      column,
      spec: input.spec ?? null,
      impl: input.impl ?? null,
      ruleId: input.ruleId ?? null,
      locations:
        input.locations ?? (file !== null && line !== null ? [{ file, line, column: column ?? 1 }] : []),
    };
    if (input.code !== undefined) finding.code = input.code;
    if (input.token !== undefined) finding.token = input.token;
    this.findings.push(finding);
  }
}

const KIND_ORDER = new Map<FindingKind, number>(FINDING_KINDS.map((kind, index) => [kind, index]));

/**
 * File, then line, then kind. Config findings (no file) come first.
 */
export function compareFindings(a: Finding, b: Finding): number {
  const fileA = a.file ?? '';
  const fileB = b.file ?? '';
  if (fileA !== fileB) return fileA < fileB ? -1 : 1;
  const lineDiff = (a.line ?? 0) - (b.line ?? 0);
  if (lineDiff !== 0) return lineDiff;
  const kindDiff = (KIND_ORDER.get(a.kind) ?? 0) - (KIND_ORDER.get(b.kind) ?? 0);
  if (kindDiff !== 0) return kindDiff;
  return (a.column ?? 0) - (b.column ?? 0) || a.message.localeCompare(b.message);
}

/**
 * Convenience wrapper used by the rebuild pipeline.
 */
export function validateIndex(index: IndexData, stale: readonly StaleReference[]): Finding[] {
  return new IndexValidator(index, stale).validate();
}
