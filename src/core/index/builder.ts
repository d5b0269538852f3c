/**
 * Index builder: merges parsed spec documents and file scans into the
 * forward and reverse indices. Runs single-threaded over sorted inputs so
 * ordering and duplicate decisions are deterministic.
 */
import type { FileScan } from '../annotations/types.js';
import type { ResolvedPatterns, ResolvedSpec } from '../patterns/types.js';
import type { ParsedSpecDocument } from '../requirements/types.js';
import { logger } from '../../utils/logger.js';
import {
  unitKey,
  type CodeUnit,
  type FileEntry,
  type FileOwner,
  type IndexData,
  type RefLocation,
  type Reference,
  type Rule,
  type RuleSite,
  type SpecEntry,
} from './types.js';

const log = logger.child('index');

export interface BuildInput {
  patterns: ResolvedPatterns;
  /** Spec name → parsed documents, in the spec's document order */
  documents: ReadonlyMap<string, readonly ParsedSpecDocument[]>;
  /** Project-relative path → scan */
  scans: ReadonlyMap<string, FileScan>;
}

const REF_FIELD = {
  impl: 'implRefs',
  verify: 'verifyRefs',
  depends: 'dependsRefs',
  related: 'relatedRefs',
} as const;

export function buildIndex(input: BuildInput): IndexData {
  const start = Date.now();
  const specs = input.patterns.specs.map((spec) => buildSpecEntry(spec, input.documents.get(spec.name) ?? []));
  const specsByName = new Map(specs.map((spec) => [spec.name, spec]));
  const owners = collectOwners(input.patterns.specs);

  const markerProblems = input.patterns.specs.flatMap((spec) =>
    (input.documents.get(spec.name) ?? []).flatMap((doc) =>
      doc.problems.map((problem) => ({ ...problem, spec: spec.name }))
    )
  );

  const files = new Map<string, FileEntry>();
  const references: Reference[] = [];
  const annotationProblems: IndexData['annotationProblems'] = [];
  const sources = new Map<string, string[]>();

  for (const file of [...owners.keys()].sort()) {
    const scan = input.scans.get(file);
    const fileOwners = owners.get(file) ?? [];
    if (!scan) continue;

    sources.set(file, scan.lines);
    annotationProblems.push(...scan.problems.map((problem) => ({ ...problem, file })));

    const units: CodeUnit[] = scan.units.map((unit) => ({
      key: unitKey(file, unit.startLine, unit.endLine),
      file,
      startLine: unit.startLine,
      endLine: unit.endLine,
      kind: unit.kind,
      name: unit.name,
      ruleRefs: [],
    }));
    const unitRefs = units.map(() => new Set<string>());

    for (const annotation of scan.annotations) {
      const unit = units[annotation.unitIndex];
      if (!unit) continue;

      const candidates = [
        ...new Set(fileOwners.map((owner) => owner.spec)),
      ].filter((name) => specsByName.get(name)?.prefix === annotation.prefix);

      const reference: Reference = {
        verb: annotation.verb,
        prefix: annotation.prefix,
        ruleId: annotation.ruleId,
        file,
        line: annotation.line,
        column: annotation.column,
        token: annotation.token,
        capturedFingerprint: annotation.capturedFingerprint,
        status: 'mismatch',
        spec: null,
        impls: [],
        unitKey: unit.key,
      };

      const specName = candidates.length === 1 ? candidates[0] : undefined;
      const spec = specName === undefined ? undefined : specsByName.get(specName);
      if (spec) {
        const impls = fileOwners.filter((owner) => owner.spec === spec.name).map((owner) => owner.impl);
        reference.spec = spec.name;
        reference.impls = impls;

        const rule = spec.rules.get(annotation.ruleId);
        if (rule) {
          reference.status = 'resolved';
          const field = REF_FIELD[annotation.verb];
          for (const impl of impls) {
            rule[field].push({ file, line: annotation.line, impl });
          }
          unitRefs[annotation.unitIndex]?.add(rule.id);
        } else {
          reference.status = 'broken';
        }
      }

      references.push(reference);
    }

    units.forEach((unit, index) => {
      unit.ruleRefs = [...(unitRefs[index] ?? [])].sort();
    });

    files.set(file, {
      file,
      language: scan.language,
      owners: fileOwners,
      units,
      totalUnits: units.length,
      coveredUnits: units.filter((unit) => unit.ruleRefs.length > 0).length,
    });
  }

  for (const spec of specs) {
    for (const rule of spec.rules.values()) {
      rule.implRefs.sort(compareLocations);
      rule.verifyRefs.sort(compareLocations);
      rule.dependsRefs.sort(compareLocations);
      rule.relatedRefs.sort(compareLocations);
    }
  }

  log.debug('Index built', {
    specs: specs.length,
    files: files.size,
    references: references.length,
    ms: Date.now() - start,
  });

  return {
    specs,
    files,
    references,
    markerProblems,
    annotationProblems,
    configProblems: input.patterns.problems,
    sources,
  };
}

/**
 * Rules of one spec. The first declaration of an id in document order
 * supplies the rule's own fields; every declaration keeps its content in
 * `declarations`.
 */
function buildSpecEntry(spec: ResolvedSpec, documents: readonly ParsedSpecDocument[]): SpecEntry {
  const rules = new Map<string, Rule>();

  for (const document of documents) {
    for (const declaration of document.declarations) {
      const site: RuleSite = {
        sourceFile: declaration.sourceFile,
        line: declaration.line,
        column: declaration.column,
        text: declaration.text,
        level: declaration.level,
        explicitLevel: declaration.explicitLevel,
        fingerprint: declaration.fingerprint,
      };
      const existing = rules.get(declaration.id);
      if (existing) {
        existing.declarations.push(site);
        continue;
      }
      rules.set(declaration.id, {
        id: declaration.id,
        text: declaration.text,
        level: declaration.level,
        explicitLevel: declaration.explicitLevel,
        fingerprint: declaration.fingerprint,
        sourceFile: declaration.sourceFile,
        line: declaration.line,
        column: declaration.column,
        declarations: [site],
        implRefs: [],
        verifyRefs: [],
        dependsRefs: [],
        relatedRefs: [],
      });
    }
  }

  return {
    name: spec.name,
    prefix: spec.prefix,
    sourceUrl: spec.sourceUrl,
    documents: spec.documents,
    impls: spec.impls.map((impl) => ({ name: impl.impl, files: impl.files, testFiles: impl.testFiles })),
    rules,
  };
}

function collectOwners(specs: readonly ResolvedSpec[]): Map<string, FileOwner[]> {
  const owners = new Map<string, FileOwner[]>();
  for (const spec of specs) {
    for (const impl of spec.impls) {
      const tests = new Set(impl.testFiles);
      for (const file of impl.files) {
        const list = owners.get(file) ?? [];
        list.push({ spec: spec.name, impl: impl.impl, isTest: tests.has(file) });
        owners.set(file, list);
      }
    }
  }
  return owners;
}

function compareLocations(a: RefLocation, b: RefLocation): number {
  return a.file.localeCompare(b.file) || a.line - b.line || a.impl.localeCompare(b.impl);
}
