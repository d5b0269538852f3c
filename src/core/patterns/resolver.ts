/**
 * Pattern resolver: expands the configured globs into sorted file lists.
 */
import { globFiles } from '../../utils/file-system.js';
import { createPathMatcher } from '../../utils/path-matcher.js';
import { ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import type { Config, ImplConfig, SpecConfig } from '../config/schema.js';
import type { ConfigProblem, ResolvedImpl, ResolvedPatterns, ResolvedSpec } from './types.js';

/**
 * Resolve every spec's documents and every pairing's files. A spec or
 * pairing with a problem is left out and reported; the others are
 * unaffected.
 */
export async function resolvePatterns(config: Config, projectRoot: string): Promise<ResolvedPatterns> {
  const specs: ResolvedSpec[] = [];
  const problems: ConfigProblem[] = [];

  for (const spec of config.specs) {
    const documents = await globFiles(spec.include, { cwd: projectRoot });
    if (documents.length === 0) {
      problems.push({
        code: ErrorCodes.NO_SPEC_DOCUMENTS,
        spec: spec.name,
        impl: null,
        message:
          spec.include.length === 0
            ? `spec "${spec.name}" has no include patterns`
            : `spec "${spec.name}" include patterns matched no documents: ${spec.include.join(', ')}`,
      });
      continue;
    }

    const impls: ResolvedImpl[] = [];
    for (const impl of spec.impls) {
      const resolved = await resolveImpl(spec, impl, projectRoot);
      if ('code' in resolved) {
        problems.push(resolved);
      } else {
        impls.push(resolved);
      }
    }

    specs.push({
      name: spec.name,
      prefix: spec.prefix,
      sourceUrl: spec.source_url ?? null,
      documents,
      impls,
    });
  }

  warnSharedPrefixes(specs);
  return { specs, problems };
}

async function resolveImpl(
  spec: SpecConfig,
  impl: ImplConfig,
  projectRoot: string
): Promise<ResolvedImpl | ConfigProblem> {
  if (impl.include.length === 0) {
    return {
      code: ErrorCodes.EMPTY_INCLUDE,
      spec: spec.name,
      impl: impl.name,
      message: `impl "${spec.name}/${impl.name}" has no include patterns`,
    };
  }

  const sources = await globFiles(impl.include, { cwd: projectRoot, ignore: impl.exclude });
  if (sources.length === 0) {
    return {
      code: ErrorCodes.NO_FILES,
      spec: spec.name,
      impl: impl.name,
      message: `impl "${spec.name}/${impl.name}" include patterns matched no files: ${impl.include.join(', ')}`,
    };
  }

  const tests = await globFiles(impl.test_include, { cwd: projectRoot, ignore: impl.exclude });
  const files = [...new Set([...sources, ...tests])].sort();
  const testMatcher = createPathMatcher(impl.test_include, impl.exclude);

  return {
    spec: spec.name,
    impl: impl.name,
    files,
    testFiles: files.filter((file) => testMatcher.matches(file)),
  };
}

function warnSharedPrefixes(specs: ResolvedSpec[]): void {
  const byPrefix = new Map<string, string[]>();
  for (const spec of specs) {
    byPrefix.set(spec.prefix, [...(byPrefix.get(spec.prefix) ?? []), spec.name]);
  }
  for (const [prefix, names] of byPrefix) {
    if (names.length > 1) {
      log.warn(`Prefix "${prefix}" is shared by specs ${names.join(', ')}; their references are ambiguous`);
    }
  }
}
