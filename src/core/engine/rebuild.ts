/**
 * One full rebuild: resolve patterns, parse documents and scan files in
 * parallel batches, then merge, validate and check staleness.
 */
import * as path from 'node:path';
import type { ScanCache } from '../annotations/cache.js';
import { LanguageTable } from '../annotations/languages.js';
import { scanFile } from '../annotations/scanner.js';
import type { FileScan } from '../annotations/types.js';
import type { Config } from '../config/schema.js';
import { buildIndex } from '../index/builder.js';
import type { Snapshot } from '../index/types.js';
import { resolvePatterns } from '../patterns/resolver.js';
import { parseSpecDocument } from '../requirements/parser.js';
import type { ParsedSpecDocument } from '../requirements/types.js';
import { findStaleReferences } from '../staleness/tracker.js';
import { validateIndex } from '../validation/validator.js';
import { defaultConcurrency, mapInBatches } from '../../utils/concurrency.js';
import { SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('index');

export interface RebuildOptions {
  projectRoot: string;
  cache?: ScanCache;
}

/**
 * Build a snapshot from fresh disk reads. Any read failure rejects; the
 * caller decides what stays live.
 */
export async function buildSnapshot(config: Config, options: RebuildOptions): Promise<Omit<Snapshot, 'version'>> {
  const start = Date.now();
  const { projectRoot } = options;
  const concurrency = config.scan.concurrency ?? defaultConcurrency();

  const patterns = await resolvePatterns(config, projectRoot);

  const documents = new Map<string, ParsedSpecDocument[]>();
  for (const spec of patterns.specs) {
    const parsed = await mapInBatches(spec.documents, concurrency, async (document) => {
      const content = await readOrFail(projectRoot, document);
      return parseSpecDocument(content, { prefix: spec.prefix, sourceFile: document });
    });
    documents.set(spec.name, parsed);
  }

  const files = [...new Set(patterns.specs.flatMap((spec) => spec.impls.flatMap((impl) => impl.files)))].sort();
  const languages = new LanguageTable(config.languages);
  const prefixes = new Set(config.specs.map((spec) => spec.prefix));

  const scanned = await mapInBatches(files, concurrency, async (file) => {
    try {
      return await scanFile(projectRoot, file, { languages, prefixes, cache: options.cache });
    } catch (error) {
      throw new SystemError(ErrorCodes.READ_ERROR, `Failed to scan ${file}: ${errorMessage(error)}`, { file });
    }
  });
  const scans = new Map<string, FileScan>(scanned.map((scan) => [scan.file, scan]));

  if (options.cache) {
    const removed = options.cache.prune(new Set(files));
    const stats = options.cache.takeStats();
    log.debug('Scan cache', { ...stats, removed });
  }

  const index = buildIndex({ patterns, documents, scans });
  const stale = findStaleReferences(index);
  const findings = validateIndex(index, stale);

  log.debug('Rebuild finished', {
    documents: [...documents.values()].reduce((sum, docs) => sum + docs.length, 0),
    files: files.length,
    findings: findings.length,
    ms: Date.now() - start,
  });

  return {
    ...index,
    builtAt: new Date().toISOString(),
    config,
    stale,
    findings,
  };
}

async function readOrFail(projectRoot: string, file: string): Promise<string> {
  try {
    return await readFile(path.join(projectRoot, file));
  } catch (error) {
    throw new SystemError(ErrorCodes.READ_ERROR, `Failed to read ${file}: ${errorMessage(error)}`, { file });
  }
}
