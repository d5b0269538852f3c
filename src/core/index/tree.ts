/**
 * Directory coverage aggregates, computed bottom-up from the reverse index
 * at query time. Each directory's totals are the sums of its direct
 * children, so no unit is ever counted twice.
 */
import type { FileEntry } from './types.js';

export interface CoverageNode {
  /** Project-relative path; '' for the root */
  path: string;
  name: string;
  type: 'directory' | 'file';
  totalUnits: number;
  coveredUnits: number;
  /** One decimal; 100 when there are no units */
  percent: number;
  children: CoverageNode[];
}

export function coveragePercent(covered: number, total: number): number {
  if (total === 0) return 100;
  return Math.round((covered / total) * 1000) / 10;
}

/**
 * Build the aggregate tree for the given files. With `scope`, only files at
 * or below that path are included and the returned node is the scope.
 */
export function buildCoverageTree(files: Iterable<FileEntry>, scope = ''): CoverageNode {
  const root = normalizeScope(scope);
  const top = directoryNode(root);
  const directories = new Map<string, CoverageNode>([[root, top]]);

  const ensureDirectory = (dirPath: string): CoverageNode => {
    const existing = directories.get(dirPath);
    if (existing) return existing;
    const node = directoryNode(dirPath);
    directories.set(dirPath, node);
    ensureDirectory(parentOf(dirPath, root)).children.push(node);
    return node;
  };

  for (const entry of files) {
    if (!isWithin(entry.file, root)) continue;
    if (entry.file === root) {
      return fileNode(entry);
    }
    ensureDirectory(parentOf(entry.file, root)).children.push(fileNode(entry));
  }

  summarize(top);
  return top;
}

function summarize(node: CoverageNode): void {
  if (node.type === 'file') return;
  node.children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  let total = 0;
  let covered = 0;
  for (const child of node.children) {
    summarize(child);
    total += child.totalUnits;
    covered += child.coveredUnits;
  }
  node.totalUnits = total;
  node.coveredUnits = covered;
  node.percent = coveragePercent(covered, total);
}

function directoryNode(dirPath: string): CoverageNode {
  return {
    path: dirPath,
    name: dirPath.split('/').pop() ?? '',
    type: 'directory',
    totalUnits: 0,
    coveredUnits: 0,
    percent: 100,
    children: [],
  };
}

function fileNode(entry: FileEntry): CoverageNode {
  return {
    path: entry.file,
    name: entry.file.split('/').pop() ?? entry.file,
    type: 'file',
    totalUnits: entry.totalUnits,
    coveredUnits: entry.coveredUnits,
    percent: coveragePercent(entry.coveredUnits, entry.totalUnits),
    children: [],
  };
}

function parentOf(filePath: string, root: string): string {
  const slash = filePath.lastIndexOf('/');
  const parent = slash === -1 ? '' : filePath.slice(0, slash);
  return parent.length < root.length ? root : parent;
}

/**
 * True when `filePath` is `scope` itself or lies below it.
 */
export function isWithin(filePath: string, scope: string): boolean {
  const root = normalizeScope(scope);
  return root === '' || filePath === root || filePath.startsWith(`${root}/`);
}

export function normalizeScope(scope: string): string {
  return scope.replace(/\\/g, '/').replace(/^\.(?:\/|$)/, '').replace(/\/+$/, '');
}
