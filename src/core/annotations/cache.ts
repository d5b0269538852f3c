/**
 * ScanCache - in-memory scan results keyed by file, reused across rebuilds
 * while the file's checksum and language style stay the same.
 */
import type { FileScan } from './types.js';

export interface ScanCacheStats {
  hits: number;
  misses: number;
  totalCached: number;
}

export class ScanCache {
  private entries = new Map<string, { key: string; scan: FileScan }>();
  private stats: ScanCacheStats = { hits: 0, misses: 0, totalCached: 0 };

  /**
   * Cached scan for a file, if it was stored under the same key.
   */
  lookup(file: string, key: string): FileScan | undefined {
    const entry = this.entries.get(file);
    if (entry && entry.key === key) {
      this.stats.hits++;
      return entry.scan;
    }
    this.stats.misses++;
    return undefined;
  }

  store(file: string, key: string, scan: FileScan): void {
    this.entries.set(file, { key, scan });
    this.stats.totalCached = this.entries.size;
  }

  /**
   * Forget files that are no longer part of any pairing.
   */
  prune(liveFiles: ReadonlySet<string>): number {
    let removed = 0;
    for (const file of [...this.entries.keys()]) {
      if (!liveFiles.has(file)) {
        this.entries.delete(file);
        removed++;
      }
    }
    this.stats.totalCached = this.entries.size;
    return removed;
  }

  /** Returns and resets hit/miss counters. */
  takeStats(): ScanCacheStats {
    const stats = { ...this.stats };
    this.stats = { hits: 0, misses: 0, totalCached: this.entries.size };
    return stats;
  }

  clear(): void {
    this.entries.clear();
    this.stats = { hits: 0, misses: 0, totalCached: 0 };
  }
}
