/**
 * SHA-256 checksums for file contents and rule fingerprints.
 */
import { createHash } from 'node:crypto';

/**
 * Compute a SHA-256 checksum of the given content.
 * Returns the first 16 characters of the hex digest.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}
