/**
 * Languages without a block structure we can follow: every annotation group
 * gets a line unit of its own.
 */
import type { UnitAnalysis, UnitStrategy } from './types.js';

export class LineStrategy implements UnitStrategy {
  readonly family = 'line' as const;

  analyze(): UnitAnalysis {
    return { units: [], blockOpenedAt: () => null };
  }
}
