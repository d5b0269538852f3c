/**
 * Unit strategy registry, keyed by language family.
 */
import type { UnitFamily } from '../../config/schema.js';
import { BraceStrategy } from './brace.js';
import { IndentStrategy } from './indent.js';
import { LineStrategy } from './line.js';
import type { UnitStrategy } from './types.js';

export { BraceStrategy, classifyHeader } from './brace.js';
export { IndentStrategy } from './indent.js';
export { LineStrategy } from './line.js';
export * from './types.js';

const STRATEGIES: Record<UnitFamily, UnitStrategy> = {
  brace: new BraceStrategy(),
  indent: new IndentStrategy(),
  line: new LineStrategy(),
};

export function strategyFor(family: UnitFamily): UnitStrategy {
  return STRATEGIES[family];
}
