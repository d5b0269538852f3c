export * from './types.js';
export * from './languages.js';
export * from './lexer.js';
export * from './grammar.js';
export * from './scanner.js';
export * from './cache.js';
export { strategyFor, classifyHeader, enforceNesting, type UnitStrategy, type UnitAnalysis } from './units/index.js';
