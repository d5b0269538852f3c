export * from './types.js';
export * from './levels.js';
export * from './parser.js';
