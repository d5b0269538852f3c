export * from './types.js';
export * from './builder.js';
export * from './tree.js';
