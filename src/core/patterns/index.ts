export * from './types.js';
export * from './resolver.js';
