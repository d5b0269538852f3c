export * from './types.js';
export * from './validator.js';
