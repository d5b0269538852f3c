export * from './types.js';
export * from './search.js';
export * from './service.js';
