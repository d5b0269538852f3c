/**
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Spec documents and rules
export * from './core/requirements/index.js';

// Source annotations and code units
export * from './core/annotations/index.js';

// Pattern resolution
export * from './core/patterns/index.js';

// Index, staleness and validation
export * from './core/index/index.js';
export * from './core/staleness/index.js';
export * from './core/validation/index.js';

// Queries and the live engine
export * from './core/query/index.js';
export * from './core/engine/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
