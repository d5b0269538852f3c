export * from './rebuild.js';
export * from './controller.js';
export * from './watcher.js';
