export * from './entity.js';
export * from './migration.js';
export * from './queue.js';
export * from './storage.js';
