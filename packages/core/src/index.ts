// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Clock
export * from './clock/index.js';

// Concurrency
export * from './concurrency/index.js';

// Input Validation
export * from './validation/index.js';

// Payload Schemas
export * from './schema/index.js';

// Migrations
export * from './migrations/index.js';

// Sync Queue
export * from './queue/index.js';

// Conflict Resolution
export * from './conflict/index.js';

// Local Store
export * from './store/index.js';
