export { TransactionMigrationContext } from './migration-context.js';
export { MigrationManager } from './migration-manager.js';
export { MigrationRegistry } from './migration-registry.js';
export type {
  Migration,
  MigrationContext,
  MigrationManagerOptions,
  MigrationStatus,
  MigrationValidationResult,
  ReadinessGate,
} from './types.js';
