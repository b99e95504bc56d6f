/**
 * Audit entry written once per successfully applied migration
 */
export interface MigrationRecord {
  /** Unique migration version */
  version: number;
  /** Human-readable migration name */
  name: string;
  /** When the migration committed (Unix ms) */
  executedAt: number;
}
