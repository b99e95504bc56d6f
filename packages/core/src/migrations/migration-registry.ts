import { MigrationError } from '../errors/tidemark-error.js';
import type { Migration, MigrationValidationResult } from './types.js';

/**
 * Ordered set of migrations for one store
 */
export class MigrationRegistry {
  private readonly migrations: Migration[] = [];

  constructor(migrations: Migration[] = []) {
    for (const migration of migrations) {
      this.add(migration);
    }
  }

  /**
   * Add a migration, keeping the set sorted by version
   */
  add(migration: Migration): void {
    if (this.migrations.some((m) => m.version === migration.version)) {
      throw new MigrationError(
        'TIDEMARK_M702',
        `Migration for version ${migration.version} is already registered`,
        migration.version
      );
    }

    this.migrations.push(migration);
    this.migrations.sort((a, b) => a.version - b.version);
  }

  /**
   * All migrations, ascending by version
   */
  getMigrations(): Migration[] {
    return [...this.migrations];
  }

  /**
   * Migrations with `from < version <= to`, ascending
   */
  getRange(from: number, to: number): Migration[] {
    return this.migrations.filter((m) => m.version > from && m.version <= to);
  }

  /**
   * Highest registered version (0 when empty)
   */
  getLatestVersion(): number {
    const last = this.migrations[this.migrations.length - 1];
    return last ? last.version : 0;
  }

  /**
   * Check versions are positive integers without gaps
   */
  validate(): MigrationValidationResult {
    const errors: string[] = [];

    for (const migration of this.migrations) {
      if (!Number.isInteger(migration.version) || migration.version < 1) {
        errors.push(`Migration version must be a positive integer, got ${migration.version}`);
      }
      if (typeof migration.up !== 'function') {
        errors.push(`Migration ${migration.version} has no up step`);
      }
      if (migration.down !== undefined && typeof migration.down !== 'function') {
        errors.push(`Migration ${migration.version} has a down step that is not a function`);
      }
    }

    for (let i = 1; i < this.migrations.length; i++) {
      const prev = this.migrations[i - 1];
      const curr = this.migrations[i];
      if (prev && curr && curr.version !== prev.version + 1) {
        errors.push(`Version gap detected: migration ${prev.version} to ${curr.version}`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
