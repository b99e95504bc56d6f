import { systemClock, type Clock } from '../clock/clock.js';
import { AsyncLock } from '../concurrency/async-lock.js';
import {
  MigrationError,
  StoreNotReadyError,
  UnsupportedNewerSchemaError,
  toError,
} from '../errors/tidemark-error.js';
import { resolveLogger, type Logger } from '../observability/logger.js';
import type { StorageBackend } from '../types/storage.js';
import { TransactionMigrationContext } from './migration-context.js';
import { MigrationRegistry } from './migration-registry.js';
import type {
  Migration,
  MigrationManagerOptions,
  MigrationStatus,
  ReadinessGate,
} from './types.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Brings a store from its persisted schema version to the version the
 * running build requires, applying each pending migration exactly once.
 *
 * @example
 * ```typescript
 * const manager = new MigrationManager(backend, { migrations });
 * const applied = await manager.initialize();
 * console.log(`Applied ${applied.join(', ')}`);
 * ```
 */
export class MigrationManager implements ReadinessGate {
  private readonly backend: StorageBackend;
  private readonly registry: MigrationRegistry;
  private readonly lock: AsyncLock;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private targetVersion: number;
  private readyVersion: number | null = null;
  private knownVersion = 0;

  constructor(backend: StorageBackend, options: MigrationManagerOptions = {}) {
    this.backend = backend;
    this.registry = new MigrationRegistry(options.migrations ?? []);
    this.lock = options.lock ?? new AsyncLock();
    this.clock = options.clock ?? systemClock;
    this.logger = resolveLogger(options.logger, 'MigrationManager');
    this.targetVersion = this.registry.getLatestVersion();
  }

  /**
   * Register an additional migration before `initialize`
   */
  addMigration(migration: Migration): void {
    this.registry.add(migration);
    this.targetVersion = Math.max(this.targetVersion, migration.version);
  }

  /**
   * Apply every migration in `(persisted, targetVersion]`, ascending, each in
   * its own transaction. Returns the versions applied by this call.
   *
   * @throws UnsupportedNewerSchemaError when the store is newer than the target
   * @throws MigrationError when the set is invalid or a step fails
   */
  async initialize(targetVersion?: number): Promise<number[]> {
    return this.lock.run(() => this.runPending(targetVersion));
  }

  /**
   * Current persisted version, applied records and what is still pending
   */
  async status(): Promise<MigrationStatus> {
    const targetVersion = this.targetVersion;
    const { currentVersion, applied } = await this.backend.read((reader) => ({
      currentVersion: reader.getSchemaVersion(),
      applied: reader.listMigrationRecords(),
    }));

    return {
      currentVersion,
      targetVersion,
      applied,
      pending: this.registry.getRange(currentVersion, targetVersion).map((m) => m.version),
      ready: this.readyVersion !== null && currentVersion >= targetVersion,
      reversible: this.registry
        .getMigrations()
        .filter((m) => m.down !== undefined)
        .map((m) => m.version),
    };
  }

  /**
   * Whether `initialize` has completed
   */
  isReady(): boolean {
    return this.readyVersion !== null;
  }

  /**
   * Throw unless `initialize` has completed
   */
  assertReady(): void {
    if (this.readyVersion === null) {
      throw new StoreNotReadyError(this.knownVersion, this.targetVersion);
    }
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async runPending(requestedTarget: number | undefined): Promise<number[]> {
    const validation = this.registry.validate();
    if (!validation.valid) {
      throw new MigrationError(
        'TIDEMARK_M702',
        `Invalid migration set: ${validation.errors.join('; ')}`,
        null,
        { errors: validation.errors }
      );
    }

    const target = requestedTarget ?? this.registry.getLatestVersion();
    if (!Number.isInteger(target) || target < 0) {
      throw new MigrationError('TIDEMARK_M702', `Invalid target version ${target}`, null);
    }
    this.targetVersion = target;

    const storedVersion = await this.backend.read((reader) => reader.getSchemaVersion());
    this.knownVersion = storedVersion;
    if (storedVersion > target) {
      throw new UnsupportedNewerSchemaError(storedVersion, target);
    }

    const pending = this.registry.getRange(storedVersion, target);
    this.assertContiguous(pending, storedVersion, target);

    if (pending.length > 0) {
      this.logger.info('Applying migrations', {
        from: storedVersion,
        to: target,
        count: pending.length,
      });
    }

    const applied: number[] = [];
    let fromVersion = storedVersion;

    for (const migration of pending) {
      const ran = await this.apply(migration, fromVersion);
      if (ran) {
        applied.push(migration.version);
      }
      fromVersion = migration.version;
      this.knownVersion = migration.version;
    }

    this.readyVersion = target;
    this.logger.info('Store ready', { schemaVersion: target, applied });
    return applied;
  }

  private assertContiguous(pending: Migration[], from: number, to: number): void {
    const missing: number[] = [];
    for (let version = from + 1; version <= to; version++) {
      if (!pending.some((m) => m.version === version)) {
        missing.push(version);
      }
    }

    if (missing.length > 0) {
      throw new MigrationError(
        'TIDEMARK_M702',
        `No migration registered for version ${missing.join(', ')}`,
        missing[0] ?? null,
        { missing }
      );
    }
  }

  private async apply(migration: Migration, fromVersion: number): Promise<boolean> {
    const startedAt = this.clock.now();

    try {
      const ran = await this.backend.transaction((tx) => {
        if (tx.hasMigrationRecord(migration.version)) {
          if (tx.getSchemaVersion() < migration.version) {
            tx.setSchemaVersion(migration.version);
          }
          return false;
        }

        const context = new TransactionMigrationContext(
          tx,
          migration.version,
          fromVersion,
          startedAt
        );
        const result: unknown = migration.up(context);
        if (isPromiseLike(result)) {
          void result.then(undefined, (late: unknown) => {
            this.logger.warn('Asynchronous migration step rejected after rollback', {
              version: migration.version,
              error: toError(late).message,
            });
          });
          throw new Error('Migration up step must be synchronous');
        }

        tx.insertMigrationRecord({
          version: migration.version,
          name: migration.name,
          executedAt: this.clock.now(),
        });
        tx.setSchemaVersion(migration.version);
        return true;
      });

      if (ran) {
        this.logger.info('Migration applied', { version: migration.version, name: migration.name });
      } else {
        this.logger.debug('Migration already recorded, skipped', { version: migration.version });
      }
      return ran;
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Migration failed', cause, { version: migration.version });
      throw new MigrationError(
        'TIDEMARK_M700',
        `Migration ${migration.version} (${migration.name}) failed: ${cause.message}`,
        migration.version,
        { name: migration.name },
        cause
      );
    }
  }
}
