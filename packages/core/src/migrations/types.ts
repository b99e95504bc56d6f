import type { Clock } from '../clock/clock.js';
import type { AsyncLock } from '../concurrency/async-lock.js';
import type { LoggerOption } from '../observability/logger.js';
import type { Entity, EntityPayload } from '../types/entity.js';
import type { MigrationRecord } from '../types/migration.js';

/**
 * Store handle passed to a migration's `up` step. Every write lands in the
 * migration's own transaction.
 */
export interface MigrationContext {
  /** Version being applied */
  readonly version: number;
  /** Schema version the store was at before this step */
  readonly fromVersion: number;
  /** Time the step started (from the injected clock) */
  readonly now: number;

  /** Create an entity collection (no-op when it exists) */
  createCollection(name: string): void;
  /** Drop an entity collection and all its rows */
  dropCollection(name: string): void;
  /** Rename an entity collection, keeping its rows */
  renameCollection(from: string, to: string): void;
  /** Whether an entity collection exists */
  hasCollection(name: string): boolean;
  /** Names of all entity collections */
  listCollections(): string[];

  /**
   * Rewrite every payload of a collection, tombstones included. Returns the
   * number of rows rewritten.
   */
  transformPayloads(
    collection: string,
    transform: (payload: EntityPayload, entity: Entity) => EntityPayload
  ): number;

  /** Read an entity, tombstones included */
  getEntity(collection: string, id: string): Entity | null;
  /** All entities of a collection, tombstones included */
  listEntities(collection: string): Entity[];
  /** Write an entity row as-is (nothing is enqueued for sync) */
  putEntity(entity: Entity): void;
  /** Remove an entity row as-is (nothing is enqueued for sync) */
  purgeEntity(collection: string, id: string): void;

  /** Read engine metadata */
  getMeta(key: string): string | null;
  /** Write engine metadata */
  setMeta(key: string, value: string): void;
}

/**
 * A versioned schema/data step. `up` must be synchronous: it runs inside a
 * storage transaction that cannot span an await.
 *
 * @example
 * ```typescript
 * const addLikeCount: Migration = {
 *   version: 2,
 *   name: 'add-like-count',
 *   up: (ctx) => {
 *     ctx.transformPayloads('posts', (post) => ({ likeCount: 0, ...post }));
 *   },
 * };
 * ```
 */
export interface Migration {
  /** Version this migration brings the store to */
  version: number;
  /** Migration name recorded in the audit log */
  name: string;
  /** Upgrade step */
  up: (context: MigrationContext) => void;
  /**
   * Documented downgrade step for migrations that support one. The engine
   * never runs it, since the schema version only moves forward; `status()`
   * lists the versions that carry one.
   */
  down?: (context: MigrationContext) => void;
}

/**
 * Migration validation result
 */
export interface MigrationValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Snapshot returned by `migrationStatus`
 */
export interface MigrationStatus {
  /** Persisted schema version */
  currentVersion: number;
  /** Version the running build requires */
  targetVersion: number;
  /** Applied migrations, ascending */
  applied: MigrationRecord[];
  /** Registered versions still to apply, ascending */
  pending: number[];
  /** Whether the store is at the target version */
  ready: boolean;
  /** Registered versions that document a `down` step, ascending */
  reversible: number[];
}

/**
 * Migration manager options
 */
export interface MigrationManagerOptions {
  /** Registered migrations */
  migrations?: Migration[];
  /** Exclusive store lock shared with the other components */
  lock?: AsyncLock;
  /** Time source for `executedAt` */
  clock?: Clock;
  /** Logger or logger options */
  logger?: LoggerOption;
}

/**
 * Anything that can refuse access to a store that is not migrated yet
 */
export interface ReadinessGate {
  assertReady(): void;
}
