/**
 * LocalStore: durable entity collections with soft-delete and revision
 * metadata.
 *
 * Every mutating call writes the entity and appends its Sync Queue item in
 * one storage transaction, under the store's exclusive lock. Change events
 * are published on `changes$` only after the transaction has committed.
 */

import { Subject, takeUntil, type Observable } from 'rxjs';
import { systemClock, type Clock } from '../clock/clock.js';
import { AsyncLock } from '../concurrency/async-lock.js';
import { StorageError, TidemarkError, ValidationError } from '../errors/tidemark-error.js';
import type { ReadinessGate } from '../migrations/types.js';
import { resolveLogger, type Logger, type LoggerOption } from '../observability/logger.js';
import type { SyncQueue } from '../queue/sync-queue.js';
import { parsePayload, type PayloadSchema } from '../schema/payload-schema.js';
import type {
  ChangeOrigin,
  Entity,
  EntityChange,
  EntityPayload,
  RemoteEntity,
} from '../types/entity.js';
import type { StorageBackend, StorageReader, StorageTransaction } from '../types/storage.js';
import {
  assertCollectionName,
  assertEntityId,
  assertPayloadBody,
} from '../validation/input-validation.js';
import { EntitySequence, type EntitySequenceOptions } from './entity-sequence.js';

// ── Types ──────────────────────────────────────────────────

export interface LocalStoreOptions {
  /** Queue that receives one item per mutation */
  queue: SyncQueue;
  /** Exclusive store lock shared with the other components */
  lock?: AsyncLock;
  /** Time source for `updatedAt` */
  clock?: Clock;
  /** Payload schemas by collection */
  schemas?: Record<string, PayloadSchema>;
  /** Refuses access until migrations have run */
  readiness?: ReadinessGate;
  /** Logger or logger options */
  logger?: LoggerOption;
}

export interface GetOptions {
  /** Return tombstones too (default: false) */
  includeDeleted?: boolean;
}

export type ListOptions = EntitySequenceOptions;

// ── Implementation ────────────────────────────────────────

export class LocalStore {
  private readonly backend: StorageBackend;
  private readonly queue: SyncQueue;
  private readonly lock: AsyncLock;
  private readonly clock: Clock;
  private readonly schemas: Record<string, PayloadSchema>;
  private readonly readiness?: ReadinessGate;
  private readonly logger: Logger;
  private readonly destroy$ = new Subject<void>();
  private readonly changesSubject = new Subject<EntityChange>();
  private closed = false;

  /** Committed entity changes, local and remote */
  readonly changes$: Observable<EntityChange>;

  constructor(backend: StorageBackend, options: LocalStoreOptions) {
    this.backend = backend;
    this.queue = options.queue;
    this.lock = options.lock ?? new AsyncLock();
    this.clock = options.clock ?? systemClock;
    this.schemas = options.schemas ?? {};
    this.readiness = options.readiness;
    this.logger = resolveLogger(options.logger, 'LocalStore');
    this.changes$ = this.changesSubject.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Get a live entity, or a tombstone when `includeDeleted` is set
   */
  async get(collection: string, id: string, options: GetOptions = {}): Promise<Entity | null> {
    this.assertUsable();
    assertCollectionName(collection);
    assertEntityId(id);

    const entity = await this.backend.read((reader) => {
      this.requireCollection(reader, collection);
      return reader.getEntity(collection, id);
    });

    if (!entity || (entity.isDeleted && !options.includeDeleted)) {
      return null;
    }
    return entity;
  }

  /**
   * Create or update an entity and enqueue the matching push
   */
  async put(collection: string, id: string, payload: EntityPayload): Promise<Entity> {
    this.assertUsable();
    assertCollectionName(collection);
    assertEntityId(id);
    const value = this.preparePayload(collection, payload);

    const entity = await this.lock.run(() =>
      this.backend.transaction((tx) => {
        this.requireCollection(tx, collection);
        const existing = tx.getEntity(collection, id);
        const live = existing !== null && !existing.isDeleted;
        const conflicted = existing?.syncState === 'conflicted';

        const next: Entity = {
          collection,
          id,
          payload: value,
          revision: (existing?.revision ?? 0) + 1,
          updatedAt: this.clock.now(),
          isDeleted: false,
          syncState: conflicted ? 'conflicted' : 'pending-push',
          conflict: conflicted ? (existing?.conflict ?? null) : null,
        };

        const baseRevision = this.queue.baseRevisionFor(tx, existing);
        tx.putEntity(next);
        this.queue.append(tx, {
          collection,
          id,
          operation: live ? 'update' : 'create',
          payload: value,
          baseRevision,
        });
        return next;
      })
    );

    this.logger.debug('Entity written', { collection, id, revision: entity.revision });
    this.publish([{ operation: 'upsert', collection, id, entity, origin: 'local' }]);
    return entity;
  }

  /**
   * Tombstone an entity and enqueue the matching delete. Returns the
   * tombstone, or null when there was no live entity.
   */
  async delete(collection: string, id: string): Promise<Entity | null> {
    this.assertUsable();
    assertCollectionName(collection);
    assertEntityId(id);

    const tombstone = await this.lock.run(() =>
      this.backend.transaction((tx) => {
        this.requireCollection(tx, collection);
        const existing = tx.getEntity(collection, id);
        if (!existing || existing.isDeleted) {
          return null;
        }

        const next: Entity = {
          ...existing,
          revision: existing.revision + 1,
          updatedAt: this.clock.now(),
          isDeleted: true,
          syncState: existing.syncState === 'conflicted' ? 'conflicted' : 'pending-push',
        };

        const baseRevision = this.queue.baseRevisionFor(tx, existing);
        tx.putEntity(next);
        this.queue.append(tx, {
          collection,
          id,
          operation: 'delete',
          payload: existing.payload,
          baseRevision,
        });
        return next;
      })
    );

    if (tombstone) {
      this.logger.debug('Entity deleted', { collection, id, revision: tombstone.revision });
      this.publish([{ operation: 'delete', collection, id, entity: tombstone, origin: 'local' }]);
    }
    return tombstone;
  }

  /**
   * Lazy sequence over a collection. Each iteration re-reads current state.
   */
  list(collection: string, options: ListOptions = {}): EntitySequence {
    this.assertUsable();
    assertCollectionName(collection);

    return new EntitySequence(
      () =>
        this.backend.read((reader) => {
          this.requireCollection(reader, collection);
          return reader.listEntities(collection);
        }),
      options
    );
  }

  /**
   * Overwrite local state with a remote version and mark it clean. A remote
   * deletion purges the local row and returns null.
   */
  async applyRemote(collection: string, id: string, remote: RemoteEntity): Promise<Entity | null> {
    this.assertUsable();
    assertCollectionName(collection);
    assertEntityId(id);
    if (remote.id !== id) {
      throw new ValidationError([
        { path: 'id', message: `Remote entity id "${remote.id}" does not match "${id}"` },
      ]);
    }

    const change = await this.lock.run(() =>
      this.backend.transaction((tx) => this.applyRemoteIn(tx, collection, remote))
    );

    this.publish([change]);
    return change.entity;
  }

  /**
   * `applyRemote` inside a caller's transaction. The caller publishes the
   * returned change after commit.
   */
  applyRemoteIn(tx: StorageTransaction, collection: string, remote: RemoteEntity): EntityChange {
    this.requireCollection(tx, collection);

    if (remote.deleted) {
      return this.purgeIn(tx, collection, remote.id, 'remote');
    }

    const entity: Entity = {
      collection,
      id: remote.id,
      payload: remote.payload,
      revision: remote.serverRevision,
      updatedAt: remote.updatedAt,
      isDeleted: false,
      syncState: 'clean',
      conflict: null,
    };
    tx.putEntity(entity);
    return { operation: 'upsert', collection, id: remote.id, entity, origin: 'remote' };
  }

  /**
   * Write a resolved entity inside a caller's transaction
   */
  writeIn(tx: StorageTransaction, entity: Entity, origin: ChangeOrigin): EntityChange {
    this.requireCollection(tx, entity.collection);
    tx.putEntity(entity);
    return {
      operation: entity.isDeleted ? 'delete' : 'upsert',
      collection: entity.collection,
      id: entity.id,
      entity,
      origin,
    };
  }

  /**
   * Remove a row entirely inside a caller's transaction
   */
  purgeIn(
    tx: StorageTransaction,
    collection: string,
    id: string,
    origin: ChangeOrigin
  ): EntityChange {
    tx.purgeEntity(collection, id);
    return { operation: 'purge', collection, id, entity: null, origin };
  }

  /**
   * Entities waiting for an application-level conflict resolution
   */
  async conflicts(collection?: string): Promise<Entity[]> {
    this.assertUsable();
    if (collection !== undefined) {
      assertCollectionName(collection);
    }

    return this.backend.read((reader) => {
      const names = collection !== undefined ? [collection] : reader.listCollections();
      const result: Entity[] = [];
      for (const name of names) {
        this.requireCollection(reader, name);
        for (const entity of reader.listEntities(name)) {
          if (entity.syncState === 'conflicted') {
            result.push(entity);
          }
        }
      }
      return result;
    });
  }

  /**
   * Settle a conflicted entity with an application-chosen payload. The
   * payload is stored as a pending local write and pushed on the next sync.
   */
  async resolveConflict(collection: string, id: string, payload: EntityPayload): Promise<Entity> {
    this.assertUsable();
    assertCollectionName(collection);
    assertEntityId(id);
    const value = this.preparePayload(collection, payload);

    const entity = await this.lock.run(() =>
      this.backend.transaction((tx) => {
        this.requireCollection(tx, collection);
        const existing = tx.getEntity(collection, id);
        if (!existing || existing.syncState !== 'conflicted') {
          throw new TidemarkError({
            code: 'TIDEMARK_R401',
            message: `Entity ${collection}/${id} is not conflicted`,
            context: { collection, id },
          });
        }

        const remoteRevision = existing.conflict?.remoteRevision ?? existing.revision;
        const baseRevision = existing.conflict?.remoteDeleted ? null : remoteRevision;
        const next: Entity = {
          collection,
          id,
          payload: value,
          revision: Math.max(existing.revision, remoteRevision) + 1,
          updatedAt: this.clock.now(),
          isDeleted: false,
          syncState: 'pending-push',
          conflict: null,
        };

        tx.putEntity(next);
        // Earlier pending items now build on the version the application saw
        this.queue.rebaseActiveIn(tx, collection, id, baseRevision);
        this.queue.append(tx, {
          collection,
          id,
          operation: existing.conflict?.remoteDeleted ? 'create' : 'update',
          payload: value,
          baseRevision,
        });
        return next;
      })
    );

    this.logger.info('Conflict resolved by application', { collection, id });
    this.publish([{ operation: 'upsert', collection, id, entity, origin: 'local' }]);
    return entity;
  }

  /**
   * Publish committed changes to subscribers
   */
  publish(changes: EntityChange[]): void {
    if (this.closed) return;
    for (const change of changes) {
      this.changesSubject.next(change);
    }
  }

  /**
   * Complete `changes$` and refuse further calls
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.changesSubject.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private assertUsable(): void {
    if (this.closed) {
      throw TidemarkError.fromCode('TIDEMARK_X901', { component: 'LocalStore' });
    }
    this.readiness?.assertReady();
  }

  private preparePayload(collection: string, payload: EntityPayload): EntityPayload {
    assertPayloadBody(payload);
    const schema = this.schemas[collection];
    return schema ? parsePayload(collection, schema, payload) : structuredClone(payload);
  }

  private requireCollection(reader: StorageReader, collection: string): void {
    if (!reader.hasCollection(collection)) {
      throw new StorageError('TIDEMARK_S303', `Unknown collection "${collection}"`, {
        collection,
      });
    }
  }
}
