/**
 * SyncQueue: durable, ordered log of mutations that still have to reach
 * the remote.
 *
 * Items live in the same storage backend as the entities, so a Local Store
 * write and its queue append share one transaction. Items are removed only
 * by `ack` (confirmed remote success) or explicit dead-letter discard.
 *
 * @example
 * ```typescript
 * const queue = new SyncQueue(backend, { backoff: { maxAttempts: 5 } });
 *
 * for (const item of await queue.peekBatch(50)) {
 *   try {
 *     await remote.push(item);
 *     await queue.ack(item.sequence);
 *   } catch (error) {
 *     await queue.fail(item.sequence, error);
 *   }
 * }
 * ```
 */

import { systemClock, type Clock } from '../clock/clock.js';
import { AsyncLock } from '../concurrency/async-lock.js';
import { QueueError, toError } from '../errors/tidemark-error.js';
import { resolveLogger, type Logger, type LoggerOption } from '../observability/logger.js';
import { entityKey, type Entity, type EntityPayload } from '../types/entity.js';
import type { QueueItem, QueueOperation } from '../types/queue.js';
import type { StorageBackend, StorageReader, StorageTransaction } from '../types/storage.js';
import { BackoffPolicy, createBackoffPolicy, type BackoffOptions } from './backoff.js';

// ── Types ──────────────────────────────────────────────────

export interface SyncQueueOptions {
  /** Exclusive store lock shared with the other components */
  lock?: AsyncLock;
  /** Time source for `createdAt` and retry scheduling */
  clock?: Clock;
  /** Retry policy (default: base 1s, factor 2, max 60s, 8 attempts) */
  backoff?: BackoffOptions | BackoffPolicy;
  /** Logger or logger options */
  logger?: LoggerOption;
}

export interface EnqueueInput {
  collection: string;
  id: string;
  operation: QueueOperation;
  payload: EntityPayload;
  /** Server revision the mutation was made against (default: null) */
  baseRevision?: number | null;
}

export interface PeekOptions {
  /** Only items with a larger sequence */
  afterSequence?: number;
  /**
   * Only items whose retry time has come. An item that is not yet due holds
   * back every later item of the same entity.
   */
  dueOnly?: boolean;
}

export interface FailOptions {
  /** Dead-letter at once instead of scheduling a retry */
  permanent?: boolean;
}

/** Reason recorded on items dropped from the active queue by a remote-wins resolution */
export const SUPERSEDED_BY_REMOTE = 'superseded by remote version';

// ── Implementation ────────────────────────────────────────

export class SyncQueue {
  readonly backoff: BackoffPolicy;
  private readonly backend: StorageBackend;
  private readonly lock: AsyncLock;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(backend: StorageBackend, options: SyncQueueOptions = {}) {
    this.backend = backend;
    this.lock = options.lock ?? new AsyncLock();
    this.clock = options.clock ?? systemClock;
    this.backoff = createBackoffPolicy(options.backoff);
    this.logger = resolveLogger(options.logger, 'SyncQueue');
  }

  /**
   * Append an item in its own transaction. Returns its sequence.
   */
  async enqueue(input: EnqueueInput): Promise<number> {
    const item = await this.lock.run(() => this.backend.transaction((tx) => this.append(tx, input)));
    return item.sequence;
  }

  /**
   * Append an item inside a caller's transaction
   */
  append(tx: StorageTransaction, input: EnqueueInput): QueueItem {
    const item = tx.appendQueueItem({
      collection: input.collection,
      id: input.id,
      operation: input.operation,
      payload: input.payload,
      baseRevision: input.baseRevision ?? null,
      createdAt: this.clock.now(),
    });
    this.logger.debug('Enqueued', {
      sequence: item.sequence,
      collection: item.collection,
      id: item.id,
      operation: item.operation,
    });
    return item;
  }

  /**
   * Up to `max` active items, ascending by sequence. Each call re-reads the
   * current state.
   */
  async peekBatch(max: number, options: PeekOptions = {}): Promise<QueueItem[]> {
    if (max <= 0) return [];

    if (!options.dueOnly) {
      return this.backend.read((reader) =>
        reader.listQueueItems({ afterSequence: options.afterSequence, limit: max })
      );
    }

    const now = this.clock.now();
    const all = await this.backend.read((reader) => reader.listQueueItems());
    const held = new Set<string>();
    const due: QueueItem[] = [];

    for (const item of all) {
      const key = entityKey(item.collection, item.id);
      if (held.has(key)) continue;
      if (item.nextAttemptAt > now) {
        held.add(key);
        continue;
      }
      if (options.afterSequence !== undefined && item.sequence <= options.afterSequence) continue;
      due.push(item);
      if (due.length >= max) break;
    }

    return due;
  }

  /**
   * Remove an item after confirmed remote success
   */
  async ack(sequence: number): Promise<QueueItem> {
    return this.lock.run(() => this.backend.transaction((tx) => this.ackIn(tx, sequence)));
  }

  /**
   * `ack` inside a caller's transaction
   */
  ackIn(tx: StorageTransaction, sequence: number): QueueItem {
    const item = this.requireActive(tx, sequence);
    tx.removeQueueItem(sequence);
    this.logger.debug('Acknowledged', { sequence, collection: item.collection, id: item.id });
    return item;
  }

  /**
   * Record a failed delivery. The item is rescheduled with backoff, or moved
   * to dead-letter once it reaches the attempt ceiling or the failure is
   * permanent.
   */
  async fail(sequence: number, error: unknown, options: FailOptions = {}): Promise<QueueItem> {
    const message = toError(error).message;
    return this.lock.run(() =>
      this.backend.transaction((tx) =>
        this.failIn(tx, sequence, message, options.permanent ?? false)
      )
    );
  }

  /**
   * `fail` inside a caller's transaction
   */
  failIn(tx: StorageTransaction, sequence: number, message: string, permanent: boolean): QueueItem {
    const item = this.requireActive(tx, sequence);
    const attemptCount = item.attemptCount + 1;
    const now = this.clock.now();
    const deadLetter = permanent || this.backoff.isExhausted(attemptCount);

    const updated: QueueItem = {
      ...item,
      attemptCount,
      lastError: message,
      nextAttemptAt: deadLetter ? now : now + this.backoff.delayFor(attemptCount),
      deadLetter,
    };
    tx.updateQueueItem(updated);

    if (deadLetter) {
      this.logger.warn('Moved to dead-letter', {
        sequence,
        collection: item.collection,
        id: item.id,
        attemptCount,
        permanent,
        error: message,
      });
    } else {
      this.logger.warn('Delivery failed, retry scheduled', {
        sequence,
        attemptCount,
        nextAttemptAt: updated.nextAttemptAt,
        error: message,
      });
    }

    return updated;
  }

  /**
   * Move every active item of an entity to dead-letter with `reason`
   */
  deadLetterActiveIn(
    tx: StorageTransaction,
    collection: string,
    id: string,
    reason: string
  ): QueueItem[] {
    const moved: QueueItem[] = [];
    for (const item of tx.listQueueItems({ collection, id })) {
      const updated: QueueItem = { ...item, lastError: reason, deadLetter: true };
      tx.updateQueueItem(updated);
      moved.push(updated);
    }
    if (moved.length > 0) {
      this.logger.warn('Moved to dead-letter', {
        collection,
        id,
        sequences: moved.map((item) => item.sequence),
        error: reason,
      });
    }
    return moved;
  }

  /**
   * Point every active item of an entity at a new server revision, after
   * the remote confirmed or supplied that revision
   */
  rebaseActiveIn(
    tx: StorageTransaction,
    collection: string,
    id: string,
    baseRevision: number | null
  ): void {
    for (const item of tx.listQueueItems({ collection, id })) {
      if (item.baseRevision !== baseRevision) {
        tx.updateQueueItem({ ...item, baseRevision });
      }
    }
  }

  /**
   * Drop every active item of an entity and queue `input` in their place.
   * When the oldest dropped item was a create, the replacement is one too.
   */
  replaceActiveIn(tx: StorageTransaction, input: EnqueueInput): QueueItem {
    const active = tx.listQueueItems({ collection: input.collection, id: input.id });
    for (const item of active) {
      tx.removeQueueItem(item.sequence);
    }
    const operation = active[0]?.operation === 'create' ? 'create' : input.operation;
    const replacement = this.append(tx, { ...input, operation });
    if (active.length > 0) {
      this.logger.debug('Replaced active items', {
        collection: input.collection,
        id: input.id,
        sequences: active.map((item) => item.sequence),
        newSequence: replacement.sequence,
      });
    }
    return replacement;
  }

  /**
   * Server revision a new mutation of `entity` is made against: the
   * revision of a clean entity, else the base its pending items carry
   */
  baseRevisionFor(reader: StorageReader, entity: Entity | null): number | null {
    if (!entity) return null;
    if (entity.syncState === 'clean') {
      return entity.isDeleted ? null : entity.revision;
    }
    const [pending] = reader.listQueueItems({
      collection: entity.collection,
      id: entity.id,
      limit: 1,
    });
    if (pending) return pending.baseRevision;
    return entity.conflict?.remoteRevision ?? null;
  }

  /**
   * Whether an entity still has active (non-dead-letter) items
   */
  hasActiveFor(reader: StorageReader, collection: string, id: string): boolean {
    return reader.listQueueItems({ collection, id, limit: 1 }).length > 0;
  }

  /**
   * Dead-lettered items, ascending by sequence
   */
  async deadLetters(): Promise<QueueItem[]> {
    return this.backend.read((reader) => reader.listQueueItems({ deadLetter: true }));
  }

  /**
   * Put a dead-lettered item back at the tail of the active queue with a
   * fresh sequence and no attempts. Returns the new item.
   *
   * The item is rebased onto the revision the entity builds on now, and a
   * clean entity goes back to `pending-push`. Without a local entity the
   * item keeps its own base.
   */
  async retryDeadLetter(sequence: number): Promise<QueueItem> {
    return this.lock.run(() =>
      this.backend.transaction((tx) => {
        const item = this.requireDeadLetter(tx, sequence);
        tx.removeQueueItem(sequence);

        const entity = tx.getEntity(item.collection, item.id);
        const retried = this.append(tx, {
          collection: item.collection,
          id: item.id,
          operation: item.operation,
          payload: item.payload,
          baseRevision: entity ? this.baseRevisionFor(tx, entity) : item.baseRevision,
        });
        if (entity?.syncState === 'clean') {
          tx.putEntity({ ...entity, syncState: 'pending-push' });
        }

        this.logger.info('Dead-letter requeued', {
          sequence,
          newSequence: retried.sequence,
          baseRevision: retried.baseRevision,
        });
        return retried;
      })
    );
  }

  /**
   * Delete a dead-lettered item for good. Returns the removed item.
   *
   * When it was the last undelivered item of a `pending-push` entity that
   * the remote already holds, the entity goes back to `clean` at the
   * revision the item was built on. An entity the remote never held stays
   * `pending-push`; its next write is sent as new.
   */
  async discardDeadLetter(sequence: number): Promise<QueueItem> {
    return this.lock.run(() =>
      this.backend.transaction((tx) => {
        const item = this.requireDeadLetter(tx, sequence);
        tx.removeQueueItem(sequence);

        const entity = tx.getEntity(item.collection, item.id);
        const undelivered =
          this.hasActiveFor(tx, item.collection, item.id) ||
          tx.listQueueItems({ collection: item.collection, id: item.id, deadLetter: true, limit: 1 })
            .length > 0;
        if (entity?.syncState === 'pending-push' && item.baseRevision !== null && !undelivered) {
          tx.putEntity({ ...entity, revision: item.baseRevision, syncState: 'clean' });
        }

        this.logger.info('Dead-letter discarded', { sequence });
        return item;
      })
    );
  }

  /**
   * Number of active items
   */
  async pendingCount(): Promise<number> {
    return this.backend.read((reader) => reader.countQueueItems(false));
  }

  /**
   * Earliest `nextAttemptAt` among active items, or null when empty. With
   * `after`, only times strictly later than it count.
   */
  async nextDueAt(after?: number): Promise<number | null> {
    const items = await this.backend.read((reader) => reader.listQueueItems());
    let earliest: number | null = null;
    for (const item of items) {
      if (after !== undefined && item.nextAttemptAt <= after) continue;
      if (earliest === null || item.nextAttemptAt < earliest) {
        earliest = item.nextAttemptAt;
      }
    }
    return earliest;
  }

  // ── Private ──────────────────────────────────────────────────────────

  private requireItem(reader: StorageReader, sequence: number): QueueItem {
    const item = reader.getQueueItem(sequence);
    if (!item) {
      throw new QueueError('TIDEMARK_Q200', `Queue item ${sequence} not found`, { sequence });
    }
    return item;
  }

  private requireActive(reader: StorageReader, sequence: number): QueueItem {
    const item = this.requireItem(reader, sequence);
    if (item.deadLetter) {
      throw new QueueError('TIDEMARK_Q202', `Queue item ${sequence} is dead-lettered`, {
        sequence,
      });
    }
    return item;
  }

  private requireDeadLetter(reader: StorageReader, sequence: number): QueueItem {
    const item = this.requireItem(reader, sequence);
    if (!item.deadLetter) {
      throw new QueueError('TIDEMARK_Q201', `Queue item ${sequence} is not dead-lettered`, {
        sequence,
      });
    }
    return item;
  }
}
