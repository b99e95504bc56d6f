import {
  ConflictResolutionError,
  ConflictResolver,
  RemoteError,
  SUPERSEDED_BY_REMOTE,
  entityKey,
  remoteToEntity,
  resolveLogger,
  systemClock,
  toError,
  type AsyncLock,
  type Clock,
  type ConflictRecord,
  type Entity,
  type EntityChange,
  type LocalStore,
  type Logger,
  type QueueItem,
  type QueueOperation,
  type RemoteEntity,
  type StorageBackend,
  type StorageReader,
  type StorageTransaction,
  type SyncQueue,
  type TimerHandle,
} from '@tidemark/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import type { ConnectivityMonitor } from './connectivity.js';
import type { PushRequest, RemoteApi } from './transport/types.js';
import type {
  CoordinatorState,
  SyncCoordinatorOptions,
  SyncEvent,
  SyncRunResult,
  SyncRunStatus,
  SyncStats,
  SyncTrigger,
} from './types.js';

// ── Types ──────────────────────────────────────────────────

type PushOutcome =
  | { kind: 'pushed'; item: QueueItem; serverRevision: number }
  | { kind: 'failed'; item: QueueItem; error: RemoteError }
  | { kind: 'aborted'; item: QueueItem; error: RemoteError };

type Decision =
  | { kind: 'skip' }
  | { kind: 'apply' }
  | { kind: 'resolved'; record: ConflictRecord }
  | { kind: 'conflicted'; local: Entity; error: ConflictResolutionError };

interface PulledCollection {
  collection: string;
  /** Latest change per id, in arrival order */
  changes: RemoteEntity[];
  cursor: string;
  received: number;
}

interface PlannedChange {
  collection: string;
  remote: RemoteEntity;
  /** Local state the decision was made against */
  local: Entity | null;
  decision: Decision;
}

interface RunCounters {
  pushed: number;
  failed: number;
  deadLettered: number;
  pulled: number;
  conflicts: number;
}

interface CommitResult {
  changes: EntityChange[];
  events: SyncEvent[];
}

function sameVersion(a: Entity | null, b: Entity | null): boolean {
  if (a === null || b === null) return a === b;
  return (
    a.revision === b.revision &&
    a.updatedAt === b.updatedAt &&
    a.syncState === b.syncState &&
    a.isDeleted === b.isDeleted
  );
}

// ── Implementation ────────────────────────────────────────

/**
 * Moves queued local mutations to the remote and remote changes into the
 * Local Store.
 *
 * A run drains the queue, pulls every configured collection, resolves
 * pulled changes against pending local state and commits the result in one
 * transaction together with the new cursors. Only one run is active at a
 * time; triggers that arrive meanwhile share a single follow-up run.
 *
 * @example
 * ```typescript
 * const coordinator = new SyncCoordinator({
 *   backend, store, queue, lock, remote,
 *   collections: ['posts'],
 *   storeId,
 * });
 *
 * coordinator.events$.subscribe((event) => console.log(event.type));
 * const result = await coordinator.triggerSync();
 * console.log(result.status, result.pushed, result.pulled);
 * ```
 */
export class SyncCoordinator {
  private readonly backend: StorageBackend;
  private readonly store: LocalStore;
  private readonly queue: SyncQueue;
  private readonly remote: RemoteApi;
  private readonly collections: string[];
  private readonly resolvers: Record<string, ConflictResolver>;
  private readonly defaultResolver: ConflictResolver;
  private readonly lock: AsyncLock;
  private readonly storeId: string;
  private readonly connectivity?: ConnectivityMonitor;
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private readonly batchSize: number;
  private readonly pushConcurrency: number;
  private readonly logger: Logger;

  private readonly stateSubject = new BehaviorSubject<CoordinatorState>('idle');
  private readonly eventsSubject = new Subject<SyncEvent>();
  private readonly destroy$ = new Subject<void>();
  private stop$ = new Subject<void>();

  private active: Promise<SyncRunResult> | null = null;
  private followUp: Promise<SyncRunResult> | null = null;
  private cancelRequested = false;
  private running = false;
  private closed = false;
  private intervalTimer: TimerHandle | null = null;
  private retryTimer: TimerHandle | null = null;
  private statsValue: SyncStats = {
    runs: 0,
    pushed: 0,
    failed: 0,
    deadLettered: 0,
    pulled: 0,
    conflicts: 0,
    lastRunAt: null,
    lastError: null,
  };

  /** Current lifecycle state, replayed on subscribe */
  readonly state$: Observable<CoordinatorState>;
  /** Run and item events */
  readonly events$: Observable<SyncEvent>;

  constructor(options: SyncCoordinatorOptions) {
    this.backend = options.backend;
    this.store = options.store;
    this.queue = options.queue;
    this.remote = options.remote;
    this.collections = [...options.collections];
    this.resolvers = options.resolvers ?? {};
    this.defaultResolver = options.defaultResolver ?? new ConflictResolver();
    this.lock = options.lock;
    this.storeId = options.storeId;
    this.connectivity = options.connectivity;
    this.clock = options.clock ?? systemClock;
    this.intervalMs = Math.max(0, options.intervalMs ?? 0);
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? 50));
    this.pushConcurrency = Math.max(1, Math.floor(options.pushConcurrency ?? 1));
    this.logger = resolveLogger(options.logger, 'SyncCoordinator');

    this.state$ = this.stateSubject.asObservable().pipe(takeUntil(this.destroy$));
    this.events$ = this.eventsSubject.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Current lifecycle state */
  get state(): CoordinatorState {
    return this.stateSubject.value;
  }

  /** Whether `start()` is in effect */
  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start a run, or join the follow-up run when one is already active.
   * Resolves with the run's result and never rejects.
   */
  triggerSync(trigger: SyncTrigger = 'manual'): Promise<SyncRunResult> {
    // A queued follow-up owns the next run even after the active one settled
    if (this.followUp) {
      return this.followUp;
    }
    if (!this.active) {
      return this.begin(trigger);
    }

    this.logger.debug('Run in progress, follow-up scheduled', { trigger });
    this.followUp = this.active.then(() => {
      this.followUp = null;
      return this.begin(trigger);
    });
    return this.followUp;
  }

  /**
   * Stop the active run at the next queue item. Sends already in flight
   * finish and get their bookkeeping; pulled changes are not committed.
   */
  cancel(): void {
    if (!this.active) return;
    this.cancelRequested = true;
    this.logger.info('Cancellation requested');
  }

  /**
   * Resolves once no run is active or queued
   */
  async whenIdle(): Promise<void> {
    while (this.followUp ?? this.active) {
      await (this.followUp ?? this.active);
    }
  }

  /**
   * Subscribe to connectivity, arm the interval and retry timers, and run
   * once when online
   */
  start(): void {
    if (this.running || this.closed) return;
    this.running = true;
    this.stop$ = new Subject<void>();

    const connectivity = this.connectivity;
    if (connectivity) {
      let previous = connectivity.isOnline();
      connectivity.online$.pipe(takeUntil(this.stop$)).subscribe((online) => {
        if (online && !previous) {
          this.logger.info('Connectivity restored');
          this.fire('connectivity');
        }
        previous = online;
      });
    }

    this.scheduleInterval();
    this.logger.info('Sync coordinator started', {
      collections: this.collections,
      intervalMs: this.intervalMs,
    });
    this.fire('startup');
  }

  /**
   * Drop subscriptions and timers. An active run continues to completion.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.stop$.next();
    this.stop$.complete();
    this.intervalTimer?.cancel();
    this.intervalTimer = null;
    this.cancelRetry();
    this.logger.info('Sync coordinator stopped');
  }

  /**
   * Stop, wait for runs to settle, and complete the observables
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.stop();
    this.closed = true;
    await this.whenIdle();
    this.destroy$.next();
    this.destroy$.complete();
    this.stateSubject.complete();
    this.eventsSubject.complete();
  }

  /**
   * Cumulative counters since construction
   */
  stats(): SyncStats {
    return { ...this.statsValue };
  }

  // ── Run ──────────────────────────────────────────────────────────────

  private begin(trigger: SyncTrigger): Promise<SyncRunResult> {
    const run = this.execute(trigger).finally(() => {
      if (this.active === run) {
        this.active = null;
      }
    });
    this.active = run;
    return run;
  }

  private async execute(trigger: SyncTrigger): Promise<SyncRunResult> {
    const startedAt = this.clock.now();
    const counters: RunCounters = { pushed: 0, failed: 0, deadLettered: 0, pulled: 0, conflicts: 0 };
    this.cancelRequested = false;

    this.logger.info('Sync run started', { trigger });
    this.emit({ type: 'run-started', trigger, timestamp: startedAt });

    let result: SyncRunResult;
    try {
      const status = await this.runPhases(counters);
      result = this.buildResult(trigger, status, counters, startedAt);
      this.logger.info('Sync run finished', {
        trigger,
        status,
        pushed: counters.pushed,
        failed: counters.failed,
        deadLettered: counters.deadLettered,
        pulled: counters.pulled,
        conflicts: counters.conflicts,
      });
      this.emit({ type: 'run-completed', result });
    } catch (caught) {
      const error = toError(caught);
      this.setState('failed');
      result = { ...this.buildResult(trigger, 'failed', counters, startedAt), error };
      this.logger.error('Sync run failed', error, { trigger });
      this.emit({ type: 'run-failed', result, error });
    }

    this.recordStats(result);
    this.setState('idle');
    await this.scheduleRetry();
    return result;
  }

  private async runPhases(counters: RunCounters): Promise<SyncRunStatus> {
    this.setState('draining');
    await this.drain(counters);
    if (this.cancelRequested) return 'cancelled';

    this.setState('pulling');
    const pulled = await this.pull();
    if (pulled === null || this.cancelRequested) return 'cancelled';

    this.setState('resolving');
    const planned = await this.plan(pulled);

    this.setState('committing');
    await this.commit(pulled, planned, counters);
    return 'completed';
  }

  // ── Draining ─────────────────────────────────────────────────────────

  private async drain(counters: RunCounters): Promise<void> {
    const blocked = new Set<string>();
    let afterSequence: number | undefined;

    while (!this.cancelRequested) {
      const batch = await this.queue.peekBatch(this.batchSize, { afterSequence });
      const last = batch[batch.length - 1];
      if (!last) return;
      afterSequence = last.sequence;

      const now = this.clock.now();
      const entities = await this.backend.read((reader) => {
        const byKey = new Map<string, Entity | null>();
        for (const item of batch) {
          const key = entityKey(item.collection, item.id);
          if (!byKey.has(key)) {
            byKey.set(
              key,
              reader.hasCollection(item.collection) ? reader.getEntity(item.collection, item.id) : null
            );
          }
        }
        return byKey;
      });

      const groups = new Map<string, QueueItem[]>();
      for (const item of batch) {
        const key = entityKey(item.collection, item.id);
        if (blocked.has(key)) continue;
        if (item.nextAttemptAt > now || entities.get(key)?.syncState === 'conflicted') {
          blocked.add(key);
          continue;
        }
        const group = groups.get(key) ?? [];
        group.push(item);
        groups.set(key, group);
      }

      if (groups.size === 0) continue;

      const outcomes = await this.sendGroups([...groups.values()], blocked);
      await this.settle(outcomes, counters);

      const aborted = outcomes.find((outcome) => outcome.kind === 'aborted');
      if (aborted) {
        throw aborted.error;
      }
    }
  }

  /**
   * Send groups with at most `pushConcurrency` entities in flight. Items of
   * one entity go strictly one after another.
   */
  private async sendGroups(groups: QueueItem[][], blocked: Set<string>): Promise<PushOutcome[]> {
    const outcomes: PushOutcome[] = [];
    const halt = { aborted: false };
    let next = 0;

    const worker = async (): Promise<void> => {
      while (!halt.aborted && !this.cancelRequested) {
        const group = groups[next++];
        if (!group) return;

        // Later items of the group build on the revision an earlier push got
        let rebased: number | undefined;
        for (const item of group) {
          if (halt.aborted || this.cancelRequested) return;
          const outcome = await this.send(item, rebased ?? item.baseRevision);
          outcomes.push(outcome);
          if (outcome.kind === 'pushed') {
            rebased = outcome.serverRevision;
          }

          if (outcome.kind === 'aborted') {
            halt.aborted = true;
            return;
          }
          if (outcome.kind === 'failed' && outcome.error.kind !== 'permanent') {
            blocked.add(entityKey(item.collection, item.id));
            break;
          }
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.pushConcurrency, groups.length) }, () =>
      worker()
    );
    await Promise.all(workers);
    return outcomes;
  }

  private async send(item: QueueItem, baseRevision: number | null): Promise<PushOutcome> {
    const request: PushRequest = {
      collection: item.collection,
      id: item.id,
      operation: item.operation,
      payload: item.payload,
      idempotencyKey: `${this.storeId}:${item.sequence}`,
      baseRevision,
    };

    try {
      const { serverRevision } = await this.remote.push(request);
      this.logger.debug('Pushed', {
        sequence: item.sequence,
        collection: item.collection,
        id: item.id,
        serverRevision,
      });
      return { kind: 'pushed', item, serverRevision };
    } catch (caught) {
      const error = RemoteError.from(caught, {
        sequence: item.sequence,
        collection: item.collection,
        id: item.id,
      });
      this.logger.debug('Push failed', { sequence: item.sequence, kind: error.kind, error: error.message });
      return error.isConnectivityError
        ? { kind: 'aborted', item, error }
        : { kind: 'failed', item, error };
    }
  }

  /**
   * Apply ack/fail bookkeeping in ascending sequence order, in one
   * transaction
   */
  private async settle(outcomes: PushOutcome[], counters: RunCounters): Promise<void> {
    const ordered = [...outcomes].sort((a, b) => a.item.sequence - b.item.sequence);

    const { changes, events } = await this.lock.run(() =>
      this.backend.transaction((tx): CommitResult => {
        const result: CommitResult = { changes: [], events: [] };

        for (const outcome of ordered) {
          if (outcome.kind === 'aborted') continue;
          const { item } = outcome;
          const current = tx.getQueueItem(item.sequence);
          if (!current || current.deadLetter) continue;

          if (outcome.kind === 'pushed') {
            this.queue.ackIn(tx, item.sequence);
            const change = this.confirm(tx, item, outcome.serverRevision);
            if (change) result.changes.push(change);
            result.events.push({
              type: 'item-pushed',
              sequence: item.sequence,
              collection: item.collection,
              id: item.id,
              serverRevision: outcome.serverRevision,
            });
            continue;
          }

          const updated = this.queue.failIn(
            tx,
            item.sequence,
            outcome.error.message,
            outcome.error.kind === 'permanent'
          );
          result.events.push(
            updated.deadLetter
              ? {
                  type: 'item-dead-lettered',
                  sequence: item.sequence,
                  collection: item.collection,
                  id: item.id,
                  reason: outcome.error.message,
                }
              : {
                  type: 'item-failed',
                  sequence: item.sequence,
                  collection: item.collection,
                  id: item.id,
                  attemptCount: updated.attemptCount,
                  nextAttemptAt: updated.nextAttemptAt,
                  error: outcome.error.message,
                }
          );
        }

        return result;
      })
    );

    this.publish(changes, events, counters);
  }

  /**
   * Mark an entity clean once its last pending item is acknowledged, or
   * purge a confirmed tombstone. Items still pending move onto the new
   * server revision.
   */
  private confirm(tx: StorageTransaction, item: QueueItem, serverRevision: number): EntityChange | null {
    if (this.queue.hasActiveFor(tx, item.collection, item.id)) {
      this.queue.rebaseActiveIn(tx, item.collection, item.id, serverRevision);
      return null;
    }
    if (!tx.hasCollection(item.collection)) return null;

    const entity = tx.getEntity(item.collection, item.id);
    if (!entity || entity.syncState !== 'pending-push') return null;

    if (entity.isDeleted) {
      return this.store.purgeIn(tx, item.collection, item.id, 'remote');
    }
    return this.store.writeIn(
      tx,
      { ...entity, revision: serverRevision, syncState: 'clean', conflict: null },
      'remote'
    );
  }

  // ── Pulling ──────────────────────────────────────────────────────────

  /**
   * Page through every collection. Returns null when cancelled.
   */
  private async pull(): Promise<PulledCollection[] | null> {
    const pulled: PulledCollection[] = [];

    for (const collection of this.collections) {
      let cursor = await this.backend.read((reader) => reader.getCursor(collection));
      const byId = new Map<string, RemoteEntity>();
      let received = 0;

      for (;;) {
        if (this.cancelRequested) return null;

        const page = await this.remote.pull(collection, cursor);
        for (const change of page.changes) {
          byId.delete(change.id);
          byId.set(change.id, change);
        }
        received += page.changes.length;

        if (!page.hasMore) {
          pulled.push({ collection, changes: [...byId.values()], cursor: page.cursor, received });
          break;
        }
        if (page.cursor === cursor) {
          throw RemoteError.permanent('Remote reported more changes without advancing the cursor', {
            collection,
            cursor,
          });
        }
        cursor = page.cursor;
      }

      this.logger.debug('Pulled', { collection, count: received });
    }

    return pulled;
  }

  // ── Resolving ────────────────────────────────────────────────────────

  private async plan(pulled: PulledCollection[]): Promise<PlannedChange[]> {
    return this.backend.read((reader) => {
      const planned: PlannedChange[] = [];
      for (const { collection, changes } of pulled) {
        for (const remote of changes) {
          const local = reader.getEntity(collection, remote.id);
          const decision = this.decide(reader, collection, local, remote);
          planned.push({ collection, remote, local, decision });
        }
      }
      return planned;
    });
  }

  private decide(
    reader: StorageReader,
    collection: string,
    local: Entity | null,
    remote: RemoteEntity
  ): Decision {
    const remoteDeleted = remote.deleted ?? false;

    if (!local) {
      return remoteDeleted ? { kind: 'skip' } : { kind: 'apply' };
    }

    if (local.syncState === 'clean') {
      // Older than what this store already holds
      if (remote.serverRevision < local.revision) return { kind: 'skip' };
      return { kind: 'apply' };
    }

    if (local.isDeleted && remoteDeleted) {
      return { kind: 'skip' };
    }

    // Pending items already build on this revision (typically the echo of
    // an earlier push from this store)
    const [pending] = reader.listQueueItems({ collection, id: remote.id, limit: 1 });
    if (pending && pending.baseRevision !== null && remote.serverRevision <= pending.baseRevision) {
      return { kind: 'skip' };
    }

    try {
      const record = this.resolverFor(collection).resolve(local, remoteToEntity(collection, remote));
      return { kind: 'resolved', record };
    } catch (error) {
      if (error instanceof ConflictResolutionError) {
        return { kind: 'conflicted', local, error };
      }
      throw error;
    }
  }

  private resolverFor(collection: string): ConflictResolver {
    return this.resolvers[collection] ?? this.defaultResolver;
  }

  // ── Committing ───────────────────────────────────────────────────────

  private async commit(
    pulled: PulledCollection[],
    planned: PlannedChange[],
    counters: RunCounters
  ): Promise<void> {
    const { changes, events } = await this.lock.run(() =>
      this.backend.transaction((tx): CommitResult => {
        const result: CommitResult = { changes: [], events: [] };

        for (const entry of planned) {
          const local = tx.getEntity(entry.collection, entry.remote.id);
          const decision = sameVersion(local, entry.local)
            ? entry.decision
            : this.decide(tx, entry.collection, local, entry.remote);
          this.applyDecision(tx, entry.collection, entry.remote, decision, result);
        }

        for (const { collection, cursor } of pulled) {
          tx.setCursor(collection, cursor);
        }
        return result;
      })
    );

    const pulledEvents: SyncEvent[] = pulled.map(({ collection, cursor, received }) => {
      counters.pulled += received;
      return { type: 'pulled', collection, count: received, cursor };
    });
    this.publish(changes, [...pulledEvents, ...events], counters);
  }

  private applyDecision(
    tx: StorageTransaction,
    collection: string,
    remote: RemoteEntity,
    decision: Decision,
    result: CommitResult
  ): void {
    switch (decision.kind) {
      case 'skip':
        return;

      case 'apply':
        result.changes.push(this.store.applyRemoteIn(tx, collection, remote));
        return;

      case 'conflicted': {
        const entity: Entity = {
          ...decision.local,
          syncState: 'conflicted',
          conflict: {
            remotePayload: remote.payload,
            remoteRevision: remote.serverRevision,
            remoteUpdatedAt: remote.updatedAt,
            remoteDeleted: remote.deleted ?? false,
            error: decision.error.message,
          },
        };
        result.changes.push(this.store.writeIn(tx, entity, 'remote'));
        result.events.push({
          type: 'entity-conflicted',
          collection,
          id: remote.id,
          error: decision.error.message,
        });
        this.logger.warn('Entity conflicted', { collection, id: remote.id, error: decision.error.message });
        return;
      }

      case 'resolved':
        this.applyResolution(tx, collection, decision.record, result);
        result.events.push({
          type: 'conflict-resolved',
          collection,
          id: remote.id,
          resolution: decision.record.resolution,
        });
        return;
    }
  }

  private applyResolution(
    tx: StorageTransaction,
    collection: string,
    record: ConflictRecord,
    result: CommitResult
  ): void {
    const { resolved } = record;

    switch (record.resolution) {
      case 'remote-wins': {
        result.changes.push(
          resolved.isDeleted
            ? this.store.purgeIn(tx, collection, resolved.id, 'remote')
            : this.store.writeIn(tx, resolved, 'remote')
        );
        for (const item of this.queue.deadLetterActiveIn(tx, collection, resolved.id, SUPERSEDED_BY_REMOTE)) {
          result.events.push({
            type: 'item-dead-lettered',
            sequence: item.sequence,
            collection,
            id: resolved.id,
            reason: SUPERSEDED_BY_REMOTE,
          });
        }
        return;
      }

      case 'local-wins': {
        result.changes.push(this.store.writeIn(tx, resolved, 'local'));
        const baseRevision = record.remote.isDeleted ? null : record.remote.revision;
        if (this.queue.hasActiveFor(tx, collection, resolved.id)) {
          this.queue.rebaseActiveIn(tx, collection, resolved.id, baseRevision);
          return;
        }
        let operation: QueueOperation = 'update';
        if (resolved.isDeleted) operation = 'delete';
        else if (record.remote.isDeleted) operation = 'create';
        this.queue.append(tx, {
          collection,
          id: resolved.id,
          operation,
          payload: resolved.payload,
          baseRevision,
        });
        return;
      }

      case 'merged':
        // The merged payload carries the local edits, so it replaces them
        result.changes.push(this.store.writeIn(tx, resolved, 'local'));
        this.queue.replaceActiveIn(tx, {
          collection,
          id: resolved.id,
          operation: 'update',
          payload: resolved.payload,
          baseRevision: record.remote.revision,
        });
        return;
    }
  }

  // ── Private ──────────────────────────────────────────────────────────

  private publish(changes: EntityChange[], events: SyncEvent[], counters: RunCounters): void {
    this.store.publish(changes);
    for (const event of events) {
      switch (event.type) {
        case 'item-pushed':
          counters.pushed++;
          break;
        case 'item-failed':
          counters.failed++;
          break;
        case 'item-dead-lettered':
          counters.deadLettered++;
          break;
        case 'conflict-resolved':
        case 'entity-conflicted':
          counters.conflicts++;
          break;
        default:
          break;
      }
      this.emit(event);
    }
  }

  private buildResult(
    trigger: SyncTrigger,
    status: SyncRunStatus,
    counters: RunCounters,
    startedAt: number
  ): SyncRunResult {
    return { trigger, status, ...counters, startedAt, finishedAt: this.clock.now() };
  }

  private recordStats(result: SyncRunResult): void {
    const stats = this.statsValue;
    this.statsValue = {
      runs: stats.runs + 1,
      pushed: stats.pushed + result.pushed,
      failed: stats.failed + result.failed,
      deadLettered: stats.deadLettered + result.deadLettered,
      pulled: stats.pulled + result.pulled,
      conflicts: stats.conflicts + result.conflicts,
      lastRunAt: result.finishedAt,
      lastError: result.error ? result.error.message : null,
    };
  }

  private fire(trigger: SyncTrigger): void {
    if (this.closed) return;
    if (this.connectivity && !this.connectivity.isOnline()) {
      this.logger.debug('Offline, trigger skipped', { trigger });
      return;
    }
    void this.triggerSync(trigger);
  }

  private scheduleInterval(): void {
    if (!this.running || this.intervalMs === 0) return;
    this.intervalTimer = this.clock.schedule(this.intervalMs, () => {
      this.intervalTimer = null;
      this.fire('interval');
      this.scheduleInterval();
    });
  }

  /**
   * Arm a timer for the earliest retry that is still in the future
   */
  private async scheduleRetry(): Promise<void> {
    this.cancelRetry();
    if (!this.running) return;

    let dueAt: number | null;
    try {
      dueAt = await this.queue.nextDueAt(this.clock.now());
    } catch (error) {
      this.logger.warn('Could not schedule retry', { error: toError(error).message });
      return;
    }
    if (dueAt === null || !this.running) return;

    // Another run may have armed a timer while this one awaited the queue
    this.cancelRetry();
    this.retryTimer = this.clock.schedule(dueAt - this.clock.now(), () => {
      this.retryTimer = null;
      this.fire('retry');
    });
    this.logger.debug('Retry scheduled', { dueAt });
  }

  private cancelRetry(): void {
    this.retryTimer?.cancel();
    this.retryTimer = null;
  }

  private setState(state: CoordinatorState): void {
    if (this.stateSubject.value !== state && !this.stateSubject.closed) {
      this.stateSubject.next(state);
    }
  }

  private emit(event: SyncEvent): void {
    if (!this.eventsSubject.closed) {
      this.eventsSubject.next(event);
    }
  }
}

/**
 * Create a sync coordinator
 */
export function createSyncCoordinator(options: SyncCoordinatorOptions): SyncCoordinator {
  return new SyncCoordinator(options);
}
