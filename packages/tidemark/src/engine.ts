import { randomUUID } from 'node:crypto';
import {
  AsyncLock,
  ConflictResolver,
  LocalStore,
  MigrationManager,
  SyncQueue,
  TidemarkError,
  resolveLogger,
  systemClock,
  type Entity,
  type EntityChange,
  type EntityPayload,
  type EntitySequence,
  type GetOptions,
  type ListOptions,
  type Logger,
  type MigrationStatus,
  type PayloadSchema,
  type QueueItem,
  type StorageBackend,
} from '@tidemark/core';
import {
  SyncCoordinator,
  type CoordinatorState,
  type SyncEvent,
  type SyncRunResult,
  type SyncStats,
} from '@tidemark/sync';
import { EMPTY, of, type Observable } from 'rxjs';
import { validateEngineConfig, type EngineConfig } from './config.js';

/** Meta key of the persisted store id */
export const STORE_ID_META_KEY = 'store_id';

/**
 * Offline-first data engine.
 *
 * Wires the Migration Manager, Local Store, Sync Queue, Conflict Resolver
 * and (with a remote) the Sync Coordinator over one storage backend and one
 * exclusive lock. Reads and writes never wait for the network.
 *
 * @example
 * ```typescript
 * import { Engine, createMemoryBackend } from 'tidemark';
 * import { createHttpRemote } from 'tidemark/sync';
 *
 * const engine = await Engine.open({
 *   backend: createMemoryBackend(),
 *   migrations: [{ version: 1, name: 'notes', up: (ctx) => ctx.createCollection('notes') }],
 *   collections: { notes: { strategy: 'last-write-wins' } },
 *   remote: createHttpRemote({ baseUrl: 'https://api.example.com/sync' }),
 * });
 *
 * await engine.put('notes', 'n1', { title: 'Groceries' });
 * const result = await engine.triggerSync();
 * console.log(result.status, result.pushed);
 *
 * await engine.close();
 * ```
 */
export class Engine {
  readonly name: string;
  private readonly config: EngineConfig;
  private readonly backend: StorageBackend;
  private readonly lock = new AsyncLock();
  private readonly migrations: MigrationManager;
  private readonly queue: SyncQueue;
  private readonly store: LocalStore;
  private readonly logger: Logger;
  private coordinator: SyncCoordinator | null = null;
  private storeIdValue: string | null = null;
  private closed = false;

  /**
   * Open an engine: open the backend, run pending migrations, create the
   * configured collections and start sync.
   *
   * No engine is returned when a step fails; the backend is closed again.
   *
   * @throws ValidationError when the config is malformed
   * @throws MigrationError when a migration fails or the stored schema is newer
   */
  static async open(config: EngineConfig): Promise<Engine> {
    validateEngineConfig(config);
    const engine = new Engine(config);
    await engine.initialize();
    return engine;
  }

  private constructor(config: EngineConfig) {
    this.config = config;
    this.name = config.name ?? 'tidemark';
    this.backend = config.backend;
    this.logger = resolveLogger(config.logger, 'Engine');
    const clock = config.clock ?? systemClock;

    this.migrations = new MigrationManager(this.backend, {
      migrations: config.migrations,
      lock: this.lock,
      clock,
      logger: config.logger,
    });
    this.queue = new SyncQueue(this.backend, {
      lock: this.lock,
      clock,
      backoff: config.backoff,
      logger: config.logger,
    });

    const schemas: Record<string, PayloadSchema> = {};
    for (const [name, collection] of Object.entries(config.collections ?? {})) {
      if (collection.schema) {
        schemas[name] = collection.schema;
      }
    }
    this.store = new LocalStore(this.backend, {
      queue: this.queue,
      lock: this.lock,
      clock,
      schemas,
      readiness: this.migrations,
      logger: config.logger,
    });
  }

  /** Committed entity changes, local and remote */
  get changes$(): Observable<EntityChange> {
    return this.store.changes$;
  }

  /** Coordinator state; always `idle` without a remote */
  get syncState$(): Observable<CoordinatorState> {
    return this.coordinator?.state$ ?? of<CoordinatorState>('idle');
  }

  /** Sync progress events; completes at once without a remote */
  get syncEvents$(): Observable<SyncEvent> {
    return this.coordinator?.events$ ?? EMPTY;
  }

  /** Random id persisted at first open, prefix of every idempotency key */
  get storeId(): string {
    if (this.storeIdValue === null) {
      throw TidemarkError.fromCode('TIDEMARK_S301', { component: 'Engine' });
    }
    return this.storeIdValue;
  }

  /** Whether a remote is configured */
  get syncEnabled(): boolean {
    return this.coordinator !== null;
  }

  get isOpen(): boolean {
    return !this.closed && this.backend.isOpen();
  }

  // ── Entities ─────────────────────────────────────────────────────────

  put(collection: string, id: string, payload: EntityPayload): Promise<Entity> {
    return this.store.put(collection, id, payload);
  }

  get(collection: string, id: string, options?: GetOptions): Promise<Entity | null> {
    return this.store.get(collection, id, options);
  }

  delete(collection: string, id: string): Promise<Entity | null> {
    return this.store.delete(collection, id);
  }

  list(collection: string, options?: ListOptions): EntitySequence {
    return this.store.list(collection, options);
  }

  conflicts(collection?: string): Promise<Entity[]> {
    return this.store.conflicts(collection);
  }

  resolveConflict(collection: string, id: string, payload: EntityPayload): Promise<Entity> {
    return this.store.resolveConflict(collection, id, payload);
  }

  // ── Queue ────────────────────────────────────────────────────────────

  async deadLetters(): Promise<QueueItem[]> {
    this.assertOpen();
    return this.queue.deadLetters();
  }

  async retryDeadLetter(sequence: number): Promise<QueueItem> {
    this.assertOpen();
    return this.queue.retryDeadLetter(sequence);
  }

  async discardDeadLetter(sequence: number): Promise<QueueItem> {
    this.assertOpen();
    return this.queue.discardDeadLetter(sequence);
  }

  /** Active (not dead-lettered) queue items */
  async pendingCount(): Promise<number> {
    this.assertOpen();
    return this.queue.pendingCount();
  }

  // ── Sync ─────────────────────────────────────────────────────────────

  /**
   * Run a sync now, or join the follow-up of the active run.
   *
   * @throws TidemarkError (`TIDEMARK_C505`) when no remote is configured
   */
  async triggerSync(): Promise<SyncRunResult> {
    this.assertOpen();
    return this.requireCoordinator().triggerSync('manual');
  }

  /** Stop the active run at the next queue item */
  cancelSync(): void {
    this.coordinator?.cancel();
  }

  /** Subscribe to connectivity and arm the sync timers */
  startSync(): void {
    this.assertOpen();
    this.requireCoordinator().start();
  }

  /** Drop sync subscriptions and timers */
  stopSync(): void {
    this.coordinator?.stop();
  }

  /** Cumulative sync counters, or null without a remote */
  syncStats(): SyncStats | null {
    return this.coordinator?.stats() ?? null;
  }

  // ── Schema ───────────────────────────────────────────────────────────

  migrationStatus(): Promise<MigrationStatus> {
    return this.migrations.status();
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  /**
   * Stop sync, wait for the active run, complete the observables and close
   * the backend
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.coordinator?.close();
    this.store.close();
    await this.backend.close();
    this.logger.info('Engine closed', { name: this.name });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async initialize(): Promise<void> {
    const storeId = await this.openStore();
    this.storeIdValue = storeId;

    const remote = this.config.remote;
    if (!remote) return;

    const resolvers: Record<string, ConflictResolver> = {};
    for (const [name, collection] of Object.entries(this.config.collections ?? {})) {
      resolvers[name] = new ConflictResolver({
        strategy: collection.strategy,
        compareBy: collection.compareBy,
        merge: collection.merge,
      });
    }

    const sync = this.config.sync ?? {};
    this.coordinator = new SyncCoordinator({
      backend: this.backend,
      store: this.store,
      queue: this.queue,
      remote,
      collections: Object.keys(resolvers),
      resolvers,
      lock: this.lock,
      storeId,
      connectivity: this.config.connectivity,
      clock: this.config.clock,
      intervalMs: sync.intervalMs,
      batchSize: sync.batchSize,
      pushConcurrency: sync.pushConcurrency,
      logger: this.config.logger,
    });

    if (sync.autoStart ?? true) {
      this.coordinator.start();
    }
  }

  /**
   * Open the backend and run migrations. Closes the backend again when a
   * step fails.
   */
  private async openStore(): Promise<string> {
    await this.backend.open({ name: this.name });

    try {
      const applied = await this.migrations.initialize(this.config.targetVersion);
      const storeId = await this.prepareStore();
      this.logger.info('Engine opened', {
        name: this.name,
        storeId,
        backend: this.backend.name,
        migrationsApplied: applied,
      });
      return storeId;
    } catch (error) {
      this.closed = true;
      this.store.close();
      await this.backend.close();
      throw error;
    }
  }

  /**
   * Create missing configured collections and load (or mint) the store id
   */
  private prepareStore(): Promise<string> {
    const names = Object.keys(this.config.collections ?? {});

    return this.lock.run(() =>
      this.backend.transaction((tx) => {
        for (const name of names) {
          if (!tx.hasCollection(name)) {
            tx.createCollection(name);
            this.logger.debug('Collection created', { collection: name });
          }
        }

        const existing = tx.getMeta(STORE_ID_META_KEY);
        if (existing !== null) return existing;

        const storeId = randomUUID();
        tx.setMeta(STORE_ID_META_KEY, storeId);
        return storeId;
      })
    );
  }

  private requireCoordinator(): SyncCoordinator {
    if (!this.coordinator) {
      throw TidemarkError.fromCode('TIDEMARK_C505', { component: 'Engine' });
    }
    return this.coordinator;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw TidemarkError.fromCode('TIDEMARK_X901', { component: 'Engine' });
    }
  }
}
