import {
  AsyncLock,
  ConflictResolver,
  LocalStore,
  MigrationManager,
  SUPERSEDED_BY_REMOTE,
  SyncQueue,
  VirtualClock,
  type EntityChange,
} from '@tidemark/core';
import { afterEach, describe, expect, it } from 'vitest';
import { createMemoryBackend, type MemoryStorageBackend } from '@tidemark/storage-memory';
import { createInMemoryRemote, type InMemoryRemote } from '@tidemark/testing';
import { createManualConnectivity, type ConnectivityMonitor } from './connectivity.js';
import { SyncCoordinator } from './sync-coordinator.js';
import type { RemoteApi } from './transport/types.js';
import type { CoordinatorState, SyncEvent } from './types.js';

interface Harness {
  backend: MemoryStorageBackend;
  clock: VirtualClock;
  queue: SyncQueue;
  store: LocalStore;
  remote: InMemoryRemote;
  coordinator: SyncCoordinator;
}

interface HarnessOptions {
  resolvers?: Record<string, ConflictResolver>;
  connectivity?: ConnectivityMonitor;
  intervalMs?: number;
  batchSize?: number;
  pushConcurrency?: number;
  pageSize?: number;
  wrapRemote?: (inner: InMemoryRemote) => RemoteApi;
}

const harnesses: Harness[] = [];

async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const backend = createMemoryBackend();
  await backend.open({ name: 'sync' });
  const clock = new VirtualClock(1_000);
  const lock = new AsyncLock();

  await new MigrationManager(backend, {
    lock,
    clock,
    migrations: [{ version: 1, name: 'initial', up: (ctx) => ctx.createCollection('posts') }],
  }).initialize();

  const queue = new SyncQueue(backend, {
    lock,
    clock,
    backoff: { baseDelayMs: 1_000, maxAttempts: 3, jitter: 0 },
  });
  const store = new LocalStore(backend, { queue, lock, clock });
  const remote = createInMemoryRemote({ clock, pageSize: options.pageSize });

  const coordinator = new SyncCoordinator({
    backend,
    store,
    queue,
    remote: options.wrapRemote ? options.wrapRemote(remote) : remote,
    collections: ['posts'],
    resolvers: options.resolvers,
    lock,
    storeId: 'store-1',
    connectivity: options.connectivity,
    clock,
    intervalMs: options.intervalMs,
    batchSize: options.batchSize,
    pushConcurrency: options.pushConcurrency,
  });

  const harness = { backend, clock, queue, store, remote, coordinator };
  harnesses.push(harness);
  return harness;
}

describe('SyncCoordinator', () => {
  afterEach(async () => {
    for (const harness of harnesses.splice(0)) {
      await harness.coordinator.close();
    }
  });

  describe('pushing', () => {
    it('should push an offline write once connectivity returns', async () => {
      const connectivity = createManualConnectivity(false);
      const { coordinator, store, queue, remote } = await createHarness({ connectivity });
      coordinator.start();

      await store.put('posts', 'p1', { caption: 'a' });
      const [queued] = await queue.peekBatch(10);
      expect(queued).toMatchObject({ sequence: 1, operation: 'create' });
      expect(remote.pushes).toHaveLength(0);

      connectivity.setOnline(true);
      await coordinator.whenIdle();

      expect(await queue.pendingCount()).toBe(0);
      const entity = await store.get('posts', 'p1');
      expect(entity).toMatchObject({
        payload: { caption: 'a' },
        syncState: 'clean',
        revision: remote.get('posts', 'p1')?.serverRevision,
      });
      expect(remote.pushes.map((push) => push.idempotencyKey)).toEqual(['store-1:1']);
    });

    it('should drain every batch', async () => {
      const { coordinator, store, queue, remote } = await createHarness({ batchSize: 2 });
      for (const id of ['a', 'b', 'c', 'd', 'e']) {
        await store.put('posts', id, { caption: id });
      }

      const result = await coordinator.triggerSync();

      expect(result).toMatchObject({ status: 'completed', pushed: 5, failed: 0 });
      expect(await queue.pendingCount()).toBe(0);
      expect(remote.pushes.map((push) => push.id)).toEqual(['a', 'b', 'c', 'd', 'e']);
      const states = (await store.list('posts').toArray()).map((e) => e.syncState);
      expect(states).toEqual(['clean', 'clean', 'clean', 'clean', 'clean']);
    });

    it('should chain several writes to one entity on the revisions they get', async () => {
      const { coordinator, store, queue, remote } = await createHarness();
      await store.put('posts', 'p1', { caption: 'one' });
      await store.put('posts', 'p1', { caption: 'two' });
      await store.put('posts', 'p1', { caption: 'three' });

      const result = await coordinator.triggerSync();

      expect(result).toMatchObject({ pushed: 3, failed: 0 });
      expect(remote.pushes.map((push) => [push.operation, push.baseRevision])).toEqual([
        ['create', null],
        ['update', 1],
        ['update', 2],
      ]);
      expect(await queue.pendingCount()).toBe(0);
      expect(await store.get('posts', 'p1')).toMatchObject({
        payload: { caption: 'three' },
        revision: 3,
        syncState: 'clean',
      });
    });

    it('should purge a tombstone once the remote confirms the delete', async () => {
      const { coordinator, store, remote } = await createHarness();
      await store.put('posts', 'p1', { caption: 'short-lived' });
      await coordinator.triggerSync();

      await store.delete('posts', 'p1');
      await coordinator.triggerSync();

      expect(await store.get('posts', 'p1', { includeDeleted: true })).toBeNull();
      expect(remote.get('posts', 'p1')).toMatchObject({ serverRevision: 2, deleted: true });
      expect(remote.pushes.map((push) => [push.operation, push.baseRevision])).toEqual([
        ['create', null],
        ['delete', 1],
      ]);
    });

    it('should reschedule transient failures with backoff', async () => {
      const { coordinator, store, queue, remote } = await createHarness();
      await store.put('posts', 'p1', {});
      remote.failPushes({ kind: 'transient', message: 'HTTP error: 503' });

      const result = await coordinator.triggerSync();

      expect(result).toMatchObject({ status: 'completed', pushed: 0, failed: 1 });
      const [item] = await queue.peekBatch(1);
      expect(item).toMatchObject({
        attemptCount: 1,
        lastError: 'HTTP error: 503',
        nextAttemptAt: 2_000,
        deadLetter: false,
      });
    });

    it('should skip items whose retry time has not come', async () => {
      const { coordinator, store, clock, remote } = await createHarness();
      await store.put('posts', 'p1', {});
      remote.failPushes({ kind: 'transient' });
      await coordinator.triggerSync();

      await coordinator.triggerSync();
      expect(remote.pushes).toHaveLength(1);

      clock.advance(1_000);
      const result = await coordinator.triggerSync();
      expect(result.pushed).toBe(1);
      expect(remote.pushes).toHaveLength(2);
    });

    it('should dead-letter an item after the attempt ceiling', async () => {
      const { coordinator, store, queue, clock, remote } = await createHarness();
      await store.put('posts', 'p1', {});
      remote.failPushes({ kind: 'transient', message: 'HTTP error: 500', times: Infinity });

      await coordinator.triggerSync();
      clock.advance(1_000);
      await coordinator.triggerSync();
      clock.advance(2_000);
      const last = await coordinator.triggerSync();

      expect(last).toMatchObject({ failed: 0, deadLettered: 1 });
      expect(await queue.pendingCount()).toBe(0);
      const [dead] = await queue.deadLetters();
      expect(dead).toMatchObject({ attemptCount: 3, lastError: 'HTTP error: 500' });
      expect((await store.get('posts', 'p1'))?.syncState).toBe('pending-push');
    });

    it('should dead-letter a permanent rejection at once', async () => {
      const { coordinator, store, queue, remote } = await createHarness();
      await store.put('posts', 'p1', {});
      remote.failPushes({ kind: 'permanent', message: 'HTTP error: 422' });

      const result = await coordinator.triggerSync();

      expect(result).toMatchObject({ status: 'completed', deadLettered: 1, failed: 0 });
      expect((await queue.deadLetters()).map((item) => item.lastError)).toEqual(['HTTP error: 422']);
    });

    it('should abort the run when the remote is unreachable', async () => {
      const { coordinator, store, queue, backend, remote } = await createHarness();
      await store.put('posts', 'p1', {});
      remote.setReachable(false);

      const result = await coordinator.triggerSync();

      expect(result.status).toBe('failed');
      expect(result.error?.message).toBe('Remote unreachable');
      const [item] = await queue.peekBatch(1);
      expect(item?.attemptCount).toBe(0);
      expect(await backend.read((reader) => reader.getCursor('posts'))).toBeNull();
      expect(coordinator.state).toBe('idle');
    });

    it('should keep at most pushConcurrency entities in flight', async () => {
      let inFlight = 0;
      let peak = 0;
      const { coordinator, store } = await createHarness({
        pushConcurrency: 2,
        wrapRemote: (inner) => ({
          push: async (request) => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await new Promise((resolve) => setImmediate(resolve));
            inFlight--;
            return inner.push(request);
          },
          pull: (collection, cursor) => inner.pull(collection, cursor),
        }),
      });
      for (const id of ['a', 'b', 'c']) {
        await store.put('posts', id, {});
      }

      const result = await coordinator.triggerSync();

      expect(result.pushed).toBe(3);
      expect(peak).toBe(2);
    });
  });

  describe('pulling', () => {
    it('should apply remote changes and advance the cursor', async () => {
      const { coordinator, store, backend, remote } = await createHarness({ pageSize: 2 });
      for (const id of ['r1', 'r2', 'r3', 'r4', 'r5']) {
        remote.seed('posts', id, { caption: id }, { updatedAt: 500 });
      }

      const result = await coordinator.triggerSync();

      expect(result).toMatchObject({ status: 'completed', pulled: 5 });
      expect(remote.pulls).toEqual(['posts', 'posts', 'posts']);
      expect(await backend.read((reader) => reader.getCursor('posts'))).toBe('5');
      expect(await store.get('posts', 'r3')).toMatchObject({
        payload: { caption: 'r3' },
        revision: 3,
        updatedAt: 500,
        syncState: 'clean',
      });
    });

    it('should purge an entity the remote deleted', async () => {
      const { coordinator, store, remote } = await createHarness();
      remote.seed('posts', 'p1', { caption: 'x' });
      await coordinator.triggerSync();
      const changes: EntityChange[] = [];
      store.changes$.subscribe((change) => changes.push(change));

      remote.seed('posts', 'p1', {}, { deleted: true });
      await coordinator.triggerSync();

      expect(await store.get('posts', 'p1', { includeDeleted: true })).toBeNull();
      expect(changes).toEqual([
        { operation: 'purge', collection: 'posts', id: 'p1', entity: null, origin: 'remote' },
      ]);
    });

    it('should leave cursors and entities untouched when a pull fails', async () => {
      const { coordinator, store, backend, remote } = await createHarness();
      remote.seed('posts', 'p9', { caption: 'later' });
      remote.failPulls({ kind: 'transient', message: 'pull broke' });

      const failed = await coordinator.triggerSync();

      expect(failed.status).toBe('failed');
      expect(failed.error?.message).toBe('pull broke');
      expect(await backend.read((reader) => reader.getCursor('posts'))).toBeNull();
      expect(await store.get('posts', 'p9')).toBeNull();

      const retried = await coordinator.triggerSync();
      expect(retried.status).toBe('completed');
      expect((await store.get('posts', 'p9'))?.payload).toEqual({ caption: 'later' });
    });

    it('should fail a run whose remote never advances the cursor', async () => {
      const { coordinator } = await createHarness({
        wrapRemote: (inner) => ({
          push: (request) => inner.push(request),
          pull: () => Promise.resolve({ changes: [], cursor: 'stuck', hasMore: true }),
        }),
      });

      const result = await coordinator.triggerSync();

      expect(result.status).toBe('failed');
      expect(result.error?.message).toBe('Remote reported more changes without advancing the cursor');
    });
  });

  describe('conflicts', () => {
    it('should let a newer remote version win under last-write-wins', async () => {
      const { coordinator, store, queue, clock, remote } = await createHarness({
        resolvers: { posts: new ConflictResolver({ strategy: 'last-write-wins' }) },
      });
      await store.put('posts', 'p1', { caption: 'local' });
      remote.seed('posts', 'p1', { caption: 'remote' }, { updatedAt: clock.now() + 1_000 });

      const result = await coordinator.triggerSync();

      expect(result).toMatchObject({
        status: 'completed',
        pushed: 0,
        failed: 1,
        deadLettered: 1,
        pulled: 1,
        conflicts: 1,
      });
      expect(await store.get('posts', 'p1')).toMatchObject({
        payload: { caption: 'remote' },
        revision: 1,
        syncState: 'clean',
      });
      expect(await queue.pendingCount()).toBe(0);
      expect((await queue.deadLetters()).map((item) => item.lastError)).toEqual([SUPERSEDED_BY_REMOTE]);
    });

    it('should re-push the local version when it wins', async () => {
      const { coordinator, store, clock, remote } = await createHarness({
        resolvers: { posts: new ConflictResolver({ strategy: 'local-wins' }) },
      });
      await store.put('posts', 'p1', { caption: 'local' });
      remote.seed('posts', 'p1', { caption: 'remote' });

      const first = await coordinator.triggerSync();
      expect(first).toMatchObject({ failed: 1, conflicts: 1 });
      expect(await store.get('posts', 'p1')).toMatchObject({
        payload: { caption: 'local' },
        syncState: 'pending-push',
      });

      clock.advance(1_000);
      const second = await coordinator.triggerSync();

      expect(second.pushed).toBe(1);
      expect(remote.get('posts', 'p1')?.payload).toEqual({ caption: 'local' });
      expect(await store.get('posts', 'p1')).toMatchObject({ revision: 2, syncState: 'clean' });
    });

    it('should park an entity whose merge fails until the application resolves it', async () => {
      const { coordinator, store, queue, clock, remote } = await createHarness({
        resolvers: {
          posts: new ConflictResolver({
            strategy: 'field-merge',
            merge: () => {
              throw new Error('incompatible');
            },
          }),
        },
      });
      await store.put('posts', 'p1', { caption: 'local' });
      remote.seed('posts', 'p1', { caption: 'remote' });

      const first = await coordinator.triggerSync();
      expect(first).toMatchObject({ failed: 1, conflicts: 1 });

      const [conflicted] = await store.conflicts('posts');
      expect(conflicted).toMatchObject({
        syncState: 'conflicted',
        payload: { caption: 'local' },
        conflict: {
          remotePayload: { caption: 'remote' },
          remoteRevision: 1,
          error: 'Conflict resolution failed for posts/p1: incompatible',
        },
      });

      clock.advance(1_000);
      await coordinator.triggerSync();
      expect(remote.pushes).toHaveLength(1);

      await store.resolveConflict('posts', 'p1', { caption: 'final' });
      const settled = await coordinator.triggerSync();

      expect(settled.pushed).toBe(2);
      expect(await queue.pendingCount()).toBe(0);
      expect(remote.get('posts', 'p1')?.payload).toEqual({ caption: 'final' });
      expect(await store.get('posts', 'p1')).toMatchObject({
        payload: { caption: 'final' },
        revision: 3,
        syncState: 'clean',
      });
    });
  });

  describe('field merge', () => {
    it('should push one merged version that keeps both sides', async () => {
      const { coordinator, store, queue, remote } = await createHarness({
        resolvers: {
          posts: new ConflictResolver({
            strategy: 'field-merge',
            merge: (mine, theirs) => ({ ...theirs, caption: mine.caption }),
          }),
        },
      });
      await store.put('posts', 'p1', { caption: 'a', likes: 0 });
      await coordinator.triggerSync();
      remote.seed('posts', 'p1', { caption: 'a', likes: 5 });
      await store.put('posts', 'p1', { caption: 'local', likes: 0 });

      const first = await coordinator.triggerSync();
      expect(first).toMatchObject({ pushed: 0, failed: 1, pulled: 1, conflicts: 1 });

      const queued = await queue.peekBatch(10);
      expect(queued).toHaveLength(1);
      expect(queued[0]).toMatchObject({
        operation: 'update',
        payload: { caption: 'local', likes: 5 },
        baseRevision: 2,
        attemptCount: 0,
      });

      const second = await coordinator.triggerSync();
      expect(second.pushed).toBe(1);

      // Nothing after the remote's edit dropped its field
      const later = await remote.pull('posts', '2');
      expect(later.changes.map((change) => change.payload)).toEqual([{ caption: 'local', likes: 5 }]);
      expect(await store.get('posts', 'p1')).toMatchObject({
        payload: { caption: 'local', likes: 5 },
        revision: 3,
        syncState: 'clean',
      });
    });
  });

  describe('runs', () => {
    it('should coalesce triggers into one follow-up run', async () => {
      const { coordinator } = await createHarness();

      const first = coordinator.triggerSync();
      const second = coordinator.triggerSync('interval');
      const third = coordinator.triggerSync();

      expect(second).toBe(third);
      expect(second).not.toBe(first);
      const [a, b] = await Promise.all([first, second]);
      expect(a.trigger).toBe('manual');
      expect(b.trigger).toBe('interval');
      expect(coordinator.stats().runs).toBe(2);
    });

    it('should hand a trigger made right after a run settles to the queued follow-up', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const { coordinator } = await createHarness({
        wrapRemote: (inner) => ({
          push: (request) => inner.push(request),
          pull: async (collection, cursor) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            try {
              await new Promise<void>((resolve) => setImmediate(resolve));
              return await inner.pull(collection, cursor);
            } finally {
              inFlight--;
            }
          },
        }),
      });

      const first = coordinator.triggerSync();
      const chained = (async () => {
        await first;
        return coordinator.triggerSync();
      })();
      const followUp = coordinator.triggerSync('interval');

      const [, again, queued] = await Promise.all([first, chained, followUp]);

      expect(again).toBe(queued);
      expect(queued.trigger).toBe('interval');
      expect(maxInFlight).toBe(1);
      expect(coordinator.stats().runs).toBe(2);
    });

    it('should stop at the next queue item when cancelled', async () => {
      let coordinatorRef: SyncCoordinator | null = null;
      const harness = await createHarness({
        wrapRemote: (inner) => ({
          push: (request) => {
            coordinatorRef?.cancel();
            return inner.push(request);
          },
          pull: (collection, cursor) => inner.pull(collection, cursor),
        }),
      });
      coordinatorRef = harness.coordinator;
      await harness.store.put('posts', 'a', {});
      await harness.store.put('posts', 'b', {});

      const result = await harness.coordinator.triggerSync();

      expect(result).toMatchObject({ status: 'cancelled', pushed: 1 });
      expect(await harness.queue.pendingCount()).toBe(1);
      expect(harness.remote.pulls).toEqual([]);
    });

    it('should walk the lifecycle states', async () => {
      const { coordinator, remote } = await createHarness();
      const states: CoordinatorState[] = [];
      coordinator.state$.subscribe((state) => states.push(state));

      await coordinator.triggerSync();
      remote.setReachable(false);
      await coordinator.triggerSync();

      expect(states).toEqual([
        'idle',
        'draining',
        'pulling',
        'resolving',
        'committing',
        'idle',
        'draining',
        'pulling',
        'failed',
        'idle',
      ]);
    });

    it('should report events and cumulative stats', async () => {
      const { coordinator, store } = await createHarness();
      const events: SyncEvent[] = [];
      coordinator.events$.subscribe((event) => events.push(event));
      await store.put('posts', 'p1', {});

      await coordinator.triggerSync();

      expect(events.map((event) => event.type)).toEqual([
        'run-started',
        'item-pushed',
        'pulled',
        'run-completed',
      ]);
      expect(events[2]).toEqual({ type: 'pulled', collection: 'posts', count: 1, cursor: '1' });
      expect(coordinator.stats()).toEqual({
        runs: 1,
        pushed: 1,
        failed: 0,
        deadLettered: 0,
        pulled: 1,
        conflicts: 0,
        lastRunAt: 1_000,
        lastError: null,
      });
    });
  });

  describe('timers', () => {
    it('should run on start, on every interval and after stop no more', async () => {
      const { coordinator, clock } = await createHarness({ intervalMs: 5_000 });

      coordinator.start();
      await coordinator.whenIdle();
      expect(coordinator.stats().runs).toBe(1);

      clock.advance(5_000);
      await coordinator.whenIdle();
      expect(coordinator.stats().runs).toBe(2);

      coordinator.stop();
      clock.advance(20_000);
      await coordinator.whenIdle();
      expect(coordinator.stats().runs).toBe(2);
    });

    it('should retry failed items when their backoff expires', async () => {
      const { coordinator, store, queue, clock, remote } = await createHarness();
      await store.put('posts', 'p1', {});
      remote.failPushes({ kind: 'transient' });

      coordinator.start();
      await coordinator.whenIdle();
      expect(await queue.pendingCount()).toBe(1);

      clock.advance(1_000);
      await coordinator.whenIdle();

      expect(await queue.pendingCount()).toBe(0);
      expect(coordinator.stats().runs).toBe(2);
    });

    it('should not run on startup while offline', async () => {
      const connectivity = createManualConnectivity(false);
      const { coordinator } = await createHarness({ connectivity });

      coordinator.start();
      await coordinator.whenIdle();

      expect(coordinator.stats().runs).toBe(0);
    });
  });

  it('should complete its observables on close', async () => {
    const { coordinator } = await createHarness();
    let completed = 0;
    coordinator.state$.subscribe({ complete: () => completed++ });
    coordinator.events$.subscribe({ complete: () => completed++ });

    await coordinator.close();

    expect(completed).toBe(2);
  });
});
