import { beforeEach, describe, expect, it } from 'vitest';
import { createMemoryBackend, type MemoryStorageBackend } from '@tidemark/storage-memory';
import { AsyncLock } from '../concurrency/async-lock.js';
import { SyncQueue } from '../queue/sync-queue.js';
import { LocalStore } from '../store/local-store.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('AsyncLock', () => {
  it('should run tasks one at a time in arrival order', async () => {
    const lock = new AsyncLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.run(() => {
      events.push('second');
      return 2;
    });

    expect(lock.isLocked).toBe(true);
    expect(lock.queueLength).toBe(2);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should release after a failing task and keep its error local', async () => {
    const lock = new AsyncLock();

    const failing = lock.run(() => {
      throw new Error('boom');
    });
    const next = lock.run(() => 'ok');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('ok');
    expect(lock.isLocked).toBe(false);
  });
});

describe('Local Store concurrency', () => {
  let backend: MemoryStorageBackend;
  let queue: SyncQueue;
  let store: LocalStore;

  beforeEach(async () => {
    backend = createMemoryBackend();
    await backend.open({ name: 'concurrency' });
    await backend.transaction((tx) => tx.createCollection('items'));

    const lock = new AsyncLock();
    queue = new SyncQueue(backend, { lock });
    store = new LocalStore(backend, { queue, lock });
  });

  it('should keep every concurrent write to distinct entities', async () => {
    const count = 50;

    const results = await Promise.all(
      Array.from({ length: count }, (_, i) => store.put('items', `item-${i}`, { counter: i }))
    );

    expect(results.every((entity) => entity.revision === 1)).toBe(true);
    expect(await store.list('items').count()).toBe(count);

    const sequences = (await queue.peekBatch(count)).map((item) => item.sequence);
    expect(new Set(sequences).size).toBe(count);
    expect(await queue.pendingCount()).toBe(count);
  });

  it('should serialize concurrent writes to one entity', async () => {
    const count = 20;

    await Promise.all(
      Array.from({ length: count }, (_, i) => store.put('items', 'shared', { counter: i }))
    );

    const entity = await store.get('items', 'shared');
    expect(entity?.revision).toBe(count);
    expect(entity?.payload).toEqual({ counter: count - 1 });

    const operations = (await queue.peekBatch(count)).map((item) => item.operation);
    expect(operations[0]).toBe('create');
    expect(operations.slice(1).every((operation) => operation === 'update')).toBe(true);
  });

  it('should enqueue in the order writes commit', async () => {
    await Promise.all([
      store.put('items', 'a', {}),
      store.delete('items', 'a'),
      store.put('items', 'a', { again: true }),
    ]);

    const items = await queue.peekBatch(10);
    expect(items.map((item) => item.operation)).toEqual(['create', 'delete', 'create']);
    expect((await store.get('items', 'a'))?.revision).toBe(3);
  });
});
