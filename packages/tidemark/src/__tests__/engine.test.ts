import { createInMemoryRemote } from '@tidemark/testing';
import { z } from 'zod';
import { afterEach, describe, expect, it } from 'vitest';
import {
  Engine,
  MigrationError,
  STORE_ID_META_KEY,
  TidemarkError,
  ValidationError,
  VirtualClock,
  createMemoryBackend,
  validateEngineConfig,
  type EngineConfig,
  type Migration,
} from '../index.js';

const migrations: Migration[] = [
  { version: 1, name: 'create-posts', up: (ctx) => ctx.createCollection('posts') },
];

const engines: Engine[] = [];

async function open(config: EngineConfig): Promise<Engine> {
  const engine = await Engine.open(config);
  engines.push(engine);
  return engine;
}

describe('Engine', () => {
  afterEach(async () => {
    for (const engine of engines.splice(0)) {
      await engine.close();
    }
  });

  describe('open', () => {
    it('should migrate the store and create configured collections', async () => {
      const backend = createMemoryBackend();
      const engine = await open({
        backend,
        migrations,
        collections: { posts: {}, tags: {} },
      });

      expect(engine.isOpen).toBe(true);
      expect(engine.syncEnabled).toBe(false);
      expect(await backend.read((reader) => reader.listCollections())).toEqual(['posts', 'tags']);

      const status = await engine.migrationStatus();
      expect(status).toMatchObject({ currentVersion: 1, targetVersion: 1, pending: [], ready: true });
    });

    it('should persist the store id across restarts', async () => {
      const backend = createMemoryBackend();
      const first = await Engine.open({ backend, migrations });
      const storeId = first.storeId;
      await first.close();

      const second = await open({ backend, migrations });

      expect(second.storeId).toBe(storeId);
      expect(storeId).toMatch(/^[0-9a-f-]{36}$/);
      expect(await backend.read((reader) => reader.getMeta(STORE_ID_META_KEY))).toBe(storeId);
    });

    it('should close the backend again when a migration fails', async () => {
      const backend = createMemoryBackend();

      const error: unknown = await Engine.open({
        backend,
        migrations: [
          {
            version: 1,
            name: 'broken',
            up: () => {
              throw new Error('bad step');
            },
          },
        ],
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MigrationError);
      expect(backend.isOpen()).toBe(false);
    });

    it('should refuse a store migrated by a newer build', async () => {
      const backend = createMemoryBackend();
      const newer = await Engine.open({
        backend,
        migrations: [...migrations, { version: 2, name: 'create-tags', up: (ctx) => ctx.createCollection('tags') }],
      });
      await newer.close();

      const error: unknown = await Engine.open({ backend, migrations }).catch((e: unknown) => e);

      expect(TidemarkError.isCode(error, 'TIDEMARK_M701')).toBe(true);
      expect(backend.isOpen()).toBe(false);
    });

    it('should reject a field-merge collection without a merge function', async () => {
      const backend = createMemoryBackend();

      const error: unknown = await Engine.open({
        backend,
        collections: { posts: { strategy: 'field-merge' } },
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual([
          { path: 'collections.posts.merge', message: 'field-merge requires a merge function' },
        ]);
      }
      expect(backend.isOpen()).toBe(false);
    });
  });

  describe('validateEngineConfig', () => {
    it('should accept a minimal config', () => {
      expect(() => validateEngineConfig({ backend: createMemoryBackend() })).not.toThrow();
    });

    it('should report each malformed field', () => {
      const error: unknown = (() => {
        try {
          validateEngineConfig({
            backend: {},
            collections: { '9posts': {} },
            sync: { batchSize: 0 },
          });
          return null;
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues.map((issue) => issue.path)).toEqual([
          'backend',
          'collections.9posts',
          'sync.batchSize',
        ]);
        expect(error.context).toMatchObject({ source: 'EngineConfig' });
      }
    });
  });

  describe('local data', () => {
    it('should read and write without a remote', async () => {
      const engine = await open({ backend: createMemoryBackend(), migrations });

      await engine.put('posts', 'p1', { caption: 'a' });
      await engine.put('posts', 'p2', { caption: 'b' });
      await engine.delete('posts', 'p2');

      expect((await engine.get('posts', 'p1'))?.payload).toEqual({ caption: 'a' });
      expect(await engine.get('posts', 'p2')).toBeNull();
      expect((await engine.list('posts').toArray()).map((e) => e.id)).toEqual(['p1']);
      expect(await engine.pendingCount()).toBe(3);
      expect(engine.syncStats()).toBeNull();
    });

    it('should validate payloads against collection schemas', async () => {
      const engine = await open({
        backend: createMemoryBackend(),
        collections: { posts: { schema: z.object({ caption: z.string() }) } },
      });

      await expect(engine.put('posts', 'p1', { caption: 7 })).rejects.toThrow(ValidationError);
      expect(await engine.pendingCount()).toBe(0);
    });

    it('should refuse to sync without a remote', async () => {
      const engine = await open({ backend: createMemoryBackend(), migrations });

      const error: unknown = await engine.triggerSync().catch((e: unknown) => e);

      expect(TidemarkError.isCode(error, 'TIDEMARK_C505')).toBe(true);
    });
  });

  describe('sync', () => {
    it('should push local writes with store-scoped idempotency keys', async () => {
      const clock = new VirtualClock(1_000);
      const remote = createInMemoryRemote({ clock });
      const engine = await open({
        backend: createMemoryBackend(),
        migrations,
        collections: { posts: {} },
        remote,
        clock,
        sync: { autoStart: false },
      });

      await engine.put('posts', 'p1', { caption: 'a' });
      const result = await engine.triggerSync();

      expect(result).toMatchObject({ status: 'completed', pushed: 1 });
      expect(remote.pushes.map((push) => push.idempotencyKey)).toEqual([`${engine.storeId}:1`]);
      expect(await engine.get('posts', 'p1')).toMatchObject({ revision: 1, syncState: 'clean' });
      expect(engine.syncStats()).toMatchObject({ runs: 1, pushed: 1 });
    });

    it('should carry a write from one device to another', async () => {
      const clock = new VirtualClock(1_000);
      const remote = createInMemoryRemote({ clock });
      const config = {
        migrations,
        collections: { posts: { strategy: 'last-write-wins' as const } },
        remote,
        clock,
        sync: { autoStart: false },
      };
      const phone = await open({ ...config, backend: createMemoryBackend() });
      const laptop = await open({ ...config, backend: createMemoryBackend() });

      await phone.put('posts', 'p1', { caption: 'from phone' });
      await phone.triggerSync();
      await laptop.triggerSync();

      expect(await laptop.get('posts', 'p1')).toMatchObject({
        payload: { caption: 'from phone' },
        syncState: 'clean',
      });
      expect(phone.storeId).not.toBe(laptop.storeId);
    });

    it('should sync on open by default', async () => {
      const remote = createInMemoryRemote();
      remote.seed('posts', 'r1', { caption: 'server' });

      const engine = await open({
        backend: createMemoryBackend(),
        collections: { posts: {} },
        remote,
      });
      await engine.triggerSync();

      expect((await engine.get('posts', 'r1'))?.payload).toEqual({ caption: 'server' });
      expect(engine.syncStats()?.runs).toBe(2);
    });

    it('should expose dead letters for retry and discard', async () => {
      const remote = createInMemoryRemote();
      const engine = await open({
        backend: createMemoryBackend(),
        collections: { posts: {} },
        remote,
        sync: { autoStart: false },
      });
      await engine.put('posts', 'p1', {});
      await engine.put('posts', 'p2', {});
      remote.failPushes({ kind: 'permanent', times: 2 });

      await engine.triggerSync();
      const dead = await engine.deadLetters();
      expect(dead.map((item) => item.id)).toEqual(['p1', 'p2']);

      const [first, second] = dead;
      if (!first || !second) throw new Error('expected two dead letters');
      await engine.retryDeadLetter(first.sequence);
      await engine.discardDeadLetter(second.sequence);

      expect(await engine.pendingCount()).toBe(1);
      expect(await engine.deadLetters()).toEqual([]);

      const result = await engine.triggerSync();
      expect(result.pushed).toBe(1);
      expect(remote.get('posts', 'p1')).toBeDefined();
    });
  });

  describe('close', () => {
    it('should close everything once and refuse further calls', async () => {
      const backend = createMemoryBackend();
      const engine = await Engine.open({ backend, migrations, remote: createInMemoryRemote() });
      let completed = false;
      engine.changes$.subscribe({ complete: () => (completed = true) });

      await engine.close();
      await engine.close();

      expect(engine.isOpen).toBe(false);
      expect(backend.isOpen()).toBe(false);
      expect(completed).toBe(true);
      await expect(engine.deadLetters()).rejects.toThrow(TidemarkError);
      await expect(engine.put('posts', 'p1', {})).rejects.toThrow(TidemarkError);
    });

    it('should report idle sync state without a remote', async () => {
      const engine = await open({ backend: createMemoryBackend(), migrations });
      const states: string[] = [];
      engine.syncState$.subscribe((state) => states.push(state));

      expect(states).toEqual(['idle']);
    });
  });
});
