/**
 * @packageDocumentation
 *
 * # Tidemark - Offline-First Data Engine
 *
 * Tidemark keeps application data in a local store that always answers
 * reads and writes, records every mutation in a durable sync queue, and
 * reconciles with a remote collaborator whenever one is reachable.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Engine, createMemoryBackend } from 'tidemark';
 *
 * const engine = await Engine.open({
 *   backend: createMemoryBackend(),
 *   migrations: [
 *     { version: 1, name: 'create-notes', up: (ctx) => ctx.createCollection('notes') },
 *   ],
 *   collections: { notes: {} },
 * });
 *
 * await engine.put('notes', 'n1', { title: 'Groceries', done: false });
 * const note = await engine.get('notes', 'n1');
 *
 * for await (const open of engine.list('notes', { where: (e) => e.payload.done === false })) {
 *   console.log(open.id);
 * }
 * ```
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────┐
 * │                          Engine                             │
 * │  put / get / delete / list          triggerSync / status    │
 * └──────────────┬───────────────────────────────┬──────────────┘
 *                │                               │
 * ┌──────────────▼──────────────┐  ┌─────────────▼──────────────┐
 * │ LocalStore ── SyncQueue     │  │ SyncCoordinator            │
 * │ (one transaction per write) │◄─┤ drain → pull → resolve →   │
 * │ MigrationManager (gate)     │  │ commit                     │
 * └──────────────┬──────────────┘  └─────────────┬──────────────┘
 *                │                               │ RemoteApi
 * ┌──────────────▼──────────────┐                ▼
 * │ StorageBackend              │        HTTP or your own
 * │ memory │ SQLite             │
 * └─────────────────────────────┘
 * ```
 *
 * ## Package Exports
 *
 * This `tidemark` package re-exports:
 * - `@tidemark/core` - data model, errors, logger, Local Store, Sync Queue,
 *   Migration Manager, Conflict Resolver
 * - `@tidemark/storage-memory` - in-memory backend
 *
 * For sync (remote clients, connectivity, coordinator), import from
 * `tidemark/sync`. For the SQLite backend, import from `tidemark/sqlite`.
 *
 * @module tidemark
 */

// Engine
export { Engine, STORE_ID_META_KEY } from './engine.js';
export {
  engineConfigSchema,
  validateEngineConfig,
  type CollectionConfig,
  type EngineConfig,
  type SyncConfig,
} from './config.js';

// Core
export * from '@tidemark/core';

// Storage
export { MemoryStorageBackend, createMemoryBackend } from '@tidemark/storage-memory';
