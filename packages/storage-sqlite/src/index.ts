/**
 * @tidemark/storage-sqlite - SQLite storage backend for Tidemark
 *
 * Persists entity collections, the sync queue, cursors and migration
 * records in one SQLite database, so every engine transaction maps onto a
 * single SQL transaction.
 *
 * ## Drivers
 *
 * | Driver | Environment | Notes |
 * |--------|-------------|-------|
 * | better-sqlite3 | Node.js | Default, file or in-memory |
 * | sql.js | Node.js / WASM | In-memory, exportable to bytes |
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createSQLiteBackend } from '@tidemark/storage-sqlite';
 * import { Engine } from 'tidemark';
 *
 * const engine = await Engine.open({
 *   name: 'notes',
 *   backend: createSQLiteBackend({ path: './notes.db', walMode: true }),
 *   collections: { notes: {} },
 * });
 * ```
 *
 * @packageDocumentation
 * @module @tidemark/storage-sqlite
 */

export { SQLiteStorageBackend, createSQLiteBackend, type SQLiteBackendOptions } from './backend.js';
export { createBetterSqliteDriver, createSqlJsDriver } from './driver.js';
export type * from './types.js';
