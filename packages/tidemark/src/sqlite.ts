/**
 * SQLite storage backend, re-exported from `@tidemark/storage-sqlite`.
 *
 * @module tidemark/sqlite
 */

export * from '@tidemark/storage-sqlite';
