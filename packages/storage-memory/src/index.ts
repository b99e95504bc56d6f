/**
 * @packageDocumentation
 *
 * In-memory storage backend for Tidemark.
 *
 * Keeps every table in JavaScript memory with copy-on-commit transactions.
 * Suited to tests, development, and short-lived processes.
 *
 * ```typescript
 * import { Engine } from 'tidemark';
 * import { createMemoryBackend } from '@tidemark/storage-memory';
 *
 * const engine = await Engine.open({
 *   backend: createMemoryBackend(),
 *   migrations,
 *   collections: { posts: {} },
 * });
 * ```
 *
 * Data is lost when the process ends.
 *
 * @module @tidemark/storage-memory
 */
export * from './backend.js';
