/**
 * Table layout and row decoding for the SQLite backend.
 */

import { z } from 'zod';

export const META_TABLE = '_tidemark_meta';
export const SCHEMA_TABLE = '_tidemark_schema';
export const MIGRATIONS_TABLE = '_tidemark_migrations';
export const COLLECTIONS_TABLE = '_tidemark_collections';
export const QUEUE_TABLE = '_tidemark_queue';
export const CURSORS_TABLE = '_tidemark_cursors';

/** Meta key holding the highest queue sequence ever assigned */
export const LAST_SEQUENCE_KEY = 'queue.last_sequence';

export const INTERNAL_TABLES_DDL = `
  CREATE TABLE IF NOT EXISTS ${META_TABLE} (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS ${SCHEMA_TABLE} (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    version INTEGER NOT NULL
  );

  INSERT OR IGNORE INTO ${SCHEMA_TABLE} (id, version) VALUES (1, 0);

  CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    executed_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS ${COLLECTIONS_TABLE} (
    name TEXT PRIMARY KEY
  );

  CREATE TABLE IF NOT EXISTS ${QUEUE_TABLE} (
    sequence INTEGER PRIMARY KEY,
    collection TEXT NOT NULL,
    entity_id TEXT NOT NULL,
    operation TEXT NOT NULL,
    payload TEXT NOT NULL,
    base_revision INTEGER,
    attempt_count INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    last_error TEXT,
    next_attempt_at INTEGER NOT NULL,
    dead_letter INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS ${QUEUE_TABLE}_entity
    ON ${QUEUE_TABLE} (collection, entity_id, sequence);

  CREATE TABLE IF NOT EXISTS ${CURSORS_TABLE} (
    collection TEXT PRIMARY KEY,
    cursor TEXT NOT NULL
  );
`;

/**
 * Quoted table name for an entity collection. The name must already match
 * the collection name pattern.
 */
export function entityTable(collection: string): string {
  return `"entity_${collection}"`;
}

export function entityTableDdl(collection: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${entityTable(collection)} (
      id TEXT PRIMARY KEY,
      payload TEXT NOT NULL,
      revision INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      is_deleted INTEGER NOT NULL DEFAULT 0,
      sync_state TEXT NOT NULL,
      conflict TEXT
    )
  `;
}

// ── Row schemas ──────────────────────────────────────────────────────

export const payloadSchema = z.record(z.unknown());

export const conflictSchema = z.object({
  remotePayload: payloadSchema,
  remoteRevision: z.number().int(),
  remoteUpdatedAt: z.number(),
  remoteDeleted: z.boolean(),
  error: z.string(),
});

export const entityRowSchema = z.object({
  id: z.string(),
  payload: z.string(),
  revision: z.number().int(),
  updated_at: z.number(),
  is_deleted: z.number().int(),
  sync_state: z.enum(['clean', 'pending-push', 'conflicted']),
  conflict: z.string().nullable(),
});

export const queueRowSchema = z.object({
  sequence: z.number().int(),
  collection: z.string(),
  entity_id: z.string(),
  operation: z.enum(['create', 'update', 'delete']),
  payload: z.string(),
  base_revision: z.number().int().nullable(),
  attempt_count: z.number().int(),
  created_at: z.number(),
  last_error: z.string().nullable(),
  next_attempt_at: z.number(),
  dead_letter: z.number().int(),
});

export const migrationRowSchema = z.object({
  version: z.number().int(),
  name: z.string(),
  executed_at: z.number(),
});
