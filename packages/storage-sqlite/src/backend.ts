/**
 * SQLite storage backend for Tidemark.
 *
 * Layout (one database per store):
 *
 * | Table | Contents |
 * |-------|----------|
 * | `_tidemark_schema` | single row holding the schema version |
 * | `_tidemark_migrations` | one row per applied migration |
 * | `_tidemark_collections` | names of entity collections |
 * | `entity_<collection>` | id, payload JSON, revision, updated_at, is_deleted, sync_state, conflict JSON |
 * | `_tidemark_queue` | sync queue items, active and dead-lettered |
 * | `_tidemark_cursors` | one sync watermark per collection |
 * | `_tidemark_meta` | engine metadata (store id, last queue sequence) |
 *
 * Transactions use `BEGIN IMMEDIATE` / `COMMIT` / `ROLLBACK` on the single
 * connection the backend owns.
 *
 * @module storage-sqlite
 */

import {
  COLLECTION_NAME_PATTERN,
  StorageError,
  TidemarkError,
  resolveLogger,
  toError,
  type Entity,
  type EntityConflict,
  type Logger,
  type LoggerOption,
  type MigrationRecord,
  type QueueItem,
  type QueueItemInput,
  type QueueListOptions,
  type StorageBackend,
  type StorageConfig,
  type StorageReader,
  type StorageTransaction,
} from '@tidemark/core';
import type { ZodType, ZodTypeDef } from 'zod';
import { createBetterSqliteDriver } from './driver.js';
import {
  COLLECTIONS_TABLE,
  CURSORS_TABLE,
  INTERNAL_TABLES_DDL,
  LAST_SEQUENCE_KEY,
  META_TABLE,
  MIGRATIONS_TABLE,
  QUEUE_TABLE,
  SCHEMA_TABLE,
  conflictSchema,
  entityRowSchema,
  entityTable,
  entityTableDdl,
  migrationRowSchema,
  payloadSchema,
  queueRowSchema,
} from './schema.js';
import type { SQLiteDriver, SQLiteDriverConfig, SQLiteDriverFactory, SqlParam, SqlRow } from './types.js';

/**
 * SQLite backend options
 */
export interface SQLiteBackendOptions extends SQLiteDriverConfig {
  /** Driver factory (default: better-sqlite3 at `path`) */
  driver?: SQLiteDriverFactory;
  /** Logger or logger options */
  logger?: LoggerOption;
}

function decode<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new StorageError('TIDEMARK_S304', `Corrupt ${what}: ${result.error.message}`, { what });
  }
  return result.data;
}

function parseJson(text: string, what: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    throw new StorageError('TIDEMARK_S304', `Corrupt ${what}: invalid JSON`, { what }, toError(error));
  }
}

function assertTableName(collection: string): void {
  if (!COLLECTION_NAME_PATTERN.test(collection)) {
    throw new TidemarkError({
      code: 'TIDEMARK_V101',
      message: `Invalid collection name "${collection}"`,
      context: { collection },
    });
  }
}

/**
 * Read view over the connection
 */
class SQLiteReader implements StorageReader {
  protected readonly driver: SQLiteDriver;

  constructor(driver: SQLiteDriver) {
    this.driver = driver;
  }

  getSchemaVersion(): number {
    const row = this.get(`SELECT version FROM ${SCHEMA_TABLE} WHERE id = 1`);
    const version = row?.version;
    return typeof version === 'number' ? version : 0;
  }

  listMigrationRecords(): MigrationRecord[] {
    return this.all(
      `SELECT version, name, executed_at FROM ${MIGRATIONS_TABLE} ORDER BY version`
    ).map((row) => {
      const record = decode(migrationRowSchema, row, 'migration record');
      return { version: record.version, name: record.name, executedAt: record.executed_at };
    });
  }

  hasMigrationRecord(version: number): boolean {
    return this.get(`SELECT 1 AS found FROM ${MIGRATIONS_TABLE} WHERE version = ?`, version) !== undefined;
  }

  listCollections(): string[] {
    return this.all(`SELECT name FROM ${COLLECTIONS_TABLE} ORDER BY name`)
      .map((row) => row.name)
      .filter((name): name is string => typeof name === 'string');
  }

  hasCollection(name: string): boolean {
    return this.get(`SELECT 1 AS found FROM ${COLLECTIONS_TABLE} WHERE name = ?`, name) !== undefined;
  }

  getEntity(collection: string, id: string): Entity | null {
    this.requireCollection(collection);
    const row = this.get(`SELECT * FROM ${entityTable(collection)} WHERE id = ?`, id);
    return row ? this.decodeEntity(collection, row) : null;
  }

  listEntities(collection: string): Entity[] {
    if (!this.hasCollection(collection)) return [];
    return this.all(`SELECT * FROM ${entityTable(collection)} ORDER BY id`).map((row) =>
      this.decodeEntity(collection, row)
    );
  }

  getQueueItem(sequence: number): QueueItem | null {
    const row = this.get(`SELECT * FROM ${QUEUE_TABLE} WHERE sequence = ?`, sequence);
    return row ? this.decodeQueueItem(row) : null;
  }

  listQueueItems(options: QueueListOptions = {}): QueueItem[] {
    const clauses = ['dead_letter = ?'];
    const params: SqlParam[] = [options.deadLetter ? 1 : 0];

    if (options.afterSequence !== undefined) {
      clauses.push('sequence > ?');
      params.push(options.afterSequence);
    }
    if (options.collection !== undefined) {
      clauses.push('collection = ?');
      params.push(options.collection);
    }
    if (options.id !== undefined) {
      clauses.push('entity_id = ?');
      params.push(options.id);
    }

    let sql = `SELECT * FROM ${QUEUE_TABLE} WHERE ${clauses.join(' AND ')} ORDER BY sequence`;
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(Math.max(0, Math.floor(options.limit)));
    }

    return this.all(sql, ...params).map((row) => this.decodeQueueItem(row));
  }

  countQueueItems(deadLetter: boolean): number {
    const row = this.get(
      `SELECT COUNT(*) AS total FROM ${QUEUE_TABLE} WHERE dead_letter = ?`,
      deadLetter ? 1 : 0
    );
    const total = row?.total;
    return typeof total === 'number' ? total : 0;
  }

  getCursor(collection: string): string | null {
    const row = this.get(`SELECT cursor FROM ${CURSORS_TABLE} WHERE collection = ?`, collection);
    const cursor = row?.cursor;
    return typeof cursor === 'string' ? cursor : null;
  }

  getMeta(key: string): string | null {
    const row = this.get(`SELECT value FROM ${META_TABLE} WHERE key = ?`, key);
    const value = row?.value;
    return typeof value === 'string' ? value : null;
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  protected get(sql: string, ...params: SqlParam[]): SqlRow | undefined {
    return this.execute(() => this.driver.prepare(sql).get(...params));
  }

  protected all(sql: string, ...params: SqlParam[]): SqlRow[] {
    return this.execute(() => this.driver.prepare(sql).all(...params));
  }

  protected run(sql: string, ...params: SqlParam[]): number {
    return this.execute(() => this.driver.prepare(sql).run(...params).changes);
  }

  protected exec(sql: string): void {
    this.execute(() => this.driver.exec(sql));
  }

  protected requireCollection(collection: string): void {
    assertTableName(collection);
    if (!this.hasCollection(collection)) {
      throw new StorageError('TIDEMARK_S303', `Unknown collection "${collection}"`, {
        collection,
      });
    }
  }

  private execute<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (TidemarkError.isTidemarkError(error)) throw error;
      const cause = toError(error);
      throw new StorageError('TIDEMARK_S300', `SQLite error: ${cause.message}`, {}, cause);
    }
  }

  private decodeEntity(collection: string, value: SqlRow): Entity {
    const row = decode(entityRowSchema, value, `entity row in ${collection}`);
    const payload = decode(payloadSchema, parseJson(row.payload, 'entity payload'), 'entity payload');
    let conflict: EntityConflict | null = null;
    if (row.conflict !== null) {
      conflict = decode(conflictSchema, parseJson(row.conflict, 'conflict'), 'conflict');
    }

    return {
      collection,
      id: row.id,
      payload,
      revision: row.revision,
      updatedAt: row.updated_at,
      isDeleted: row.is_deleted !== 0,
      syncState: row.sync_state,
      conflict,
    };
  }

  private decodeQueueItem(value: SqlRow): QueueItem {
    const row = decode(queueRowSchema, value, 'queue item');
    return {
      sequence: row.sequence,
      collection: row.collection,
      id: row.entity_id,
      operation: row.operation,
      payload: decode(payloadSchema, parseJson(row.payload, 'queue payload'), 'queue payload'),
      baseRevision: row.base_revision,
      attemptCount: row.attempt_count,
      createdAt: row.created_at,
      lastError: row.last_error,
      nextAttemptAt: row.next_attempt_at,
      deadLetter: row.dead_letter !== 0,
    };
  }
}

/**
 * Write view, only handed out between BEGIN and COMMIT
 */
class SQLiteTransaction extends SQLiteReader implements StorageTransaction {
  setSchemaVersion(version: number): void {
    this.run(`UPDATE ${SCHEMA_TABLE} SET version = ? WHERE id = 1`, version);
  }

  insertMigrationRecord(record: MigrationRecord): void {
    this.run(
      `INSERT INTO ${MIGRATIONS_TABLE} (version, name, executed_at) VALUES (?, ?, ?)`,
      record.version,
      record.name,
      record.executedAt
    );
  }

  createCollection(name: string): void {
    assertTableName(name);
    this.exec(entityTableDdl(name));
    this.run(`INSERT OR IGNORE INTO ${COLLECTIONS_TABLE} (name) VALUES (?)`, name);
  }

  dropCollection(name: string): void {
    assertTableName(name);
    this.exec(`DROP TABLE IF EXISTS ${entityTable(name)}`);
    this.run(`DELETE FROM ${COLLECTIONS_TABLE} WHERE name = ?`, name);
  }

  renameCollection(from: string, to: string): void {
    this.requireCollection(from);
    assertTableName(to);
    this.exec(`ALTER TABLE ${entityTable(from)} RENAME TO ${entityTable(to)}`);
    this.run(`UPDATE ${COLLECTIONS_TABLE} SET name = ? WHERE name = ?`, to, from);
  }

  putEntity(entity: Entity): void {
    this.requireCollection(entity.collection);
    this.run(
      `INSERT OR REPLACE INTO ${entityTable(entity.collection)}
        (id, payload, revision, updated_at, is_deleted, sync_state, conflict)
        VALUES (?, ?, ?, ?, ?, ?, ?)`,
      entity.id,
      JSON.stringify(entity.payload),
      entity.revision,
      entity.updatedAt,
      entity.isDeleted ? 1 : 0,
      entity.syncState,
      entity.conflict ? JSON.stringify(entity.conflict) : null
    );
  }

  purgeEntity(collection: string, id: string): void {
    this.requireCollection(collection);
    this.run(`DELETE FROM ${entityTable(collection)} WHERE id = ?`, id);
  }

  appendQueueItem(input: QueueItemInput): QueueItem {
    const last = Number(this.getMeta(LAST_SEQUENCE_KEY) ?? '0');
    const sequence = (Number.isInteger(last) ? last : 0) + 1;
    this.setMeta(LAST_SEQUENCE_KEY, String(sequence));

    const item: QueueItem = {
      sequence,
      collection: input.collection,
      id: input.id,
      operation: input.operation,
      payload: structuredClone(input.payload),
      baseRevision: input.baseRevision,
      attemptCount: 0,
      createdAt: input.createdAt,
      lastError: null,
      nextAttemptAt: input.createdAt,
      deadLetter: false,
    };

    this.run(
      `INSERT INTO ${QUEUE_TABLE}
        (sequence, collection, entity_id, operation, payload, base_revision, attempt_count,
         created_at, last_error, next_attempt_at, dead_letter)
        VALUES (?, ?, ?, ?, ?, ?, 0, ?, NULL, ?, 0)`,
      item.sequence,
      item.collection,
      item.id,
      item.operation,
      JSON.stringify(item.payload),
      item.baseRevision,
      item.createdAt,
      item.nextAttemptAt
    );
    return item;
  }

  updateQueueItem(item: QueueItem): void {
    const changes = this.run(
      `UPDATE ${QUEUE_TABLE}
        SET collection = ?, entity_id = ?, operation = ?, payload = ?, base_revision = ?,
            attempt_count = ?, created_at = ?, last_error = ?, next_attempt_at = ?,
            dead_letter = ?
        WHERE sequence = ?`,
      item.collection,
      item.id,
      item.operation,
      JSON.stringify(item.payload),
      item.baseRevision,
      item.attemptCount,
      item.createdAt,
      item.lastError,
      item.nextAttemptAt,
      item.deadLetter ? 1 : 0,
      item.sequence
    );
    if (changes === 0) {
      throw new StorageError('TIDEMARK_S300', `Queue item ${item.sequence} does not exist`, {
        sequence: item.sequence,
      });
    }
  }

  removeQueueItem(sequence: number): void {
    this.run(`DELETE FROM ${QUEUE_TABLE} WHERE sequence = ?`, sequence);
  }

  setCursor(collection: string, cursor: string): void {
    this.run(
      `INSERT INTO ${CURSORS_TABLE} (collection, cursor) VALUES (?, ?)
        ON CONFLICT(collection) DO UPDATE SET cursor = excluded.cursor`,
      collection,
      cursor
    );
  }

  setMeta(key: string, value: string): void {
    this.run(
      `INSERT INTO ${META_TABLE} (key, value) VALUES (?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      key,
      value
    );
  }
}

/**
 * SQLite storage backend.
 *
 * @example
 * ```typescript
 * import { createSQLiteBackend } from '@tidemark/storage-sqlite';
 *
 * const backend = createSQLiteBackend({ path: './app.db', walMode: true });
 * await backend.open({ name: 'app' });
 * ```
 */
export class SQLiteStorageBackend implements StorageBackend {
  readonly name = 'sqlite';

  private driver: SQLiteDriver | null = null;
  private readonly options: SQLiteBackendOptions;
  private readonly logger: Logger;

  constructor(options: SQLiteBackendOptions = {}) {
    this.options = options;
    this.logger = resolveLogger(options.logger, 'SQLiteStorageBackend');
  }

  async open(config: StorageConfig): Promise<void> {
    if (this.driver) return;

    const factory = this.options.driver ?? (() => createBetterSqliteDriver(this.options));
    let driver: SQLiteDriver;
    try {
      driver = await factory();
      driver.exec(INTERNAL_TABLES_DDL);
    } catch (error) {
      const cause = toError(error);
      throw new StorageError(
        'TIDEMARK_S300',
        `Failed to open SQLite store "${config.name}": ${cause.message}`,
        { name: config.name, path: this.options.path ?? ':memory:' },
        cause
      );
    }

    this.driver = driver;
    this.logger.info('SQLite store opened', {
      name: config.name,
      driver: driver.kind,
      path: this.options.path ?? ':memory:',
    });
  }

  async close(): Promise<void> {
    if (!this.driver) return;
    const driver = this.driver;
    this.driver = null;
    driver.close();
  }

  isOpen(): boolean {
    return this.driver?.isOpen() ?? false;
  }

  async read<R>(fn: (reader: StorageReader) => R): Promise<R> {
    const driver = this.requireDriver();
    return this.inTransaction(driver, 'BEGIN', () => fn(new SQLiteReader(driver)));
  }

  async transaction<R>(fn: (tx: StorageTransaction) => R): Promise<R> {
    const driver = this.requireDriver();
    return this.inTransaction(driver, 'BEGIN IMMEDIATE', () => fn(new SQLiteTransaction(driver)));
  }

  /**
   * Serialize the database (sql.js driver only)
   */
  export(): Uint8Array | null {
    return this.driver?.export?.() ?? null;
  }

  private inTransaction<R>(driver: SQLiteDriver, begin: string, body: () => R): R {
    this.control(driver, begin);
    let result: R;
    try {
      result = body();
      this.control(driver, 'COMMIT');
    } catch (error) {
      this.rollback(driver);
      throw error;
    }
    return result;
  }

  private control(driver: SQLiteDriver, statement: string): void {
    try {
      driver.exec(statement);
    } catch (error) {
      const cause = toError(error);
      throw new StorageError('TIDEMARK_S300', `${statement} failed: ${cause.message}`, {}, cause);
    }
  }

  private rollback(driver: SQLiteDriver): void {
    try {
      driver.exec('ROLLBACK');
    } catch (rollbackError) {
      this.logger.error('Rollback failed', toError(rollbackError));
    }
  }

  private requireDriver(): SQLiteDriver {
    if (!this.driver) {
      throw new StorageError('TIDEMARK_S301', 'SQLite backend is not open');
    }
    return this.driver;
  }
}

/**
 * Create a SQLite storage backend
 */
export function createSQLiteBackend(options: SQLiteBackendOptions = {}): SQLiteStorageBackend {
  return new SQLiteStorageBackend(options);
}
