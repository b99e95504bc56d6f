import type { Entity } from './entity.js';
import type { MigrationRecord } from './migration.js';
import type { QueueItem, QueueItemInput, QueueListOptions } from './queue.js';

/**
 * Read-only view of the persisted state.
 *
 * All methods are synchronous: a read or write transaction runs to
 * completion without yielding, so no other work observes it half-applied.
 */
export interface StorageReader {
  /** Persisted schema version (0 for a fresh store) */
  getSchemaVersion(): number;

  /** All migration records, ascending by version */
  listMigrationRecords(): MigrationRecord[];

  /** Whether a migration record exists for a version */
  hasMigrationRecord(version: number): boolean;

  /** Names of all entity collections */
  listCollections(): string[];

  /** Whether an entity collection exists */
  hasCollection(name: string): boolean;

  /** Get an entity, tombstones included */
  getEntity(collection: string, id: string): Entity | null;

  /** All entities of a collection, tombstones included, ordered by id */
  listEntities(collection: string): Entity[];

  /** Get a queue item, active or dead-lettered */
  getQueueItem(sequence: number): QueueItem | null;

  /** Queue items ascending by sequence */
  listQueueItems(options?: QueueListOptions): QueueItem[];

  /** Count queue items */
  countQueueItems(deadLetter: boolean): number;

  /** Sync watermark of a collection */
  getCursor(collection: string): string | null;

  /** Arbitrary engine metadata */
  getMeta(key: string): string | null;
}

/**
 * Read-write view handed to a transaction callback
 */
export interface StorageTransaction extends StorageReader {
  /** Persist the schema version */
  setSchemaVersion(version: number): void;

  /** Append a migration record */
  insertMigrationRecord(record: MigrationRecord): void;

  /** Create an entity collection (no-op when it exists) */
  createCollection(name: string): void;

  /** Drop an entity collection and its rows */
  dropCollection(name: string): void;

  /** Rename an entity collection, keeping its rows */
  renameCollection(from: string, to: string): void;

  /** Insert or replace an entity */
  putEntity(entity: Entity): void;

  /** Remove an entity row entirely */
  purgeEntity(collection: string, id: string): void;

  /** Append a queue item, assigning the next sequence */
  appendQueueItem(input: QueueItemInput): QueueItem;

  /** Replace a queue item (matched by sequence) */
  updateQueueItem(item: QueueItem): void;

  /** Remove a queue item */
  removeQueueItem(sequence: number): void;

  /** Store a sync watermark */
  setCursor(collection: string, cursor: string): void;

  /** Store engine metadata */
  setMeta(key: string, value: string): void;
}

/**
 * Storage backend configuration
 */
export interface StorageConfig {
  /** Store name, used for log context and file naming */
  name: string;
}

/**
 * Pluggable persistence backend. The only component that touches
 * persisted bytes; entity rows and queue items share its transactions.
 */
export interface StorageBackend {
  /** Backend name for identification */
  readonly name: string;

  /**
   * Open the backend and create internal tables
   */
  open(config: StorageConfig): Promise<void>;

  /**
   * Close the backend and release resources
   */
  close(): Promise<void>;

  /**
   * Whether the backend is open
   */
  isOpen(): boolean;

  /**
   * Run a read-only callback against committed state
   */
  read<R>(fn: (reader: StorageReader) => R): Promise<R>;

  /**
   * Run a callback in a transaction. Everything it writes commits together;
   * a throw rolls all of it back and rejects with the thrown error.
   */
  transaction<R>(fn: (tx: StorageTransaction) => R): Promise<R>;
}

/**
 * Storage backend factory function type
 */
export type StorageBackendFactory = () => StorageBackend;
