import {
  StorageError,
  type Entity,
  type MigrationRecord,
  type QueueItem,
  type QueueItemInput,
  type QueueListOptions,
  type StorageBackend,
  type StorageConfig,
  type StorageReader,
  type StorageTransaction,
} from '@tidemark/core';

/**
 * Everything a memory backend holds
 */
interface MemoryState {
  schemaVersion: number;
  migrations: Map<number, MigrationRecord>;
  collections: Map<string, Map<string, Entity>>;
  queue: Map<number, QueueItem>;
  lastSequence: number;
  cursors: Map<string, string>;
  meta: Map<string, string>;
}

function emptyState(): MemoryState {
  return {
    schemaVersion: 0,
    migrations: new Map(),
    collections: new Map(),
    queue: new Map(),
    lastSequence: 0,
    cursors: new Map(),
    meta: new Map(),
  };
}

function matchesQueueFilter(item: QueueItem, options: QueueListOptions): boolean {
  if (item.deadLetter !== (options.deadLetter ?? false)) return false;
  if (options.afterSequence !== undefined && item.sequence <= options.afterSequence) return false;
  if (options.collection !== undefined && item.collection !== options.collection) return false;
  if (options.id !== undefined && item.id !== options.id) return false;
  return true;
}

/**
 * Read view over a state snapshot. Returned values are copies.
 */
class MemoryReader implements StorageReader {
  protected readonly state: MemoryState;

  constructor(state: MemoryState) {
    this.state = state;
  }

  getSchemaVersion(): number {
    return this.state.schemaVersion;
  }

  listMigrationRecords(): MigrationRecord[] {
    return [...this.state.migrations.values()]
      .sort((a, b) => a.version - b.version)
      .map((record) => ({ ...record }));
  }

  hasMigrationRecord(version: number): boolean {
    return this.state.migrations.has(version);
  }

  listCollections(): string[] {
    return [...this.state.collections.keys()].sort();
  }

  hasCollection(name: string): boolean {
    return this.state.collections.has(name);
  }

  getEntity(collection: string, id: string): Entity | null {
    const entity = this.state.collections.get(collection)?.get(id);
    return entity ? structuredClone(entity) : null;
  }

  listEntities(collection: string): Entity[] {
    const rows = this.state.collections.get(collection);
    if (!rows) return [];
    return [...rows.values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((entity) => structuredClone(entity));
  }

  getQueueItem(sequence: number): QueueItem | null {
    const item = this.state.queue.get(sequence);
    return item ? structuredClone(item) : null;
  }

  listQueueItems(options: QueueListOptions = {}): QueueItem[] {
    const items = [...this.state.queue.values()]
      .filter((item) => matchesQueueFilter(item, options))
      .sort((a, b) => a.sequence - b.sequence);
    const limited = options.limit !== undefined ? items.slice(0, options.limit) : items;
    return limited.map((item) => structuredClone(item));
  }

  countQueueItems(deadLetter: boolean): number {
    let count = 0;
    for (const item of this.state.queue.values()) {
      if (item.deadLetter === deadLetter) count++;
    }
    return count;
  }

  getCursor(collection: string): string | null {
    return this.state.cursors.get(collection) ?? null;
  }

  getMeta(key: string): string | null {
    return this.state.meta.get(key) ?? null;
  }
}

/**
 * Write view over a private copy of the state
 */
class MemoryTransaction extends MemoryReader implements StorageTransaction {
  setSchemaVersion(version: number): void {
    this.state.schemaVersion = version;
  }

  insertMigrationRecord(record: MigrationRecord): void {
    if (this.state.migrations.has(record.version)) {
      throw new StorageError(
        'TIDEMARK_S300',
        `Migration record ${record.version} already exists`,
        { version: record.version }
      );
    }
    this.state.migrations.set(record.version, { ...record });
  }

  createCollection(name: string): void {
    if (!this.state.collections.has(name)) {
      this.state.collections.set(name, new Map());
    }
  }

  dropCollection(name: string): void {
    this.state.collections.delete(name);
  }

  renameCollection(from: string, to: string): void {
    const rows = this.requireRows(from);
    const renamed = new Map<string, Entity>();
    for (const [id, entity] of rows) {
      renamed.set(id, { ...entity, collection: to });
    }
    this.state.collections.delete(from);
    this.state.collections.set(to, renamed);
  }

  putEntity(entity: Entity): void {
    this.requireRows(entity.collection).set(entity.id, structuredClone(entity));
  }

  purgeEntity(collection: string, id: string): void {
    this.requireRows(collection).delete(id);
  }

  appendQueueItem(input: QueueItemInput): QueueItem {
    const sequence = this.state.lastSequence + 1;
    this.state.lastSequence = sequence;

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
    this.state.queue.set(sequence, item);
    return structuredClone(item);
  }

  updateQueueItem(item: QueueItem): void {
    if (!this.state.queue.has(item.sequence)) {
      throw new StorageError('TIDEMARK_S300', `Queue item ${item.sequence} does not exist`, {
        sequence: item.sequence,
      });
    }
    this.state.queue.set(item.sequence, structuredClone(item));
  }

  removeQueueItem(sequence: number): void {
    this.state.queue.delete(sequence);
  }

  setCursor(collection: string, cursor: string): void {
    this.state.cursors.set(collection, cursor);
  }

  setMeta(key: string, value: string): void {
    this.state.meta.set(key, value);
  }

  private requireRows(collection: string): Map<string, Entity> {
    const rows = this.state.collections.get(collection);
    if (!rows) {
      throw new StorageError('TIDEMARK_S303', `Unknown collection "${collection}"`, {
        collection,
      });
    }
    return rows;
  }
}

/**
 * In-memory storage backend.
 *
 * Transactions run against a private copy of the state that replaces the
 * committed state only when the callback returns; a throw discards the copy.
 * Data survives `close()` / `open()` on the same instance, which lets tests
 * reopen a store the way an application restarts against a file.
 *
 * @example
 * ```typescript
 * import { createMemoryBackend } from '@tidemark/storage-memory';
 *
 * const backend = createMemoryBackend();
 * await backend.open({ name: 'app' });
 * ```
 */
export class MemoryStorageBackend implements StorageBackend {
  readonly name = 'memory';

  private state: MemoryState = emptyState();
  private opened = false;

  async open(_config: StorageConfig): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  isOpen(): boolean {
    return this.opened;
  }

  async read<R>(fn: (reader: StorageReader) => R): Promise<R> {
    this.assertOpen();
    return fn(new MemoryReader(this.state));
  }

  async transaction<R>(fn: (tx: StorageTransaction) => R): Promise<R> {
    this.assertOpen();
    const draft = structuredClone(this.state);
    const result = fn(new MemoryTransaction(draft));
    this.state = draft;
    return result;
  }

  /**
   * Drop everything, as if the backing file were deleted
   */
  reset(): void {
    this.state = emptyState();
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new StorageError('TIDEMARK_S301', 'Memory backend is not open');
    }
  }
}

/**
 * Create an in-memory storage backend
 */
export function createMemoryBackend(): MemoryStorageBackend {
  return new MemoryStorageBackend();
}
