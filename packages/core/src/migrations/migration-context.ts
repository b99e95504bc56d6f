import { StorageError } from '../errors/tidemark-error.js';
import type { Entity, EntityPayload } from '../types/entity.js';
import type { StorageTransaction } from '../types/storage.js';
import { assertCollectionName, assertPayloadBody } from '../validation/input-validation.js';
import type { MigrationContext } from './types.js';

/**
 * MigrationContext over an open storage transaction
 */
export class TransactionMigrationContext implements MigrationContext {
  readonly version: number;
  readonly fromVersion: number;
  readonly now: number;
  private readonly tx: StorageTransaction;

  constructor(tx: StorageTransaction, version: number, fromVersion: number, now: number) {
    this.tx = tx;
    this.version = version;
    this.fromVersion = fromVersion;
    this.now = now;
  }

  createCollection(name: string): void {
    assertCollectionName(name);
    this.tx.createCollection(name);
  }

  dropCollection(name: string): void {
    this.requireCollection(name);
    this.tx.dropCollection(name);
  }

  renameCollection(from: string, to: string): void {
    this.requireCollection(from);
    assertCollectionName(to);
    if (this.tx.hasCollection(to)) {
      throw new StorageError('TIDEMARK_S300', `Cannot rename "${from}": "${to}" already exists`, {
        from,
        to,
      });
    }
    this.tx.renameCollection(from, to);
  }

  hasCollection(name: string): boolean {
    return this.tx.hasCollection(name);
  }

  listCollections(): string[] {
    return this.tx.listCollections();
  }

  transformPayloads(
    collection: string,
    transform: (payload: EntityPayload, entity: Entity) => EntityPayload
  ): number {
    this.requireCollection(collection);
    let count = 0;

    for (const entity of this.tx.listEntities(collection)) {
      const payload = transform(structuredClone(entity.payload), entity);
      assertPayloadBody(payload);
      this.tx.putEntity({ ...entity, payload });
      count++;
    }

    return count;
  }

  getEntity(collection: string, id: string): Entity | null {
    this.requireCollection(collection);
    return this.tx.getEntity(collection, id);
  }

  listEntities(collection: string): Entity[] {
    this.requireCollection(collection);
    return this.tx.listEntities(collection);
  }

  putEntity(entity: Entity): void {
    this.requireCollection(entity.collection);
    assertPayloadBody(entity.payload);
    this.tx.putEntity(entity);
  }

  purgeEntity(collection: string, id: string): void {
    this.requireCollection(collection);
    this.tx.purgeEntity(collection, id);
  }

  getMeta(key: string): string | null {
    return this.tx.getMeta(key);
  }

  setMeta(key: string, value: string): void {
    this.tx.setMeta(key, value);
  }

  private requireCollection(name: string): void {
    if (!this.tx.hasCollection(name)) {
      throw new StorageError('TIDEMARK_S303', `Unknown collection "${name}"`, { collection: name });
    }
  }
}
