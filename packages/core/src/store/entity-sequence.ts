import type { Entity } from '../types/entity.js';

/**
 * Filters applied by an {@link EntitySequence}
 */
export interface EntitySequenceOptions {
  /** Predicate entities must satisfy */
  where?: (entity: Entity) => boolean;
  /** Include tombstones (default: false) */
  includeDeleted?: boolean;
  /** Maximum number of entities */
  limit?: number;
}

/**
 * Finite, restartable sequence of entities.
 *
 * Nothing is read until iteration starts, and every iteration re-reads the
 * committed state: no cursor outlives a loop.
 *
 * @example
 * ```typescript
 * for await (const post of store.list('posts', { where: (e) => e.payload.pinned === true })) {
 *   console.log(post.id);
 * }
 * ```
 */
export class EntitySequence implements AsyncIterable<Entity> {
  private readonly load: () => Promise<Entity[]>;
  private readonly options: EntitySequenceOptions;

  constructor(load: () => Promise<Entity[]>, options: EntitySequenceOptions = {}) {
    this.load = load;
    this.options = options;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Entity, void, undefined> {
    const { where, includeDeleted = false, limit } = this.options;
    if (limit !== undefined && limit <= 0) return;

    const entities = await this.load();
    let yielded = 0;

    for (const entity of entities) {
      if (entity.isDeleted && !includeDeleted) continue;
      if (where && !where(entity)) continue;

      yield entity;
      yielded++;
      if (limit !== undefined && yielded >= limit) return;
    }
  }

  /**
   * Collect the sequence into an array
   */
  async toArray(): Promise<Entity[]> {
    const result: Entity[] = [];
    for await (const entity of this) {
      result.push(entity);
    }
    return result;
  }

  /**
   * Number of entities the sequence currently yields
   */
  async count(): Promise<number> {
    return (await this.toArray()).length;
  }
}
