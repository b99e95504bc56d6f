import { ConflictResolutionError, ValidationError, toError } from '../errors/tidemark-error.js';
import type {
  ConflictRecord,
  ConflictResolutionKind,
  Entity,
  EntityPayload,
  RemoteEntity,
} from '../types/entity.js';
import { isPlainObject } from '../validation/input-validation.js';

/**
 * Conflict resolution strategies
 */
export type ConflictStrategy = 'remote-wins' | 'local-wins' | 'last-write-wins' | 'field-merge';

/**
 * Field a last-write-wins comparison reads
 */
export type CompareBy = 'updatedAt' | 'revision';

/**
 * Caller-supplied merge for the field-merge strategy. Must be a pure
 * function of its arguments.
 */
export type FieldMergeFunction = (
  localPayload: EntityPayload,
  remotePayload: EntityPayload,
  versions: { local: Entity; remote: Entity }
) => EntityPayload;

/**
 * Per-collection resolution policy
 */
export interface ConflictPolicy {
  /** Strategy (default: 'last-write-wins') */
  strategy?: ConflictStrategy;
  /** Comparison field for last-write-wins (default: 'updatedAt') */
  compareBy?: CompareBy;
  /** Merge function, required for field-merge */
  merge?: FieldMergeFunction;
}

/**
 * Turn a pulled change into an Entity snapshot comparable with a local one
 */
export function remoteToEntity(collection: string, remote: RemoteEntity): Entity {
  return {
    collection,
    id: remote.id,
    payload: remote.payload,
    revision: remote.serverRevision,
    updatedAt: remote.updatedAt,
    isDeleted: remote.deleted ?? false,
    syncState: 'clean',
    conflict: null,
  };
}

/**
 * Decides the winner between a local and a remote version of one entity.
 *
 * The result depends only on the two inputs and the policy, so resolving the
 * same pair twice yields equal records.
 *
 * @example
 * ```typescript
 * const resolver = new ConflictResolver({ strategy: 'last-write-wins' });
 * const record = resolver.resolve(local, remote);
 * console.log(record.resolution); // 'remote-wins' when remote is newer
 * ```
 */
export class ConflictResolver {
  readonly strategy: ConflictStrategy;
  private readonly compareBy: CompareBy;
  private readonly merge?: FieldMergeFunction;

  constructor(policy: ConflictPolicy = {}) {
    this.strategy = policy.strategy ?? 'last-write-wins';
    this.compareBy = policy.compareBy ?? 'updatedAt';
    this.merge = policy.merge;

    if (this.strategy === 'field-merge' && !this.merge) {
      throw new ValidationError([
        { path: 'merge', message: 'The field-merge strategy needs a merge function' },
      ]);
    }
  }

  /**
   * Resolve a local and remote version of the same entity
   *
   * @throws ConflictResolutionError when the merge function fails
   */
  resolve(local: Entity, remote: Entity): ConflictRecord {
    switch (this.strategy) {
      case 'remote-wins':
        return this.remoteWins(local, remote);

      case 'local-wins':
        return this.localWins(local, remote);

      case 'last-write-wins':
        return this.resolveLastWriteWins(local, remote);

      case 'field-merge':
        // A deletion on either side leaves nothing to merge field by field
        if (local.isDeleted || remote.isDeleted) {
          return this.resolveLastWriteWins(local, remote);
        }
        return this.resolveMerge(local, remote);
    }
  }

  // ── Private ──────────────────────────────────────────────────────────

  private resolveLastWriteWins(local: Entity, remote: Entity): ConflictRecord {
    const localValue = this.compareBy === 'revision' ? local.revision : local.updatedAt;
    const remoteValue = this.compareBy === 'revision' ? remote.revision : remote.updatedAt;

    // Ties go to the remote: the server clock is canonical
    return localValue > remoteValue ? this.localWins(local, remote) : this.remoteWins(local, remote);
  }

  private remoteWins(local: Entity, remote: Entity): ConflictRecord {
    return this.record(local, remote, 'remote-wins', {
      ...remote,
      collection: local.collection,
      payload: structuredClone(remote.payload),
      syncState: 'clean',
      conflict: null,
    });
  }

  private localWins(local: Entity, remote: Entity): ConflictRecord {
    return this.record(local, remote, 'local-wins', {
      ...local,
      payload: structuredClone(local.payload),
      revision: remote.revision,
      syncState: 'pending-push',
      conflict: null,
    });
  }

  private resolveMerge(local: Entity, remote: Entity): ConflictRecord {
    const merge = this.merge;
    if (!merge) {
      throw new ConflictResolutionError(local.collection, local.id);
    }

    let merged: unknown;
    try {
      merged = merge(structuredClone(local.payload), structuredClone(remote.payload), {
        local,
        remote,
      });
    } catch (error) {
      throw new ConflictResolutionError(local.collection, local.id, toError(error));
    }

    if (!isPlainObject(merged)) {
      throw new ConflictResolutionError(
        local.collection,
        local.id,
        new Error('Merge function must return a plain object')
      );
    }

    return this.record(local, remote, 'merged', {
      ...local,
      payload: merged,
      revision: remote.revision,
      updatedAt: Math.max(local.updatedAt, remote.updatedAt),
      isDeleted: false,
      syncState: 'pending-push',
      conflict: null,
    });
  }

  private record(
    local: Entity,
    remote: Entity,
    resolution: ConflictResolutionKind,
    resolved: Entity
  ): ConflictRecord {
    return {
      local,
      remote,
      resolution,
      resolved,
      resolvedAt: Math.max(local.updatedAt, remote.updatedAt),
    };
  }
}
