/**
 * Structured value stored for an entity. Opaque to the engine apart from
 * JSON round-tripping.
 */
export type EntityPayload = Record<string, unknown>;

/**
 * Synchronization state of a local entity
 */
export type SyncState = 'clean' | 'pending-push' | 'conflicted';

/**
 * Remote snapshot kept on an entity that could not be reconciled
 * automatically.
 */
export interface EntityConflict {
  /** Remote payload at the time of the conflict */
  remotePayload: EntityPayload;
  /** Server revision of the remote version */
  remoteRevision: number;
  /** Remote modification time (Unix ms) */
  remoteUpdatedAt: number;
  /** Whether the remote version was a deletion */
  remoteDeleted: boolean;
  /** Why automatic resolution failed */
  error: string;
}

/**
 * A domain record identified by `(collection, id)`.
 */
export interface Entity {
  /** Collection the entity belongs to */
  collection: string;
  /** Identifier, unique within the collection */
  id: string;
  /** Entity data */
  payload: EntityPayload;
  /** Integer revision; bumped locally, replaced by server revisions */
  revision: number;
  /** Last modification time (Unix ms) */
  updatedAt: number;
  /** Tombstone marker */
  isDeleted: boolean;
  /** Where the entity stands relative to the remote */
  syncState: SyncState;
  /** Unresolved remote version, only set while `syncState` is `conflicted` */
  conflict: EntityConflict | null;
}

/**
 * Entity as delivered by the remote collaborator
 */
export interface RemoteEntity {
  id: string;
  payload: EntityPayload;
  serverRevision: number;
  updatedAt: number;
  deleted?: boolean;
}

/**
 * Key identifying an entity across collections
 */
export interface EntityKey {
  collection: string;
  id: string;
}

/**
 * Build the map key used to group work per entity
 */
export function entityKey(collection: string, id: string): string {
  return `${collection}\u0000${id}`;
}

/**
 * Where a committed change originated
 */
export type ChangeOrigin = 'local' | 'remote';

/**
 * Event published after a change to an entity has been committed
 */
export interface EntityChange {
  /** Kind of change */
  operation: 'upsert' | 'delete' | 'purge';
  collection: string;
  id: string;
  /** State after the change (null when purged) */
  entity: Entity | null;
  origin: ChangeOrigin;
}

/**
 * Resolution outcome for a conflict
 */
export type ConflictResolutionKind = 'local-wins' | 'remote-wins' | 'merged';

/**
 * Result of resolving a local and a remote version of the same entity.
 * Never persisted.
 */
export interface ConflictRecord {
  local: Entity;
  remote: Entity;
  resolution: ConflictResolutionKind;
  /** The winning state to commit */
  resolved: Entity;
  /** Derived from the inputs, not the wall clock */
  resolvedAt: number;
}
