import type { EntityPayload, QueueOperation, RemoteEntity } from '@tidemark/core';

/**
 * One queued mutation sent to the remote.
 */
export interface PushRequest {
  /** Collection containing the entity */
  collection: string;
  /** Entity identifier */
  id: string;
  /** Mutation kind */
  operation: QueueOperation;
  /** Payload snapshot taken when the mutation was made */
  payload: EntityPayload;
  /**
   * Stable per queue item (`<storeId>:<sequence>`), so a retried push the
   * remote already applied can be recognised
   */
  idempotencyKey: string;
  /**
   * Server revision the mutation was made against, or null when the remote
   * held no version. A remote should refuse the push as a transient
   * conflict when its current revision differs.
   */
  baseRevision: number | null;
}

/**
 * Remote acknowledgement of a push
 */
export interface PushResult {
  /** Revision the remote assigned to the entity */
  serverRevision: number;
}

/**
 * One page of remote changes
 */
export interface PullResult {
  /** Changes after the requested cursor, oldest first */
  changes: RemoteEntity[];
  /** Watermark to request the next page with */
  cursor: string;
  /** Whether another page is waiting (default: false) */
  hasMore?: boolean;
}

/**
 * The remote collaborator the coordinator talks to.
 *
 * Implementations reject with a `RemoteError` carrying its kind. Anything
 * else they throw is treated as transient.
 */
export interface RemoteApi {
  /** Send one mutation */
  push(request: PushRequest): Promise<PushResult>;
  /** Fetch changes of a collection after `cursor` (null: from the start) */
  pull(collection: string, cursor: string | null): Promise<PullResult>;
}

/**
 * Fetch signature accepted by the HTTP remote
 */
export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Configuration for the HTTP remote.
 */
export interface HttpRemoteConfig {
  /** Base URL, e.g. `https://api.example.com/sync` */
  baseUrl: string;
  /** Extra request headers (credentials are the caller's concern) */
  headers?: Record<string, string>;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Fetch implementation (default: global fetch) */
  fetch?: FetchFunction;
}
