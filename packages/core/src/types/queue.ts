import type { EntityPayload } from './entity.js';

/**
 * Mutation kinds recorded in the sync queue
 */
export type QueueOperation = 'create' | 'update' | 'delete';

/**
 * A pending mutation that still has to reach the remote
 */
export interface QueueItem {
  /** Strictly increasing, assigned at enqueue time, never reused */
  sequence: number;
  collection: string;
  id: string;
  operation: QueueOperation;
  /** Payload snapshot taken when the mutation was made */
  payload: EntityPayload;
  /**
   * Server revision the mutation was made against; null when the remote
   * has no version of the entity yet
   */
  baseRevision: number | null;
  /** Failed delivery attempts so far */
  attemptCount: number;
  /** Enqueue time (Unix ms) */
  createdAt: number;
  /** Message of the most recent failure */
  lastError: string | null;
  /** Earliest time the item may be sent again (Unix ms) */
  nextAttemptAt: number;
  /** Parked after exhausting retries or a permanent rejection */
  deadLetter: boolean;
}

/**
 * Input for appending a queue item
 */
export interface QueueItemInput {
  collection: string;
  id: string;
  operation: QueueOperation;
  payload: EntityPayload;
  baseRevision: number | null;
  createdAt: number;
}

/**
 * Filter for listing queue items
 */
export interface QueueListOptions {
  /** List dead-lettered items instead of active ones */
  deadLetter?: boolean;
  /** Only items with a sequence strictly greater than this */
  afterSequence?: number;
  /** Restrict to one entity */
  collection?: string;
  id?: string;
  /** Maximum number of items */
  limit?: number;
}
