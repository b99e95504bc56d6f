import type {
  AsyncLock,
  Clock,
  ConflictResolutionKind,
  ConflictResolver,
  LocalStore,
  LoggerOption,
  StorageBackend,
  SyncQueue,
} from '@tidemark/core';
import type { ConnectivityMonitor } from './connectivity.js';
import type { RemoteApi } from './transport/types.js';

/**
 * Coordinator lifecycle. A run walks
 * `idle → draining → pulling → resolving → committing → idle`;
 * an aborted run passes through `failed` on its way back to `idle`.
 */
export type CoordinatorState =
  | 'idle'
  | 'draining'
  | 'pulling'
  | 'resolving'
  | 'committing'
  | 'failed';

/**
 * What started a run
 */
export type SyncTrigger = 'manual' | 'startup' | 'connectivity' | 'interval' | 'retry';

/**
 * How a run ended
 */
export type SyncRunStatus = 'completed' | 'failed' | 'cancelled';

/**
 * Outcome of one sync run. `triggerSync` resolves with it; it never
 * rejects.
 */
export interface SyncRunResult {
  trigger: SyncTrigger;
  status: SyncRunStatus;
  /** Queue items acknowledged by the remote */
  pushed: number;
  /** Queue items rescheduled after a transient failure */
  failed: number;
  /** Queue items moved to dead-letter */
  deadLettered: number;
  /** Remote changes received */
  pulled: number;
  /** Pulled changes that went through the resolver */
  conflicts: number;
  startedAt: number;
  finishedAt: number;
  /** Why the run failed */
  error?: Error;
}

/**
 * Sync events
 */
export type SyncEvent =
  | { type: 'run-started'; trigger: SyncTrigger; timestamp: number }
  | {
      type: 'item-pushed';
      sequence: number;
      collection: string;
      id: string;
      serverRevision: number;
    }
  | {
      type: 'item-failed';
      sequence: number;
      collection: string;
      id: string;
      attemptCount: number;
      nextAttemptAt: number;
      error: string;
    }
  | {
      type: 'item-dead-lettered';
      sequence: number;
      collection: string;
      id: string;
      reason: string;
    }
  | { type: 'pulled'; collection: string; count: number; cursor: string }
  | { type: 'conflict-resolved'; collection: string; id: string; resolution: ConflictResolutionKind }
  | { type: 'entity-conflicted'; collection: string; id: string; error: string }
  | { type: 'run-completed'; result: SyncRunResult }
  | { type: 'run-failed'; result: SyncRunResult; error: Error };

/**
 * Cumulative coordinator statistics
 */
export interface SyncStats {
  runs: number;
  pushed: number;
  failed: number;
  deadLettered: number;
  pulled: number;
  conflicts: number;
  lastRunAt: number | null;
  lastError: string | null;
}

/**
 * Coordinator dependencies and tuning
 */
export interface SyncCoordinatorOptions {
  /** Storage shared with the store and queue */
  backend: StorageBackend;
  store: LocalStore;
  queue: SyncQueue;
  remote: RemoteApi;
  /** Collections to pull, in order */
  collections: string[];
  /** Resolver per collection */
  resolvers?: Record<string, ConflictResolver>;
  /** Resolver for collections without their own (default: last-write-wins) */
  defaultResolver?: ConflictResolver;
  /** Exclusive store lock shared with the other components */
  lock: AsyncLock;
  /** Prefix of every idempotency key */
  storeId: string;
  /** Offline → online transitions trigger a run */
  connectivity?: ConnectivityMonitor;
  clock?: Clock;
  /** Periodic run interval in ms, 0 disables (default: 0) */
  intervalMs?: number;
  /** Queue items read per batch (default: 50) */
  batchSize?: number;
  /** Entities pushed in parallel (default: 1) */
  pushConcurrency?: number;
  /** Logger or logger options */
  logger?: LoggerOption;
}
