export { BackoffPolicy, createBackoffPolicy, type BackoffOptions } from './backoff.js';
export {
  SUPERSEDED_BY_REMOTE,
  SyncQueue,
  type EnqueueInput,
  type FailOptions,
  type PeekOptions,
  type SyncQueueOptions,
} from './sync-queue.js';
