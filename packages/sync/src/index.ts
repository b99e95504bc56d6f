/**
 * @tidemark/sync - Synchronization for Tidemark stores
 *
 * Moves queued local mutations to a remote collaborator and remote changes
 * back into the Local Store, reconciling the two with the configured
 * conflict strategies.
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────┐
 * │                      SyncCoordinator                        │
 * │                                                             │
 * │  idle → draining → pulling → resolving → committing → idle  │
 * │                 ↘ failed ↗                                  │
 * │                                                             │
 * │  ┌────────────┐  ┌────────────┐  ┌──────────────────────┐   │
 * │  │ SyncQueue  │  │ LocalStore │  │ ConflictResolver     │   │
 * │  │ (push)     │  │ (apply)    │  │ (per collection)     │   │
 * │  └────────────┘  └────────────┘  └──────────────────────┘   │
 * └──────────────────────────────┬──────────────────────────────┘
 *                                │ RemoteApi (push / pull)
 *                                ▼
 *                      HttpRemote or your own
 * ```
 *
 * ## Triggers
 *
 * | Trigger | Source |
 * |---------|--------|
 * | `manual` | `triggerSync()` |
 * | `startup` | `start()` while online |
 * | `connectivity` | offline → online transition of the monitor |
 * | `interval` | periodic timer (`intervalMs`) |
 * | `retry` | earliest scheduled queue retry |
 *
 * @packageDocumentation
 * @module @tidemark/sync
 */

export {
  ManualConnectivity,
  PollingConnectivity,
  createManualConnectivity,
  createPollingConnectivity,
  type ConnectivityMonitor,
  type PollingConnectivityOptions,
} from './connectivity.js';

export { SyncCoordinator, createSyncCoordinator } from './sync-coordinator.js';

export {
  HttpRemote,
  createHttpRemote,
  remoteErrorForStatus,
  type FetchFunction,
  type HttpRemoteConfig,
  type PullResult,
  type PushRequest,
  type PushResult,
  type RemoteApi,
} from './transport/index.js';

export type {
  CoordinatorState,
  SyncCoordinatorOptions,
  SyncEvent,
  SyncRunResult,
  SyncRunStatus,
  SyncStats,
  SyncTrigger,
} from './types.js';
