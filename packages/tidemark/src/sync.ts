/**
 * @packageDocumentation
 *
 * # Tidemark Sync
 *
 * Remote clients, connectivity monitors and the Sync Coordinator. The
 * `Engine` builds a coordinator itself when its config names a
 * remote; import from here to construct the remote and the monitor.
 *
 * ```typescript
 * import { Engine, createMemoryBackend } from 'tidemark';
 * import { createHttpRemote, createManualConnectivity } from 'tidemark/sync';
 *
 * const connectivity = createManualConnectivity(false);
 * const engine = await Engine.open({
 *   backend: createMemoryBackend(),
 *   migrations,
 *   collections: { notes: {} },
 *   remote: createHttpRemote({ baseUrl: 'https://api.example.com/sync' }),
 *   connectivity,
 * });
 *
 * engine.syncEvents$.subscribe((event) => console.log(event.type));
 * connectivity.setOnline(true); // starts a sync run
 * ```
 *
 * @module tidemark/sync
 */

export * from '@tidemark/sync';
