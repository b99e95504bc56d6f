import {
  ValidationError,
  validateCollectionName,
  type BackoffOptions,
  type Clock,
  type ConflictPolicy,
  type FieldMergeFunction,
  type LoggerOption,
  type Migration,
  type PayloadSchema,
  type StorageBackend,
} from '@tidemark/core';
import type { ConnectivityMonitor, RemoteApi } from '@tidemark/sync';
import { ZodType, z } from 'zod';

// ── Types ──────────────────────────────────────────────────

/**
 * Per-collection configuration: conflict policy plus an optional payload
 * schema
 */
export interface CollectionConfig extends ConflictPolicy {
  /** zod schema every written payload must satisfy */
  schema?: PayloadSchema;
}

/**
 * Sync Coordinator tuning
 */
export interface SyncConfig {
  /** Periodic run interval in ms, 0 disables (default: 0) */
  intervalMs?: number;
  /** Queue items read per batch (default: 50) */
  batchSize?: number;
  /** Entities pushed in parallel (default: 1) */
  pushConcurrency?: number;
  /** Start the coordinator when the engine opens (default: true) */
  autoStart?: boolean;
}

/**
 * Engine configuration
 */
export interface EngineConfig {
  /** Store name handed to the backend (default: 'tidemark') */
  name?: string;
  /** Persistence backend, opened by the engine */
  backend: StorageBackend;
  /** Ordered schema migrations */
  migrations?: Migration[];
  /** Version to migrate to (default: highest registered) */
  targetVersion?: number;
  /** Collections created at open and pulled on every sync */
  collections?: Record<string, CollectionConfig>;
  /** Remote collaborator; without one the engine is local only */
  remote?: RemoteApi;
  /** Online/offline signal driving connectivity-triggered syncs */
  connectivity?: ConnectivityMonitor;
  clock?: Clock;
  /** Logger or logger options */
  logger?: LoggerOption;
  /** Queue retry policy */
  backoff?: BackoffOptions;
  sync?: SyncConfig;
}

// ── Schema ─────────────────────────────────────────────────

function isFunction(value: unknown): boolean {
  return typeof value === 'function';
}

function hasMethods(...names: string[]): (value: unknown) => boolean {
  return (value) =>
    typeof value === 'object' &&
    value !== null &&
    names.every((name) => typeof Reflect.get(value, name) === 'function');
}

const collectionNameSchema = z.string().superRefine((name, ctx) => {
  for (const message of validateCollectionName(name).errors) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
  }
});

const collectionConfigSchema = z
  .object({
    strategy: z.enum(['remote-wins', 'local-wins', 'last-write-wins', 'field-merge']).optional(),
    compareBy: z.enum(['updatedAt', 'revision']).optional(),
    merge: z.custom<FieldMergeFunction>(isFunction, 'merge must be a function').optional(),
    schema: z
      .custom<PayloadSchema>((value) => value instanceof ZodType, 'schema must be a zod schema')
      .optional(),
  })
  .refine((config) => config.strategy !== 'field-merge' || config.merge !== undefined, {
    message: 'field-merge requires a merge function',
    path: ['merge'],
  });

const migrationSchema = z.object({
  version: z.number().int().positive(),
  name: z.string().min(1),
  up: z.custom<Migration['up']>(isFunction, 'up must be a function'),
  down: z.custom<Migration['up']>(isFunction, 'down must be a function').optional(),
});

const backoffSchema = z.object({
  baseDelayMs: z.number().nonnegative().optional(),
  factor: z.number().min(1).optional(),
  maxDelayMs: z.number().nonnegative().optional(),
  maxAttempts: z.number().int().positive().optional(),
  jitter: z.number().min(0).max(1).optional(),
  random: z.custom<() => number>(isFunction, 'random must be a function').optional(),
});

const syncSchema = z.object({
  intervalMs: z.number().int().nonnegative().optional(),
  batchSize: z.number().int().positive().optional(),
  pushConcurrency: z.number().int().positive().optional(),
  autoStart: z.boolean().optional(),
});

/**
 * Shape check run by `Engine.open` before anything is opened
 */
export const engineConfigSchema = z.object({
  name: z.string().min(1).optional(),
  backend: z.custom<StorageBackend>(
    hasMethods('open', 'close', 'isOpen', 'read', 'transaction'),
    'backend must implement StorageBackend'
  ),
  migrations: z.array(migrationSchema).optional(),
  targetVersion: z.number().int().nonnegative().optional(),
  collections: z.record(collectionNameSchema, collectionConfigSchema).optional(),
  remote: z.custom<RemoteApi>(hasMethods('push', 'pull'), 'remote must implement push and pull').optional(),
  connectivity: z
    .custom<ConnectivityMonitor>(hasMethods('isOnline'), 'connectivity must implement isOnline')
    .optional(),
  clock: z.custom<Clock>(hasMethods('now', 'schedule'), 'clock must implement now and schedule').optional(),
  logger: z
    .custom<LoggerOption>(
      (value) => value === false || (typeof value === 'object' && value !== null),
      'logger must be a Logger, logger options or false'
    )
    .optional(),
  backoff: backoffSchema.optional(),
  sync: syncSchema.optional(),
});

/**
 * Validate an engine config.
 *
 * @throws ValidationError (`TIDEMARK_V100`) with one issue per problem
 */
export function validateEngineConfig(config: unknown): void {
  const result = engineConfigSchema.safeParse(config);
  if (result.success) return;

  throw new ValidationError(
    result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
    { source: 'EngineConfig' }
  );
}
