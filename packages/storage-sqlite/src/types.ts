/**
 * Connection settings for a SQLite driver
 */
export interface SQLiteDriverConfig {
  /** Path to the database file (default: in-memory) */
  path?: string;
  /** Enable WAL journaling */
  walMode?: boolean;
  /** Synchronous mode */
  synchronous?: 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';
  /** How long to wait on a locked database, in ms */
  busyTimeoutMs?: number;
}

/**
 * Value bound to a statement parameter
 */
export type SqlParam = string | number | null;

/**
 * Row returned by a query, keyed by column name
 */
export type SqlRow = Record<string, unknown>;

/**
 * Run result from statement execution
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * Statement prepared for execution
 */
export interface PreparedStatement {
  run(...params: SqlParam[]): RunResult;
  get(...params: SqlParam[]): SqlRow | undefined;
  all(...params: SqlParam[]): SqlRow[];
}

/**
 * SQLite driver interface (abstraction over better-sqlite3 and sql.js)
 */
export interface SQLiteDriver {
  /** Driver name for logging */
  readonly kind: string;

  /** Execute one or more SQL statements without results */
  exec(sql: string): void;

  /** Prepare a statement */
  prepare(sql: string): PreparedStatement;

  /** Close the database */
  close(): void;

  /** Check if database is open */
  isOpen(): boolean;

  /** Export database to bytes (sql.js) */
  export?(): Uint8Array;

  /** Read a pragma value */
  pragma(name: string): unknown;
}

/**
 * Creates the driver when the backend opens
 */
export type SQLiteDriverFactory = () => SQLiteDriver | Promise<SQLiteDriver>;
