import Database from 'better-sqlite3';
import type { SqlJsStatic } from 'sql.js';
import type { PreparedStatement, SQLiteDriver, SQLiteDriverConfig, SqlRow } from './types.js';

function isSqlRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRows(values: unknown[]): SqlRow[] {
  return values.filter(isSqlRow);
}

/**
 * Create a better-sqlite3 driver (Node.js)
 */
export function createBetterSqliteDriver(config: SQLiteDriverConfig = {}): SQLiteDriver {
  const db = new Database(config.path ?? ':memory:');

  if (config.walMode) {
    db.pragma('journal_mode = WAL');
  }

  if (config.synchronous) {
    db.pragma(`synchronous = ${config.synchronous}`);
  }

  if (config.busyTimeoutMs !== undefined) {
    db.pragma(`busy_timeout = ${Math.floor(config.busyTimeoutMs)}`);
  }

  const statements = new Map<string, Database.Statement>();

  function statement(sql: string): Database.Statement {
    let stmt = statements.get(sql);
    if (!stmt) {
      stmt = db.prepare(sql);
      statements.set(sql, stmt);
    }
    return stmt;
  }

  return {
    kind: 'better-sqlite3',
    exec: (sql: string) => {
      db.exec(sql);
    },
    prepare: (sql: string): PreparedStatement => {
      const stmt = statement(sql);
      return {
        run: (...params) => {
          const result = stmt.run(...params);
          return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
        },
        get: (...params) => {
          const row: unknown = stmt.get(...params);
          return isSqlRow(row) ? row : undefined;
        },
        all: (...params) => toRows(stmt.all(...params)),
      };
    },
    close: () => {
      statements.clear();
      db.close();
    },
    isOpen: () => db.open,
    pragma: (name: string) => db.pragma(name, { simple: true }),
  };
}

/**
 * Create a sql.js (WASM) driver from an initialized module
 *
 * @example
 * ```typescript
 * import initSqlJs from 'sql.js';
 *
 * const SQL = await initSqlJs();
 * const backend = createSQLiteBackend({ driver: () => createSqlJsDriver(SQL) });
 * ```
 */
export function createSqlJsDriver(SQL: SqlJsStatic, data?: Uint8Array): SQLiteDriver {
  const db = new SQL.Database(data);
  let isDbOpen = true;

  return {
    kind: 'sql.js',
    exec: (sql: string) => {
      db.exec(sql);
    },
    prepare: (sql: string): PreparedStatement => ({
      run: (...params) => {
        db.run(sql, params);
        return { changes: db.getRowsModified(), lastInsertRowid: 0 };
      },
      get: (...params) => {
        const stmt = db.prepare(sql);
        try {
          stmt.bind(params);
          return stmt.step() ? stmt.getAsObject() : undefined;
        } finally {
          stmt.free();
        }
      },
      all: (...params) => {
        const stmt = db.prepare(sql);
        try {
          stmt.bind(params);
          const rows: SqlRow[] = [];
          while (stmt.step()) {
            rows.push(stmt.getAsObject());
          }
          return rows;
        } finally {
          stmt.free();
        }
      },
    }),
    close: () => {
      db.close();
      isDbOpen = false;
    },
    isOpen: () => isDbOpen,
    export: () => db.export(),
    pragma: (name: string) => {
      const result = db.exec(`PRAGMA ${name}`);
      return result[0]?.values[0]?.[0];
    },
  };
}
