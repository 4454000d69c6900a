import initSqlJs from 'sql.js';
import type { BindParams, Database, SqlJsStatic, SqlValue } from 'sql.js';
import { QueryError } from '@tideway/core';
import type { SQLiteDriver, SQLiteEngineConfig, SQLiteStatement } from './types.js';

let sqlJs: Promise<SqlJsStatic> | null = null;

/** Load the sql.js module once per process; its WebAssembly binary ships in the package */
function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs().catch((error: unknown) => {
      sqlJs = null;
      throw error;
    });
  }
  return sqlJs;
}

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint' && Number.isSafeInteger(Number(value))) return Number(value);
  if (value instanceof Uint8Array) return value;
  throw new QueryError(`Unsupported parameter type: ${typeof value}`);
}

function bind(params: readonly unknown[]): BindParams {
  return params.map(toSqlValue);
}

function lastInsertRowid(db: Database): number {
  const value = db.exec('SELECT last_insert_rowid()')[0]?.values[0]?.[0];
  return typeof value === 'number' ? value : 0;
}

function createStatement(db: Database, sql: string): SQLiteStatement {
  const rows = (params: readonly unknown[], limit: number): Record<string, SqlValue>[] => {
    const stmt = db.prepare(sql);
    try {
      stmt.bind(bind(params));
      const results: Record<string, SqlValue>[] = [];
      while (results.length < limit && stmt.step()) {
        results.push(stmt.getAsObject());
      }
      return results;
    } finally {
      stmt.free();
    }
  };

  return {
    run: (...params: unknown[]) => {
      db.run(sql, bind(params));
      return { changes: db.getRowsModified(), lastInsertRowid: lastInsertRowid(db) };
    },
    get: (...params: unknown[]) => rows(params, 1)[0],
    all: (...params: unknown[]) => rows(params, Number.POSITIVE_INFINITY),
  };
}

/**
 * Create a sql.js driver (SQLite compiled to WebAssembly).
 *
 * The database lives in memory; `config.data` opens a copy of an existing
 * database image.
 */
export async function createSqlJsDriver(config: SQLiteEngineConfig = {}): Promise<SQLiteDriver> {
  const SQL = await loadSqlJs();
  const db = new SQL.Database(config.data);

  // Configure pragmas
  if (config.foreignKeys) {
    db.run('PRAGMA foreign_keys = ON');
  }

  if (config.cacheSize) {
    db.run(`PRAGMA cache_size = -${config.cacheSize}`);
  }

  let isDbOpen = true;

  return {
    exec: (sql: string) => {
      db.exec(sql);
    },
    prepare: (sql: string) => {
      // Surfaces syntax errors and missing tables when the statement is prepared.
      db.prepare(sql).free();
      return createStatement(db, sql);
    },
    close: () => {
      db.close();
      isDbOpen = false;
    },
    isOpen: () => isDbOpen,
  };
}
