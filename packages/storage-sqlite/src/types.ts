/**
 * SQLite engine configuration
 */
export interface SQLiteEngineConfig {
  /** Database image to open; a fresh in-memory database when omitted */
  data?: Uint8Array;
  /** Enable foreign keys */
  foreignKeys?: boolean;
  /** Cache size in KB */
  cacheSize?: number;
  /** Rows read per page by one-shot fetches (default: 100) */
  fetchPageSize?: number;
}

/**
 * Run result from statement execution
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

/**
 * SQLite statement prepared for execution
 */
export interface SQLiteStatement {
  run(...params: unknown[]): RunResult;
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

/**
 * SQLite driver interface
 */
export interface SQLiteDriver {
  /** Execute one or more SQL statements without parameters */
  exec(sql: string): void;

  /** Prepare a statement; throws when SQLite rejects it */
  prepare(sql: string): SQLiteStatement;

  /** Close the database */
  close(): void;

  /** Check if database is open */
  isOpen(): boolean;
}

/** A result row, keyed by column name */
export type SQLiteRow = Record<string, unknown>;

/** Kind of write a live change reports */
export type LiveOperation = 'insert' | 'update' | 'delete';

/**
 * Change event delivered to live subscribers of a table
 */
export interface LiveChange {
  operation: LiveOperation;
  /** Table written to, lower-cased */
  table: string;
  /** Rows affected by the statement */
  changes: number;
  /** Rowid of an inserted row; absent for tables without rowids */
  rowid?: number;
  /** The inserted row, read back by rowid */
  record?: SQLiteRow;
}
