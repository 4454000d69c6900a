/**
 * SQLiteQueryEngine: a push-based query engine over SQLite.
 *
 * One-shot queries are read a page at a time and handed to the listener row
 * by row; the engine awaits the listener between rows, so a gated consumer
 * paces the read and the connection is free between pages.
 *
 * Live queries are table-level: a `SELECT … FROM <table>` subscription
 * receives a {@link LiveChange} for every write made through
 * {@link SQLiteQueryEngine.execute} that touches that table.
 *
 * @example
 * ```typescript
 * const engine = await SQLiteQueryEngine.open();
 * engine.execute('CREATE TABLE orders (id INTEGER PRIMARY KEY, total INTEGER)');
 * const streams = new QueryStreams(engine);
 *
 * toObservable(streams.live('SELECT * FROM orders')).subscribe((change) => {
 *   console.log(change.operation, change.record);
 * });
 *
 * engine.execute('INSERT INTO orders (total) VALUES (?)', [42]);
 * ```
 */

import {
  ProducerError,
  QueryError,
  silentLogger,
  type FetchOptions,
  type LiveResultListener,
  type QueryEngine,
  type ResultListener,
  type SubscriptionToken,
  type TidewayLogger,
} from '@tideway/core';
import { createSqlJsDriver } from './driver.js';
import type {
  LiveChange,
  LiveOperation,
  RunResult,
  SQLiteDriver,
  SQLiteEngineConfig,
  SQLiteRow,
} from './types.js';

// ── Types ──────────────────────────────────────────────────

export interface SQLiteQueryEngineOptions {
  /** Rows read per page by one-shot fetches (default: 100) */
  fetchPageSize?: number;
  logger?: TidewayLogger;
}

interface LiveSubscription {
  token: SubscriptionToken;
  table: string;
  listener: LiveResultListener<LiveChange>;
}

interface WriteTarget {
  operation: LiveOperation;
  table: string;
}

// ── Query parsing ──────────────────────────────────────────

const IDENTIFIER = String.raw`["\`\[]?([A-Za-z_][A-Za-z0-9_]*)["\`\]]?`;

const LIVE_SELECT = new RegExp(String.raw`^\s*select\b[\s\S]*?\bfrom\s+${IDENTIFIER}`, 'i');

const WRITES: ReadonlyArray<{ operation: LiveOperation; pattern: RegExp }> = [
  {
    operation: 'insert',
    pattern: new RegExp(String.raw`^\s*(?:insert|replace)(?:\s+or\s+\w+)?\s+into\s+${IDENTIFIER}`, 'i'),
  },
  {
    operation: 'update',
    pattern: new RegExp(String.raw`^\s*update(?:\s+or\s+\w+)?\s+${IDENTIFIER}`, 'i'),
  },
  {
    operation: 'delete',
    pattern: new RegExp(String.raw`^\s*delete\s+from\s+${IDENTIFIER}`, 'i'),
  },
];

/** Table a live query selects from, or null when it is not a SELECT */
export function liveQueryTable(query: string): string | null {
  const table = LIVE_SELECT.exec(query)?.[1];
  return table === undefined ? null : table.toLowerCase();
}

function writeTarget(sql: string): WriteTarget | null {
  for (const { operation, pattern } of WRITES) {
    const table = pattern.exec(sql)?.[1];
    if (table !== undefined) {
      return { operation, table: table.toLowerCase() };
    }
  }
  return null;
}

function isRow(value: unknown): value is SQLiteRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripTerminator(query: string): string {
  return query.trim().replace(/;+$/, '');
}

// ── Engine ─────────────────────────────────────────────────

export class SQLiteQueryEngine implements QueryEngine<SQLiteRow, LiveChange> {
  private readonly subscriptions = new Map<SubscriptionToken, LiveSubscription>();
  private nextToken = 1;
  private readonly pageSize: number;
  private readonly logger: TidewayLogger;

  constructor(
    private readonly driver: SQLiteDriver,
    options: SQLiteQueryEngineOptions = {}
  ) {
    const pageSize = options.fetchPageSize ?? 100;
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new QueryError(`fetchPageSize must be a positive integer, got ${pageSize}`);
    }
    this.pageSize = pageSize;
    this.logger = (options.logger ?? silentLogger).child('sqlite');
  }

  /** Open a sql.js database and wrap it in an engine */
  static async open(
    config: SQLiteEngineConfig = {},
    logger?: TidewayLogger
  ): Promise<SQLiteQueryEngine> {
    return new SQLiteQueryEngine(await createSqlJsDriver(config), {
      fetchPageSize: config.fetchPageSize,
      logger,
    });
  }

  /** Number of registered live subscriptions */
  get liveSubscriptions(): number {
    return this.subscriptions.size;
  }

  async fetch(
    query: string,
    options: FetchOptions,
    listener: ResultListener<SQLiteRow>
  ): Promise<void> {
    this.assertOpen();
    const statement = this.driver.prepare(
      `SELECT * FROM (${stripTerminator(query)}) LIMIT ? OFFSET ?`
    );
    const params = options.params ?? [];
    let remaining = options.limit ?? Number.POSITIVE_INFINITY;
    let offset = 0;

    while (remaining > 0) {
      this.assertOpen();
      const size = Math.min(this.pageSize, remaining);
      const page = statement.all(...params, size, offset);

      for (const row of page) {
        if (!isRow(row)) {
          throw new QueryError('Query produced a value that is not a row', { query });
        }
        if (!(await listener.onResult(row))) {
          this.logger.debug('Fetch stopped by listener', { query, offset });
          return;
        }
      }

      if (page.length < size) break;
      offset += page.length;
      remaining -= page.length;
    }

    listener.onEnd();
  }

  async subscribe(
    query: string,
    listener: LiveResultListener<LiveChange>
  ): Promise<SubscriptionToken> {
    this.assertOpen();
    const table = liveQueryTable(query);
    if (table === null) {
      throw new QueryError(`Live queries must be SELECT statements over a table: ${query}`, {
        query,
      });
    }

    const token = this.nextToken++;
    this.subscriptions.set(token, { token, table, listener });
    this.logger.debug('Live subscription registered', { token, table });
    return token;
  }

  unsubscribe(token: SubscriptionToken): void {
    if (this.subscriptions.delete(token)) {
      this.logger.debug('Live subscription removed', { token });
    }
  }

  /**
   * Run a statement. Writes to a table with live subscribers notify each of
   * them once.
   */
  execute(sql: string, params: readonly unknown[] = []): RunResult {
    this.assertOpen();
    const result = this.driver.prepare(sql).run(...params);

    const target = writeTarget(sql);
    if (target && result.changes > 0) {
      this.notify(target, result);
    }
    return result;
  }

  /** Fail every live subscription and close the database */
  close(): void {
    const subscriptions = [...this.subscriptions.values()];
    this.subscriptions.clear();
    for (const subscription of subscriptions) {
      subscription.listener.onLiveError(
        new ProducerError('TIDE_P301', 'Query engine closed', { token: subscription.token })
      );
    }
    if (this.driver.isOpen()) {
      this.driver.close();
    }
  }

  private notify(target: WriteTarget, result: RunResult): void {
    const subscribers = [...this.subscriptions.values()].filter((s) => s.table === target.table);
    if (subscribers.length === 0) return;

    const change: LiveChange = {
      operation: target.operation,
      table: target.table,
      changes: result.changes,
    };
    if (target.operation === 'insert') {
      const record = this.readInserted(target.table, result.lastInsertRowid);
      if (record) {
        change.rowid = result.lastInsertRowid;
        change.record = record;
      }
    }

    for (const subscription of subscribers) {
      try {
        subscription.listener.onLiveResult(subscription.token, change);
      } catch (error) {
        this.logger.error(
          'Live listener threw',
          error instanceof Error ? error : new Error(String(error)),
          { token: subscription.token }
        );
        this.unsubscribe(subscription.token);
        subscription.listener.onLiveError(error);
      }
    }
  }

  /** The row an insert wrote; null for tables without rowids */
  private readInserted(table: string, rowid: number): SQLiteRow | null {
    try {
      const record = this.driver.prepare(`SELECT * FROM "${table}" WHERE rowid = ?`).get(rowid);
      return isRow(record) ? record : null;
    } catch (error) {
      // The write has committed; subscribers still hear about it.
      this.logger.debug('Inserted row not readable by rowid', {
        table,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private assertOpen(): void {
    if (!this.driver.isOpen()) {
      throw new ProducerError('TIDE_P300', 'Database is closed');
    }
  }
}
