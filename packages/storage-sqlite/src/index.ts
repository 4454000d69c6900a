/**
 * @tideway/storage-sqlite - SQLite query engine for Tideway
 *
 * Implements the live and one-shot engine contracts of `@tideway/core` over
 * SQLite through sql.js (SQLite compiled to WebAssembly), so SQLite results
 * can be consumed as demand-driven streams.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { QueryStreams, toAsyncIterable } from '@tideway/core';
 * import { SQLiteQueryEngine } from '@tideway/storage-sqlite';
 *
 * const engine = await SQLiteQueryEngine.open({ foreignKeys: true });
 * const streams = new QueryStreams(engine);
 *
 * for await (const row of toAsyncIterable(streams.fetch('SELECT * FROM orders'))) {
 *   console.log(row);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @tideway/storage-sqlite
 */

export * from './driver.js';
export * from './query-engine.js';
export type * from './types.js';
