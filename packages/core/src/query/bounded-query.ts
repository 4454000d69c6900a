import {
  ConfigValidationError,
  DecodeError,
  toProducerError,
} from '../errors/stream-error.js';
import { DemandStream } from '../flow/demand-stream.js';
import { ResultGate, type GateSink } from '../flow/result-gate.js';
import { silentLogger, type TidewayLogger } from '../observability/logger.js';
import type { FetchOptions, FetchQueryEngine, ResultListener } from '../types/engine.js';
import type { FlowControlConfig } from '../validation/flow-control.js';

/**
 * How a one-shot fetch is paced.
 *
 * - `backpressured`: the engine waits in a {@link ResultGate} after every row
 *   until the consumer has taken it
 * - `buffering`: the engine is never held; rows queue in the stream buffer
 *   under the overflow strategy
 */
export type FetchMode = 'backpressured' | 'buffering';

export interface BoundedQueryOptions extends FetchOptions {
  /** @default 'backpressured' */
  mode?: FetchMode;
  /** Buffer size, overflow strategy and permit timeout */
  config?: FlowControlConfig;
  logger?: TidewayLogger;
}

export interface DecodedBoundedQueryOptions<TRow, T> extends BoundedQueryOptions {
  decode: (row: TRow) => T;
}

let nextFetchId = 1;

/**
 * Run a one-shot query and expose its rows as a demand-driven stream.
 *
 * The fetch starts immediately. Its handle stands in for the subscription
 * token, so rows flow as soon as the consumer requests them, and cancelling
 * tells the engine to stop fetching. The stream completes once the engine
 * has finished and every buffered row has been delivered.
 *
 * @example
 * ```typescript
 * const rows = createBoundedQuery(engine, 'SELECT * FROM orders WHERE total > ?', {
 *   params: [100],
 *   limit: 1000,
 * });
 *
 * rows.subscribe({
 *   start: (s) => s.request(50),
 *   next: (row) => process(row),
 *   error: (err) => console.error(err.format()),
 *   complete: () => console.log('done'),
 * });
 * ```
 */
export function createBoundedQuery<TRow>(
  engine: FetchQueryEngine<TRow>,
  query: string,
  options?: BoundedQueryOptions
): DemandStream<TRow>;
export function createBoundedQuery<TRow, T>(
  engine: FetchQueryEngine<TRow>,
  query: string,
  options: DecodedBoundedQueryOptions<TRow, T>
): DemandStream<T>;
export function createBoundedQuery<TRow, T>(
  engine: FetchQueryEngine<TRow>,
  query: string,
  options: BoundedQueryOptions & { decode?: (row: TRow) => T } = {}
): DemandStream<TRow | T> {
  if (options.limit !== undefined && !(Number.isInteger(options.limit) && options.limit > 0)) {
    throw new ConfigValidationError([
      { path: 'limit', message: 'must be a positive integer', value: options.limit },
    ]);
  }

  const fetchId = nextFetchId++;
  const mode = options.mode ?? 'backpressured';
  const logger = (options.logger ?? silentLogger).child('fetch', { query, fetchId, mode });
  let gate: ResultGate<TRow> | null = null;
  let stopped = false;

  const stream = new DemandStream<TRow | T>({
    config: options.config,
    logger,
    unsubscribe: () => {
      stopped = true;
      gate?.finish();
    },
    onDelivered: () => gate?.release(),
    onTerminated: () => {
      stopped = true;
      gate?.finish();
    },
  });

  const decode = options.decode;
  const sink: GateSink<TRow> = {
    push: (row) => {
      if (!decode) {
        stream.push(row);
        return;
      }
      try {
        stream.push(decode(row));
      } catch (error) {
        stream.fail(
          new DecodeError(error instanceof Error ? error : new Error(String(error)), { query })
        );
      }
    },
    end: () => stream.end(),
    fail: (error) => stream.fail(toProducerError(error, 'TIDE_P300', { query })),
  };

  let listener: ResultListener<TRow>;
  let settle: { onEnd(): void; onError(error: unknown): void };
  let ended = false;

  if (mode === 'backpressured') {
    const resultGate = new ResultGate<TRow>(sink, {
      timeoutMs: stream.config.timeoutMs,
      logger: logger.child('gate'),
    });
    gate = resultGate;
    listener = resultGate;
    settle = resultGate;
  } else {
    listener = {
      onResult: (row) => {
        if (stopped) return false;
        sink.push(row);
        return !stopped;
      },
      onEnd: () => {
        ended = true;
        sink.end();
      },
    };
    settle = {
      // Covers an engine that returns without calling onEnd.
      onEnd: () => {
        if (!ended) sink.end();
      },
      onError: (error) => sink.fail(error),
    };
  }

  // The fetch handle is known up front; rows may be delivered right away.
  stream.pushToken(fetchId);

  const done = logger.time('fetch');
  logger.debug('Fetching', { limit: options.limit });

  let fetching: Promise<void>;
  try {
    fetching = engine.fetch(query, { limit: options.limit, params: options.params }, listener);
  } catch (error) {
    fetching = Promise.reject(error);
  }

  void fetching.then(
    () => {
      done({ delivered: stream.snapshot.delivered });
      settle.onEnd();
    },
    (error: unknown) => {
      logger.error('Fetch failed', error instanceof Error ? error : new Error(String(error)));
      settle.onError(error);
    }
  );

  return stream;
}
