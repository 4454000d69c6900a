import {
  DecodeError,
  TokenTimeoutError,
  toProducerError,
} from '../errors/stream-error.js';
import { DemandStream } from '../flow/demand-stream.js';
import { silentLogger, type TidewayLogger } from '../observability/logger.js';
import type { LiveQueryEngine, LiveResultListener, SubscriptionToken } from '../types/engine.js';
import type { FlowControlConfig } from '../validation/flow-control.js';

/**
 * Configuration options for live queries.
 *
 * @see {@link createLiveQuery}
 */
export interface LiveQueryOptions {
  /** Buffer size, overflow strategy and token timeout */
  config?: FlowControlConfig;
  logger?: TidewayLogger;
}

/** Live query options with a decoder turning raw change events into values */
export interface DecodedLiveQueryOptions<TEvent, T> extends LiveQueryOptions {
  decode: (event: TEvent) => T;
}

/**
 * Subscribe to a live query and expose its change events as a demand-driven
 * stream.
 *
 * The engine subscription is issued immediately. Events arriving before the
 * consumer asks for them are buffered under the overflow strategy, and none is
 * delivered until the subscription token is known. Cancelling before the
 * token arrives defers the unsubscribe until it does.
 *
 * If the token has not arrived within `config.timeoutMs` the stream fails
 * with a TokenTimeoutError.
 *
 * @example
 * ```typescript
 * const changes = createLiveQuery(engine, 'SELECT * FROM orders', {
 *   config: { bufferSize: 500, overflowStrategy: 'drop-head' },
 * });
 *
 * for await (const change of toAsyncIterable(changes)) {
 *   console.log(change.operation, change.record);
 * }
 * ```
 */
export function createLiveQuery<TEvent>(
  engine: LiveQueryEngine<TEvent>,
  query: string,
  options?: LiveQueryOptions
): DemandStream<TEvent>;
export function createLiveQuery<TEvent, T>(
  engine: LiveQueryEngine<TEvent>,
  query: string,
  options: DecodedLiveQueryOptions<TEvent, T>
): DemandStream<T>;
export function createLiveQuery<TEvent, T>(
  engine: LiveQueryEngine<TEvent>,
  query: string,
  options: LiveQueryOptions & { decode?: (event: TEvent) => T } = {}
): DemandStream<TEvent | T> {
  const logger = (options.logger ?? silentLogger).child('live', { query });
  let tokenTimer: ReturnType<typeof setTimeout> | null = null;

  const clearTokenTimer = (): void => {
    if (tokenTimer) {
      clearTimeout(tokenTimer);
      tokenTimer = null;
    }
  };

  const stream = new DemandStream<TEvent | T>({
    config: options.config,
    logger,
    unsubscribe: (token) => engine.unsubscribe(token),
    onTerminated: clearTokenTimer,
  });

  const decode = options.decode;
  const listener: LiveResultListener<TEvent> = {
    onLiveResult: (token, event) => {
      clearTokenTimer();
      if (!decode) {
        stream.push(event, token);
        return;
      }
      try {
        stream.push(decode(event), token);
      } catch (error) {
        stream.pushToken(token);
        stream.fail(
          new DecodeError(error instanceof Error ? error : new Error(String(error)), { query })
        );
      }
    },
    onLiveError: (error) => {
      stream.fail(toProducerError(error, 'TIDE_P301', { query }));
    },
  };

  tokenTimer = setTimeout(() => {
    tokenTimer = null;
    logger.warn('Subscription token did not arrive', { timeoutMs: stream.config.timeoutMs });
    stream.fail(new TokenTimeoutError(stream.config.timeoutMs));
  }, stream.config.timeoutMs);

  logger.debug('Subscribing');

  let subscribing: Promise<SubscriptionToken>;
  try {
    subscribing = engine.subscribe(query, listener);
  } catch (error) {
    subscribing = Promise.reject(error);
  }

  void subscribing.then(
    (token) => {
      clearTokenTimer();
      logger.debug('Subscription token received', { token });
      stream.pushToken(token);
    },
    (error: unknown) => {
      clearTokenTimer();
      stream.fail(toProducerError(error, 'TIDE_P301', { query }));
    }
  );

  return stream;
}
