import type { DemandStream } from '../flow/demand-stream.js';
import { silentLogger, type TidewayLogger } from '../observability/logger.js';
import type { QueryEngine } from '../types/engine.js';
import {
  resolveFlowControlConfig,
  type FlowControlConfig,
  type ResolvedFlowControlConfig,
} from '../validation/flow-control.js';
import { createBoundedQuery, type BoundedQueryOptions } from './bounded-query.js';
import { createLiveQuery } from './live-query.js';

export interface QueryStreamsOptions {
  /** Defaults applied to every stream this instance opens */
  config?: FlowControlConfig;
  logger?: TidewayLogger;
}

export type FetchStreamOptions = Omit<BoundedQueryOptions, 'logger'>;

/**
 * Opens live and one-shot streams against a single engine with shared
 * flow-control defaults.
 *
 * @example
 * ```typescript
 * const streams = new QueryStreams(engine, {
 *   config: { bufferSize: 200, overflowStrategy: 'fail', timeoutMs: 5000 },
 * });
 *
 * const changes = streams.live('SELECT * FROM orders');
 * const rows = streams.fetch('SELECT * FROM orders', { limit: 100 });
 * ```
 */
export class QueryStreams<TRow, TEvent> {
  readonly config: ResolvedFlowControlConfig;
  private readonly logger: TidewayLogger;

  constructor(
    private readonly engine: QueryEngine<TRow, TEvent>,
    options: QueryStreamsOptions = {}
  ) {
    this.config = resolveFlowControlConfig(options.config);
    this.logger = options.logger ?? silentLogger;
  }

  /** Subscribe to a live query; `config` overrides the instance defaults */
  live(query: string, config?: FlowControlConfig): DemandStream<TEvent> {
    return createLiveQuery(this.engine, query, {
      config: resolveFlowControlConfig(config, this.config),
      logger: this.logger,
    });
  }

  /** Run a one-shot query; `options.config` overrides the instance defaults */
  fetch(query: string, options: FetchStreamOptions = {}): DemandStream<TRow> {
    return createBoundedQuery(this.engine, query, {
      ...options,
      config: resolveFlowControlConfig(options.config, this.config),
      logger: this.logger,
    });
  }
}
