import { describe, expect, it } from 'vitest';
import { ConfigValidationError } from '../../errors/stream-error.js';
import { TidewayLogger, type LogEntry } from '../../observability/logger.js';
import { QueryStreams } from '../query-streams.js';
import { FakeEngine, flush } from './fakes.js';

describe('QueryStreams', () => {
  it('should resolve instance defaults', () => {
    const streams = new QueryStreams(new FakeEngine(), { config: { bufferSize: 5 } });
    expect(streams.config).toEqual({ bufferSize: 5, overflowStrategy: 'drop-head', timeoutMs: 30_000 });
  });

  it('should reject invalid defaults', () => {
    expect(
      () => new QueryStreams(new FakeEngine(), { config: { overflowStrategy: 'fail', timeoutMs: -1 } })
    ).toThrow(ConfigValidationError);
  });

  it('should open live streams with per-stream overrides', async () => {
    const engine = new FakeEngine();
    const streams = new QueryStreams(engine, { config: { bufferSize: 5 } });

    const live = streams.live('SELECT * FROM orders', { overflowStrategy: 'fail' });
    expect(live.config).toEqual({ bufferSize: 5, overflowStrategy: 'fail', timeoutMs: 30_000 });
    expect(engine.subscription?.query).toBe('SELECT * FROM orders');

    engine.confirm(1);
    await flush();
    expect(live.phase).toBe('active');
  });

  it('should open fetch streams with per-stream overrides', async () => {
    const engine = new FakeEngine(['r1', 'r2']);
    const streams = new QueryStreams(engine, { config: { bufferSize: 5, timeoutMs: 2000 } });

    const rows = streams.fetch('SELECT * FROM orders', { limit: 1, config: { bufferSize: 3 } });
    expect(rows.config).toEqual({ bufferSize: 3, overflowStrategy: 'drop-head', timeoutMs: 2000 });

    const received: string[] = [];
    rows.subscribe({
      start: (subscription) => subscription.request(10),
      next: (row) => received.push(row),
      error: () => {},
      complete: () => {},
    });
    await flush();

    expect(received).toEqual(['r1']);
    expect(rows.phase).toBe('completed');
  });

  it('should hand its logger to the streams it opens', async () => {
    const entries: LogEntry[] = [];
    const logger = new TidewayLogger({
      module: 'orders',
      level: 'debug',
      handler: (entry) => entries.push(entry),
    });
    const engine = new FakeEngine();
    const streams = new QueryStreams(engine, { logger });

    streams.live('SELECT * FROM orders');
    engine.confirm(1);
    await flush();

    const subscribing = entries.find((entry) => entry.message === 'Subscribing');
    expect(subscribing?.module).toBe('orders:live');
    expect(subscribing?.context).toEqual({ query: 'SELECT * FROM orders' });
  });
});
