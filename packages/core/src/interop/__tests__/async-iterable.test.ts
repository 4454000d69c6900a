import { describe, expect, it, vi } from 'vitest';
import { StreamError } from '../../errors/stream-error.js';
import { DemandStream } from '../../flow/demand-stream.js';
import { toAsyncIterable } from '../async-iterable.js';

describe('toAsyncIterable', () => {
  it('should request one item per next()', async () => {
    const stream = new DemandStream<string>({ unsubscribe: () => {} });
    stream.pushToken(1);
    const iterator = toAsyncIterable(stream);

    const first = iterator.next();
    expect(stream.snapshot.demand).toBe(1);

    stream.push('a');
    await expect(first).resolves.toEqual({ value: 'a', done: false });
    expect(stream.snapshot.demand).toBe(0);
  });

  it('should iterate buffered items and finish with the stream', async () => {
    const stream = new DemandStream<string>({ unsubscribe: () => {} });
    stream.pushToken(1);
    stream.push('a');
    stream.push('b');
    stream.push('c');
    stream.end();

    const received: string[] = [];
    for await (const item of toAsyncIterable(stream)) {
      received.push(item);
    }

    expect(received).toEqual(['a', 'b', 'c']);
    expect(stream.phase).toBe('completed');
  });

  it('should reject a pending next() with the stream error, then report done', async () => {
    const stream = new DemandStream<string>({ unsubscribe: () => {} });
    const iterator = toAsyncIterable(stream);

    const pending = iterator.next();
    stream.fail(new Error('disk full'));

    await expect(pending).rejects.toBeInstanceOf(StreamError);
    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('should reject the next call when the stream failed in between', async () => {
    const stream = new DemandStream<string>({ unsubscribe: () => {} });
    const iterator = toAsyncIterable(stream);
    stream.fail(StreamError.fromCode('TIDE_P301'));

    await expect(iterator.next()).rejects.toMatchObject({ code: 'TIDE_P301' });
    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('should cancel the stream when the loop exits early', async () => {
    const unsubscribe = vi.fn();
    const stream = new DemandStream<string>({ unsubscribe });
    stream.pushToken(6);
    stream.push('a');
    stream.push('b');

    for await (const item of toAsyncIterable(stream)) {
      expect(item).toBe('a');
      break;
    }

    expect(unsubscribe).toHaveBeenCalledWith(6);
    expect(stream.phase).toBe('completed');
  });
});
