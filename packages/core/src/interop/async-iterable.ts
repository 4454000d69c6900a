import type { StreamError } from '../errors/stream-error.js';
import type { StreamSource, StreamSubscription } from '../types/stream.js';

interface Waiter<T> {
  resolve(result: IteratorResult<T>): void;
  reject(error: StreamError): void;
}

/**
 * Pull items from a demand-driven stream one `next()` at a time.
 *
 * Each `next()` requests exactly one item. Leaving a `for await` loop early
 * cancels the stream. An error signal rejects the pending (or next) call;
 * afterwards the iterator reports done.
 *
 * @example
 * ```typescript
 * for await (const row of toAsyncIterable(streams.fetch('SELECT * FROM orders'))) {
 *   await slowWork(row); // nothing more is fetched until this returns
 * }
 * ```
 */
export function toAsyncIterable<T>(source: StreamSource<T>): AsyncIterableIterator<T> {
  const ready: { value: T }[] = [];
  const waiters: Waiter<T>[] = [];
  let handle: StreamSubscription | null = null;
  let finished = false;
  let failure: StreamError | null = null;

  const done = (): IteratorResult<T> => ({ value: undefined, done: true });

  const settleWaiters = (): void => {
    for (const waiter of waiters.splice(0)) {
      if (failure) {
        waiter.reject(failure);
        failure = null;
      } else {
        waiter.resolve(done());
      }
    }
  };

  source.subscribe({
    start: (subscription) => {
      handle = subscription;
    },
    next: (value) => {
      const waiter = waiters.shift();
      if (waiter) {
        waiter.resolve({ value, done: false });
      } else {
        ready.push({ value });
      }
    },
    error: (error) => {
      finished = true;
      failure = error;
      settleWaiters();
    },
    complete: () => {
      finished = true;
      settleWaiters();
    },
  });

  const iterator: AsyncIterableIterator<T> = {
    next: () => {
      const box = ready.shift();
      if (box) {
        return Promise.resolve({ value: box.value, done: false });
      }
      if (finished) {
        if (failure) {
          const error = failure;
          failure = null;
          return Promise.reject(error);
        }
        return Promise.resolve(done());
      }
      return new Promise<IteratorResult<T>>((resolve, reject) => {
        waiters.push({ resolve, reject });
        handle?.request(1);
      });
    },
    return: () => {
      handle?.cancel();
      finished = true;
      failure = null;
      ready.length = 0;
      settleWaiters();
      return Promise.resolve(done());
    },
    [Symbol.asyncIterator]: () => iterator,
  };

  return iterator;
}
