import { Observable } from 'rxjs';
import type { StreamSource, StreamSubscription } from '../types/stream.js';
import { assertDemand } from '../validation/flow-control.js';

export interface ToObservableOptions {
  /**
   * Items requested at a time; another batch is requested each time a batch
   * has been delivered. Infinity requests everything up front.
   * @default 16
   */
  prefetch?: number;
}

/**
 * Expose a demand-driven stream as an RxJS Observable.
 *
 * The stream serves one consumer, so the returned Observable can be
 * subscribed once; unsubscribing cancels the stream.
 *
 * @example
 * ```typescript
 * toObservable(streams.live('SELECT * FROM orders'), { prefetch: 32 })
 *   .pipe(bufferTime(1000))
 *   .subscribe((batch) => console.log(batch.length, 'changes'));
 * ```
 */
export function toObservable<T>(
  source: StreamSource<T>,
  options: ToObservableOptions = {}
): Observable<T> {
  const prefetch = options.prefetch ?? 16;
  assertDemand(prefetch);

  return new Observable<T>((subscriber) => {
    let handle: StreamSubscription | null = null;
    let received = 0;

    source.subscribe({
      start: (subscription) => {
        handle = subscription;
        subscription.request(prefetch);
      },
      next: (item) => {
        subscriber.next(item);
        received += 1;
        if (received === prefetch) {
          received = 0;
          handle?.request(prefetch);
        }
      },
      error: (error) => subscriber.error(error),
      complete: () => subscriber.complete(),
    });

    return () => handle?.cancel();
  });
}
