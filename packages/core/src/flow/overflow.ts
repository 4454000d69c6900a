import type { OverflowStrategy } from '../validation/flow-control.js';

/** Outcome of offering an item to a bounded buffer */
export type OfferResult<T> =
  | { readonly outcome: 'buffered' }
  | { readonly outcome: 'dropped'; readonly dropped: readonly T[] }
  | { readonly outcome: 'overflow' };

/**
 * Offer an item to a buffer holding at most `capacity` items, applying the
 * overflow strategy when it is full. Mutates `buffer` in place; after the call
 * `buffer.length <= capacity`. On `overflow` the buffer is left untouched and
 * the caller terminates the stream.
 */
export function offer<T>(
  buffer: T[],
  item: T,
  capacity: number,
  strategy: OverflowStrategy
): OfferResult<T> {
  if (buffer.length < capacity) {
    buffer.push(item);
    return { outcome: 'buffered' };
  }

  switch (strategy) {
    case 'drop-head': {
      const dropped = buffer.splice(0, buffer.length - capacity + 1);
      buffer.push(item);
      return { outcome: 'dropped', dropped };
    }
    case 'drop-tail': {
      const dropped = buffer.splice(capacity - 1);
      buffer.push(item);
      return { outcome: 'dropped', dropped };
    }
    case 'drop-buffer': {
      const dropped = buffer.splice(0);
      buffer.push(item);
      return { outcome: 'dropped', dropped };
    }
    case 'drop-new':
      return { outcome: 'dropped', dropped: [item] };
    case 'fail':
      return { outcome: 'overflow' };
  }
}
