/**
 * Consumer-facing demand-driven stream contract.
 */

import type { Observable } from 'rxjs';
import type { StreamError } from '../errors/stream-error.js';

/** Handle a subscriber uses to signal demand or stop the stream */
export interface StreamSubscription {
  /**
   * Ask for up to `n` more items. Throws InvalidDemandError synchronously when
   * `n` is not a positive integer or Infinity; the stream keeps running.
   */
  request(n: number): void;
  /** Stop the stream. Safe to call repeatedly and after termination. */
  cancel(): void;
}

/**
 * Receives `next*` followed by exactly one of `complete` or `error`.
 * No signal follows a terminal one.
 */
export interface StreamSubscriber<T> {
  /** Called first, before any other signal */
  start?(subscription: StreamSubscription): void;
  next(item: T): void;
  error(error: StreamError): void;
  complete(): void;
}

/** Lifecycle phase of a stream */
export type StreamPhase = 'awaiting-token' | 'active' | 'draining' | 'cancelled' | 'completed' | 'failed';

/** Point-in-time view of a stream's flow-control state */
export interface StreamSnapshot {
  readonly phase: StreamPhase;
  /** Items held in the buffer */
  readonly buffered: number;
  /** Outstanding consumer demand */
  readonly demand: number;
  /** Items handed to the consumer so far */
  readonly delivered: number;
  /** Items discarded by the overflow strategy so far */
  readonly dropped: number;
}

/** A single-consumer, demand-driven source of items */
export interface StreamSource<T> {
  subscribe(subscriber: StreamSubscriber<T>): StreamSubscription;
  /** Emits a snapshot on every state change; completes on termination */
  readonly state$: Observable<StreamSnapshot>;
}
