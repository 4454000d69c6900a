/**
 * DemandStream: the consumer-facing end of a subscription.
 *
 * Wraps a {@link SubscriptionMachine} and translates its output into the
 * `start / next* / (complete | error)` contract. Producers feed it through
 * {@link DemandStream.push}, {@link DemandStream.pushToken},
 * {@link DemandStream.end} and {@link DemandStream.fail}.
 *
 * @example
 * ```typescript
 * const stream = new DemandStream<Row>({
 *   config: { bufferSize: 100, overflowStrategy: 'drop-head' },
 *   unsubscribe: (token) => engine.unsubscribe(token),
 * });
 *
 * stream.subscribe({
 *   start: (s) => s.request(10),
 *   next: (row) => console.log(row),
 *   error: (err) => console.error(err.format()),
 *   complete: () => console.log('done'),
 * });
 * ```
 */

import type { Observable } from 'rxjs';
import {
  ensureStreamError,
  SubscriberConflictError,
  type StreamError,
} from '../errors/stream-error.js';
import { silentLogger, type TidewayLogger } from '../observability/logger.js';
import type { SubscriptionToken } from '../types/engine.js';
import type {
  StreamPhase,
  StreamSnapshot,
  StreamSource,
  StreamSubscriber,
  StreamSubscription,
} from '../types/stream.js';
import {
  resolveFlowControlConfig,
  type FlowControlConfig,
  type ResolvedFlowControlConfig,
} from '../validation/flow-control.js';
import { SubscriptionMachine } from './subscription-machine.js';

export interface DemandStreamOptions {
  /** Flow-control settings; missing fields take the defaults */
  config?: FlowControlConfig;
  /** Ask the producer to stop the subscription identified by `token` */
  unsubscribe(token: SubscriptionToken): void | Promise<void>;
  /** Called after each item is handed to the consumer */
  onDelivered?(): void;
  /** Called once when the stream reaches a terminal state */
  onTerminated?(): void;
  logger?: TidewayLogger;
}

type TerminalSignal = { readonly kind: 'complete' } | { readonly kind: 'error'; readonly error: StreamError };

const DETACHED_SUBSCRIPTION: StreamSubscription = {
  request: () => {},
  cancel: () => {},
};

export class DemandStream<T> implements StreamSource<T> {
  private readonly machine: SubscriptionMachine<T>;
  private readonly logger: TidewayLogger;
  readonly config: ResolvedFlowControlConfig;

  private subscriber: StreamSubscriber<T> | null = null;
  private subscribed = false;
  private detached = false;
  private pendingTerminal: TerminalSignal | null = null;

  readonly state$: Observable<StreamSnapshot>;

  constructor(private readonly options: DemandStreamOptions) {
    this.config = resolveFlowControlConfig(options.config);
    this.logger = options.logger ?? silentLogger;
    this.machine = new SubscriptionMachine<T>(
      {
        emit: (item) => this.signalNext(item),
        complete: () => this.signalTerminal({ kind: 'complete' }),
        fail: (error) => this.signalTerminal({ kind: 'error', error }),
        unsubscribe: (token) => this.releaseProducer(token),
      },
      {
        bufferSize: this.config.bufferSize,
        overflowStrategy: this.config.overflowStrategy,
        logger: this.logger,
      }
    );
    this.state$ = this.machine.state$;
  }

  get phase(): StreamPhase {
    return this.machine.phase;
  }

  get isTerminated(): boolean {
    return this.machine.isTerminated;
  }

  get snapshot(): StreamSnapshot {
    return this.machine.snapshot;
  }

  /** Items waiting for demand, oldest first */
  bufferedItems(): readonly T[] {
    return this.machine.bufferedItems();
  }

  // ── Consumer side ────────────────────────────────────────

  subscribe(subscriber: StreamSubscriber<T>): StreamSubscription {
    if (this.subscribed) {
      subscriber.start?.(DETACHED_SUBSCRIPTION);
      subscriber.error(new SubscriberConflictError());
      return DETACHED_SUBSCRIPTION;
    }

    this.subscribed = true;
    this.subscriber = subscriber;

    const subscription: StreamSubscription = {
      request: (n) => this.machine.request(n),
      cancel: () => this.machine.cancel(),
    };

    this.invoke(() => subscriber.start?.(subscription));

    const pending = this.pendingTerminal;
    if (pending && !this.detached) {
      this.pendingTerminal = null;
      this.deliverTerminal(pending);
    }

    return subscription;
  }

  /** Cancel without a subscription, e.g. when the consumer never attached */
  cancel(): void {
    this.machine.cancel();
  }

  // ── Producer side ────────────────────────────────────────

  pushToken(token: SubscriptionToken): void {
    this.machine.tokenArrived(token);
  }

  push(item: T, token?: SubscriptionToken): void {
    this.machine.itemArrived(item, token);
  }

  /** The producer has no more items */
  end(): void {
    this.machine.complete();
  }

  /** The producer failed; non-StreamError values are wrapped as query failures */
  fail(error: unknown): void {
    this.machine.fail(ensureStreamError(error, 'TIDE_P300'));
  }

  // ── Machine output ───────────────────────────────────────

  private signalNext(item: T): void {
    const subscriber = this.subscriber;
    if (subscriber && !this.detached) {
      this.invoke(() => subscriber.next(item));
    }
    this.options.onDelivered?.();
  }

  private signalTerminal(signal: TerminalSignal): void {
    this.options.onTerminated?.();

    if (!this.subscribed) {
      this.pendingTerminal = signal;
      return;
    }
    if (!this.detached) {
      this.deliverTerminal(signal);
    }
  }

  private deliverTerminal(signal: TerminalSignal): void {
    const subscriber = this.subscriber;
    this.subscriber = null;
    if (!subscriber) return;

    if (signal.kind === 'complete') {
      this.invoke(() => subscriber.complete());
    } else {
      this.invoke(() => subscriber.error(signal.error));
    }
  }

  private invoke(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.detached = true;
      this.logger.error(
        'Subscriber callback threw, cancelling stream',
        error instanceof Error ? error : new Error(String(error))
      );
      this.machine.cancel();
    }
  }

  private releaseProducer(token: SubscriptionToken): void {
    this.logger.debug('Unsubscribing', { token });
    let pending: void | Promise<void>;
    try {
      pending = this.options.unsubscribe(token);
    } catch (error) {
      this.logUnsubscribeFailure(token, error);
      return;
    }
    void Promise.resolve(pending).catch((error: unknown) => this.logUnsubscribeFailure(token, error));
  }

  private logUnsubscribeFailure(token: SubscriptionToken, error: unknown): void {
    this.logger.warn('Unsubscribe failed', {
      token,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
