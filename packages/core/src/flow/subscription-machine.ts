/**
 * SubscriptionMachine: lifecycle, buffer and demand of one subscription.
 *
 * Events (token arrived, item arrived, demand requested, cancel requested,
 * error, producer finished) go through a mailbox and are handled one at a
 * time, so a call made from inside an output callback (a subscriber calling
 * `request` from `next`, say) is queued behind the event being handled
 * instead of running nested inside it.
 *
 * Items are never emitted before the subscription token is known, so a
 * cancellation can always be turned into an unsubscribe once it is.
 *
 * @example
 * ```typescript
 * const machine = new SubscriptionMachine<Row>(output, {
 *   bufferSize: 2,
 *   overflowStrategy: 'drop-head',
 * });
 *
 * machine.tokenArrived(7);
 * machine.itemArrived(a);
 * machine.itemArrived(b);
 * machine.request(1); // output.emit(a); b stays buffered
 * ```
 */

import { BehaviorSubject, type Observable } from 'rxjs';
import { BufferOverflowError, type StreamError } from '../errors/stream-error.js';
import { silentLogger, type TidewayLogger } from '../observability/logger.js';
import type { SubscriptionToken } from '../types/engine.js';
import type { StreamPhase, StreamSnapshot } from '../types/stream.js';
import { addDemand, assertDemand, type OverflowStrategy } from '../validation/flow-control.js';
import { offer } from './overflow.js';

// ── Types ──────────────────────────────────────────────────

/**
 * Machine state. Each phase carries only the data valid in it: a token exists
 * only once the subscription is active. `producerDone` marks a producer that
 * finished while items were held waiting for the token.
 */
export type MachineState<T> =
  | { readonly phase: 'awaiting-token'; readonly buffer: T[]; readonly producerDone: boolean }
  | { readonly phase: 'active'; readonly buffer: T[]; readonly token: SubscriptionToken }
  | { readonly phase: 'draining'; readonly buffer: T[] }
  | { readonly phase: 'cancelled' }
  | { readonly phase: 'completed'; readonly releaseOnToken: boolean }
  | {
      readonly phase: 'failed';
      readonly error: StreamError;
      readonly releaseOnToken: boolean;
    };

export type MachineEvent<T> =
  | { readonly type: 'token'; readonly token: SubscriptionToken }
  | { readonly type: 'item'; readonly item: T; readonly token?: SubscriptionToken }
  | { readonly type: 'request'; readonly count: number }
  | { readonly type: 'cancel' }
  | { readonly type: 'error'; readonly error: StreamError }
  | { readonly type: 'complete' };

/** Effects the machine asks its owner to carry out */
export interface MachineOutput<T> {
  /** Hand one item to the consumer */
  emit(item: T): void;
  /** Signal successful termination */
  complete(): void;
  /** Signal termination with an error */
  fail(error: StreamError): void;
  /** Ask the producer to stop the subscription identified by `token` */
  unsubscribe(token: SubscriptionToken): void;
}

export interface SubscriptionMachineOptions {
  bufferSize: number;
  overflowStrategy: OverflowStrategy;
  logger?: TidewayLogger;
}

type StateOf<T, P extends StreamPhase> = Extract<MachineState<T>, { phase: P }>;

// ── Machine ───────────────────────────────────────────────

export class SubscriptionMachine<T> {
  private state: MachineState<T> = { phase: 'awaiting-token', buffer: [], producerDone: false };
  private demand = 0;
  private delivered = 0;
  private dropped = 0;

  private readonly mailbox: MachineEvent<T>[] = [];
  private processing = false;
  private published = false;

  private logger: TidewayLogger;
  private readonly snapshotSubject: BehaviorSubject<StreamSnapshot>;

  /** Snapshot after every handled event; completes once the machine terminates */
  readonly state$: Observable<StreamSnapshot>;

  constructor(
    private readonly output: MachineOutput<T>,
    private readonly options: SubscriptionMachineOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.snapshotSubject = new BehaviorSubject<StreamSnapshot>(this.snapshot);
    this.state$ = this.snapshotSubject.asObservable();
  }

  get phase(): StreamPhase {
    return this.state.phase;
  }

  get isTerminated(): boolean {
    return this.state.phase === 'completed' || this.state.phase === 'failed';
  }

  get snapshot(): StreamSnapshot {
    const state = this.state;
    const buffered =
      state.phase === 'awaiting-token' || state.phase === 'active' || state.phase === 'draining'
        ? state.buffer.length
        : 0;
    return {
      phase: state.phase,
      buffered,
      demand: this.demand,
      delivered: this.delivered,
      dropped: this.dropped,
    };
  }

  /** Items currently held, oldest first */
  bufferedItems(): readonly T[] {
    const state = this.state;
    if (state.phase === 'awaiting-token' || state.phase === 'active' || state.phase === 'draining') {
      return [...state.buffer];
    }
    return [];
  }

  tokenArrived(token: SubscriptionToken): void {
    this.dispatch({ type: 'token', token });
  }

  /** An item produced by the engine; live events carry their subscription token */
  itemArrived(item: T, token?: SubscriptionToken): void {
    this.dispatch(token === undefined ? { type: 'item', item } : { type: 'item', item, token });
  }

  /** Throws InvalidDemandError synchronously for anything but a positive integer or Infinity */
  request(count: number): void {
    assertDemand(count);
    this.dispatch({ type: 'request', count });
  }

  cancel(): void {
    this.dispatch({ type: 'cancel' });
  }

  fail(error: StreamError): void {
    this.dispatch({ type: 'error', error });
  }

  /** The producer has no more items */
  complete(): void {
    this.dispatch({ type: 'complete' });
  }

  // ── Mailbox ──────────────────────────────────────────────

  private dispatch(event: MachineEvent<T>): void {
    this.mailbox.push(event);
    if (this.processing) return;

    this.processing = true;
    try {
      for (let next = this.mailbox.shift(); next !== undefined; next = this.mailbox.shift()) {
        this.handle(next);
        this.publish();
      }
    } finally {
      this.processing = false;
    }
  }

  private handle(event: MachineEvent<T>): void {
    const state = this.state;
    switch (state.phase) {
      case 'awaiting-token':
        this.whileAwaitingToken(state, event);
        break;
      case 'active':
        this.whileActive(state, event);
        break;
      case 'draining':
        this.whileDraining(state, event);
        break;
      case 'cancelled':
        this.whileCancelled(event);
        break;
      case 'completed':
      case 'failed':
        this.afterTermination(state, event);
        break;
    }
  }

  private publish(): void {
    if (this.published) return;
    this.snapshotSubject.next(this.snapshot);
    if (this.isTerminated) {
      this.published = true;
      this.snapshotSubject.complete();
    }
  }

  // ── Transitions ──────────────────────────────────────────

  private whileAwaitingToken(state: StateOf<T, 'awaiting-token'>, event: MachineEvent<T>): void {
    if (state.producerDone) {
      this.whileFinishedAwaitingToken(state, event);
      return;
    }
    switch (event.type) {
      case 'token':
        this.activate(state.buffer, event.token);
        this.drain();
        break;
      case 'item':
        if (event.token === undefined) {
          // Held until the token is known, whatever the demand.
          this.enqueue(state.buffer, event.item, undefined);
        } else {
          // Serve demand accumulated so far before the new item competes for space.
          this.activate(state.buffer, event.token);
          this.drain();
          if (this.state.phase === 'active') {
            this.enqueue(state.buffer, event.item, event.token);
            this.drain();
          }
        }
        break;
      case 'request':
        this.demand = addDemand(this.demand, event.count);
        break;
      case 'cancel':
        this.transition({ phase: 'cancelled' });
        break;
      case 'error':
        this.terminateWithError(event.error, undefined, true);
        break;
      case 'complete':
        if (state.buffer.length === 0) {
          this.terminate(true);
        } else {
          // Nothing may be emitted until the token is known.
          this.transition({ phase: 'awaiting-token', buffer: state.buffer, producerDone: true });
        }
        break;
    }
  }

  private whileFinishedAwaitingToken(
    state: StateOf<T, 'awaiting-token'>,
    event: MachineEvent<T>
  ): void {
    switch (event.type) {
      case 'token':
        this.bindToken(event.token);
        this.beginDraining(state.buffer);
        break;
      case 'item':
        if (event.token !== undefined) {
          this.bindToken(event.token);
          this.beginDraining(state.buffer);
        }
        this.logger.debug('Ignoring producer event after completion', { event: event.type });
        break;
      case 'request':
        this.demand = addDemand(this.demand, event.count);
        break;
      case 'cancel':
        this.transition({ phase: 'cancelled' });
        break;
      case 'error':
        this.terminateWithError(event.error, undefined, true);
        break;
      case 'complete':
        break;
    }
  }

  private whileActive(state: StateOf<T, 'active'>, event: MachineEvent<T>): void {
    switch (event.type) {
      case 'token':
        if (event.token !== state.token) {
          this.logger.warn('Ignoring second subscription token', {
            token: state.token,
            received: event.token,
          });
        }
        break;
      case 'item':
        this.enqueue(state.buffer, event.item, state.token);
        this.drain();
        break;
      case 'request':
        this.demand = addDemand(this.demand, event.count);
        this.drain();
        break;
      case 'cancel':
        this.output.unsubscribe(state.token);
        this.terminate();
        break;
      case 'error':
        this.terminateWithError(event.error, state.token, false);
        break;
      case 'complete':
        this.beginDraining(state.buffer);
        break;
    }
  }

  private whileDraining(state: StateOf<T, 'draining'>, event: MachineEvent<T>): void {
    switch (event.type) {
      case 'request':
        this.demand = addDemand(this.demand, event.count);
        this.drain();
        break;
      case 'cancel':
        this.terminate();
        break;
      case 'error':
        this.terminateWithError(event.error, undefined, false);
        break;
      case 'token':
      case 'item':
      case 'complete':
        this.logger.debug('Ignoring producer event after completion', {
          event: event.type,
          buffered: state.buffer.length,
        });
        break;
    }
  }

  private whileCancelled(event: MachineEvent<T>): void {
    switch (event.type) {
      case 'token':
        this.output.unsubscribe(event.token);
        this.terminate();
        break;
      case 'item':
        if (event.token !== undefined) {
          this.output.unsubscribe(event.token);
          this.terminate();
        }
        break;
      case 'error':
        // The subscription never materialised; a late token is still released.
        this.logger.debug('Cancelled subscription failed before its token arrived', {
          error: event.error.message,
        });
        this.terminate(true);
        break;
      case 'complete':
        this.terminate(true);
        break;
      case 'request':
      case 'cancel':
        break;
    }
  }

  private afterTermination(
    state: StateOf<T, 'completed' | 'failed'>,
    event: MachineEvent<T>
  ): void {
    const token = event.type === 'token' || event.type === 'item' ? event.token : undefined;
    if (token !== undefined && state.releaseOnToken) {
      this.output.unsubscribe(token);
      this.state = { ...state, releaseOnToken: false };
      return;
    }
    if (event.type === 'item' || event.type === 'error') {
      this.logger.debug('Ignoring event after termination', { event: event.type, phase: state.phase });
    }
  }

  // ── Helpers ──────────────────────────────────────────────

  private transition(next: MachineState<T>): void {
    this.logger.debug('Subscription state changed', { from: this.state.phase, to: next.phase });
    this.state = next;
  }

  private activate(buffer: T[], token: SubscriptionToken): void {
    this.bindToken(token);
    this.transition({ phase: 'active', buffer, token });
  }

  private bindToken(token: SubscriptionToken): void {
    this.logger = this.logger.bind({ token });
  }

  private enqueue(buffer: T[], item: T, token: SubscriptionToken | undefined): void {
    const result = offer(buffer, item, this.options.bufferSize, this.options.overflowStrategy);
    if (result.outcome === 'dropped') {
      this.dropped += result.dropped.length;
      this.logger.debug('Buffer full, items dropped', {
        strategy: this.options.overflowStrategy,
        dropped: result.dropped.length,
      });
    } else if (result.outcome === 'overflow') {
      buffer.length = 0;
      this.terminateWithError(
        new BufferOverflowError(this.options.bufferSize),
        token,
        token === undefined
      );
    }
  }

  private drain(): void {
    const state = this.state;
    if (state.phase !== 'active' && state.phase !== 'draining') return;

    const batch = state.buffer.splice(0, Math.min(this.demand, state.buffer.length));
    for (const [index, item] of batch.entries()) {
      if (this.cancelPending()) {
        state.buffer.unshift(...batch.slice(index));
        break;
      }
      this.demand -= 1;
      this.delivered += 1;
      this.output.emit(item);
    }

    if (state.phase === 'draining' && state.buffer.length === 0) {
      this.terminate();
    }
  }

  /** A consumer that cancels from inside `emit` gets nothing further */
  private cancelPending(): boolean {
    return this.mailbox.some((event) => event.type === 'cancel');
  }

  private beginDraining(buffer: T[]): void {
    if (buffer.length === 0) {
      this.terminate();
      return;
    }
    this.transition({ phase: 'draining', buffer });
    this.drain();
  }

  private terminate(releaseOnToken = false): void {
    this.transition({ phase: 'completed', releaseOnToken });
    this.output.complete();
  }

  private terminateWithError(
    error: StreamError,
    token: SubscriptionToken | undefined,
    releaseOnToken: boolean
  ): void {
    if (token !== undefined) {
      this.output.unsubscribe(token);
    }
    this.transition({ phase: 'failed', error, releaseOnToken });
    this.output.fail(error);
  }
}
