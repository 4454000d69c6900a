/**
 * ResultGate: paces a one-shot fetch to its consumer.
 *
 * The engine awaits {@link ResultGate.onResult} for every row. The gate
 * forwards the row and then holds the engine on a counting permit until the
 * consumer has taken an item ({@link ResultGate.release}), so a fast producer
 * runs at most one row ahead of a slow consumer.
 *
 * Permits accumulate, so releasing before the producer waits is safe.
 * {@link ResultGate.finish} unblocks a waiting producer without a matching
 * release and stops the gate from granting further permits.
 */

import { GateTimeoutError } from '../errors/stream-error.js';
import { silentLogger, type TidewayLogger } from '../observability/logger.js';
import type { ResultListener } from '../types/engine.js';

/** Where the gate forwards what the producer reports */
export interface GateSink<TRow> {
  push(row: TRow): void;
  end(): void;
  fail(error: unknown): void;
}

export interface ResultGateOptions {
  /** Longest a producer may wait for a permit before the stream fails */
  timeoutMs: number;
  logger?: TidewayLogger;
}

interface Waiter {
  settle(acquired: boolean): void;
}

export class ResultGate<TRow> implements ResultListener<TRow> {
  private permits = 0;
  private readonly waiters: Waiter[] = [];
  private finished = false;
  private ended = false;
  private readonly logger: TidewayLogger;

  constructor(
    private readonly sink: GateSink<TRow>,
    private readonly options: ResultGateOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Whether the gate still grants permits */
  get isOpen(): boolean {
    return !this.finished;
  }

  get availablePermits(): number {
    return this.permits;
  }

  /** Number of producer calls currently held */
  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Forward a row, then wait for the consumer. Resolves `false` when the
   * producer should stop fetching.
   */
  async onResult(row: TRow): Promise<boolean> {
    if (this.finished) return false;

    this.sink.push(row);
    const acquired = await this.acquire();
    return acquired && !this.finished;
  }

  /** End of fetch. Only the first call has an effect. */
  onEnd(): void {
    if (this.ended) return;
    this.ended = true;
    this.sink.end();
  }

  /** The fetch failed: forward the error and let the producer go */
  onError(error: unknown): void {
    this.sink.fail(error);
    this.finish();
  }

  /** One item was accepted by the consumer */
  release(): void {
    if (this.finished) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.settle(true);
    } else {
      this.permits += 1;
    }
  }

  /** Release every waiting producer and stop granting permits. Idempotent. */
  finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.permits = 0;

    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.settle(false);
    }
  }

  private acquire(): Promise<boolean> {
    if (this.permits > 0) {
      this.permits -= 1;
      return Promise.resolve(true);
    }
    if (this.finished) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index === -1) return;
        this.waiters.splice(index, 1);
        this.logger.warn('Producer timed out waiting for demand', {
          timeoutMs: this.options.timeoutMs,
        });
        resolve(false);
        this.sink.fail(new GateTimeoutError(this.options.timeoutMs));
        this.finish();
      }, this.options.timeoutMs);

      const waiter: Waiter = {
        settle: (acquired) => {
          clearTimeout(timer);
          resolve(acquired);
        },
      };
      this.waiters.push(waiter);
    });
  }
}
