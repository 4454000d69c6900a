import { describe, expect, it } from 'vitest';
import { BufferOverflowError, InvalidDemandError, StreamError } from '../../errors/stream-error.js';
import type { StreamPhase } from '../../types/stream.js';
import { MAX_DEMAND } from '../../validation/flow-control.js';
import { SubscriptionMachine, type SubscriptionMachineOptions } from '../subscription-machine.js';

function createHarness(options: Partial<SubscriptionMachineOptions> = {}) {
  const emitted: string[] = [];
  const unsubscribed: number[] = [];
  const errors: StreamError[] = [];
  let completions = 0;

  const machine = new SubscriptionMachine<string>(
    {
      emit: (item) => emitted.push(item),
      complete: () => {
        completions += 1;
      },
      fail: (error) => errors.push(error),
      unsubscribe: (token) => unsubscribed.push(token),
    },
    { bufferSize: 10, overflowStrategy: 'drop-head', ...options }
  );

  return { machine, emitted, unsubscribed, errors, completions: () => completions };
}

describe('SubscriptionMachine', () => {
  describe('delivery', () => {
    it('should deliver only what was requested and buffer the rest', () => {
      const { machine, emitted } = createHarness();
      machine.tokenArrived(7);
      machine.itemArrived('x');
      machine.itemArrived('y');
      machine.request(1);

      expect(emitted).toEqual(['x']);
      expect(machine.bufferedItems()).toEqual(['y']);
      expect(machine.phase).toBe('active');
    });

    it('should never deliver more than requested', () => {
      const { machine, emitted } = createHarness();
      machine.tokenArrived(1);
      machine.request(2);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.itemArrived('c');

      expect(emitted).toEqual(['a', 'b']);
      expect(machine.snapshot).toEqual({
        phase: 'active',
        buffered: 1,
        demand: 0,
        delivered: 2,
        dropped: 0,
      });
    });

    it('should hold items until the token is known whatever the demand', () => {
      const { machine, emitted } = createHarness();
      machine.request(5);
      machine.itemArrived('a');
      machine.itemArrived('b');
      expect(emitted).toEqual([]);
      expect(machine.phase).toBe('awaiting-token');

      machine.tokenArrived(3);
      expect(emitted).toEqual(['a', 'b']);
      expect(machine.snapshot.demand).toBe(3);
    });

    it('should keep arrival order when the token comes after the items', () => {
      const { machine, emitted } = createHarness();
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.tokenArrived(3);
      machine.itemArrived('c');
      machine.request(3);

      expect(emitted).toEqual(['a', 'b', 'c']);
    });

    it('should activate on an item that carries its token', () => {
      const { machine, emitted } = createHarness();
      machine.itemArrived('a', 4);
      expect(machine.phase).toBe('active');

      machine.itemArrived('b', 4);
      machine.tokenArrived(4);
      machine.request(2);
      expect(emitted).toEqual(['a', 'b']);
    });

    it('should serve earlier demand before the first token-carrying item competes for space', () => {
      const { machine, emitted } = createHarness({ bufferSize: 2, overflowStrategy: 'fail' });
      machine.request(2);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.itemArrived('c', 9);

      expect(emitted).toEqual(['a', 'b']);
      expect(machine.bufferedItems()).toEqual(['c']);
      expect(machine.phase).toBe('active');
    });

    it('should queue requests made from inside emit', () => {
      const emitted: string[] = [];
      const machine: SubscriptionMachine<string> = new SubscriptionMachine<string>(
        {
          emit: (item) => {
            emitted.push(item);
            machine.request(1);
          },
          complete: () => {},
          fail: () => {},
          unsubscribe: () => {},
        },
        { bufferSize: 10, overflowStrategy: 'drop-head' }
      );

      machine.tokenArrived(1);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.itemArrived('c');
      machine.request(1);

      expect(emitted).toEqual(['a', 'b', 'c']);
      expect(machine.snapshot.demand).toBe(1);
    });
  });

  describe('demand', () => {
    it('should saturate at MAX_DEMAND', () => {
      const { machine } = createHarness();
      machine.request(Number.POSITIVE_INFINITY);
      expect(machine.snapshot.demand).toBe(MAX_DEMAND);

      machine.request(MAX_DEMAND);
      expect(machine.snapshot.demand).toBe(MAX_DEMAND);
    });

    it.each([0, -1, 1.5, Number.NaN])('should reject request(%s) without changing state', (n) => {
      const { machine } = createHarness();
      machine.tokenArrived(1);
      machine.request(2);

      expect(() => machine.request(n)).toThrow(InvalidDemandError);
      expect(machine.phase).toBe('active');
      expect(machine.snapshot.demand).toBe(2);
    });
  });

  describe('overflow', () => {
    it('should drop the oldest item with drop-head', () => {
      const { machine } = createHarness({ bufferSize: 2, overflowStrategy: 'drop-head' });
      machine.tokenArrived(1);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.itemArrived('c');

      expect(machine.bufferedItems()).toEqual(['b', 'c']);
      expect(machine.snapshot.dropped).toBe(1);
    });

    it('should count every item discarded by drop-buffer', () => {
      const { machine } = createHarness({ bufferSize: 2, overflowStrategy: 'drop-buffer' });
      machine.tokenArrived(1);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.itemArrived('c');

      expect(machine.bufferedItems()).toEqual(['c']);
      expect(machine.snapshot.dropped).toBe(2);
    });

    it('should fail and unsubscribe with the fail strategy', () => {
      const { machine, emitted, errors, unsubscribed } = createHarness({
        bufferSize: 2,
        overflowStrategy: 'fail',
      });
      machine.tokenArrived(7);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.itemArrived('c');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(BufferOverflowError);
      expect(errors[0]?.message).toBe('Buffer of size 2 has overflown');
      expect(unsubscribed).toEqual([7]);
      expect(machine.phase).toBe('failed');

      machine.request(5);
      expect(emitted).toEqual([]);
    });

    it('should release a late token after overflowing before it arrived', () => {
      const { machine, errors, unsubscribed } = createHarness({
        bufferSize: 1,
        overflowStrategy: 'fail',
      });
      machine.itemArrived('a');
      machine.itemArrived('b');
      expect(errors).toHaveLength(1);
      expect(unsubscribed).toEqual([]);

      machine.tokenArrived(5);
      expect(unsubscribed).toEqual([5]);
    });
  });

  describe('cancellation', () => {
    it('should unsubscribe once a token arrives after cancel', () => {
      const { machine, emitted, unsubscribed, completions } = createHarness();
      machine.request(10);
      machine.cancel();
      expect(machine.phase).toBe('cancelled');
      expect(completions()).toBe(0);

      machine.itemArrived('a');
      machine.tokenArrived(9);
      machine.tokenArrived(9);

      expect(unsubscribed).toEqual([9]);
      expect(completions()).toBe(1);
      expect(emitted).toEqual([]);
      expect(machine.phase).toBe('completed');
    });

    it('should unsubscribe on the first token-carrying item after cancel', () => {
      const { machine, unsubscribed, completions } = createHarness();
      machine.cancel();
      machine.itemArrived('a', 6);

      expect(unsubscribed).toEqual([6]);
      expect(completions()).toBe(1);
    });

    it('should be idempotent while active', () => {
      const { machine, unsubscribed, completions } = createHarness();
      machine.tokenArrived(2);
      machine.cancel();
      machine.cancel();

      expect(unsubscribed).toEqual([2]);
      expect(completions()).toBe(1);
    });

    it('should complete rather than fail when a cancelled subscription errors', () => {
      const { machine, errors, unsubscribed, completions } = createHarness();
      machine.cancel();
      machine.fail(StreamError.fromCode('TIDE_P301'));

      expect(errors).toEqual([]);
      expect(completions()).toBe(1);

      machine.tokenArrived(8);
      expect(unsubscribed).toEqual([8]);
    });

    it('should stop draining on cancel', () => {
      const { machine, emitted, completions } = createHarness();
      machine.tokenArrived(1);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.complete();
      machine.cancel();
      machine.request(2);

      expect(emitted).toEqual([]);
      expect(completions()).toBe(1);
    });

    it('should deliver nothing more once the consumer cancels from inside emit', () => {
      const emitted: string[] = [];
      const unsubscribed: number[] = [];
      const machine: SubscriptionMachine<string> = new SubscriptionMachine<string>(
        {
          emit: (item) => {
            emitted.push(item);
            machine.cancel();
          },
          complete: () => {},
          fail: () => {},
          unsubscribe: (token) => unsubscribed.push(token),
        },
        { bufferSize: 10, overflowStrategy: 'drop-head' }
      );

      machine.tokenArrived(5);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.itemArrived('c');
      machine.request(3);

      expect(emitted).toEqual(['a']);
      expect(unsubscribed).toEqual([5]);
      expect(machine.phase).toBe('completed');
    });
  });

  describe('completion', () => {
    it('should complete at once when nothing is buffered', () => {
      const { machine, completions } = createHarness();
      machine.tokenArrived(1);
      machine.complete();

      expect(machine.phase).toBe('completed');
      expect(completions()).toBe(1);
    });

    it('should drain the buffer before completing', () => {
      const { machine, emitted, completions } = createHarness();
      machine.tokenArrived(1);
      machine.itemArrived('a');
      machine.itemArrived('b');
      machine.complete();
      expect(machine.phase).toBe('draining');

      machine.itemArrived('late');
      machine.request(1);
      expect(emitted).toEqual(['a']);
      expect(completions()).toBe(0);

      machine.request(1);
      expect(emitted).toEqual(['a', 'b']);
      expect(completions()).toBe(1);
    });

    it('should hold buffered items when the producer finishes before the token', () => {
      const { machine, emitted, unsubscribed, completions } = createHarness();
      machine.itemArrived('a');
      machine.complete();
      machine.request(1);

      expect(emitted).toEqual([]);
      expect(machine.phase).toBe('awaiting-token');
      expect(machine.bufferedItems()).toEqual(['a']);
      expect(completions()).toBe(0);

      machine.tokenArrived(5);
      expect(emitted).toEqual(['a']);
      expect(completions()).toBe(1);
      expect(unsubscribed).toEqual([]);
      expect(machine.phase).toBe('completed');
    });

    it('should release a token arriving after a cancelled subscription finished', () => {
      const { machine, unsubscribed, completions } = createHarness();
      machine.cancel();
      machine.complete();
      expect(completions()).toBe(1);

      machine.tokenArrived(5);
      machine.tokenArrived(5);
      expect(unsubscribed).toEqual([5]);
    });

    it('should release a token arriving after an empty producer finished', () => {
      const { machine, unsubscribed, completions } = createHarness();
      machine.complete();
      expect(machine.phase).toBe('completed');
      expect(completions()).toBe(1);

      machine.tokenArrived(6);
      machine.itemArrived('x', 6);
      expect(unsubscribed).toEqual([6]);
      expect(completions()).toBe(1);
    });
  });

  describe('errors', () => {
    it('should unsubscribe when the producer fails while active', () => {
      const { machine, errors, unsubscribed } = createHarness();
      machine.tokenArrived(3);
      const failure = StreamError.fromCode('TIDE_P300');
      machine.fail(failure);
      machine.fail(StreamError.fromCode('TIDE_X900'));

      expect(errors).toEqual([failure]);
      expect(unsubscribed).toEqual([3]);
      expect(machine.phase).toBe('failed');
    });

    it('should release a token arriving after a failure exactly once', () => {
      const { machine, unsubscribed } = createHarness();
      machine.fail(StreamError.fromCode('TIDE_T401'));
      machine.tokenArrived(4);
      machine.tokenArrived(4);

      expect(unsubscribed).toEqual([4]);
    });
  });

  describe('state$', () => {
    it('should publish a snapshot per event and complete on termination', () => {
      const { machine } = createHarness();
      const phases: StreamPhase[] = [];
      let closed = false;
      machine.state$.subscribe({
        next: (snapshot) => phases.push(snapshot.phase),
        complete: () => {
          closed = true;
        },
      });

      machine.tokenArrived(1);
      machine.cancel();

      expect(phases).toEqual(['awaiting-token', 'active', 'completed']);
      expect(closed).toBe(true);
    });
  });
});
