import { describe, expect, it } from 'vitest';
import { offer } from '../overflow.js';

describe('offer', () => {
  it('should append while below capacity', () => {
    const buffer = ['a'];
    expect(offer(buffer, 'b', 2, 'fail')).toEqual({ outcome: 'buffered' });
    expect(buffer).toEqual(['a', 'b']);
  });

  it('should drop the oldest item with drop-head', () => {
    const buffer = ['a', 'b'];
    expect(offer(buffer, 'c', 2, 'drop-head')).toEqual({ outcome: 'dropped', dropped: ['a'] });
    expect(buffer).toEqual(['b', 'c']);
  });

  it('should replace the newest item with drop-tail', () => {
    const buffer = ['a', 'b'];
    expect(offer(buffer, 'c', 2, 'drop-tail')).toEqual({ outcome: 'dropped', dropped: ['b'] });
    expect(buffer).toEqual(['a', 'c']);
  });

  it('should clear the buffer with drop-buffer', () => {
    const buffer = ['a', 'b', 'c'];
    expect(offer(buffer, 'd', 3, 'drop-buffer')).toEqual({
      outcome: 'dropped',
      dropped: ['a', 'b', 'c'],
    });
    expect(buffer).toEqual(['d']);
  });

  it('should discard the incoming item with drop-new', () => {
    const buffer = ['a', 'b'];
    expect(offer(buffer, 'c', 2, 'drop-new')).toEqual({ outcome: 'dropped', dropped: ['c'] });
    expect(buffer).toEqual(['a', 'b']);
  });

  it('should report overflow with fail and leave the buffer alone', () => {
    const buffer = ['a', 'b'];
    expect(offer(buffer, 'c', 2, 'fail')).toEqual({ outcome: 'overflow' });
    expect(buffer).toEqual(['a', 'b']);
  });

  it('should work with a capacity of one', () => {
    const buffer = ['a'];
    offer(buffer, 'b', 1, 'drop-head');
    expect(buffer).toEqual(['b']);
    offer(buffer, 'c', 1, 'drop-tail');
    expect(buffer).toEqual(['c']);
  });
});
