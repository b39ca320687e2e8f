import { describe, expect, it } from 'vitest';
import { EventChannel } from '../channel.js';
import { delay, withTimeout } from '../async.js';

describe('EventChannel', () => {
  it('holds events until a consumer attaches, then delivers them in order', async () => {
    const channel = new EventChannel<number>('test');
    const seen: number[] = [];
    channel.put(1);
    channel.put(2);
    expect(channel.size()).toBe(2);

    channel.consume((n) => {
      seen.push(n);
    });
    channel.put(3);
    await channel.settled();

    expect(seen).toEqual([1, 2, 3]);
  });

  it('finishes one handler before starting the next', async () => {
    const channel = new EventChannel<string>('test');
    const log: string[] = [];
    channel.consume(async (event) => {
      log.push(`start ${event}`);
      await delay(5);
      log.push(`end ${event}`);
    });

    channel.put('a');
    channel.put('b');
    await channel.settled();

    expect(log).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('keeps delivering after a handler throws', async () => {
    const channel = new EventChannel<number>('test');
    const seen: number[] = [];
    channel.consume((n) => {
      if (n === 1) throw new Error('boom');
      seen.push(n);
    });

    channel.put(1);
    channel.put(2);
    await channel.settled();

    expect(seen).toEqual([2]);
  });

  it('allows only one consumer', () => {
    const channel = new EventChannel<number>('test');
    channel.consume(() => undefined);

    expect(() => channel.consume(() => undefined)).toThrow('already has a consumer');
  });

  it('stops delivering once the consumer detaches', async () => {
    const channel = new EventChannel<number>('test');
    const seen: number[] = [];
    const detach = channel.consume((n) => {
      seen.push(n);
    });
    detach();

    channel.put(1);

    expect(seen).toEqual([]);
    expect(channel.size()).toBe(1);
  });
});

describe('withTimeout', () => {
  it('resolves with the fallback when the promise is too slow', async () => {
    const slow = delay(50).then(() => 'late');
    expect(await withTimeout(slow, 5, 'fallback')).toBe('fallback');
  });

  it('resolves with the value when the promise wins', async () => {
    expect(await withTimeout(Promise.resolve('fast'), 50, 'fallback')).toBe('fast');
  });
});
