import { describe, expect, it } from 'vitest';
import { LruCache } from '../src/util/lruCache.js';
import { ReadWriteLock } from '../src/util/rwLock.js';
import { AbortedError, TimeoutError, sleep, withTimeout } from '../src/util/timeout.js';
import { clampSimilarity, normalize } from '../src/util/vector.js';
import { estimateTokens } from '../src/util/tokens.js';

describe('LruCache', () => {
  it('evicts the least recently used key', () => {
    const cache = new LruCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.set('c', 3);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('a')).toBe(true);
    expect(cache.size).toBe(2);
  });

  it('stores nothing with capacity 0', () => {
    const cache = new LruCache<string, number>(0);
    cache.set('a', 1);
    expect(cache.get('a')).toBeUndefined();
  });
});

describe('ReadWriteLock', () => {
  function deferred(): { promise: Promise<void>; resolve: () => void } {
    const out = { resolve: (): void => undefined };
    const promise = new Promise<void>((r) => {
      out.resolve = () => r();
    });
    return { promise, resolve: () => out.resolve() };
  }

  it('lets readers share the lock', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const first = lock.read(() => gate.promise);
    const second = lock.read(() => 'second');
    await expect(second).resolves.toBe('second');
    expect(lock.state.readers).toBe(1);
    gate.resolve();
    await first;
    expect(lock.state).toEqual({ readers: 0, writing: false, waiting: 0 });
  });

  it('grants waiters in arrival order, so a queued writer blocks later readers', async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const gate = deferred();

    const r1 = lock.read(async () => {
      await gate.promise;
      order.push('r1');
    });
    const w = lock.write(() => {
      order.push('w');
    });
    const r2 = lock.read(() => {
      order.push('r2');
    });

    expect(lock.state).toEqual({ readers: 1, writing: false, waiting: 2 });
    gate.resolve();
    await Promise.all([r1, w, r2]);
    expect(order).toEqual(['r1', 'w', 'r2']);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.write(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(lock.write(() => 'ok')).resolves.toBe('ok');
  });
});

describe('withTimeout', () => {
  it('resolves with the callee result', async () => {
    await expect(withTimeout(async () => 7, 100)).resolves.toBe(7);
  });

  it('rejects with TimeoutError and aborts the callee signal', async () => {
    let seen: AbortSignal | undefined;
    const err = await withTimeout((signal) => {
      seen = signal;
      return new Promise<never>(() => undefined);
    }, 5).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('rejects with AbortedError when the caller aborts', async () => {
    const controller = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => undefined), 1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  it('lets sleep be cancelled', async () => {
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });
});

describe('vector helpers', () => {
  it('normalizes to unit length and refuses the zero vector', () => {
    expect(Array.from(normalize([3, 4]) ?? [])).toEqual([Math.fround(0.6), Math.fround(0.8)]);
    expect(normalize([0, 0])).toBeNull();
  });

  it('clamps rounding overshoot', () => {
    expect(clampSimilarity(1.0000001)).toBe(1);
    expect(clampSimilarity(-1.2)).toBe(-1);
    expect(clampSimilarity(0.25)).toBe(0.25);
  });

  it('estimates four characters per token, rounding up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});
