import { describe, it, expect } from 'vitest';

import { TtlCache } from '../ttlCache';

function makeClock(start = 1_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => { t += ms; },
  };
}

describe('TtlCache', () => {
  it('returns a value until its TTL elapses', () => {
    const clock = makeClock();
    const cache = new TtlCache<number[]>(100, clock.now);
    cache.set('k', [1, 2]);

    clock.advance(99);
    expect(cache.get('k')).toEqual([1, 2]);

    clock.advance(1);
    expect(cache.get('k')).toBeNull();
  });

  it('evicts an expired entry on read', () => {
    const clock = makeClock();
    const cache = new TtlCache<string>(100, clock.now);
    cache.set('a', '1');
    clock.advance(100);
    expect(cache.get('a')).toBeNull();
    cache.set('a', '2');
    expect(cache.get('a')).toBe('2');
  });

  it('disables caching with a TTL of 0', () => {
    const cache = new TtlCache<string>(0);
    cache.set('k', 'v');
    expect(cache.get('k')).toBeNull();
  });
});
