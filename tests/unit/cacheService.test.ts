import { MemoryCache } from '../../src/services/cacheService';

describe('Memory Cache', () => {
  let now: number;
  let cache: MemoryCache<string>;

  beforeEach(() => {
    now = 1_000_000;
    cache = new MemoryCache<string>(60, () => now);
  });

  it('should return a value until its TTL passes', () => {
    cache.set('lotto649', '2024-06-08');

    now += 59_999;
    expect(cache.get('lotto649')).toBe('2024-06-08');

    now += 1;
    expect(cache.get('lotto649')).toBeNull();
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, entries: 0 });
  });

  it('should honour a per-entry TTL', () => {
    cache.set('lotto649', '2024-06-08', { ttl: 5 });

    now += 5_000;
    expect(cache.get('lotto649')).toBeNull();
  });

  it('should report whether invalidation removed anything', () => {
    cache.set('lotto649', '2024-06-08');

    expect(cache.invalidate('lotto649')).toBe(true);
    expect(cache.invalidate('lotto649')).toBe(false);
  });

  it('should clear every entry', () => {
    cache.set('lotto649', '2024-06-08');
    cache.set('LottoMax', '2024-06-07');

    cache.clear();

    expect(cache.getStats().entries).toBe(0);
  });
});
