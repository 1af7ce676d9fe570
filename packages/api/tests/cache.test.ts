import { describe, test, expect } from 'vitest';
import { ConversionCache } from '../src/cache.js';

describe('ConversionCache', () => {
  test('computes once per key', () => {
    const cache = new ConversionCache(10);
    let calls = 0;
    const compute = () => {
      calls++;
      return 'kana';
    };

    expect(cache.getOrCompute('encode', 'hepburn', 'カナ', compute)).toBe('kana');
    expect(cache.getOrCompute('encode', 'hepburn', 'カナ', compute)).toBe('kana');
    expect(calls).toBe(1);
    expect(cache.getStats()).toEqual({ size: 1, hits: 1, misses: 1 });
  });

  test('kind and system are part of the key', () => {
    const cache = new ConversionCache(10);
    cache.getOrCompute('encode', 'hepburn', 'shi', () => 'a');
    cache.getOrCompute('encode', 'kunrei', 'shi', () => 'b');
    expect(cache.getOrCompute('decode', '', 'shi', () => 'し')).toBe('し');
    expect(cache.getStats()).toEqual({ size: 3, hits: 0, misses: 3 });
  });

  test('evicts the least recently used entry', () => {
    const cache = new ConversionCache(2);
    cache.getOrCompute('decode', '', 'ka', () => 'か');
    cache.getOrCompute('decode', '', 'ki', () => 'き');
    // touch "ka" so "ki" is the oldest
    cache.getOrCompute('decode', '', 'ka', () => 'x');
    cache.getOrCompute('decode', '', 'ku', () => 'く');

    expect(cache.getOrCompute('decode', '', 'ka', () => 'x')).toBe('か');
    expect(cache.getOrCompute('decode', '', 'ki', () => 'recomputed')).toBe('recomputed');
  });

  test('clear resets entries and counters', () => {
    const cache = new ConversionCache(4);
    cache.getOrCompute('decode', '', 'ka', () => 'か');
    cache.clear();
    expect(cache.getStats()).toEqual({ size: 0, hits: 0, misses: 0 });
  });
});
