import { describe, it, expect, beforeEach } from 'vitest';
import { emptyAttributeSet, freezeAttributes, makeField } from '../../src/services/attributes.js';
import { InMemoryResultCache } from '../../src/stores/InMemoryResultCache.js';
import type { AttributeSet } from '../../src/types/models.js';

function withConfidence(confidence: number): AttributeSet {
  return freezeAttributes({ country: makeField('country', ['JP'], 'Made in Japan', confidence) });
}

describe('InMemoryResultCache', () => {
  let cache: InMemoryResultCache;

  beforeEach(() => {
    cache = new InMemoryResultCache(3);
  });

  it('should admit and look up a confident result', () => {
    const attributes = withConfidence(0.9);
    expect(cache.admit('a', attributes)).toBe(true);
    expect(cache.lookup('a')).toBe(attributes);
    expect(cache.size).toBe(1);
  });

  it('should miss an unknown fingerprint', () => {
    expect(cache.lookup('missing')).toBeUndefined();
  });

  it('should refuse results at or below the admission threshold', () => {
    expect(cache.admit('a', withConfidence(0.5))).toBe(false);
    expect(cache.admit('b', emptyAttributeSet(['country', 'size']))).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should evict the oldest insertion past the bound', () => {
    for (const key of ['a', 'b', 'c', 'd']) cache.admit(key, withConfidence(0.9));

    expect(cache.keys()).toEqual(['b', 'c', 'd']);
    expect(cache.lookup('a')).toBeUndefined();
  });

  it('should move a re-admitted key to the newest position', () => {
    for (const key of ['a', 'b', 'c']) cache.admit(key, withConfidence(0.9));
    cache.admit('a', withConfidence(0.8));
    cache.admit('d', withConfidence(0.9));

    expect(cache.keys()).toEqual(['c', 'a', 'd']);
    expect(cache.lookup('a')?.country?.confidence).toBe(0.8);
  });

  it('should not reorder on lookup', () => {
    for (const key of ['a', 'b', 'c']) cache.admit(key, withConfidence(0.9));
    cache.lookup('a');
    cache.admit('d', withConfidence(0.9));

    expect(cache.keys()).toEqual(['b', 'c', 'd']);
  });

  it('should clear and report the count', () => {
    cache.admit('a', withConfidence(0.9));
    cache.admit('b', withConfidence(0.9));
    expect(cache.clear()).toBe(2);
    expect(cache.size).toBe(0);
  });

  it('should reject a non-positive bound', () => {
    expect(() => new InMemoryResultCache(0)).toThrow(RangeError);
    expect(() => new InMemoryResultCache(1.5)).toThrow('maxEntries must be a positive integer, got 1.5');
  });

  it('should default to 1000 entries', () => {
    expect(new InMemoryResultCache().maxEntries).toBe(1000);
  });
});
