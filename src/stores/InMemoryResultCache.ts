/**
 * Bounded in-memory result cache.
 * A Map keeps insertion order; when the bound is exceeded the oldest
 * insertion is evicted. Re-admitting a key moves it to the newest position.
 * Every method is synchronous, so no two callers interleave inside one.
 */

import { meetsAdmissionThreshold } from '../services/attributes.js';
import type { AttributeSet } from '../types/models.js';
import type { IResultCache } from './IResultCache.js';

export const DEFAULT_CACHE_MAX_ENTRIES = 1000;

export class InMemoryResultCache implements IResultCache {
  private readonly entries = new Map<string, AttributeSet>();

  constructor(readonly maxEntries: number = DEFAULT_CACHE_MAX_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(fingerprint: string): AttributeSet | undefined {
    return this.entries.get(fingerprint);
  }

  admit(fingerprint: string, attributes: AttributeSet): boolean {
    if (!meetsAdmissionThreshold(attributes)) return false;

    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, attributes);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return true;
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  /** Fingerprints oldest first. */
  keys(): string[] {
    return [...this.entries.keys()];
  }
}
