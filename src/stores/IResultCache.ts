/**
 * Result cache interface.
 * Maps a request fingerprint to a validated AttributeSet.
 */

import type { AttributeSet } from '../types/models.js';

export interface IResultCache {
  readonly size: number;
  readonly maxEntries: number;

  lookup(fingerprint: string): AttributeSet | undefined;

  /**
   * Store the set if it meets the admission threshold.
   * Returns whether it was stored.
   */
  admit(fingerprint: string, attributes: AttributeSet): boolean;

  /** Remove every entry. Returns how many were removed. */
  clear(): number;
}
