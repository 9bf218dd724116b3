/**
 * Bounded in-process cache of raw responses, keyed by request key.
 *
 * Entries are promises so that callers asking for the same key while a
 * request is in flight share it. Map insertion order doubles as recency.
 */

import type { RawResponse } from './types.js';

export class ResponseCache {
  private readonly entries = new Map<string, Promise<RawResponse>>();

  constructor(readonly maxEntries = 500) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): Promise<RawResponse> | undefined {
    const entry = this.entries.get(key);
    if (entry !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    return entry;
  }

  set(key: string, response: Promise<RawResponse>): void {
    this.entries.delete(key);
    this.entries.set(key, response);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Remove `key`, but only while it still maps to `response`.
   */
  evict(key: string, response: Promise<RawResponse>): void {
    if (this.entries.get(key) === response) {
      this.entries.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
