/**
 * @fileoverview Fixed-capacity key/value store with least-recently-used eviction.
 * @module age-graph-bridge/cache/LRUCache
 *
 * Recency is tracked through the insertion order of a `Map`: a touched key is
 * deleted and re-inserted, so the first key in iteration order is always the
 * eviction candidate.
 *
 * There is no internal synchronization. Cooperative async callers on one
 * event loop are safe as long as each lookup-and-store happens without an
 * `await` in between; anything sharing the cache across worker threads must
 * serialize access itself.
 */

import { ValidationError } from '../utils/errors.js';

export const DEFAULT_LRU_MAX_SIZE = 100;

export interface LRUCacheOptions<K, V> {
  /** Hard upper bound on the number of entries. Default: 100. */
  maxSize?: number;
  /**
   * Called after an entry is evicted to make room for a new key.
   * Not called for replacements or for `clear()`.
   */
  onEvict?: (key: K, value: V) => void;
}

export type LRUClearPredicate<K, V> = (key: K, value: V) => boolean;

export class LRUCache<K, V> {
  readonly maxSize: number;
  private readonly entries = new Map<K, { value: V }>();
  private readonly onEvict?: (key: K, value: V) => void;

  constructor(options: LRUCacheOptions<K, V> = {}) {
    const maxSize = options.maxSize ?? DEFAULT_LRU_MAX_SIZE;
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new ValidationError(`LRUCache maxSize must be a positive integer, got ${maxSize}`, {
        maxSize,
      });
    }
    this.maxSize = maxSize;
    this.onEvict = options.onEvict;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Membership test that leaves recency untouched. */
  has(key: K): boolean {
    return this.entries.has(key);
  }

  /** Reads a value without marking it as used. */
  peek(key: K): V | undefined {
    return this.entries.get(key)?.value;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  put(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      this.evictOldest();
    }
    this.entries.set(key, { value });
  }

  /**
   * Removes every entry, or only those matching `predicate`. Survivors keep
   * their relative recency order.
   */
  clear(predicate?: LRUClearPredicate<K, V>): void {
    if (!predicate) {
      this.entries.clear();
      return;
    }
    const doomed: K[] = [];
    for (const [key, entry] of this.entries) {
      if (predicate(key, entry.value)) doomed.push(key);
    }
    for (const key of doomed) {
      this.entries.delete(key);
    }
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  /** Values from least to most recently used. */
  values(): V[] {
    return Array.from(this.entries.values(), (entry) => entry.value);
  }

  private evictOldest(): void {
    const oldest = this.entries.entries().next();
    if (oldest.done) return;
    const [key, entry] = oldest.value;
    this.entries.delete(key);
    this.onEvict?.(key, entry.value);
  }
}
