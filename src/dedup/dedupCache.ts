/**
 * DedupCache - bounded, time-expiring map of query ids already handled
 *
 * - Each entry expires ttlMs after it was set; reads never extend that.
 * - When a new key would exceed capacity, expired entries are purged first,
 *   then the least-frequently-used entry is evicted (oldest insertion wins
 *   ties). Every successful lookup counts as a use.
 * - Expired entries are dropped lazily, on lookup or under capacity pressure.
 *
 * Not safe for concurrent writers; the collector guarantees a single
 * in-flight cycle.
 */

import type {
  CacheLookup,
  DedupCacheOptions,
  EvictionCallback,
  EvictionReason,
} from "@/types";

type Entry<V> = {
  value: V;
  expiresAt: number;
  frequency: number;
  /** Insertion sequence, used to break LFU ties */
  seq: number;
};

export class DedupCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly onEvict?: EvictionCallback<V>;
  private readonly now: () => number;
  private nextSeq = 0;

  constructor(options: DedupCacheOptions<V>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${options.capacity}`);
    }
    if (!(options.ttlMs > 0)) {
      throw new RangeError(`Cache TTL must be positive, got ${options.ttlMs}`);
    }
    this.capacity = options.capacity;
    this.ttlMs = options.ttlMs;
    this.onEvict = options.onEvict;
    this.now = options.now ?? Date.now;
  }

  getIfPresent(key: string): CacheLookup<V> {
    const entry = this.entries.get(key);
    if (!entry) {
      return { present: false };
    }
    if (this.isExpired(entry)) {
      this.remove(key, entry, "expired");
      return { present: false };
    }
    entry.frequency++;
    return { present: true, value: entry.value };
  }

  /**
   * Insert or replace a key. Replacing keeps a single entry and restarts
   * its TTL.
   */
  set(key: string, value: V): void {
    const existing = this.entries.get(key);
    if (existing && !this.isExpired(existing)) {
      existing.value = value;
      existing.expiresAt = this.now() + this.ttlMs;
      return;
    }
    if (existing) {
      this.remove(key, existing, "expired");
    }

    if (this.entries.size >= this.capacity) {
      this.purgeExpired();
    }
    if (this.entries.size >= this.capacity) {
      this.evictLeastFrequentlyUsed();
    }

    this.entries.set(key, {
      value,
      expiresAt: this.now() + this.ttlMs,
      frequency: 0,
      seq: this.nextSeq++,
    });
  }

  /**
   * Number of stored entries, including expired ones not yet purged
   */
  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: Entry<V>): boolean {
    return this.now() >= entry.expiresAt;
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.remove(key, entry, "expired");
      }
    }
  }

  private evictLeastFrequentlyUsed(): void {
    let victimKey: string | undefined;
    let victim: Entry<V> | undefined;

    for (const [key, entry] of this.entries) {
      if (
        !victim ||
        entry.frequency < victim.frequency ||
        (entry.frequency === victim.frequency && entry.seq < victim.seq)
      ) {
        victimKey = key;
        victim = entry;
      }
    }

    if (victimKey !== undefined && victim) {
      this.remove(victimKey, victim, "capacity");
    }
  }

  private remove(key: string, entry: Entry<V>, reason: EvictionReason): void {
    this.entries.delete(key);
    this.onEvict?.(key, entry.value, reason);
  }
}
