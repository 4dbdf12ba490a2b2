/**
 * Dedup cache types
 */

export type CacheLookup<V> = { present: true; value: V } | { present: false };

export type EvictionReason = "capacity" | "expired";

export type EvictionCallback<V> = (
  key: string,
  value: V,
  reason: EvictionReason,
) => void;

export interface DedupCacheOptions<V> {
  /** Maximum live entries before LFU eviction kicks in */
  capacity: number;
  /** Time-to-live in milliseconds, counted from insertion */
  ttlMs: number;
  /** Observability hook; nothing depends on it */
  onEvict?: EvictionCallback<V>;
  /** Clock in epoch milliseconds (defaults to Date.now) */
  now?: () => number;
}
