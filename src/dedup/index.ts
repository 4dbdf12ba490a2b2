import { DedupCache } from "./dedupCache";
import { DEDUP_CACHE_CAPACITY, DEDUP_CACHE_TTL_MS } from "@/constants";
import * as logger from "@/logger";

export { DedupCache };

/**
 * Cache of evaluated query ids → epoch ms they were marked, with the
 * production capacity and TTL
 */
export function createQueryDedupCache(now?: () => number): DedupCache<number> {
  return new DedupCache<number>({
    capacity: DEDUP_CACHE_CAPACITY,
    ttlMs: DEDUP_CACHE_TTL_MS,
    now,
    onEvict: (queryId, markedAt, reason) =>
      logger.debug("Evicted query from dedup cache", {
        queryId,
        markedAt: new Date(markedAt).toISOString(),
        reason,
      }),
  });
}
