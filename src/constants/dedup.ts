/**
 * Dedup cache constants
 */

/** Maximum query ids remembered at once */
export const DEDUP_CACHE_CAPACITY = 100;

/** How long an evaluated query id is remembered (1 hour) */
export const DEDUP_CACHE_TTL_MS = 60 * 60 * 1000;
