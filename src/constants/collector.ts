/**
 * Collector and health constants
 */

/**
 * Health turns unhealthy once the last successful poll is older than
 * this many poll intervals
 */
export const HEALTH_STALE_INTERVAL_MULTIPLIER = 3;

export const HEALTH_STATUS_OK = 200;
export const HEALTH_STATUS_STALE = 500;
