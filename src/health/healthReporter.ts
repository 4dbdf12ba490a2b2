/**
 * Health reporter - liveness derived from the last successful poll
 */

import type { HealthReport, HealthState } from "@/types";
import { HEALTH_STALE_INTERVAL_MULTIPLIER } from "@/constants";

/**
 * Unhealthy once the last successful poll is more than
 * HEALTH_STALE_INTERVAL_MULTIPLIER poll intervals old.
 */
export function evaluateHealth(
  state: HealthState,
  intervalSeconds: number,
  nowMs: number,
): HealthReport {
  const gapMs = Math.max(0, nowMs - state.lastSuccessAt);
  const maxGapMs = HEALTH_STALE_INTERVAL_MULTIPLIER * intervalSeconds * 1000;
  const healthy = gapMs <= maxGapMs;
  const secondsSinceLastPoll = Math.floor(gapMs / 1000);

  const body =
    `${healthy ? "OK" : "STALE"}\n` +
    `Last successful poll: ${secondsSinceLastPoll}s ago (limit ${maxGapMs / 1000}s)\n`;

  return { healthy, secondsSinceLastPoll, body };
}
