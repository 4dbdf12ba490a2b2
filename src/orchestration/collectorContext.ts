/**
 * Collector context - everything one collector cycle reads or writes
 *
 * Built once at startup and shared with the health endpoint; there are no
 * module-level singletons for this state.
 */

import type { AlertSink, MetricsSink, QuerySourceClient } from "@/interfaces";
import type { CollectorSettings, HealthState } from "@/types";
import type { DedupCache } from "@/dedup";

export interface CollectorContext {
  readonly settings: CollectorSettings;
  readonly source: QuerySourceClient;
  readonly alertSink: AlertSink;
  readonly metrics: MetricsSink;
  /** Query id → epoch ms it was evaluated */
  readonly cache: DedupCache<number>;
  readonly health: HealthState;
  /** Epoch milliseconds */
  readonly now: () => number;
}

export function createCollectorContext(
  deps: Omit<CollectorContext, "health" | "now"> & { now?: () => number },
): CollectorContext {
  const now = deps.now ?? Date.now;
  return {
    ...deps,
    now,
    // Startup counts as fresh so the first probes do not fail before the first poll
    health: { lastSuccessAt: now() },
  };
}
