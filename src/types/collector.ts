/**
 * Collector loop types
 */

import type { ClassifierOptions } from "./classification";

export type CollectorSettings = ClassifierOptions & {
  /** Poll interval in seconds */
  intervalSeconds: number;
};

/**
 * Process-wide liveness state
 *
 * Written only by the collector, read only by the health reporter.
 */
export type HealthState = {
  /** Epoch milliseconds of the last cycle that completed without abort */
  lastSuccessAt: number;
};

export type CycleCounters = {
  /** Queries in the overview response */
  listed: number;
  /** Of those, queries in RUNNING state */
  running: number;
  /** Running queries skipped because their id was cached */
  cached: number;
  /** Running queries fetched and classified */
  evaluated: number;
  /** Queries an alert was attempted for */
  alerted: number;
  /** Alert attempts that failed to deliver */
  alertFailures: number;
};

export type CycleResult =
  | { ok: true; counters: CycleCounters; elapsedMs: number }
  | {
      ok: false;
      stage: "list" | "detail";
      queryId?: string;
      error: unknown;
      counters: CycleCounters;
      elapsedMs: number;
    };
