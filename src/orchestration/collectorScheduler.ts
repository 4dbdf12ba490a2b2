/**
 * Collector scheduler - runs collector cycles on a fixed interval
 *
 * One cycle runs immediately, then one per interval. A tick that fires while
 * a cycle is still in flight is dropped, so cycles never overlap and the
 * dedup cache only ever has one writer.
 */

import type { CycleResult } from "@/types";
import type { CollectorContext } from "./collectorContext";
import { emptyCounters, runCollectorCycle } from "./collectorCycle";
import * as logger from "@/logger";

export interface CollectorHandle {
  /**
   * Stop scheduling new cycles and wait for the in-flight one (if any)
   */
  stop(): Promise<void>;
  /**
   * Cycle currently running, if any
   */
  readonly inFlight: Promise<CycleResult> | undefined;
}

export function startCollector(
  ctx: CollectorContext,
  runCycle: (ctx: CollectorContext) => Promise<CycleResult> = runCollectorCycle,
): CollectorHandle {
  let inFlight: Promise<CycleResult> | undefined;
  let stopped = false;
  let cycleCount = 0;

  const tick = (): void => {
    if (stopped) {
      return;
    }
    if (inFlight) {
      logger.debug("Previous cycle still running, skipping tick", {
        cycleCount,
      });
      return;
    }

    cycleCount++;
    logger.debug("Timer tick, starting collector cycle", { cycleCount });

    const current = runCycle(ctx)
      .catch((error: unknown): CycleResult => {
        // runCollectorCycle reports failures in its result; this is a bug guard
        logger.error("Collector cycle threw unexpectedly", {
          cycleCount,
          error: logger.describeError(error),
        });
        return {
          ok: false,
          stage: "list",
          error,
          counters: emptyCounters(),
          elapsedMs: 0,
        };
      })
      .finally(() => {
        inFlight = undefined;
      });
    inFlight = current;
  };

  logger.info("Starting collector", {
    intervalSeconds: ctx.settings.intervalSeconds,
    connectorFilter: ctx.settings.connectorFilter,
    threshold: ctx.settings.threshold,
  });

  const timer = setInterval(tick, ctx.settings.intervalSeconds * 1000);
  tick();

  return {
    get inFlight() {
      return inFlight;
    },
    async stop(): Promise<void> {
      if (stopped) {
        return;
      }
      stopped = true;
      clearInterval(timer);
      logger.info("Collector stopping", { totalCycles: cycleCount });
      if (inFlight) {
        await inFlight;
      }
    },
  };
}
