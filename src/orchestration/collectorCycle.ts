/**
 * Collector cycle - one poll → classify → dedupe → alert pass
 *
 * Failure policy:
 * - Overview fetch fails → cycle aborts, health is not refreshed.
 * - Any detail fetch fails → cycle aborts right there (remaining queries wait
 *   for the next tick), health is not refreshed.
 * - Alert delivery fails → logged only; the query id is still marked so it
 *   is not alerted again inside the dedup window.
 *
 * Every query that was fetched and classified is marked in the cache,
 * whether it alerted, was clean, or was skipped, so it is not re-evaluated
 * until its entry expires.
 */

import type { CycleCounters, CycleResult, EngineQuery } from "@/types";
import { RUNNING_QUERY_STATE } from "@/constants";
import { classifyQuery } from "@/signal";
import type { CollectorContext } from "./collectorContext";
import * as logger from "@/logger";

export function emptyCounters(): CycleCounters {
  return {
    listed: 0,
    running: 0,
    cached: 0,
    evaluated: 0,
    alerted: 0,
    alertFailures: 0,
  };
}

export async function runCollectorCycle(
  ctx: CollectorContext,
): Promise<CycleResult> {
  const startMs = ctx.now();
  const counters = emptyCounters();

  let queries: EngineQuery[];
  try {
    queries = await ctx.source.listRunningQueries();
  } catch (error) {
    logger.error("Failed to list running queries, will retry next interval", {
      intervalSeconds: ctx.settings.intervalSeconds,
      error: logger.describeError(error),
    });
    return {
      ok: false,
      stage: "list",
      error,
      counters,
      elapsedMs: ctx.now() - startMs,
    };
  }
  counters.listed = queries.length;

  for (const overview of queries) {
    if (overview.state !== RUNNING_QUERY_STATE) {
      continue;
    }
    counters.running++;
    const queryId = overview.queryId;

    const cached = ctx.cache.getIfPresent(queryId);
    if (cached.present) {
      counters.cached++;
      logger.debug("Query already evaluated, ignoring", {
        queryId,
        cachedAt: new Date(cached.value).toISOString(),
      });
      continue;
    }

    logger.debug("Checking new running query", { queryId });

    let detail: EngineQuery;
    try {
      detail = await ctx.source.getQueryDetail(queryId);
    } catch (error) {
      logger.error("Failed to fetch query detail, aborting cycle", {
        queryId,
        error: logger.describeError(error),
      });
      return {
        ok: false,
        stage: "detail",
        queryId,
        error,
        counters,
        elapsedMs: ctx.now() - startMs,
      };
    }

    const result = classifyQuery(detail, ctx.settings, ctx.metrics);
    counters.evaluated++;

    if (result.kind === "evaluated" && result.offending.length > 0) {
      counters.alerted++;
      try {
        await ctx.alertSink.sendAlert({
          query: detail,
          offending: result.offending,
          totalPartitions: result.totalPartitions,
        });
        logger.info("Partition alert sent", {
          queryId,
          user: detail.user,
          offendingInputs: result.offending.length,
          totalPartitions: result.totalPartitions,
        });
      } catch (error) {
        counters.alertFailures++;
        logger.error("Failed to deliver partition alert", {
          queryId,
          error: logger.describeError(error),
        });
      }
    }

    ctx.cache.set(queryId, ctx.now());
  }

  const finishedAt = ctx.now();
  ctx.health.lastSuccessAt = finishedAt;

  logger.debug("Collector cycle completed", {
    ...counters,
    elapsedMs: finishedAt - startMs,
  });

  return { ok: true, counters, elapsedMs: finishedAt - startMs };
}
