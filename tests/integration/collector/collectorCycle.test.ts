/**
 * One collector cycle over in-memory source, sinks and cache
 */

import { beforeEach, describe, expect, it } from "vitest";
import { createCollectorContext, runCollectorCycle } from "@/orchestration";
import type { CollectorContext } from "@/orchestration";
import { DedupCache } from "@/dedup";
import { METRIC_QUERIED_PARTITIONS, METRIC_QUERY_PARTITION_COUNTS } from "@/constants";
import {
  FakeQuerySource,
  RecordingAlertSink,
  RecordingMetricsSink,
} from "../../helpers/recordingSinks";
import { makeInput, makeQuery, partitionIds } from "../../helpers/engineFixtures";

const START = 1_700_000_000_000;
const HOUR_MS = 3_600_000;

function offendingQuery(queryId: string, partitions = 31) {
  return makeQuery({
    queryId,
    inputs: [
      makeInput({ connectorInfo: { partitionIds: partitionIds(partitions), truncated: false } }),
    ],
  });
}

function cleanQuery(queryId: string) {
  return makeQuery({
    queryId,
    inputs: [makeInput({ connectorInfo: { partitionIds: partitionIds(2), truncated: false } })],
  });
}

describe("runCollectorCycle", () => {
  let clock: number;
  let source: FakeQuerySource;
  let alerts: RecordingAlertSink;
  let metrics: RecordingMetricsSink;
  let ctx: CollectorContext;

  beforeEach(() => {
    clock = START;
    source = new FakeQuerySource();
    alerts = new RecordingAlertSink();
    metrics = new RecordingMetricsSink();
    const now = () => clock;
    ctx = createCollectorContext({
      settings: {
        connectorFilter: "hive",
        threshold: 30,
        optOutMarker: "partition-watch:off",
        intervalSeconds: 20,
      },
      source,
      alertSink: alerts,
      metrics,
      cache: new DedupCache<number>({ capacity: 100, ttlMs: HOUR_MS, now }),
      now,
    });
  });

  it("alerts once for an offending query and marks it", async () => {
    source.add(offendingQuery("Q1"));
    clock += 1_000;

    const result = await runCollectorCycle(ctx);

    expect(result).toEqual({
      ok: true,
      counters: {
        listed: 1,
        running: 1,
        cached: 0,
        evaluated: 1,
        alerted: 1,
        alertFailures: 0,
      },
      elapsedMs: 0,
    });
    expect(alerts.alerts).toHaveLength(1);
    expect(alerts.alerts[0].query.queryId).toBe("Q1");
    expect(alerts.alerts[0].totalPartitions).toBe(31);
    expect(ctx.cache.getIfPresent("Q1")).toEqual({ present: true, value: START + 1_000 });
    expect(ctx.health.lastSuccessAt).toBe(START + 1_000);
    expect(metrics.named(METRIC_QUERIED_PARTITIONS)).toHaveLength(31);
    expect(metrics.named(METRIC_QUERY_PARTITION_COUNTS)).toHaveLength(1);
  });

  it("does not fetch or alert again for a cached query", async () => {
    source.add(offendingQuery("Q1"));
    await runCollectorCycle(ctx);

    clock += 20_000;
    const second = await runCollectorCycle(ctx);

    expect(second.ok && second.counters.cached).toBe(1);
    expect(source.listCalls).toBe(2);
    expect(source.detailCalls).toEqual(["Q1"]);
    expect(alerts.alerts).toHaveLength(1);
  });

  it("marks clean queries so they are not re-evaluated", async () => {
    source.add(cleanQuery("Q2"));

    await runCollectorCycle(ctx);
    await runCollectorCycle(ctx);

    expect(alerts.alerts).toEqual([]);
    expect(source.detailCalls).toEqual(["Q2"]);
    expect(ctx.cache.getIfPresent("Q2").present).toBe(true);
  });

  it("marks skipped queries too", async () => {
    source.add(
      makeQuery({
        queryId: "Q3",
        inputs: [makeInput({ connectorId: "mysql", schema: "app", table: "users" })],
      }),
    );
    source.add({
      ...offendingQuery("Q4", 90),
      query: "SELECT * FROM hive.web.events -- partition-watch:off",
    });

    const result = await runCollectorCycle(ctx);

    expect(result.ok && result.counters.evaluated).toBe(2);
    expect(alerts.alerts).toEqual([]);
    expect(metrics.events).toEqual([]);
    expect(ctx.cache.getIfPresent("Q3").present).toBe(true);
    expect(ctx.cache.getIfPresent("Q4").present).toBe(true);
  });

  it("only looks at running queries", async () => {
    source.add(offendingQuery("Q1"));
    source.overview.push(makeQuery({ queryId: "Q5", state: "FINISHED" }));
    source.overview.push(makeQuery({ queryId: "Q6", state: "QUEUED" }));

    const result = await runCollectorCycle(ctx);

    expect(result.ok && result.counters.listed).toBe(3);
    expect(result.ok && result.counters.running).toBe(1);
    expect(source.detailCalls).toEqual(["Q1"]);
    expect(ctx.cache.getIfPresent("Q5").present).toBe(false);
  });

  it("aborts without refreshing health when listing fails", async () => {
    source.listError = new Error("connect ECONNREFUSED");
    clock += 30_000;

    const result = await runCollectorCycle(ctx);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.stage).toBe("list");
      expect(result.error).toBe(source.listError);
    }
    expect(ctx.health.lastSuccessAt).toBe(START);
    expect(source.listCalls).toBe(1);
    expect(source.detailCalls).toEqual([]);
  });

  it("aborts at the first failing detail and retries it next cycle", async () => {
    source.add(offendingQuery("Q1"));
    source.add(cleanQuery("Q2"));
    source.add(offendingQuery("Q3"));
    source.detailErrors.set("Q2", new Error("engine timeout"));
    clock += 5_000;

    const first = await runCollectorCycle(ctx);

    expect(first).toMatchObject({ ok: false, stage: "detail", queryId: "Q2" });
    expect(first.counters.evaluated).toBe(1);
    expect(source.detailCalls).toEqual(["Q1", "Q2"]);
    expect(alerts.alerts.map((a) => a.query.queryId)).toEqual(["Q1"]);
    expect(ctx.cache.getIfPresent("Q1").present).toBe(true);
    expect(ctx.cache.getIfPresent("Q2").present).toBe(false);
    expect(ctx.health.lastSuccessAt).toBe(START);

    source.detailErrors.clear();
    clock += 20_000;
    const second = await runCollectorCycle(ctx);

    expect(second.ok).toBe(true);
    expect(source.detailCalls).toEqual(["Q1", "Q2", "Q2", "Q3"]);
    expect(alerts.alerts.map((a) => a.query.queryId)).toEqual(["Q1", "Q3"]);
    expect(ctx.health.lastSuccessAt).toBe(START + 25_000);
  });

  it("keeps going and still marks the query when an alert fails", async () => {
    alerts.failWith = new Error("HTTP 500 Internal Server Error");
    source.add(offendingQuery("Q1"));
    source.add(offendingQuery("Q2"));

    const result = await runCollectorCycle(ctx);

    expect(result.ok).toBe(true);
    expect(result.counters.alerted).toBe(2);
    expect(result.counters.alertFailures).toBe(2);
    expect(ctx.cache.getIfPresent("Q1").present).toBe(true);
    expect(ctx.cache.getIfPresent("Q2").present).toBe(true);

    alerts.failWith = undefined;
    await runCollectorCycle(ctx);
    expect(alerts.alerts).toHaveLength(2);
  });

  it("re-evaluates a query once its cache entry expires", async () => {
    source.add(offendingQuery("Q1"));
    await runCollectorCycle(ctx);

    clock += HOUR_MS;
    await runCollectorCycle(ctx);

    expect(source.detailCalls).toEqual(["Q1", "Q1"]);
    expect(alerts.alerts).toHaveLength(2);
  });
});
