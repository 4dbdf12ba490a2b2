import { describe, it, expect, beforeEach } from "vitest";
import { classifyQuery, tableIdentity } from "@/signal";
import {
  METRIC_QUERIED_PARTITIONS,
  METRIC_QUERY_PARTITION_COUNTS,
} from "@/constants";
import type { ClassifierOptions } from "@/types";
import { RecordingMetricsSink } from "../helpers/recordingSinks";
import { makeInput, makeQuery, partitionIds } from "../helpers/engineFixtures";

const OPTIONS: ClassifierOptions = {
  connectorFilter: "hive",
  threshold: 30,
  optOutMarker: "partition-watch:off",
};

describe("classifyQuery", () => {
  let metrics: RecordingMetricsSink;

  beforeEach(() => {
    metrics = new RecordingMetricsSink();
  });

  it("does not flag an input with exactly threshold partitions", () => {
    const query = makeQuery({
      inputs: [
        makeInput({ connectorInfo: { partitionIds: partitionIds(30), truncated: false } }),
      ],
    });

    const result = classifyQuery(query, OPTIONS, metrics);

    expect(result).toEqual({ kind: "evaluated", offending: [], totalPartitions: 0 });
    expect(metrics.named(METRIC_QUERIED_PARTITIONS)).toHaveLength(30);
    expect(metrics.named(METRIC_QUERY_PARTITION_COUNTS)).toHaveLength(0);
  });

  it("flags an input with threshold + 1 partitions", () => {
    const input = makeInput({
      connectorInfo: { partitionIds: partitionIds(31), truncated: false },
    });
    const result = classifyQuery(makeQuery({ inputs: [input] }), OPTIONS, metrics);

    expect(result.kind).toBe("evaluated");
    if (result.kind === "evaluated") {
      expect(result.offending).toEqual([
        { input, table: "hive.web.events", partitionCount: 31, truncated: false },
      ]);
      expect(result.totalPartitions).toBe(31);
    }
    expect(metrics.named(METRIC_QUERY_PARTITION_COUNTS)).toEqual([
      {
        name: METRIC_QUERY_PARTITION_COUNTS,
        value: 31,
        tags: { table: "hive.web.events" },
      },
    ]);
  });

  it("emits one metric per partition id with table and partition tags", () => {
    const query = makeQuery({
      inputs: [
        makeInput({
          schema: "sales",
          table: "orders",
          connectorInfo: { partitionIds: ["dt=2024-01-01", "dt=2024-01-02"], truncated: false },
        }),
      ],
    });

    classifyQuery(query, OPTIONS, metrics);

    expect(metrics.events).toEqual([
      {
        name: METRIC_QUERIED_PARTITIONS,
        value: 1,
        tags: { table: "hive.sales.orders", partition: "dt=2024-01-01" },
      },
      {
        name: METRIC_QUERIED_PARTITIONS,
        value: 1,
        tags: { table: "hive.sales.orders", partition: "dt=2024-01-02" },
      },
    ]);
  });

  it("stops at a first non-matching connector even if a later input would breach", () => {
    const query = makeQuery({
      inputs: [
        makeInput({ connectorId: "mysql", schema: "app", table: "users" }),
        makeInput({ connectorInfo: { partitionIds: partitionIds(500), truncated: false } }),
      ],
    });

    const result = classifyQuery(query, OPTIONS, metrics);

    expect(result).toEqual({
      kind: "skipped",
      reason: "connector_mismatch",
      inputIndex: 0,
      connectorId: "mysql",
    });
    expect(metrics.events).toEqual([]);
  });

  it("keeps metrics of matching inputs seen before a non-matching one", () => {
    const query = makeQuery({
      inputs: [
        makeInput({ connectorInfo: { partitionIds: partitionIds(3), truncated: false } }),
        makeInput({ connectorId: "postgres", schema: "public", table: "accounts" }),
        makeInput({ connectorInfo: { partitionIds: partitionIds(40), truncated: false } }),
      ],
    });

    const result = classifyQuery(query, OPTIONS, metrics);

    expect(result).toEqual({
      kind: "skipped",
      reason: "connector_mismatch",
      inputIndex: 1,
      connectorId: "postgres",
    });
    expect(metrics.named(METRIC_QUERIED_PARTITIONS)).toHaveLength(3);
    expect(metrics.named(METRIC_QUERY_PARTITION_COUNTS)).toHaveLength(0);
  });

  it("skips an opted-out query without emitting metrics", () => {
    const query = makeQuery({
      query: "SELECT * FROM hive.web.events -- partition-watch:off",
      inputs: [
        makeInput({ connectorInfo: { partitionIds: partitionIds(90), truncated: false } }),
      ],
    });

    const result = classifyQuery(query, OPTIONS, metrics);

    expect(result).toEqual({ kind: "skipped", reason: "opted_out" });
    expect(metrics.events).toEqual([]);
  });

  it("totals only the offending inputs", () => {
    const query = makeQuery({
      inputs: [
        makeInput({ table: "events", connectorInfo: { partitionIds: partitionIds(35), truncated: false } }),
        makeInput({ table: "sessions", connectorInfo: { partitionIds: partitionIds(5), truncated: false } }),
        makeInput({ table: "clicks", connectorInfo: { partitionIds: partitionIds(50), truncated: false } }),
      ],
    });

    const result = classifyQuery(query, OPTIONS, metrics);

    expect(result.kind).toBe("evaluated");
    if (result.kind === "evaluated") {
      expect(result.offending.map((o) => o.table)).toEqual([
        "hive.web.events",
        "hive.web.clicks",
      ]);
      expect(result.totalPartitions).toBe(85);
    }
    expect(metrics.named(METRIC_QUERIED_PARTITIONS)).toHaveLength(90);
    expect(metrics.named(METRIC_QUERY_PARTITION_COUNTS).map((m) => m.value)).toEqual([
      35, 50,
    ]);
  });

  it("marks an offending truncated partition list", () => {
    const query = makeQuery({
      inputs: [
        makeInput({ connectorInfo: { partitionIds: partitionIds(31), truncated: true } }),
      ],
    });

    const result = classifyQuery(query, OPTIONS, metrics);

    expect(result.kind).toBe("evaluated");
    if (result.kind === "evaluated") {
      expect(result.offending[0].truncated).toBe(true);
    }
  });

  it("treats a query without inputs as clean", () => {
    const result = classifyQuery(makeQuery(), OPTIONS, metrics);
    expect(result).toEqual({ kind: "evaluated", offending: [], totalPartitions: 0 });
    expect(metrics.events).toEqual([]);
  });

  it("honours a threshold of zero", () => {
    const query = makeQuery({
      inputs: [
        makeInput({ connectorInfo: { partitionIds: ["dt=1"], truncated: false } }),
      ],
    });

    const result = classifyQuery(query, { ...OPTIONS, threshold: 0 }, metrics);

    expect(result.kind === "evaluated" && result.offending.length).toBe(1);
  });
});

describe("tableIdentity", () => {
  it("joins connector, schema and table with dots", () => {
    expect(tableIdentity(makeInput({ connectorId: "hive", schema: "raw", table: "logs" }))).toBe(
      "hive.raw.logs",
    );
  });
});
