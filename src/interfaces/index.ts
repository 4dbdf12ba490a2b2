export type { QuerySourceClient } from "./clients/querySourceClient";
export type { AlertSink } from "./sinks/alertSink";
export type { MetricsSink } from "./sinks/metricsSink";
