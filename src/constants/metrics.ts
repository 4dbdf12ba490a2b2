/**
 * Metric names and sink defaults
 */

/** +1 per partition id seen on a checked input, tagged table + partition */
export const METRIC_QUERIED_PARTITIONS = "partition_watch.queried_partitions";

/** +count per offending input, tagged table */
export const METRIC_QUERY_PARTITION_COUNTS =
  "partition_watch.query_partition_counts";

export const DEFAULT_STATSD_HOST = "127.0.0.1";
export const DEFAULT_STATSD_PORT = 8125;
