/**
 * Partition classifier - decides whether a running query scans too much
 *
 * Evaluation order:
 * 1. Opt-out marker in the query text → skipped, nothing emitted.
 * 2. Inputs in engine order. The first input whose connector differs from
 *    the filter ends classification for the whole query (skipped); later
 *    inputs are never looked at, even if they would breach.
 * 3. Each checked input emits one queried_partitions metric per partition id;
 *    an input with strictly more partitions than the threshold also emits
 *    query_partition_counts (value = count) and becomes offending.
 *
 * A truncated partition list is compared as reported: the count is a lower
 * bound, so a breach is still a breach.
 */

import type { MetricsSink } from "@/interfaces";
import type {
  ClassificationResult,
  ClassifierOptions,
  EngineQuery,
  OffendingInput,
  QueryInput,
} from "@/types";
import {
  METRIC_QUERIED_PARTITIONS,
  METRIC_QUERY_PARTITION_COUNTS,
} from "@/constants";
import { hasOptOutMarker } from "@/signal/annotations/queryAnnotations";
import * as logger from "@/logger";

/**
 * connector.schema.table
 */
export function tableIdentity(input: QueryInput): string {
  return `${input.connectorId}.${input.schema}.${input.table}`;
}

export function classifyQuery(
  query: EngineQuery,
  options: ClassifierOptions,
  metrics: MetricsSink,
): ClassificationResult {
  const log = logger.withContext({ queryId: query.queryId });

  if (hasOptOutMarker(query.query, options.optOutMarker)) {
    log.debug("Query opted out of partition checks");
    return { kind: "skipped", reason: "opted_out" };
  }

  const offending: OffendingInput[] = [];

  for (const [index, input] of query.inputs.entries()) {
    if (input.connectorId !== options.connectorFilter) {
      log.debug("Input connector does not match filter, skipping query", {
        inputIndex: index,
        connectorId: input.connectorId,
        connectorFilter: options.connectorFilter,
      });
      return {
        kind: "skipped",
        reason: "connector_mismatch",
        inputIndex: index,
        connectorId: input.connectorId,
      };
    }

    const table = tableIdentity(input);
    const { partitionIds, truncated } = input.connectorInfo;
    log.debug("Checking input partition count", {
      inputIndex: index,
      table,
      partitionCount: partitionIds.length,
      truncated,
    });

    for (const partition of partitionIds) {
      metrics.increment(METRIC_QUERIED_PARTITIONS, 1, { table, partition });
    }

    if (partitionIds.length > options.threshold) {
      log.warn("Input scans more partitions than allowed", {
        inputIndex: index,
        table,
        partitionCount: partitionIds.length,
        threshold: options.threshold,
        truncated,
      });
      metrics.increment(METRIC_QUERY_PARTITION_COUNTS, partitionIds.length, {
        table,
      });
      offending.push({
        input,
        table,
        partitionCount: partitionIds.length,
        truncated,
      });
    }
  }

  return {
    kind: "evaluated",
    offending,
    totalPartitions: offending.reduce((sum, o) => sum + o.partitionCount, 0),
  };
}
