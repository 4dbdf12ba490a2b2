/**
 * Partition classification types
 */

import type { QueryInput } from "./query";

export type ClassifierOptions = {
  /** Connector whose inputs are partition-checked (e.g. "hive") */
  connectorFilter: string;
  /** Inputs scanning strictly more partitions than this are offending */
  threshold: number;
  /** Literal token that opts a query out of checking */
  optOutMarker: string;
};

export type OffendingInput = {
  input: QueryInput;
  /** Fully qualified table identity: connector.schema.table */
  table: string;
  partitionCount: number;
  /** Partition count is a lower bound */
  truncated: boolean;
};

export type SkipReason = "opted_out" | "connector_mismatch";

/**
 * Result of classifying one query
 *
 * "skipped" means the query was not applicable and can never alert on
 * this evaluation. "evaluated" with an empty offending list is a clean query.
 */
export type ClassificationResult =
  | {
      kind: "skipped";
      reason: SkipReason;
      /** Index and connector of the input that caused a connector_mismatch */
      inputIndex?: number;
      connectorId?: string;
    }
  | {
      kind: "evaluated";
      offending: OffendingInput[];
      /** Sum of partition counts across offending inputs */
      totalPartitions: number;
    };
