/**
 * Query model - what the engine reports about a running query
 *
 * Read-only from this system's perspective; built by the engine client
 * mappers from the raw overview/detail payloads.
 */

/**
 * Execution states reported by the engine
 *
 * Only RUNNING is acted upon. Kept open (string) so a newer engine
 * state never turns a whole overview response into a decode failure.
 */
export type QueryState =
  | "QUEUED"
  | "WAITING_FOR_RESOURCES"
  | "DISPATCHING"
  | "PLANNING"
  | "STARTING"
  | "RUNNING"
  | "BLOCKED"
  | "FINISHING"
  | "FINISHED"
  | "FAILED"
  | (string & {});

export type ConnectorInfo = {
  /** Partition identifiers scanned, in engine order */
  partitionIds: string[];
  /** True when the engine cut the partition list short (count is a lower bound) */
  truncated: boolean;
};

export type QueryInput = {
  connectorId: string;
  schema: string;
  table: string;
  connectorInfo: ConnectorInfo;
};

export type EngineQuery = {
  queryId: string;
  state: QueryState;
  /** Session user that submitted the query */
  user: string;
  /** Raw SQL text */
  query: string;
  /** Scanned inputs; empty on overview records */
  inputs: QueryInput[];
};
