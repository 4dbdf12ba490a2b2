/**
 * Query engine client type definitions
 */

/**
 * Failure classes surfaced by the engine client
 *
 * - UNREACHABLE: connection failure, timeout, or non-2xx status (other than 404)
 * - MALFORMED: body did not decode into the expected query shape
 * - NOT_FOUND: the query id is no longer known to the engine
 */
export type EngineErrorKind = "UNREACHABLE" | "MALFORMED" | "NOT_FOUND";

export interface EngineErrorDetails {
  kind: EngineErrorKind;
  operation: "listRunningQueries" | "getQueryDetail";
  queryId?: string;
  cause?: unknown;
}

export interface EngineClientConfig {
  /** Engine base URL including scheme and port, e.g. http://presto:8080 */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}
