/**
 * QuerySourceClient interface - read access to the engine's running queries
 */

import type { EngineQuery } from "@/types";

export interface QuerySourceClient {
  /**
   * Lightweight overview of running queries
   *
   * The engine filters by state server-side, but the overview is loose:
   * callers still check `state` and must not rely on `inputs`.
   *
   * @throws {EngineError} UNREACHABLE or MALFORMED
   */
  listRunningQueries(): Promise<EngineQuery[]>;

  /**
   * Full record for one query, including inputs and partition ids
   *
   * @throws {EngineError} UNREACHABLE, MALFORMED or NOT_FOUND
   */
  getQueryDetail(queryId: string): Promise<EngineQuery>;
}
