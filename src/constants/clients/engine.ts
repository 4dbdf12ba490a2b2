/**
 * Query engine REST API constants
 */

/** Overview of all queries (filtered server-side by `state`) */
export const ENGINE_QUERY_LIST_PATH = "/v1/query";

/** State filter passed to the overview endpoint */
export const ENGINE_RUNNING_STATE_FILTER = "running";

/** The only state the collector acts on */
export const RUNNING_QUERY_STATE = "RUNNING";

/** Web UI page for a single query (query id goes in the query string) */
export const ENGINE_QUERY_UI_PATH = "/ui/query.html";

export const ENGINE_HTTP_HEADERS: Record<string, string> = {
  Accept: "application/json",
  "User-Agent": "partition-watch",
};
