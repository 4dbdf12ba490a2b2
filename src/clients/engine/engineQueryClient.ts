/**
 * EngineQueryClient - REST client for the query engine's /v1/query API
 *
 * Implements QuerySourceClient. Each call is a single bounded request; any
 * failure becomes an EngineError and nothing is retried here.
 */

import type { QuerySourceClient } from "@/interfaces";
import type {
  EngineClientConfig,
  EngineErrorDetails,
  EngineQuery,
  HttpRequestFn,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  ENGINE_HTTP_HEADERS,
  ENGINE_QUERY_LIST_PATH,
  ENGINE_RUNNING_STATE_FILTER,
} from "@/constants";
import { decodeQueryDetail, decodeQueryOverview } from "./mappers";
import {
  EngineError,
  classifyTransportError,
  describeTransportError,
} from "./engineError";
import * as logger from "@/logger";

export interface EngineQueryClientConfig extends EngineClientConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class EngineQueryClient implements QuerySourceClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: EngineQueryClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async listRunningQueries(): Promise<EngineQuery[]> {
    const payload = await this.get(
      `${this.baseUrl}${ENGINE_QUERY_LIST_PATH}`,
      { state: ENGINE_RUNNING_STATE_FILTER },
      { operation: "listRunningQueries" },
    );

    const decoded = decodeQueryOverview(payload);
    if (!decoded.ok) {
      throw new EngineError(`Malformed query overview: ${decoded.issues}`, {
        kind: "MALFORMED",
        operation: "listRunningQueries",
      });
    }

    logger.debug("Received query overview from engine", {
      count: decoded.value.length,
    });
    return decoded.value;
  }

  async getQueryDetail(queryId: string): Promise<EngineQuery> {
    const payload = await this.get(
      `${this.baseUrl}${ENGINE_QUERY_LIST_PATH}/${encodeURIComponent(queryId)}`,
      undefined,
      { operation: "getQueryDetail", queryId },
    );

    const decoded = decodeQueryDetail(payload);
    if (!decoded.ok) {
      throw new EngineError(
        `Malformed detail for query ${queryId}: ${decoded.issues}`,
        { kind: "MALFORMED", operation: "getQueryDetail", queryId },
      );
    }

    logger.debug("Received query detail from engine", {
      queryId,
      inputs: decoded.value.inputs.length,
    });
    return decoded.value;
  }

  /**
   * GET a URL and translate transport failures into EngineError
   */
  private async get(
    url: string,
    query: Record<string, string> | undefined,
    context: Pick<EngineErrorDetails, "operation" | "queryId">,
  ): Promise<unknown> {
    try {
      return await this.httpRequest<unknown>({
        method: "GET",
        url,
        query,
        headers: ENGINE_HTTP_HEADERS,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      const kind = classifyTransportError(error, context.operation);
      const target = context.queryId ? `query ${context.queryId}` : "query overview";
      throw new EngineError(
        `Engine request for ${target} failed: ${describeTransportError(error)}`,
        { kind, ...context, cause: error },
      );
    }
  }
}
