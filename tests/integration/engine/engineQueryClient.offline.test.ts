/**
 * EngineQueryClient against the mock HTTP harness (no network)
 */

import { beforeEach, describe, expect, it } from "vitest";
import { EngineError, EngineQueryClient } from "@/clients/engine";
import { HttpError } from "@/clients/http";
import { ENGINE_HTTP_HEADERS } from "@/constants";
import { createMockHttp, loadFixtureJson } from "../../helpers/mockHttp";

const BASE_URL = "http://engine:8080";

async function captureEngineError(promise: Promise<unknown>): Promise<EngineError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof EngineError)) {
    throw new Error(`expected EngineError, got ${String(error)}`);
  }
  return error;
}

describe("EngineQueryClient (offline)", () => {
  const mock = createMockHttp();
  let client: EngineQueryClient;

  beforeEach(() => {
    mock.reset();
    client = new EngineQueryClient({
      baseUrl: `${BASE_URL}/`,
      timeoutMs: 2_500,
      httpRequest: mock.request,
    });
  });

  describe("listRunningQueries", () => {
    it("requests running queries and decodes the overview", async () => {
      mock.on("GET", `${BASE_URL}/v1/query`, loadFixtureJson("engine/overview_running.json"));

      const queries = await client.listRunningQueries();

      expect(queries.map((q) => [q.queryId, q.state, q.user])).toEqual([
        ["20240601_101500_00001_abcde", "FINISHED", "bob"],
        ["Q1", "RUNNING", "alice"],
      ]);
      expect(mock.getRecordedRequests()).toEqual([
        {
          method: "GET",
          url: `${BASE_URL}/v1/query`,
          query: { state: "running" },
          headers: ENGINE_HTTP_HEADERS,
          timeoutMs: 2_500,
        },
      ]);
    });

    it("reports a 500 as unreachable", async () => {
      mock.onResponse("GET", `${BASE_URL}/v1/query`, { status: 500, body: "boom" });

      const error = await captureEngineError(client.listRunningQueries());

      expect(error.kind).toBe("UNREACHABLE");
      expect(error.operation).toBe("listRunningQueries");
      expect(error.message).toBe("Engine request for query overview failed: HTTP 500");
      expect(error.cause).toBeInstanceOf(HttpError);
    });

    it("reports a 404 on the overview as unreachable", async () => {
      mock.onResponse("GET", `${BASE_URL}/v1/query`, { status: 404, body: "" });
      expect((await captureEngineError(client.listRunningQueries())).kind).toBe("UNREACHABLE");
    });

    it("reports a network failure as unreachable", async () => {
      mock.onCustom("GET", `${BASE_URL}/v1/query`, async () => {
        throw new TypeError("fetch failed");
      });

      const error = await captureEngineError(client.listRunningQueries());

      expect(error.kind).toBe("UNREACHABLE");
      expect(error.message).toBe("Engine request for query overview failed: fetch failed");
    });

    it("reports an unexpected body as malformed", async () => {
      mock.on("GET", `${BASE_URL}/v1/query`, { queries: [] });

      const error = await captureEngineError(client.listRunningQueries());

      expect(error.kind).toBe("MALFORMED");
      expect(error.message).toBe(
        "Malformed query overview: (root): Expected array, received object",
      );
    });
  });

  describe("getQueryDetail", () => {
    it("decodes inputs of the detail fixture", async () => {
      mock.on("GET", `${BASE_URL}/v1/query/Q1`, loadFixtureJson("engine/detail_q1.json"));

      const detail = await client.getQueryDetail("Q1");

      expect(detail.queryId).toBe("Q1");
      expect(detail.inputs).toHaveLength(1);
      expect(detail.inputs[0].connectorInfo.partitionIds).toHaveLength(31);
    });

    it("encodes the query id into the path", async () => {
      mock.on("GET", `${BASE_URL}/v1/query/a%2Fb`, { queryId: "a/b", state: "RUNNING" });

      await client.getQueryDetail("a/b");

      expect(mock.getRecordedRequests()[0].url).toBe(`${BASE_URL}/v1/query/a%2Fb`);
    });

    it("reports a 404 as not found", async () => {
      mock.onResponse("GET", `${BASE_URL}/v1/query/Q7`, { status: 404, body: "" });

      const error = await captureEngineError(client.getQueryDetail("Q7"));

      expect(error.kind).toBe("NOT_FOUND");
      expect(error.operation).toBe("getQueryDetail");
      expect(error.queryId).toBe("Q7");
      expect(error.message).toBe("Engine request for query Q7 failed: HTTP 404");
    });

    it("reports a detail without a state as malformed", async () => {
      mock.on("GET", `${BASE_URL}/v1/query/Q8`, { queryId: "Q8" });

      const error = await captureEngineError(client.getQueryDetail("Q8"));

      expect(error.kind).toBe("MALFORMED");
      expect(error.message).toBe("Malformed detail for query Q8: state: Required");
    });
  });
});
