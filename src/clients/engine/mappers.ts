/**
 * Engine payload mappers - validate raw responses and convert to EngineQuery
 */

import type { ZodError } from "zod";
import type { ConnectorInfo, EngineQuery, QueryInput } from "@/types";
import {
  engineQuerySchema,
  queryOverviewSchema,
  type RawConnectorInfo,
  type RawEngineQuery,
  type RawQueryInput,
} from "./schemas";

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: string };

/**
 * Summarise validation issues as "path: message; ..." (first few only)
 */
function summariseIssues(error: ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function mapConnectorInfo(raw: RawConnectorInfo | null | undefined): ConnectorInfo {
  return {
    partitionIds: raw?.partitionIds ?? [],
    truncated: raw?.truncated ?? false,
  };
}

function mapInput(raw: RawQueryInput): QueryInput {
  return {
    connectorId: raw.connectorId,
    schema: raw.schema,
    table: raw.table,
    connectorInfo: mapConnectorInfo(raw.connectorInfo),
  };
}

export function mapEngineQuery(raw: RawEngineQuery): EngineQuery {
  return {
    queryId: raw.queryId,
    state: raw.state,
    user: raw.session?.user ?? "",
    query: raw.query ?? "",
    inputs: (raw.inputs ?? []).map(mapInput),
  };
}

/**
 * Decode the body of GET /v1/query?state=running
 */
export function decodeQueryOverview(payload: unknown): DecodeResult<EngineQuery[]> {
  const parsed = queryOverviewSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, issues: summariseIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data.map(mapEngineQuery) };
}

/**
 * Decode the body of GET /v1/query/{id}
 */
export function decodeQueryDetail(payload: unknown): DecodeResult<EngineQuery> {
  const parsed = engineQuerySchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, issues: summariseIssues(parsed.error) };
  }
  return { ok: true, value: mapEngineQuery(parsed.data) };
}
