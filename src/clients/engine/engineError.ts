/**
 * EngineError - classified failure of a call to the query engine
 */

import type { EngineErrorDetails, EngineErrorKind } from "@/types";
import { HttpError, isAbortError } from "@/clients/http";

export class EngineError extends Error {
  public readonly kind: EngineErrorKind;
  public readonly operation: EngineErrorDetails["operation"];
  public readonly queryId?: string;

  constructor(message: string, details: EngineErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "EngineError";
    this.kind = details.kind;
    this.operation = details.operation;
    this.queryId = details.queryId;
  }
}

/**
 * Classify a transport failure from httpRequest()
 *
 * 404 only means NOT_FOUND for the detail endpoint; everywhere else a
 * non-2xx status, a timeout or a network error means the engine is
 * unreachable.
 */
export function classifyTransportError(
  error: unknown,
  operation: EngineErrorDetails["operation"],
): EngineErrorKind {
  if (
    error instanceof HttpError &&
    error.status === 404 &&
    operation === "getQueryDetail"
  ) {
    return "NOT_FOUND";
  }
  return "UNREACHABLE";
}

export function describeTransportError(error: unknown): string {
  if (error instanceof HttpError) {
    return `HTTP ${error.status}`;
  }
  if (isAbortError(error)) {
    return "request timed out";
  }
  return error instanceof Error ? error.message : String(error);
}
