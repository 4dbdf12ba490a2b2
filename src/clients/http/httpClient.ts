/**
 * HTTP client wrapper - JSON client over native fetch
 *
 * One attempt per call, bounded by a timeout. Retry policy belongs to the
 * callers: the collector simply tries again on its next tick.
 */

import type { HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Build URL with query parameters
 */
function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.append(key, String(value));
  }
  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(
  response: Response,
): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch (readError) {
    logger.debug("Could not read error response body", {
      url: response.url,
      error: logger.describeError(readError),
    });
    return undefined;
  }
}

function isJsonContentType(contentType: string | null): boolean {
  return (
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"))
  );
}

/**
 * Perform an HTTP request with a timeout
 *
 * Body handling:
 * - 204 → undefined
 * - JSON content type → parsed body, or undefined when it does not parse
 * - anything else → response text
 *
 * Callers validate the returned value; an unparseable body therefore shows up
 * as a shape mismatch rather than an exception here.
 *
 * @template T - Expected response type (unchecked)
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} AbortError on timeout, TypeError on network failure
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };
    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: await extractBodySnippet(response),
      });
    }

    if (response.status === 204) {
      return undefined as T;
    }

    const contentType = response.headers.get("content-type");
    if (!isJsonContentType(contentType)) {
      logger.debug("Non-JSON response received", {
        method: req.method,
        url,
        status: response.status,
        contentType: contentType || "none",
      });
      const text = await response.text();
      return text as unknown as T;
    }

    try {
      const data: unknown = await response.json();
      return data as T;
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        status: response.status,
        error: logger.describeError(parseError),
      });
      return undefined as T;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
