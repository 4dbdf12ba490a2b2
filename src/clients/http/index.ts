/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError, isAbortError } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRequestFn,
} from "@/types";
