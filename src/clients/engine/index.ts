/**
 * Engine client public API
 */

export { EngineQueryClient } from "./engineQueryClient";
export type { EngineQueryClientConfig } from "./engineQueryClient";
export { EngineError } from "./engineError";
export { decodeQueryDetail, decodeQueryOverview } from "./mappers";
