export * from "./logger";
export * from "./config";
export * from "./dedup";
export * from "./collector";
export * from "./metrics";
export * from "./clients/http";
export * from "./clients/engine";
export * from "./clients/slack";
