export * from "./logger";
export * from "./query";
export * from "./classification";
export * from "./dedup";
export * from "./alert";
export * from "./metrics";
export * from "./collector";
export * from "./health";
export * from "./config";
export * from "./clients/http";
export * from "./clients/engine";
