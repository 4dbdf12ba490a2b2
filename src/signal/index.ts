export { classifyQuery, tableIdentity } from "./partitions/partitionClassifier";
export {
  hasOptOutMarker,
  parseReportingToolInfo,
} from "./annotations/queryAnnotations";
