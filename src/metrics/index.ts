export { StatsdMetricsSink, parseStatsdAddress } from "./statsdMetricsSink";
