export { createCollectorContext } from "./collectorContext";
export type { CollectorContext } from "./collectorContext";
export { runCollectorCycle } from "./collectorCycle";
export { startCollector } from "./collectorScheduler";
export type { CollectorHandle } from "./collectorScheduler";
