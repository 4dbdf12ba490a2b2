/**
 * MetricsSink interface - fire-and-forget counters
 */

import type { MetricTags } from "@/types";

export interface MetricsSink {
  increment(name: string, value: number, tags: MetricTags): void;
}
