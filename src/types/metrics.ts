/**
 * Metrics sink types
 */

export type MetricTags = Record<string, string>;

export interface StatsdAddress {
  host: string;
  port: number;
}
