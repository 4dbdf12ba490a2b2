/**
 * StatsdMetricsSink - MetricsSink over a DogStatsD (UDP) client
 */

import StatsD, { type StatsD as StatsDClient } from "hot-shots";
import type { MetricsSink } from "@/interfaces";
import type { MetricTags, StatsdAddress } from "@/types";
import { DEFAULT_STATSD_HOST, DEFAULT_STATSD_PORT } from "@/constants";
import * as logger from "@/logger";

/**
 * Parse "host[:port]" into a StatsD address
 *
 * @returns undefined when the port part is not a valid port number
 */
export function parseStatsdAddress(address: string): StatsdAddress | undefined {
  const trimmed = address.trim();
  if (trimmed.length === 0) {
    return { host: DEFAULT_STATSD_HOST, port: DEFAULT_STATSD_PORT };
  }

  const separator = trimmed.lastIndexOf(":");
  if (separator === -1) {
    return { host: trimmed, port: DEFAULT_STATSD_PORT };
  }

  const host = trimmed.slice(0, separator) || DEFAULT_STATSD_HOST;
  const portText = trimmed.slice(separator + 1);
  if (!/^\d+$/.test(portText)) {
    return undefined;
  }
  const port = Number(portText);
  if (port < 1 || port > 65_535) {
    return undefined;
  }
  return { host, port };
}

export class StatsdMetricsSink implements MetricsSink {
  private readonly client: StatsDClient;

  /**
   * @param target - address to send to, or a ready client (tests pass one in mock mode)
   */
  constructor(target: StatsdAddress | StatsDClient) {
    this.client =
      target instanceof StatsD
        ? target
        : new StatsD({
            host: target.host,
            port: target.port,
            errorHandler: (err) =>
              logger.warn("StatsD send failed", {
                host: target.host,
                port: target.port,
                error: logger.describeError(err),
              }),
          });
  }

  increment(name: string, value: number, tags: MetricTags): void {
    this.client.increment(name, value, tags);
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.client.close((err) => {
        if (err) {
          logger.warn("StatsD client did not close cleanly", {
            error: logger.describeError(err),
          });
        }
        resolve();
      });
    });
  }
}
