/**
 * Configuration loader - validates raw options into AppConfig
 */

import type { AppConfig, RawOptions } from "@/types";
import { MAX_TIMER_SECONDS, OPT_OUT_MARKER } from "@/constants";
import { parseStatsdAddress } from "@/metrics";
import { ConfigError } from "./configError";

function requireUrl(option: string, value: string): string {
  if (value.trim() === "") {
    throw new ConfigError(option, "is required");
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(option, `"${value}" is not a valid URL`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(option, `"${value}" must use http or https`);
  }
  return value.replace(/\/+$/, "");
}

function parseInteger(
  option: string,
  value: string,
  bounds: { min: number; max?: number },
): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(option, `unable to convert "${value}" to an integer`);
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new ConfigError(option, `"${trimmed}" is too large`);
  }
  if (parsed < bounds.min || (bounds.max !== undefined && parsed > bounds.max)) {
    const range =
      bounds.max !== undefined ? `${bounds.min}..${bounds.max}` : `>= ${bounds.min}`;
    throw new ConfigError(option, `${parsed} is out of range (${range})`);
  }
  return parsed;
}

/**
 * @throws {ConfigError} when a required URL is missing or a value is invalid
 */
export function loadConfig(raw: RawOptions): AppConfig {
  const engineUrl = requireUrl("url", raw.engineUrl);
  const slackUrl = requireUrl("slack", raw.slackUrl);

  const connectorFilter = raw.connector.trim();
  if (connectorFilter === "") {
    throw new ConfigError("connector", "must not be empty");
  }

  const statsd = parseStatsdAddress(raw.statsd);
  if (!statsd) {
    throw new ConfigError("statsd", `"${raw.statsd}" is not a valid host:port`);
  }

  return {
    verbose: raw.verbose,
    engineUrl,
    connectorFilter,
    threshold: parseInteger("maxpart", raw.maxPartitions, { min: 0 }),
    intervalSeconds: parseInteger("interval", raw.interval, {
      min: 1,
      max: MAX_TIMER_SECONDS,
    }),
    slackUrl,
    healthPort: parseInteger("port", raw.port, { min: 0, max: 65_535 }),
    statsd,
    httpTimeoutMs:
      parseInteger("timeout", raw.timeout, { min: 1, max: MAX_TIMER_SECONDS }) *
      1000,
    reportingToolUser: raw.reportingUser,
    optOutMarker: OPT_OUT_MARKER,
  };
}
