/**
 * Configuration type definitions
 */

import type { StatsdAddress } from "./metrics";

/**
 * Raw option values after merging CLI flags over environment variables
 *
 * Numeric options stay strings here; they are parsed (and rejected) by
 * loadConfig() so that parse failures surface as configuration errors.
 */
export type RawOptions = {
  verbose: boolean;
  engineUrl: string;
  connector: string;
  maxPartitions: string;
  interval: string;
  slackUrl: string;
  port: string;
  statsd: string;
  timeout: string;
  reportingUser: string;
};

/**
 * Outcome of parsing argv
 */
export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; options: RawOptions };

export type AppConfig = {
  verbose: boolean;
  engineUrl: string;
  connectorFilter: string;
  threshold: number;
  intervalSeconds: number;
  slackUrl: string;
  healthPort: number;
  statsd: StatsdAddress;
  httpTimeoutMs: number;
  reportingToolUser: string;
  optOutMarker: string;
};
