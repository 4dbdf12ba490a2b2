/**
 * Application identity, configuration defaults and exit codes
 */

export const APP_NAME = "partition-watch";
export const APP_VERSION = "0.1.0";

export const DEFAULT_CONNECTOR = "hive";
export const DEFAULT_MAX_PARTITIONS = "30";
export const DEFAULT_UPDATE_INTERVAL_SECONDS = "20";
export const DEFAULT_HEALTH_PORT = "8080";
export const DEFAULT_STATSD_ADDRESS = "127.0.0.1:8125";
export const DEFAULT_HTTP_TIMEOUT_SECONDS = "10";
export const DEFAULT_REPORTING_TOOL_USER = "mode";

/**
 * Longest delay Node timers accept, in whole seconds; larger delays fire after 1 ms
 */
export const MAX_TIMER_SECONDS = Math.floor(2_147_483_647 / 1000);

/**
 * Token that disables checking for a query when present anywhere in its text
 */
export const OPT_OUT_MARKER = "partition-watch:off";

/**
 * Environment variables backing each option
 */
export const ENV_VARS = {
  engineUrl: "ENGINE_URL",
  connector: "ENGINE_CONNECTOR",
  maxPartitions: "MAX_PARTITIONS",
  interval: "UPDATE_INTERVAL",
  slackUrl: "SLACK_URL",
  port: "PORT",
  statsd: "STATSD_HOST",
  timeout: "HTTP_TIMEOUT",
  reportingUser: "REPORTING_TOOL_USER",
} as const;

/**
 * Older variable names, read when the current one is unset or empty
 */
export const LEGACY_ENV_VARS = {
  engineUrl: "PRESTO_URL",
  connector: "PRESTO_CONNECTOR",
} as const;

export const EXIT_CODES = {
  OK: 0,
  USAGE: 1,
  FATAL: 1,
  VERSION: 10,
} as const;
