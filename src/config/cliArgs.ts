/**
 * Command-line parsing
 *
 * Every option can also come from an environment variable; a flag given on
 * the command line wins over the environment, which wins over the default.
 * PRESTO_URL and PRESTO_CONNECTOR are still read when the current names are
 * unset.
 */

import { parseArgs } from "util";
import type { CliCommand, RawOptions } from "@/types";
import {
  APP_NAME,
  DEFAULT_CONNECTOR,
  DEFAULT_HEALTH_PORT,
  DEFAULT_HTTP_TIMEOUT_SECONDS,
  DEFAULT_MAX_PARTITIONS,
  DEFAULT_REPORTING_TOOL_USER,
  DEFAULT_STATSD_ADDRESS,
  DEFAULT_UPDATE_INTERVAL_SECONDS,
  ENV_VARS,
  LEGACY_ENV_VARS,
} from "@/constants";
import { CliUsageError } from "./configError";

type Env = Record<string, string | undefined>;

const OPTIONS = {
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "V" },
  verbose: { type: "boolean", short: "v" },
  url: { type: "string", short: "u" },
  connector: { type: "string", short: "c" },
  maxpart: { type: "string", short: "m" },
  interval: { type: "string", short: "i" },
  slack: { type: "string", short: "s" },
  port: { type: "string", short: "p" },
  statsd: { type: "string" },
  timeout: { type: "string", short: "t" },
  "reporting-user": { type: "string" },
} as const;

export const USAGE = `Usage: ${APP_NAME} [options]

Polls the query engine for running queries and alerts Slack when one scans
more partitions than allowed.

Options:
  -u, --url <url>           engine URL incl. scheme and port     [${ENV_VARS.engineUrl}]
  -c, --connector <name>    connector whose inputs are checked   [${ENV_VARS.connector}] (default: ${DEFAULT_CONNECTOR})
  -m, --maxpart <n>         alert above this many partitions     [${ENV_VARS.maxPartitions}] (default: ${DEFAULT_MAX_PARTITIONS})
  -i, --interval <seconds>  poll interval                        [${ENV_VARS.interval}] (default: ${DEFAULT_UPDATE_INTERVAL_SECONDS})
  -s, --slack <url>         Slack incoming webhook URL           [${ENV_VARS.slackUrl}]
  -p, --port <port>         health check HTTP port               [${ENV_VARS.port}] (default: ${DEFAULT_HEALTH_PORT})
      --statsd <host:port>  StatsD address                       [${ENV_VARS.statsd}] (default: ${DEFAULT_STATSD_ADDRESS})
  -t, --timeout <seconds>   outbound HTTP timeout                [${ENV_VARS.timeout}] (default: ${DEFAULT_HTTP_TIMEOUT_SECONDS})
      --reporting-user <u>  session user of the reporting tool   [${ENV_VARS.reportingUser}] (default: ${DEFAULT_REPORTING_TOOL_USER})
  -v, --verbose             enable debug logging
  -V, --version             print version and exit
  -h, --help                show this help
`;

/**
 * First non-empty value among the named variables
 */
function fromEnv(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
}

function pick(flag: string | undefined, envValue: string | undefined, fallback: string): string {
  return flag ?? envValue ?? fallback;
}

function parseArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: OPTIONS,
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new CliUsageError(
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }
}

/**
 * @throws {CliUsageError} on unknown flags, missing values or positionals
 */
export function parseCliArgs(argv: string[], env: Env): CliCommand {
  const values = parseArgv(argv);

  if (values.help) {
    return { kind: "help" };
  }
  if (values.version) {
    return { kind: "version" };
  }

  const options: RawOptions = {
    verbose: values.verbose ?? false,
    engineUrl: pick(
      values.url,
      fromEnv(env, ENV_VARS.engineUrl, LEGACY_ENV_VARS.engineUrl),
      "",
    ),
    connector: pick(
      values.connector,
      fromEnv(env, ENV_VARS.connector, LEGACY_ENV_VARS.connector),
      DEFAULT_CONNECTOR,
    ),
    maxPartitions: pick(
      values.maxpart,
      fromEnv(env, ENV_VARS.maxPartitions),
      DEFAULT_MAX_PARTITIONS,
    ),
    interval: pick(
      values.interval,
      fromEnv(env, ENV_VARS.interval),
      DEFAULT_UPDATE_INTERVAL_SECONDS,
    ),
    slackUrl: pick(values.slack, fromEnv(env, ENV_VARS.slackUrl), ""),
    port: pick(values.port, fromEnv(env, ENV_VARS.port), DEFAULT_HEALTH_PORT),
    statsd: pick(values.statsd, fromEnv(env, ENV_VARS.statsd), DEFAULT_STATSD_ADDRESS),
    timeout: pick(
      values.timeout,
      fromEnv(env, ENV_VARS.timeout),
      DEFAULT_HTTP_TIMEOUT_SECONDS,
    ),
    reportingUser: pick(
      values["reporting-user"],
      fromEnv(env, ENV_VARS.reportingUser),
      DEFAULT_REPORTING_TOOL_USER,
    ),
  };

  return { kind: "run", options };
}
