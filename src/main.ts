/**
 * partition-watch entrypoint
 *
 * Polls the query engine for running queries and alerts Slack about queries
 * that scan more partitions than allowed, while serving a liveness probe.
 *
 * Usage:
 *   npm start -- --url http://presto:8080 --slack https://hooks.slack.com/services/...
 *   ENGINE_URL=... SLACK_URL=... npm start
 *
 * Options may also be set in a .env file (see `--help` for the full list).
 *
 * Exit codes: 0 after --help, 1 on bad arguments or invalid configuration,
 * 10 after --version.
 */

import "dotenv/config";
import { hostname } from "os";
import type { AppConfig } from "@/types";
import { APP_NAME, APP_VERSION, EXIT_CODES } from "@/constants";
import { resolveStartup } from "@/config";
import { EngineQueryClient } from "@/clients/engine";
import { SlackAlertSink } from "@/clients/slack";
import { StatsdMetricsSink } from "@/metrics";
import { createQueryDedupCache } from "@/dedup";
import { createCollectorContext, startCollector } from "@/orchestration";
import { createHealthApp, listenHealthServer, closeHealthServer } from "@/health";
import * as logger from "@/logger";

async function run(config: AppConfig): Promise<void> {
  if (config.verbose) {
    logger.setLogLevel("debug");
  }

  logger.debug("Configuration loaded", {
    ...config,
    slackUrl: "(redacted)",
  });
  logger.info(`Starting ${APP_NAME}`, {
    version: APP_VERSION,
    host: hostname(),
  });

  const metrics = new StatsdMetricsSink(config.statsd);

  const ctx = createCollectorContext({
    settings: {
      connectorFilter: config.connectorFilter,
      threshold: config.threshold,
      optOutMarker: config.optOutMarker,
      intervalSeconds: config.intervalSeconds,
    },
    source: new EngineQueryClient({
      baseUrl: config.engineUrl,
      timeoutMs: config.httpTimeoutMs,
    }),
    alertSink: new SlackAlertSink({
      webhookUrl: config.slackUrl,
      engineUrl: config.engineUrl,
      reportingToolUser: config.reportingToolUser,
      optOutMarker: config.optOutMarker,
      timeoutMs: config.httpTimeoutMs,
    }),
    metrics,
    cache: createQueryDedupCache(),
  });

  const server = await listenHealthServer(createHealthApp(ctx), config.healthPort);
  const collector = startCollector(ctx);

  let shutdownRequested = false;

  const handleShutdown = (signal: string): void => {
    if (shutdownRequested) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(EXIT_CODES.FATAL);
    }
    shutdownRequested = true;
    logger.info("Shutdown signal received, finishing current cycle", { signal });

    collector
      .stop()
      .then(() => closeHealthServer(server))
      .then(() => metrics.close())
      .then(() => {
        logger.info("Shutdown complete");
        process.exit(EXIT_CODES.OK);
      })
      .catch((error: unknown) => {
        logger.error("Shutdown failed", { error: logger.describeError(error) });
        process.exit(EXIT_CODES.FATAL);
      });
  };

  process.on("SIGINT", () => handleShutdown("SIGINT"));
  process.on("SIGTERM", () => handleShutdown("SIGTERM"));

  logger.info("Running, collecting queries from engine", {
    engineUrl: config.engineUrl,
    healthPort: config.healthPort,
  });
}

const decision = resolveStartup(process.argv.slice(2), process.env);

if (decision.kind === "exit") {
  if (decision.stdout) {
    process.stdout.write(decision.stdout);
  }
  if (decision.stderr) {
    process.stderr.write(decision.stderr);
  }
  if (decision.fatal) {
    logger.error("Invalid configuration", {
      option: decision.fatal.option,
      error: decision.fatal.message,
    });
  }
  process.exit(decision.code);
} else {
  run(decision.config).catch((error: unknown) => {
    logger.error("Fatal error", {
      error: logger.describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(EXIT_CODES.FATAL);
  });
}
