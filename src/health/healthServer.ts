/**
 * Health HTTP server - answers liveness probes on GET /
 *
 * 200 while polling is fresh, 500 once it goes stale; the body always
 * carries the seconds since the last successful poll.
 */

import express, { type Express, type Request, type Response } from "express";
import type { Server } from "http";
import type { CollectorContext } from "@/orchestration";
import { HEALTH_STATUS_OK, HEALTH_STATUS_STALE } from "@/constants";
import { evaluateHealth } from "./healthReporter";
import * as logger from "@/logger";

export function createHealthApp(
  ctx: Pick<CollectorContext, "health" | "settings" | "now">,
): Express {
  const app = express();
  app.disable("x-powered-by");

  app.get("/", (_req: Request, res: Response) => {
    const report = evaluateHealth(
      ctx.health,
      ctx.settings.intervalSeconds,
      ctx.now(),
    );
    logger.debug("Received health check", {
      healthy: report.healthy,
      secondsSinceLastPoll: report.secondsSinceLastPoll,
    });
    res
      .status(report.healthy ? HEALTH_STATUS_OK : HEALTH_STATUS_STALE)
      .type("text/plain")
      .send(report.body);
  });

  return app;
}

/**
 * Listen on the given port (0 picks a free one); resolves once bound
 */
export function listenHealthServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("listening", () => {
      logger.info("Health check server listening", { port: boundPort(server) });
      resolve(server);
    });
    server.once("error", reject);
  });
}

export function boundPort(server: Server): number | undefined {
  const address = server.address();
  return typeof address === "object" && address !== null
    ? address.port
    : undefined;
}

export function closeHealthServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
