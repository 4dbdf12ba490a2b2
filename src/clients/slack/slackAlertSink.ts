/**
 * SlackAlertSink - delivers partition alerts to a Slack incoming webhook
 */

import type { AlertSink } from "@/interfaces";
import type { HttpRequestFn, PartitionAlert, SlackAlertSinkConfig } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { buildSlackPayload } from "./slackMessage";
import * as logger from "@/logger";

export interface SlackAlertSinkOptions extends SlackAlertSinkConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class SlackAlertSink implements AlertSink {
  private readonly config: SlackAlertSinkConfig;
  private readonly httpRequest: HttpRequestFn;

  constructor(options: SlackAlertSinkOptions) {
    const { httpRequest, ...config } = options;
    this.config = config;
    this.httpRequest = httpRequest ?? defaultHttpRequest;
  }

  /**
   * POST the alert once. Webhook posts are not idempotent, so failures are
   * thrown to the caller rather than retried.
   */
  async sendAlert(alert: PartitionAlert): Promise<void> {
    const payload = buildSlackPayload(alert, {
      engineUrl: this.config.engineUrl,
      reportingToolUser: this.config.reportingToolUser,
      optOutMarker: this.config.optOutMarker,
    });

    await this.httpRequest<unknown>({
      method: "POST",
      url: this.config.webhookUrl,
      json: payload,
      timeoutMs: this.config.timeoutMs,
    });

    logger.debug("Slack alert delivered", {
      queryId: alert.query.queryId,
      attachments: payload.attachments.length,
    });
  }
}
