/**
 * Slack alert sink public API
 */

export { SlackAlertSink } from "./slackAlertSink";
export type { SlackAlertSinkOptions } from "./slackAlertSink";
export { buildSlackPayload, queryUiUrl } from "./slackMessage";
