/**
 * Alert payload types
 */

import type { EngineQuery } from "./query";
import type { OffendingInput } from "./classification";

/**
 * Everything an alert sink needs to describe one offending query
 */
export type PartitionAlert = {
  query: EngineQuery;
  offending: OffendingInput[];
  totalPartitions: number;
};

/**
 * Metadata a reporting tool appends to the queries it submits
 *
 * Carried as JSON in a trailing `--` comment line.
 */
export type ReportingToolInfo = {
  user: string;
  url: string;
  scheduled: boolean;
};

export type SlackField = {
  title: string;
  value: string;
  short?: boolean;
};

export type SlackAttachment = {
  color: string;
  fields: SlackField[];
};

/**
 * Incoming-webhook message body
 */
export type SlackPayload = {
  username: string;
  text: string;
  attachments: SlackAttachment[];
};

export interface SlackAlertSinkConfig {
  webhookUrl: string;
  /** Used to build links to the engine's query page */
  engineUrl: string;
  /** Session user of the reporting tool whose metadata comment is decoded */
  reportingToolUser: string;
  optOutMarker: string;
  timeoutMs: number;
}
