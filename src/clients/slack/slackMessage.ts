/**
 * Slack message builder - renders a PartitionAlert as a webhook payload
 */

import type {
  OffendingInput,
  PartitionAlert,
  ReportingToolInfo,
  SlackAttachment,
  SlackPayload,
} from "@/types";
import {
  ENGINE_QUERY_UI_PATH,
  SLACK_OFFENDING_INPUT_COLOR,
  SLACK_REPORTING_TOOL_COLOR,
  SLACK_USERNAME,
} from "@/constants";
import { parseReportingToolInfo } from "@/signal";

export type SlackMessageOptions = {
  engineUrl: string;
  reportingToolUser: string;
  optOutMarker: string;
};

export function queryUiUrl(engineUrl: string, queryId: string): string {
  return `${engineUrl.replace(/\/+$/, "")}${ENGINE_QUERY_UI_PATH}?${encodeURIComponent(queryId)}`;
}

function formatCount(count: number, truncated: boolean): string {
  return truncated ? `${count}+` : String(count);
}

function offendingInputAttachment(offending: OffendingInput): SlackAttachment {
  return {
    color: SLACK_OFFENDING_INPUT_COLOR,
    fields: [
      { title: "Table", value: offending.table, short: true },
      {
        title: "Partitions",
        value: formatCount(offending.partitionCount, offending.truncated),
        short: true,
      },
    ],
  };
}

function reportingToolAttachment(info: ReportingToolInfo): SlackAttachment {
  return {
    color: SLACK_REPORTING_TOOL_COLOR,
    fields: [
      { title: "Report user", value: info.user, short: true },
      { title: "Scheduled?", value: String(info.scheduled), short: true },
      { title: "URL", value: info.url },
    ],
  };
}

export function buildSlackPayload(
  alert: PartitionAlert,
  options: SlackMessageOptions,
): SlackPayload {
  const { query } = alert;
  const anyTruncated = alert.offending.some((o) => o.truncated);
  const total = formatCount(alert.totalPartitions, anyTruncated);
  const link = `<${queryUiUrl(options.engineUrl, query.queryId)}|${query.queryId}>`;

  const text =
    `:rotating_light: Query ${link} by \`${query.user || "unknown"}\` is scanning more than *${total}* partitions in total!\n` +
    "Make sure the query filters on the table's partition column.\n\n" +
    `*To disable this alert for your query*, add \`-- ${options.optOutMarker}\` anywhere in the query.`;

  const attachments = alert.offending.map(offendingInputAttachment);

  if (query.user === options.reportingToolUser) {
    const info = parseReportingToolInfo(query.query);
    if (info) {
      attachments.push(reportingToolAttachment(info));
    }
  }

  return { username: SLACK_USERNAME, text, attachments };
}
