/**
 * Slack incoming-webhook constants
 */

export const SLACK_USERNAME = "Partition Watch";

/** Attachment colour for offending inputs */
export const SLACK_OFFENDING_INPUT_COLOR = "warning";

/** Attachment colour for reporting-tool metadata */
export const SLACK_REPORTING_TOOL_COLOR = "#439FE0";
