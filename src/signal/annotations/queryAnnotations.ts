/**
 * Query text annotations - conventions carried inside SQL comments
 *
 * Two conventions are recognised:
 *
 * 1. Opt-out: the literal marker (e.g. `partition-watch:off`) anywhere in the
 *    query text, usually written as `-- partition-watch:off`.
 *
 * 2. Reporting-tool metadata: reporting tools append a final comment line
 *    holding a JSON object, e.g.
 *
 *      SELECT ...
 *      -- {"user":"@analyst","url":"https://reports.example/r/1","scheduled":true}
 *
 *    Only the last non-empty line is inspected. Anything that is not a `--`
 *    comment with a JSON object carrying user/url/scheduled yields undefined.
 */

import { z } from "zod";
import type { ReportingToolInfo } from "@/types";
import * as logger from "@/logger";

const SQL_LINE_COMMENT = /^--+\s*/;

const reportingToolInfoSchema = z.object({
  user: z.string(),
  url: z.string(),
  scheduled: z.boolean(),
});

export function hasOptOutMarker(queryText: string, marker: string): boolean {
  return marker.length > 0 && queryText.includes(marker);
}

/**
 * Return the last non-empty line of the text, trimmed
 */
function lastNonEmptyLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (line.length > 0) {
      return line;
    }
  }
  return undefined;
}

export function parseReportingToolInfo(
  queryText: string,
): ReportingToolInfo | undefined {
  const line = lastNonEmptyLine(queryText);
  if (!line || !SQL_LINE_COMMENT.test(line)) {
    return undefined;
  }

  const body = line.replace(SQL_LINE_COMMENT, "");
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (parseError) {
    logger.debug("Trailing comment is not JSON, ignoring", {
      error: logger.describeError(parseError),
    });
    return undefined;
  }

  const parsed = reportingToolInfoSchema.safeParse(decoded);
  return parsed.success ? parsed.data : undefined;
}
