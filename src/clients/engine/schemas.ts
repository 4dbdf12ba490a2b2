/**
 * Engine REST payload schemas
 *
 * The same record shape is served by the overview endpoint (inputs usually
 * absent) and by the detail endpoint (inputs present). Unknown fields are
 * dropped; fields the engine may omit are nullish.
 */

import { z } from "zod";

export const connectorInfoSchema = z.object({
  partitionIds: z.array(z.string()).nullish(),
  truncated: z.boolean().nullish(),
});

export const queryInputSchema = z.object({
  connectorId: z.string(),
  schema: z.string(),
  table: z.string(),
  // Non-partitioned connectors report no connector info at all
  connectorInfo: connectorInfoSchema.nullish(),
});

export const engineQuerySchema = z.object({
  queryId: z.string().min(1),
  state: z.string(),
  query: z.string().nullish(),
  session: z
    .object({
      user: z.string().nullish(),
    })
    .nullish(),
  inputs: z.array(queryInputSchema).nullish(),
});

export const queryOverviewSchema = z.array(engineQuerySchema);

export type RawConnectorInfo = z.infer<typeof connectorInfoSchema>;
export type RawQueryInput = z.infer<typeof queryInputSchema>;
export type RawEngineQuery = z.infer<typeof engineQuerySchema>;
