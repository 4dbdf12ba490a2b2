/**
 * AlertSink interface - where offending-query alerts are delivered
 */

import type { PartitionAlert } from "@/types";

export interface AlertSink {
  /**
   * Deliver one alert. Rejects when delivery fails; the caller decides
   * what that means (the collector only logs it).
   */
  sendAlert(alert: PartitionAlert): Promise<void>;
}
