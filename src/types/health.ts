/**
 * Health reporter types
 */

export type HealthReport = {
  healthy: boolean;
  /** Whole seconds since the last successful poll */
  secondsSinceLastPoll: number;
  /** Human-readable diagnostic body */
  body: string;
};
