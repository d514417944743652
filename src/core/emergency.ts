/**
 * Emergency Stop
 *
 * Checked after every resolved strike and every execution failure:
 * - PEAK_FLOOR:          capital below 85% of peak (fixed)
 * - MAX_DRAWDOWN:        capital below the configured drawdown from peak
 * - CONSECUTIVE_MISSES:  too many losing strikes in a row
 * - EXECUTION_FAILURES:  too many aborted strikes in a row
 *
 * A halt never flattens open positions.
 */

import type { CampaignSnapshot } from "./campaign-state";

export type EmergencyReason =
  | "PEAK_FLOOR"
  | "MAX_DRAWDOWN"
  | "CONSECUTIVE_MISSES"
  | "EXECUTION_FAILURES";

export interface EmergencyStop {
  reason: EmergencyReason;
  detail: string;
}

export const PEAK_FLOOR_PCT = 85;

export function checkEmergencyStop(snapshot: CampaignSnapshot): EmergencyStop | null {
  const { capitalCents: capital, peakCapitalCents: peak, limits } = snapshot;

  // Integer comparison: capital < peak × 85%
  if (capital * 100 < peak * PEAK_FLOOR_PCT) {
    return {
      reason: "PEAK_FLOOR",
      detail: `Capital dropped more than ${100 - PEAK_FLOOR_PCT}% from peak`,
    };
  }

  if (limits.maxDrawdownPct > 0) {
    const threshold = Math.floor(peak * (1 - limits.maxDrawdownPct / 100));
    if (capital < threshold) {
      return {
        reason: "MAX_DRAWDOWN",
        detail: `Configured drawdown hit: ${limits.maxDrawdownPct.toFixed(2)}%`,
      };
    }
  }

  if (snapshot.consecutiveMisses >= limits.maxConsecutiveMisses) {
    return {
      reason: "CONSECUTIVE_MISSES",
      detail: `Too many consecutive misses: ${snapshot.consecutiveMisses}`,
    };
  }

  if (
    limits.maxConsecutiveFailures > 0 &&
    snapshot.consecutiveFailures >= limits.maxConsecutiveFailures
  ) {
    return {
      reason: "EXECUTION_FAILURES",
      detail: `Too many consecutive execution failures: ${snapshot.consecutiveFailures}`,
    };
  }

  return null;
}
