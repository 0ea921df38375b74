/**
 * Maintenance-margin monitor.
 *
 * Alerts when an account's maintenance margin uses too much of its equity.
 */

import type Decimal from "decimal.js";
import type { AccountSummary } from "../exchange/types";
import type { AlertService } from "../alerts/alertService";
import { ALERT_COOLDOWNS } from "../config/hedgeParams";

/**
 * maintenanceMargin / equity, or null when equity is not positive.
 */
export function marginRatio(summary: AccountSummary): Decimal | null {
  if (summary.equity.lte(0)) return null;
  return summary.maintenanceMargin.div(summary.equity);
}

function percent(value: Decimal): string {
  return `${value.mul(100).toFixed(2)}%`;
}

/**
 * Raise an MMR alert for `accountName` when the ratio reaches `threshold`.
 *
 * @returns true if the ratio is at or above the threshold
 */
export function checkMarginRatio(
  alerts: AlertService,
  accountName: string,
  summary: AccountSummary | null,
  threshold: Decimal
): boolean {
  if (!summary) return false;
  const ratio = marginRatio(summary);
  if (ratio === null || ratio.lt(threshold)) return false;

  alerts.notify(
    `GRVT ${accountName} MMR ALERT ${percent(ratio)}`,
    `maintenance_margin=${summary.maintenanceMargin.toFixed()} equity=${summary.equity.toFixed()} threshold=${percent(threshold)}`,
    `mmr:${accountName}`,
    ALERT_COOLDOWNS.margin
  );
  return true;
}
