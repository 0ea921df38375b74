#!/usr/bin/env tsx
/**
 * Print positions, open orders and margin of both hedge legs.
 */

import "dotenv/config";
import { loadConfig, selectHedgeAccounts } from "../src/config/config";
import { AlertService } from "../src/alerts/alertService";
import { silentLogger } from "../src/logging/logger";
import { createAccountRuntimes } from "../src/execution/venueClientFactory";
import { marginRatio } from "../src/risk/marginMonitor";
import { isStrategyOrder } from "../src/state/orderIds";
import { ACCOUNT_LABELS } from "../src/strategy/types";

function log(message: string, data?: unknown) {
  const timestamp = new Date().toISOString();
  console.log(`[${timestamp}] ${message}`);
  if (data !== undefined) {
    console.log(JSON.stringify(data, null, 2));
  }
}

async function main() {
  log("=== Check Positions ===\n");

  const config = loadConfig();
  const alerts = new AlertService({
    // Query failures are printed below instead
    notifier: { send: async () => {} },
    logger: silentLogger,
  });
  const accounts = createAccountRuntimes(selectHedgeAccounts(config.accounts), {
    alerts,
    logger: silentLogger,
    apiMaxRetries: config.apiMaxRetries,
  });

  for (const label of ACCOUNT_LABELS) {
    const runtime = accounts[label];
    log(`\n--- ${label}: ${runtime.name} (${runtime.config.env}) ---`);

    const summary = await runtime.queryAccountSummary();
    if (summary) {
      const ratio = marginRatio(summary);
      log("Account:", {
        equity: summary.equity.toFixed(2),
        available: summary.availableBalance.toFixed(2),
        maintenanceMargin: summary.maintenanceMargin.toFixed(2),
        mmr: ratio ? `${ratio.mul(100).toFixed(2)}%` : "n/a",
      });
    } else {
      log("Account summary unavailable");
    }

    const positions = await runtime.queryPositions();
    if (!positions) {
      log("Positions unavailable");
    } else if (positions.size === 0) {
      log("No positions");
    }
    for (const [instrument, pos] of positions ?? []) {
      log(
        `${instrument} size=${pos.size.toFixed()} entry=${pos.entryPrice.toFixed()} ` +
          `mark=${pos.markPrice.toFixed()} notional=${pos.signedNotional.toFixed(2)}`
      );
    }

    const openOrders = await runtime.queryOpenOrders();
    if (openOrders.size === 0) {
      log("No open orders");
    }
    for (const [instrument, orders] of openOrders) {
      for (const order of orders) {
        const owner = isStrategyOrder(order.clientOrderId) ? "strategy" : "foreign";
        log(
          `${instrument} ${order.side} ${order.size.toFixed()} @ ${order.limitPrice.toFixed()} ` +
            `traded=${order.tradedSize.toFixed()} status=${order.status} [${owner}] id=${order.orderId}`
        );
      }
    }
  }
}

main().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
