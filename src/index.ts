#!/usr/bin/env tsx
/**
 * Main entry point for the dual maker hedge.
 *
 * Composes all modules:
 * - Config loading (.env + symbols file)
 * - Alerting (Telegram relay)
 * - Hedge legs A and B (GRVT clients, signers, retry policy)
 * - Instrument name resolution
 * - Hedge engine loop and stop cleanup
 */

import "dotenv/config";
import { ConfigError, hasTelegramCredentials, loadConfig, selectHedgeAccounts } from "./config/config";
import { type InstrumentAliasMap, buildInstrumentAliasMap, loadSymbolConfigs } from "./config/symbols";
import { createLogger, type Logger } from "./logging/logger";
import { createFileEventLog, getLogFilePath } from "./logging/fileLogger";
import { AlertService } from "./alerts/alertService";
import { TelegramRelayNotifier } from "./alerts/notifier";
import type { AccountRuntime } from "./execution/accountRuntime";
import { createAccountRuntimes } from "./execution/venueClientFactory";
import { formatApiError } from "./execution/accountRuntime";
import { HedgeEngine } from "./engine/hedgeEngine";

/**
 * Instrument aliases from leg A's exchange; empty when the listing fails,
 * in which case configured names are only case-normalized.
 */
async function loadAliasMap(runtime: AccountRuntime, logger: Logger): Promise<InstrumentAliasMap> {
  const result = await runtime.listInstrumentNames();
  if (!result.ok) {
    logger.warn(`Failed to load instrument list, continuing without aliases: ${formatApiError(result.error)}`);
    return new Map();
  }
  const aliasMap = buildInstrumentAliasMap(result.result);
  logger.info(`Loaded ${result.result.length} instruments for name resolution`);
  return aliasMap;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  logger.info("=== Dual Maker Hedge ===");
  logger.info(`Mode: ${config.dryRun ? "DRY RUN" : "LIVE"}`);
  if (!config.dryRun) {
    logger.warn("!!! LIVE TRADING MODE - Real orders will be placed !!!");
  }

  const eventLog = createFileEventLog();
  logger.info(`Event log: ${getLogFilePath()}`);

  const notifier = new TelegramRelayNotifier(config.telegram);
  if (!hasTelegramCredentials(config)) {
    logger.warn("CHAT_ID or API_KEY missing, alerts will only be logged");
  }
  const alerts = new AlertService({
    notifier,
    logger,
    eventLog,
    digestUtcOffsetHours: config.digestUtcOffsetHours,
  });

  const hedgeAccounts = selectHedgeAccounts(config.accounts);
  const accounts = createAccountRuntimes(hedgeAccounts, {
    alerts,
    logger,
    apiMaxRetries: config.apiMaxRetries,
  });

  const aliasMap = await loadAliasMap(accounts.A, logger);
  const symbols = loadSymbolConfigs(config.symbolsFile, aliasMap, logger);
  const enabled = symbols.filter((s) => s.enabled);
  if (enabled.length === 0) {
    logger.warn(`No enabled symbols in ${config.symbolsFile}`);
  }

  const engine = new HedgeEngine({
    settings: config,
    accounts,
    symbols,
    alerts,
    logger,
    eventLog,
  });

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, stopping hedge engine...`);
    engine.stop();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  await engine.run();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`Config error: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
