/**
 * Configuration module for the hedge engine.
 *
 * Loads configuration from environment variables (dotenv is loaded by the
 * entry point before this runs).
 */

import Decimal from "decimal.js";
import { HEDGE_DEFAULTS } from "./hedgeParams";
import { type LogLevel, isLogLevel } from "../logging/logger";
import { type GrvtEnv, isGrvtEnv } from "../venues/grvt/types";
import { toDecimal } from "../utils/decimal";

/**
 * Raised for configuration problems that must abort startup.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Credentials and environment of one GRVT trading sub-account.
 */
export interface AccountConfig {
  /** Display name (e.g., "Trading_1a2b") */
  name: string;
  apiKey: string;
  /** Trading sub-account id */
  accountId: string;
  /** Signing key (0x-prefixed hex) */
  privateKey?: string;
  env: GrvtEnv;
}

export interface TelegramRelayConfig {
  url?: string;
  chatId?: string;
  apiKey?: string;
}

export interface Config {
  /** All trading accounts found in the environment, in index order */
  accounts: AccountConfig[];
  /** Path of the per-symbol JSON configuration */
  symbolsFile: string;
  loopIntervalMs: number;
  postOnlyMaxRetry: number;
  postOnlyCooldownMs: number;
  partialFillTimeoutMs: number;
  stuckHours: number;
  /** Maintenance margin / equity ratio that raises an alert */
  mmrAlertThreshold: Decimal;
  orderbookDepth: number;
  /** Below this leg difference each account keeps a single order */
  singleOrderDiffThreshold: Decimal;
  cancelOnStop: boolean;
  /** Newest strategy orders per symbol left resting on stop */
  stopKeepStrategyOrders: number;
  /** 0 disables the runtime limit */
  maxRuntimeMs: number;
  /** Retries for rate-limit / network errors per exchange call */
  apiMaxRetries: number;
  digestUtcOffsetHours: number;
  logLevel: LogLevel;
  /** Log orders instead of submitting them */
  dryRun: boolean;
  telegram: TelegramRelayConfig;
}

type Env = Record<string, string | undefined>;

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return !["0", "false", "no"].includes(value.trim().toLowerCase());
}

function parseEnvName(value: string | undefined, fallback: GrvtEnv): GrvtEnv {
  const raw = (value || "").trim().toLowerCase();
  if (!raw) return fallback;
  if (!isGrvtEnv(raw)) {
    throw new ConfigError(`Unsupported env ${value}`);
  }
  return raw;
}

/**
 * Scan GRVT_TRADING_*_n variables for n = 1, 2, ... until an index has
 * neither an API key nor an account id. Indexes with only one of the two
 * are skipped. Falls back to the legacy single-account variables.
 */
export function loadTradingAccounts(env: Env = process.env): AccountConfig[] {
  const defaultEnv = parseEnvName(env.GRVT_ENV, "prod");
  const accounts: AccountConfig[] = [];

  for (let index = 1; ; index++) {
    const apiKey = env[`GRVT_TRADING_API_KEY_${index}`];
    const accountId = env[`GRVT_TRADING_ACCOUNT_ID_${index}`];
    if (!apiKey && !accountId) break;
    if (!apiKey || !accountId) continue;

    const suffix = accountId.length > 4 ? accountId.slice(-4) : String(index);
    accounts.push({
      name: `Trading_${suffix}`,
      apiKey,
      accountId,
      privateKey: env[`GRVT_TRADING_PRIVATE_KEY_${index}`] || undefined,
      env: parseEnvName(env[`GRVT_ENV_${index}`], defaultEnv),
    });
  }

  if (accounts.length === 0 && env.GRVT_API_KEY && env.GRVT_TRADING_ACCOUNT_ID) {
    accounts.push({
      name: "Trading_legacy",
      apiKey: env.GRVT_API_KEY,
      accountId: env.GRVT_TRADING_ACCOUNT_ID,
      privateKey: env.GRVT_PRIVATE_KEY || undefined,
      env: defaultEnv,
    });
  }

  return accounts;
}

/**
 * Pick the two hedge legs: the first two accounts, each with a signing key.
 */
export function selectHedgeAccounts(
  accounts: AccountConfig[]
): [AccountConfig & { privateKey: string }, AccountConfig & { privateKey: string }] {
  if (accounts.length < 2) {
    throw new ConfigError("Dual maker hedge requires at least 2 trading accounts");
  }
  const [first, second] = accounts;
  return [requireKey(first), requireKey(second)];
}

function requireKey(account: AccountConfig): AccountConfig & { privateKey: string } {
  if (!account.privateKey) {
    throw new ConfigError(`Trading account ${account.name} missing private key`);
  }
  return { ...account, privateKey: account.privateKey };
}

/**
 * Load configuration from environment variables.
 *
 * Tunables (defaults in HEDGE_DEFAULTS):
 * - GRVT_HEDGE_LOOP_INTERVAL_SEC, GRVT_HEDGE_POST_ONLY_MAX_RETRY,
 *   GRVT_HEDGE_POST_ONLY_COOLDOWN_SEC, GRVT_HEDGE_PARTIAL_FILL_TIMEOUT_SEC,
 *   GRVT_HEDGE_STUCK_HOURS, GRVT_HEDGE_MMR_ALERT_THRESHOLD,
 *   GRVT_HEDGE_ORDERBOOK_DEPTH, GRVT_HEDGE_SINGLE_ORDER_DIFF_THRESHOLD_USDT,
 *   GRVT_HEDGE_CANCEL_ON_STOP, GRVT_HEDGE_STOP_KEEP_STRATEGY_ORDERS,
 *   GRVT_HEDGE_MAX_RUNTIME_SEC, GRVT_HEDGE_API_MAX_RETRIES,
 *   GRVT_HEDGE_DIGEST_UTC_OFFSET_HOURS, GRVT_HEDGE_SYMBOLS_FILE
 * - GRVT_LOG_LEVEL: debug | info | warn | error (default: info)
 * - GRVT_HEDGE_DRY_RUN: log orders instead of submitting (default: false)
 *
 * Notifications:
 * - CHAT_ID, API_KEY: Telegram relay target and key
 * - TELEGRAM_RELAY_URL: relay endpoint (default: http://localhost:3000/send-message)
 */
export function loadConfig(env: Env = process.env): Config {
  let orderbookDepth = parseIntOr(env.GRVT_HEDGE_ORDERBOOK_DEPTH, HEDGE_DEFAULTS.orderbookDepth);
  if (orderbookDepth <= 0) {
    orderbookDepth = HEDGE_DEFAULTS.orderbookDepth;
  }

  const logLevelRaw = (env.GRVT_LOG_LEVEL || "info").toLowerCase();

  const symbolsFile = (env.GRVT_HEDGE_SYMBOLS_FILE ?? HEDGE_DEFAULTS.symbolsFile).trim();
  if (!symbolsFile) {
    throw new ConfigError("GRVT_HEDGE_SYMBOLS_FILE is required");
  }

  return {
    accounts: loadTradingAccounts(env),
    symbolsFile,
    loopIntervalMs:
      parseIntOr(env.GRVT_HEDGE_LOOP_INTERVAL_SEC, HEDGE_DEFAULTS.loopIntervalSec) * 1000,
    postOnlyMaxRetry: parseIntOr(env.GRVT_HEDGE_POST_ONLY_MAX_RETRY, HEDGE_DEFAULTS.postOnlyMaxRetry),
    postOnlyCooldownMs:
      parseIntOr(env.GRVT_HEDGE_POST_ONLY_COOLDOWN_SEC, HEDGE_DEFAULTS.postOnlyCooldownSec) * 1000,
    partialFillTimeoutMs:
      parseIntOr(env.GRVT_HEDGE_PARTIAL_FILL_TIMEOUT_SEC, HEDGE_DEFAULTS.partialFillTimeoutSec) * 1000,
    stuckHours: parseIntOr(env.GRVT_HEDGE_STUCK_HOURS, HEDGE_DEFAULTS.stuckHours),
    mmrAlertThreshold: toDecimal(
      env.GRVT_HEDGE_MMR_ALERT_THRESHOLD,
      new Decimal(HEDGE_DEFAULTS.mmrAlertThreshold)
    ),
    orderbookDepth,
    singleOrderDiffThreshold: toDecimal(
      env.GRVT_HEDGE_SINGLE_ORDER_DIFF_THRESHOLD_USDT,
      new Decimal(HEDGE_DEFAULTS.singleOrderDiffThresholdUsdt)
    ),
    cancelOnStop: parseFlag(env.GRVT_HEDGE_CANCEL_ON_STOP, true),
    stopKeepStrategyOrders: Math.max(
      0,
      parseIntOr(env.GRVT_HEDGE_STOP_KEEP_STRATEGY_ORDERS, HEDGE_DEFAULTS.stopKeepStrategyOrders)
    ),
    maxRuntimeMs:
      Math.max(0, parseIntOr(env.GRVT_HEDGE_MAX_RUNTIME_SEC, HEDGE_DEFAULTS.maxRuntimeSec)) * 1000,
    apiMaxRetries: Math.max(
      0,
      parseIntOr(env.GRVT_HEDGE_API_MAX_RETRIES, HEDGE_DEFAULTS.apiMaxRetries)
    ),
    digestUtcOffsetHours: parseIntOr(
      env.GRVT_HEDGE_DIGEST_UTC_OFFSET_HOURS,
      HEDGE_DEFAULTS.digestUtcOffsetHours
    ),
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : "info",
    dryRun: parseFlag(env.GRVT_HEDGE_DRY_RUN, false),
    telegram: {
      url: env.TELEGRAM_RELAY_URL || undefined,
      chatId: env.CHAT_ID || undefined,
      apiKey: env.API_KEY || undefined,
    },
  };
}

/**
 * Check if the Telegram relay is fully configured.
 */
export function hasTelegramCredentials(config: Config): boolean {
  return !!(config.telegram.chatId && config.telegram.apiKey);
}
