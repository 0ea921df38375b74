import { describe, test, expect } from "vitest";
import {
  ConfigError,
  hasTelegramCredentials,
  loadConfig,
  loadTradingAccounts,
  selectHedgeAccounts,
} from "../src/config/config";

describe("loadTradingAccounts", () => {
  test("scans numbered accounts until both key and id are missing", () => {
    const accounts = loadTradingAccounts({
      GRVT_ENV: "testnet",
      GRVT_TRADING_API_KEY_1: "test-key-1",
      GRVT_TRADING_ACCOUNT_ID_1: "1000000000000001",
      GRVT_TRADING_PRIVATE_KEY_1: "test-secret-1",
      GRVT_TRADING_API_KEY_2: "test-key-2",
      GRVT_TRADING_API_KEY_3: "test-key-3",
      GRVT_TRADING_ACCOUNT_ID_3: "77",
      GRVT_ENV_3: "prod",
      GRVT_TRADING_API_KEY_5: "test-key-5",
      GRVT_TRADING_ACCOUNT_ID_5: "5000",
    });

    expect(accounts).toEqual([
      {
        name: "Trading_0001",
        apiKey: "test-key-1",
        accountId: "1000000000000001",
        privateKey: "test-secret-1",
        env: "testnet",
      },
      {
        name: "Trading_3",
        apiKey: "test-key-3",
        accountId: "77",
        privateKey: undefined,
        env: "prod",
      },
    ]);
  });

  test("falls back to the legacy single-account variables", () => {
    const accounts = loadTradingAccounts({
      GRVT_API_KEY: "test-key",
      GRVT_TRADING_ACCOUNT_ID: "42",
      GRVT_PRIVATE_KEY: "test-secret",
    });
    expect(accounts.map((a) => a.name)).toEqual(["Trading_legacy"]);
    expect(accounts[0].env).toBe("prod");
  });

  test("rejects unknown environments", () => {
    expect(() => loadTradingAccounts({ GRVT_ENV: "mars" })).toThrow(new ConfigError("Unsupported env mars"));
  });
});

describe("selectHedgeAccounts", () => {
  const account = (name: string, privateKey?: string) => ({
    name,
    apiKey: "test-key",
    accountId: "1",
    privateKey,
    env: "testnet" as const,
  });

  test("requires two accounts", () => {
    expect(() => selectHedgeAccounts([account("Trading_1", "k")])).toThrow(
      "Dual maker hedge requires at least 2 trading accounts"
    );
  });

  test("requires a private key on both legs", () => {
    expect(() => selectHedgeAccounts([account("Trading_1", "k"), account("Trading_2")])).toThrow(
      "Trading account Trading_2 missing private key"
    );
  });

  test("returns the first two accounts", () => {
    const [a, b] = selectHedgeAccounts([account("Trading_1", "k1"), account("Trading_2", "k2"), account("Trading_3", "k3")]);
    expect([a.name, b.name]).toEqual(["Trading_1", "Trading_2"]);
    expect(b.privateKey).toBe("k2");
  });
});

describe("loadConfig", () => {
  test("applies defaults", () => {
    const config = loadConfig({});

    expect(config.loopIntervalMs).toBe(2000);
    expect(config.postOnlyMaxRetry).toBe(5);
    expect(config.postOnlyCooldownMs).toBe(300_000);
    expect(config.partialFillTimeoutMs).toBe(1_800_000);
    expect(config.stuckHours).toBe(6);
    expect(config.mmrAlertThreshold.toFixed()).toBe("0.7");
    expect(config.orderbookDepth).toBe(10);
    expect(config.singleOrderDiffThreshold.toFixed()).toBe("20");
    expect(config.cancelOnStop).toBe(true);
    expect(config.stopKeepStrategyOrders).toBe(0);
    expect(config.maxRuntimeMs).toBe(0);
    expect(config.symbolsFile).toBe("config/hedge_symbols.json");
    expect(config.logLevel).toBe("info");
    expect(config.dryRun).toBe(false);
    expect(config.accounts).toEqual([]);
  });

  test("reads overrides", () => {
    const config = loadConfig({
      GRVT_HEDGE_LOOP_INTERVAL_SEC: "5",
      GRVT_HEDGE_MMR_ALERT_THRESHOLD: "0.8",
      GRVT_HEDGE_ORDERBOOK_DEPTH: "0",
      GRVT_HEDGE_CANCEL_ON_STOP: "no",
      GRVT_HEDGE_STOP_KEEP_STRATEGY_ORDERS: "-3",
      GRVT_HEDGE_MAX_RUNTIME_SEC: "90",
      GRVT_HEDGE_DRY_RUN: "1",
      GRVT_LOG_LEVEL: "DEBUG",
    });

    expect(config.loopIntervalMs).toBe(5000);
    expect(config.mmrAlertThreshold.toFixed()).toBe("0.8");
    expect(config.orderbookDepth).toBe(10);
    expect(config.cancelOnStop).toBe(false);
    expect(config.stopKeepStrategyOrders).toBe(0);
    expect(config.maxRuntimeMs).toBe(90_000);
    expect(config.dryRun).toBe(true);
    expect(config.logLevel).toBe("debug");
  });

  test("requires a symbols file path", () => {
    expect(() => loadConfig({ GRVT_HEDGE_SYMBOLS_FILE: "  " })).toThrow("GRVT_HEDGE_SYMBOLS_FILE is required");
  });

  test("telegram credentials need both chat id and key", () => {
    expect(hasTelegramCredentials(loadConfig({ CHAT_ID: "1" }))).toBe(false);
    expect(hasTelegramCredentials(loadConfig({ CHAT_ID: "1", API_KEY: "test-relay-key" }))).toBe(true);
  });
});
