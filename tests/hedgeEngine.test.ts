import { describe, test, expect, beforeEach, vi } from "vitest";
import Decimal from "decimal.js";
import { HedgeEngine, type HedgeEngineSettings } from "../src/engine/hedgeEngine";
import type { EventLog, HedgeLogType } from "../src/logging/fileLogger";
import { silentLogger } from "../src/logging/logger";
import { buildClientOrderId } from "../src/state/orderIds";
import type { SymbolState } from "../src/state/symbolState";
import type { AlertService } from "../src/alerts/alertService";
import type { SymbolConfig } from "../src/strategy/types";
import {
  BTC,
  ETH,
  FakeExchange,
  makeAlerts,
  makeClock,
  makeOrderRaw,
  makePositionRaw,
  makeRuntime,
  makeSymbolConfig,
  type RecordingNotifier,
} from "./helpers/fakeExchange";

function makeSettings(overrides: Partial<HedgeEngineSettings> = {}): HedgeEngineSettings {
  return {
    loopIntervalMs: 2_000,
    postOnlyMaxRetry: 3,
    postOnlyCooldownMs: 300_000,
    partialFillTimeoutMs: 1_800_000,
    stuckHours: 6,
    mmrAlertThreshold: new Decimal("0.7"),
    orderbookDepth: 10,
    singleOrderDiffThreshold: new Decimal(20),
    cancelOnStop: true,
    stopKeepStrategyOrders: 0,
    maxRuntimeMs: 0,
    dryRun: false,
    ...overrides,
  };
}

class RecordingEventLog implements EventLog {
  entries: Array<{ type: HedgeLogType; data: Record<string, unknown> }> = [];

  record(type: HedgeLogType, data: Record<string, unknown>): void {
    this.entries.push({ type, data });
  }

  ofType(type: HedgeLogType): Array<Record<string, unknown>> {
    return this.entries.filter((e) => e.type === type).map((e) => e.data);
  }
}

describe("HedgeEngine", () => {
  let clock: ReturnType<typeof makeClock>;
  let alerts: AlertService;
  let notifier: RecordingNotifier;
  let exchangeA: FakeExchange;
  let exchangeB: FakeExchange;
  let eventLog: RecordingEventLog;

  beforeEach(() => {
    clock = makeClock();
    const made = makeAlerts(clock.now);
    alerts = made.alerts;
    notifier = made.notifier;
    exchangeA = new FakeExchange();
    exchangeB = new FakeExchange();
    eventLog = new RecordingEventLog();
  });

  function makeEngine(
    settings: Partial<HedgeEngineSettings> = {},
    symbols: SymbolConfig[] = [makeSymbolConfig()],
    now: () => number = clock.now
  ): HedgeEngine {
    return new HedgeEngine({
      settings: makeSettings(settings),
      accounts: {
        A: makeRuntime("A", exchangeA, alerts),
        B: makeRuntime("B", exchangeB, alerts),
      },
      symbols,
      alerts,
      logger: silentLogger,
      eventLog,
      now,
      sleep: async () => {},
    });
  }

  function stateOf(engine: HedgeEngine, instrument: string): SymbolState {
    const state = engine.getSymbolState(instrument);
    if (!state) throw new Error(`no state for ${instrument}`);
    return state;
  }

  describe("bootstrap", () => {
    test("seeds one lot per existing position at its entry price", async () => {
      exchangeA.positions = [makePositionRaw(BTC, "0.02", "51000", "50000")];
      exchangeB.positions = [makePositionRaw(BTC, "-0.02", "51000", "50500")];
      const engine = makeEngine();

      await engine.bootstrap();

      const lots = stateOf(engine, BTC).ledger.getLots();
      expect(lots).toHaveLength(2);
      expect(lots[0]).toMatchObject({ sourceAccount: "A", sourceSide: "buy", synthetic: true });
      expect(lots[0].price.toFixed()).toBe("50000");
      expect(lots[0].remainingNotional.toFixed()).toBe("1020");
      expect(lots[1]).toMatchObject({ sourceAccount: "B", sourceSide: "sell" });
      expect(lots[1].price.toFixed()).toBe("50500");
      expect(eventLog.ofType("BOOTSTRAP_LOT")).toEqual([
        { instrument: BTC, account: "A", side: "buy", price: "50000", notional: "1020" },
        { instrument: BTC, account: "B", side: "sell", price: "50500", notional: "1020" },
      ]);
    });

    test("adopts strategy orders already on the book", async () => {
      const cid = buildClientOrderId("A", "buy", 9n);
      exchangeA.openOrders = [makeOrderRaw({ orderId: "501", clientOrderId: cid })];
      const engine = makeEngine();

      await engine.bootstrap();

      const state = stateOf(engine, BTC);
      expect(state.ledger.size()).toBe(0);
      expect(state.managedOrders.get("501")?.accountLabel).toBe("A");
    });

    test("defers seeding until both position queries succeed", async () => {
      exchangeA.positions = [makePositionRaw(BTC, "0.02", "50000")];
      exchangeB.positions = [makePositionRaw(BTC, "-0.02", "50000")];
      exchangeA.failNext("getPositions", { code: 1000, status: 400, message: "bad request" });
      const engine = makeEngine();

      await engine.bootstrap();
      expect(stateOf(engine, BTC).ledger.size()).toBe(0);
      expect(eventLog.ofType("BOOTSTRAP_LOT")).toEqual([]);

      await engine.runCycle();
      expect(stateOf(engine, BTC).ledger.size()).toBe(2);
      expect(eventLog.ofType("BOOTSTRAP_LOT")).toHaveLength(2);

      await engine.runCycle();
      expect(eventLog.ofType("BOOTSTRAP_LOT")).toHaveLength(2);
    });

    test("skips disabled symbols", async () => {
      exchangeA.positions = [makePositionRaw(BTC, "0.02", "50000")];
      const engine = makeEngine({}, [makeSymbolConfig({ enabled: false })]);

      await engine.bootstrap();

      expect(stateOf(engine, BTC).ledger.size()).toBe(0);
    });
  });

  describe("runCycle", () => {
    test("a failing symbol does not stop the others", async () => {
      exchangeA.bookThrowsFor.add(ETH);
      const engine = makeEngine({}, [makeSymbolConfig({ instrument: ETH }), makeSymbolConfig({ instrument: BTC })]);

      await engine.runCycle();

      expect(exchangeA.created.map((o) => o.legs?.[0].instrument)).toEqual([BTC]);
      expect(exchangeB.created.map((o) => o.legs?.[0].instrument)).toEqual([BTC]);
      expect(notifier.messages).toContain("GRVT hedge symbol error ETH_USDT_Perp\nbook feed down for ETH_USDT_Perp");
      expect(eventLog.ofType("ERROR")).toEqual([{ instrument: ETH, message: "book feed down for ETH_USDT_Perp" }]);
    });

    test("a failed positions query places nothing", async () => {
      exchangeA.positions = [makePositionRaw(BTC, "0.02", "50000")];
      exchangeB.positions = [makePositionRaw(BTC, "-0.02", "50000")];
      exchangeA.failNext("getPositions", { code: 1000, status: 400, message: "bad request" });
      const engine = makeEngine();

      await engine.runCycle();

      expect(exchangeA.calls.createOrder).toBe(0);
      expect(exchangeB.calls.createOrder).toBe(0);
      expect(notifier.messages).toEqual([
        "GRVT hedge positions failed Trading_A\ncode=1000 status=400 msg=bad request",
      ]);
    });

    test("dry run places nothing", async () => {
      const engine = makeEngine({ dryRun: true });

      await engine.runCycle();

      expect(exchangeA.calls.createOrder).toBe(0);
      expect(exchangeB.calls.createOrder).toBe(0);
      expect(stateOf(engine, BTC).managedOrders.size).toBe(0);
    });

    test("alerts when an account's margin ratio is high", async () => {
      exchangeB.summary = { total_equity: "1000", maintenance_margin: "800", available_balance: "10" };
      const engine = makeEngine({}, [makeSymbolConfig({ enabled: false })]);

      await engine.runCycle();

      expect(notifier.messages).toHaveLength(1);
      expect(notifier.messages[0]).toContain("Trading_B");
    });
  });

  describe("sendDailyStuckReport", () => {
    test("lists symbols unhedged past the threshold once per day", () => {
      const engine = makeEngine({}, [makeSymbolConfig({ instrument: BTC }), makeSymbolConfig({ instrument: ETH })]);
      stateOf(engine, BTC).unhedgedSince = clock.now() - 7 * 3_600_000;
      stateOf(engine, ETH).unhedgedSince = clock.now() - 3_600_000;

      expect(engine.sendDailyStuckReport()).toBe(true);
      expect(notifier.messages).toEqual(["Daily stuck hedge report:\nBTC_USDT_Perp: unhedged 7.00h"]);

      clock.advance(3_600_000);
      expect(engine.sendDailyStuckReport()).toBe(false);
    });

    test("sends nothing while every symbol is hedged", () => {
      const engine = makeEngine();
      expect(engine.sendDailyStuckReport()).toBe(false);
      expect(notifier.messages).toEqual([]);
    });
  });

  describe("cleanupOnStop", () => {
    function strategyOrder(orderId: string, minute: number, instrument: string = BTC) {
      const createTime = String(BigInt(clock.now() + minute * 60_000) * 1_000_000n);
      return makeOrderRaw({
        orderId,
        clientOrderId: buildClientOrderId("A", "buy", BigInt(minute)),
        instrument,
        createTime,
      });
    }

    test("cancels all but the newest strategy orders per symbol", async () => {
      exchangeA.openOrders = [
        strategyOrder("ord-1", 1),
        strategyOrder("ord-3", 3),
        strategyOrder("ord-2", 2),
        makeOrderRaw({ orderId: "manual-1", clientOrderId: "manual-order" }),
      ];
      exchangeB.openOrders = [strategyOrder("ord-9", 9, ETH)];
      const engine = makeEngine({ stopKeepStrategyOrders: 1 });

      const result = await engine.cleanupOnStop();

      expect(result).toEqual({ candidates: 2, cancelled: 2 });
      expect(exchangeA.cancelled).toEqual(["ord-2", "ord-1"]);
      expect(exchangeB.cancelled).toEqual([]);
      expect(eventLog.ofType("ORDER_CANCELLED")).toEqual([
        { instrument: BTC, account: "A", orderId: "ord-2", reason: "stop_cleanup" },
        { instrument: BTC, account: "A", orderId: "ord-1", reason: "stop_cleanup" },
      ]);
    });

    test("counts failed cancels as candidates only", async () => {
      exchangeA.openOrders = [strategyOrder("ord-1", 1), strategyOrder("ord-2", 2)];
      exchangeA.failNext("cancelOrder", { code: 2000, status: 400, message: "rejected" });
      const engine = makeEngine();

      const result = await engine.cleanupOnStop();

      expect(result).toEqual({ candidates: 2, cancelled: 1 });
      expect(exchangeA.cancelled).toEqual(["ord-1"]);
    });

    test("does nothing when disabled", async () => {
      exchangeA.openOrders = [strategyOrder("ord-1", 1)];
      const engine = makeEngine({ cancelOnStop: false });

      expect(await engine.cleanupOnStop()).toEqual({ candidates: 0, cancelled: 0 });
      expect(exchangeA.calls.getOpenOrders).toBe(0);
    });
  });

  describe("run", () => {
    test("stops at the runtime limit and cleans up", async () => {
      let t = clock.now();
      const ticking = () => (t += 1);
      const engine = makeEngine({ maxRuntimeMs: 1 }, [makeSymbolConfig()], ticking);

      await engine.run();

      expect(engine.isStopped()).toBe(true);
      expect(exchangeA.calls.createOrder).toBe(0);
      // bootstrap and stop cleanup
      expect(exchangeA.calls.getOpenOrders).toBe(2);
      expect(eventLog.entries[0].type).toBe("STARTUP");
      expect(eventLog.entries[eventLog.entries.length - 1].type).toBe("SHUTDOWN");
    });

    test("stop() interrupts the wait between cycles", async () => {
      const engine = makeEngine({ loopIntervalMs: 60_000 });

      const running = engine.run();
      await vi.waitFor(() => {
        expect(exchangeB.created).toHaveLength(1);
      });
      engine.stop();
      await running;

      expect(engine.isStopped()).toBe(true);
      expect(exchangeA.created).toHaveLength(1);
      expect(eventLog.ofType("SHUTDOWN")).toHaveLength(1);
    });
  });
});
