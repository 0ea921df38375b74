import { describe, test, expect, beforeEach } from "vitest";
import Decimal from "decimal.js";
import { OrderPlacer, isPostOnlyRejection, passivePrice } from "../src/execution/placement";
import { OrderTracker } from "../src/state/orderTracker";
import { createSymbolState, type SymbolState } from "../src/state/symbolState";
import type { AccountRuntime } from "../src/execution/accountRuntime";
import type { AlertService } from "../src/alerts/alertService";
import { silentLogger } from "../src/logging/logger";
import {
  FakeExchange,
  FakeSigner,
  makeAlerts,
  makeBook,
  makeClock,
  makeRuntime,
  makeSymbolConfig,
  BTC,
  type RecordingNotifier,
} from "./helpers/fakeExchange";

const d = (value: string | number) => new Decimal(value);

describe("passivePrice", () => {
  test("buys rest at the bid unless the guard is lower", () => {
    expect(passivePrice("buy", d(100), d(101), null).toFixed()).toBe("100");
    expect(passivePrice("buy", d(100), d(101), d(99)).toFixed()).toBe("99");
    expect(passivePrice("buy", d(100), d(101), d(100.5)).toFixed()).toBe("100");
  });

  test("sells rest at the ask unless the guard is higher", () => {
    expect(passivePrice("sell", d(100), d(101), null).toFixed()).toBe("101");
    expect(passivePrice("sell", d(100), d(101), d(102)).toFixed()).toBe("102");
    expect(passivePrice("sell", d(100), d(101), d(100.5)).toFixed()).toBe("101");
  });
});

test("isPostOnlyRejection matches maker-only violations", () => {
  expect(isPostOnlyRejection("Post only order would match")).toBe(true);
  expect(isPostOnlyRejection("order would be TAKER")).toBe(true);
  expect(isPostOnlyRejection("insufficient margin")).toBe(false);
});

describe("OrderPlacer", () => {
  let clock: ReturnType<typeof makeClock>;
  let alerts: AlertService;
  let notifier: RecordingNotifier;
  let exchange: FakeExchange;
  let signer: FakeSigner;
  let runtime: AccountRuntime;
  let state: SymbolState;
  let sleeps: number[];

  function makePlacer(dryRun: boolean = false): OrderPlacer {
    const tracker = new OrderTracker({
      lookupOrder: async () => null,
      alerts,
      logger: silentLogger,
      partialFillTimeoutMs: 1_800_000,
      now: clock.now,
    });
    return new OrderPlacer({
      tracker,
      alerts,
      logger: silentLogger,
      postOnlyMaxRetry: 3,
      postOnlyCooldownMs: 300_000,
      orderbookDepth: 10,
      dryRun,
      now: clock.now,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
  }

  beforeEach(() => {
    clock = makeClock();
    const made = makeAlerts(clock.now);
    alerts = made.alerts;
    notifier = made.notifier;
    exchange = new FakeExchange();
    signer = new FakeSigner();
    runtime = makeRuntime("A", exchange, alerts, { signer });
    state = createSymbolState(makeSymbolConfig());
    sleeps = [];
  });

  test("places and registers a post-only order", async () => {
    const ok = await makePlacer().placePostOnlyWithRetry(state, runtime, "buy", null, d(1000));

    expect(ok).toBe(true);
    expect(exchange.created).toHaveLength(1);
    const order = exchange.created[0];
    expect(order.post_only).toBe(true);
    expect(order.reduce_only).toBe(false);
    expect(order.sub_account_id).toBe("1001");
    expect(order.metadata?.create_time).toBe(new Date(clock.now()).toISOString());

    const [managed] = [...state.managedOrders.values()];
    expect(managed.notional.toFixed()).toBe("1000");
    expect(managed.clientOrderId).toBe(order.metadata?.client_order_id);
    expect(managed.strategyOwned).toBe(true);
  });

  test("an acknowledged order without id is tracked as a placeholder", async () => {
    exchange.omitOrderId = true;

    await makePlacer().placePostOnlyWithRetry(state, runtime, "buy", null, d(1000));

    const [key] = [...state.managedOrders.keys()];
    expect(key).toBe(`pending:${exchange.created[0].metadata?.client_order_id}`);
  });

  test("retries post-only rejections, then enters cooldown", async () => {
    exchange.failNext("createOrder", { code: 2000, status: 400, message: "post only order would match" }, 3);

    const ok = await makePlacer().placePostOnlyWithRetry(state, runtime, "sell", null, d(1000));

    expect(ok).toBe(false);
    expect(exchange.calls.createOrder).toBe(3);
    expect(sleeps).toEqual([200, 200, 200]);
    expect(state.cooldownUntil).toBe(clock.now() + 300_000);
    expect(state.managedOrders.size).toBe(0);
    expect(notifier.messages).toEqual([
      "GRVT hedge cooldown BTC_USDT_Perp\npost-only failed after 3 retries, cooldown 300s",
    ]);
  });

  test("a post-only rejection followed by success places on the retry", async () => {
    exchange.failNext("createOrder", { code: 2000, status: 400, message: "post only order would match" });

    const ok = await makePlacer().placePostOnlyWithRetry(state, runtime, "sell", null, d(1000));

    expect(ok).toBe(true);
    expect(exchange.calls.createOrder).toBe(2);
    expect(state.cooldownUntil).toBe(0);
  });

  test("other exchange errors alert and stop without cooldown", async () => {
    exchange.failNext("createOrder", { code: 2001, status: 400, message: "insufficient margin" });

    const ok = await makePlacer().placePostOnlyWithRetry(state, runtime, "buy", null, d(1000));

    expect(ok).toBe(false);
    expect(exchange.calls.createOrder).toBe(1);
    expect(state.cooldownUntil).toBe(0);
    expect(notifier.messages).toEqual([
      "GRVT hedge order failed BTC_USDT_Perp\naccount=A side=buy error=create_order_failed code=2001 status=400 msg=insufficient margin",
    ]);
  });

  test("signing failures alert and stop", async () => {
    signer.failWith = new Error("bad key");

    const ok = await makePlacer().placePostOnlyWithRetry(state, runtime, "buy", null, d(1000));

    expect(ok).toBe(false);
    expect(exchange.calls.createOrder).toBe(0);
    expect(notifier.messages).toEqual([
      "GRVT hedge order failed BTC_USDT_Perp\naccount=A side=buy error=sign_order_failed: bad key",
    ]);
  });

  test("an empty book waits and retries", async () => {
    exchange.books.set(BTC, { bids: [], asks: [] });

    const ok = await makePlacer().placePostOnlyWithRetry(state, runtime, "buy", null, d(1000));

    expect(ok).toBe(false);
    expect(exchange.calls.getOrderBook).toBe(3);
    expect(exchange.calls.createOrder).toBe(0);
    expect(sleeps).toEqual([200, 200, 200]);
    expect(state.cooldownUntil).toBe(clock.now() + 300_000);
  });

  test("the guard price moves a sell away from the book", async () => {
    exchange.books.set(BTC, makeBook("50000", "50001"));

    await makePlacer().placePostOnlyWithRetry(state, runtime, "sell", d("50123.45"), d(1000));

    expect(exchange.created[0].legs?.[0].limit_price).toBe("50123.5");
  });

  test("dry run submits and registers nothing", async () => {
    const ok = await makePlacer(true).placePostOnlyWithRetry(state, runtime, "buy", null, d(1000));

    expect(ok).toBe(true);
    expect(exchange.calls.createOrder).toBe(0);
    expect(state.managedOrders.size).toBe(0);
  });

  test("returns false when instrument metadata is unavailable", async () => {
    exchange.instruments.clear();

    const ok = await makePlacer().placePostOnlyWithRetry(state, runtime, "buy", null, d(1000));

    expect(ok).toBe(false);
    expect(exchange.calls.getOrderBook).toBe(0);
  });
});
