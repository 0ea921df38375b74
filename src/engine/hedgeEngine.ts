/**
 * Hedge engine: the polling loop.
 *
 * Each cycle snapshots both accounts, runs the decision engine for every
 * symbol (each under its own error guard) and sends the daily digest of
 * symbols that stayed unhedged too long. On stop, strategy orders left on
 * the book are cancelled, optionally keeping the newest per symbol.
 */

import type { Config } from "../config/config";
import { ALERT_COOLDOWNS, HEDGE_PARAMS } from "../config/hedgeParams";
import type { AccountSnapshot, PositionSnapshot } from "../exchange/types";
import type { AlertService } from "../alerts/alertService";
import type { Logger, SymbolStatusLine } from "../logging/logger";
import type { EventLog } from "../logging/fileLogger";
import { noopEventLog } from "../logging/fileLogger";
import type { AccountRuntime } from "../execution/accountRuntime";
import { OrderPlacer } from "../execution/placement";
import { emptyPosition } from "../normalization";
import { checkMarginRatio } from "../risk/marginMonitor";
import { isStrategyOrder } from "../state/orderIds";
import { ZERO } from "../utils/decimal";
import { OrderTracker } from "../state/orderTracker";
import { type SymbolState, createSymbolState } from "../state/symbolState";
import { type AccountSnapshots, DecisionEngine } from "../strategy/decisionEngine";
import { ACCOUNT_LABELS, type AccountLabel, type SymbolConfig } from "../strategy/types";

export type HedgeEngineSettings = Pick<
  Config,
  | "loopIntervalMs"
  | "postOnlyMaxRetry"
  | "postOnlyCooldownMs"
  | "partialFillTimeoutMs"
  | "stuckHours"
  | "mmrAlertThreshold"
  | "orderbookDepth"
  | "singleOrderDiffThreshold"
  | "cancelOnStop"
  | "stopKeepStrategyOrders"
  | "maxRuntimeMs"
  | "dryRun"
>;

export interface HedgeEngineDeps {
  settings: HedgeEngineSettings;
  accounts: Record<AccountLabel, AccountRuntime>;
  symbols: SymbolConfig[];
  alerts: AlertService;
  logger: Logger;
  eventLog?: EventLog;
  now?: () => number;
  /** Delay used by placement retries (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

export interface CleanupResult {
  candidates: number;
  cancelled: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HedgeEngine {
  private deps: HedgeEngineDeps;
  private states = new Map<string, SymbolState>();
  private tracker: OrderTracker;
  private decisions: DecisionEngine;
  private stopped = false;
  private wake: (() => void) | null = null;
  private lastStatusAt = 0;
  private lotsSeeded = false;

  constructor(deps: HedgeEngineDeps) {
    this.deps = deps;
    const { settings, alerts, logger, eventLog, now } = deps;
    const sleep = deps.sleep ?? defaultSleep;

    for (const config of deps.symbols) {
      this.states.set(config.instrument, createSymbolState(config));
    }

    this.tracker = new OrderTracker({
      lookupOrder: (account, orderId) => deps.accounts[account].lookupOrder(orderId),
      alerts,
      logger,
      eventLog,
      partialFillTimeoutMs: settings.partialFillTimeoutMs,
      now,
    });
    const placer = new OrderPlacer({
      tracker: this.tracker,
      alerts,
      logger,
      eventLog,
      postOnlyMaxRetry: settings.postOnlyMaxRetry,
      postOnlyCooldownMs: settings.postOnlyCooldownMs,
      orderbookDepth: settings.orderbookDepth,
      dryRun: settings.dryRun,
      now,
      sleep,
    });
    this.decisions = new DecisionEngine({
      accounts: deps.accounts,
      tracker: this.tracker,
      placer,
      alerts,
      logger,
      eventLog,
      singleOrderDiffThreshold: settings.singleOrderDiffThreshold,
      stuckHours: settings.stuckHours,
      now,
    });
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  private get eventLog(): EventLog {
    return this.deps.eventLog ?? noopEventLog;
  }

  getSymbolState(instrument: string): SymbolState | undefined {
    return this.states.get(instrument);
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Request the loop to stop; interrupts the current sleep.
   */
  stop(): void {
    this.stopped = true;
    if (this.wake) {
      this.wake();
      this.wake = null;
    }
  }

  /**
   * Positions, open orders and account summary for both legs. Margin is
   * checked as each summary arrives.
   */
  async collectSnapshots(): Promise<AccountSnapshots> {
    const A = await this.snapshotAccount("A");
    const B = await this.snapshotAccount("B");
    return { A, B };
  }

  private async snapshotAccount(label: AccountLabel): Promise<AccountSnapshot> {
    const runtime = this.deps.accounts[label];
    const positions = await runtime.queryPositions();
    const openOrders = await runtime.queryOpenOrders();
    const summary = await runtime.queryAccountSummary();
    checkMarginRatio(this.deps.alerts, runtime.name, summary, this.deps.settings.mmrAlertThreshold);
    return { positions, openOrders, summary };
  }

  /**
   * Seed ledger lots from existing positions and adopt open orders.
   * Seeding waits for a cycle where both position queries succeed.
   */
  async bootstrap(): Promise<void> {
    const snapshots = await this.collectSnapshots();
    const seeded = this.seedLots(snapshots);
    let enabled = 0;

    for (const state of this.states.values()) {
      if (!state.config.enabled) continue;
      enabled++;
      const instrument = state.config.instrument;
      for (const label of ACCOUNT_LABELS) {
        await this.tracker.syncOrders(state, label, snapshots[label].openOrders.get(instrument) ?? []);
      }
    }
    if (!seeded) {
      this.deps.logger.warn("[ENGINE] Positions unavailable, ledger seeding deferred");
    }
    this.deps.logger.info(`[ENGINE] Bootstrap completed for ${enabled} symbols`);
  }

  private seedLots(snapshots: AccountSnapshots): boolean {
    if (this.lotsSeeded) return true;
    const positionsA = snapshots.A.positions;
    const positionsB = snapshots.B.positions;
    if (!positionsA || !positionsB) return false;
    const positions: Record<AccountLabel, Map<string, PositionSnapshot>> = { A: positionsA, B: positionsB };
    const now = this.now();

    for (const state of this.states.values()) {
      if (!state.config.enabled) continue;
      const instrument = state.config.instrument;
      for (const label of ACCOUNT_LABELS) {
        const pos = positions[label].get(instrument) ?? emptyPosition();
        const lot = state.ledger.seedSyntheticLot(
          label,
          pos.size.gt(0) ? "buy" : "sell",
          pos.entryPrice,
          pos.absNotional,
          now
        );
        if (lot) {
          this.eventLog.record("BOOTSTRAP_LOT", {
            instrument,
            account: label,
            side: lot.sourceSide,
            price: lot.price.toFixed(),
            notional: lot.remainingNotional.toFixed(),
          });
        }
      }
    }
    this.lotsSeeded = true;
    return true;
  }

  /**
   * One poll cycle. A failing symbol is reported and skipped.
   */
  async runCycle(): Promise<void> {
    const snapshots = await this.collectSnapshots();
    this.seedLots(snapshots);

    for (const state of this.states.values()) {
      const symbol = state.config.instrument;
      try {
        await this.decisions.processSymbol(state, snapshots);
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        this.deps.logger.error(`[ENGINE] ${symbol} processing failed: ${msg}`);
        this.eventLog.record("ERROR", { instrument: symbol, message: msg });
        this.deps.alerts.notify(
          `GRVT hedge symbol error ${symbol}`,
          msg,
          `symbol_error:${symbol}`,
          ALERT_COOLDOWNS.symbolError
        );
      }
    }

    this.sendDailyStuckReport();
    this.maybeLogStatus(snapshots);
  }

  /**
   * Digest of symbols unhedged for at least the stuck threshold.
   */
  sendDailyStuckReport(): boolean {
    const now = this.now();
    const lines: string[] = [];
    for (const [symbol, state] of this.states) {
      if (state.unhedgedSince === null) continue;
      const hours = (now - state.unhedgedSince) / 3_600_000;
      if (hours < this.deps.settings.stuckHours) continue;
      lines.push(`${symbol}: unhedged ${hours.toFixed(2)}h`);
    }
    return this.deps.alerts.sendDailyDigest("Daily stuck hedge report:", lines);
  }

  /**
   * Run until stopped or the runtime limit is reached, then clean up.
   */
  async run(): Promise<void> {
    const { settings, logger } = this.deps;
    const startedAt = this.now();

    logger.info("[ENGINE] Dual maker hedge started", {
      symbols: [...this.states.values()].map((s) => `${s.config.instrument}:${s.config.positionMode}`),
      loopMs: settings.loopIntervalMs,
      bookDepth: settings.orderbookDepth,
      singleOrderDiffThreshold: settings.singleOrderDiffThreshold.toFixed(),
      postOnlyRetry: settings.postOnlyMaxRetry,
      cooldownMs: settings.postOnlyCooldownMs,
      partialTimeoutMs: settings.partialFillTimeoutMs,
      stuckHours: settings.stuckHours,
      mmrThreshold: settings.mmrAlertThreshold.toFixed(),
      dryRun: settings.dryRun,
    });
    this.eventLog.record("STARTUP", { symbols: [...this.states.keys()], dryRun: settings.dryRun });

    await this.bootstrap();

    while (!this.stopped) {
      if (settings.maxRuntimeMs > 0 && this.now() - startedAt >= settings.maxRuntimeMs) {
        logger.info(`[ENGINE] Reached max runtime ${settings.maxRuntimeMs / 1000}s, stopping hedge engine...`);
        this.stop();
        break;
      }

      try {
        await this.runCycle();
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        this.deps.alerts.notify("GRVT dual hedge loop error", msg, "main_loop_error", ALERT_COOLDOWNS.loopError);
        logger.error(`[ENGINE] Main loop error: ${msg}`);
      }

      if (!this.stopped) {
        await this.interruptibleSleep(settings.loopIntervalMs);
      }
    }

    try {
      await this.cleanupOnStop();
    } catch (error) {
      logger.error(`[ENGINE] Stop cleanup error: ${error instanceof Error ? error.message : String(error)}`);
    }
    this.eventLog.record("SHUTDOWN", { runtimeMs: this.now() - startedAt });
    logger.info("[ENGINE] Dual maker hedge stopped");
  }

  /**
   * Cancel strategy orders still resting on the book, newest kept first.
   */
  async cleanupOnStop(): Promise<CleanupResult> {
    const { settings, logger } = this.deps;
    if (!settings.cancelOnStop) {
      logger.info("[ENGINE] Skip stop cleanup because GRVT_HEDGE_CANCEL_ON_STOP=0");
      return { candidates: 0, cancelled: 0 };
    }

    const keep = settings.stopKeepStrategyOrders;
    let candidates = 0;
    let cancelled = 0;

    for (const label of ACCOUNT_LABELS) {
      const runtime = this.deps.accounts[label];
      const grouped = await runtime.queryOpenOrders();
      for (const [symbol, orders] of grouped) {
        const strategyOrders = orders
          .filter((o) => isStrategyOrder(o.clientOrderId))
          .sort((a, b) => (b.createTimeMs ?? 0) - (a.createTimeMs ?? 0));
        const toCancel = strategyOrders.slice(keep);
        candidates += toCancel.length;

        for (const order of toCancel) {
          if (await runtime.cancelOrder(order.orderId)) {
            cancelled++;
            logger.info(
              `[ENGINE] Cancelled strategy order on stop account=${label} symbol=${symbol} order_id=${order.orderId}`
            );
            this.eventLog.record("ORDER_CANCELLED", {
              instrument: symbol,
              account: label,
              orderId: order.orderId,
              reason: "stop_cleanup",
            });
          }
        }
      }
    }

    logger.info(
      `[ENGINE] Stop cleanup finished: cancelled=${cancelled} candidate=${candidates} keep_per_symbol=${keep}`
    );
    return { candidates, cancelled };
  }

  private interruptibleSleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }

  private maybeLogStatus(snapshots: AccountSnapshots): void {
    const now = this.now();
    if (now - this.lastStatusAt < HEDGE_PARAMS.statusIntervalMs) return;
    this.lastStatusAt = now;

    const lines: SymbolStatusLine[] = [];
    for (const state of this.states.values()) {
      if (!state.config.enabled) continue;
      const symbol = state.config.instrument;
      const absA = snapshots.A.positions?.get(symbol)?.absNotional;
      const absB = snapshots.B.positions?.get(symbol)?.absNotional;
      lines.push({
        instrument: symbol,
        mode: state.config.positionMode,
        absA: snapshots.A.positions ? (absA ?? ZERO).toFixed(2) : "n/a",
        absB: snapshots.B.positions ? (absB ?? ZERO).toFixed(2) : "n/a",
        openLots: state.ledger.size(),
        activeOrders: this.tracker.activeStrategyOrders(state).length,
        cooldownLeftSec:
          state.cooldownUntil > now ? Math.ceil((state.cooldownUntil - now) / 1000) : undefined,
        unhedgedForSec:
          state.unhedgedSince !== null ? Math.floor((now - state.unhedgedSince) / 1000) : undefined,
      });
    }
    this.deps.logger.logStatus(lines);
  }
}
