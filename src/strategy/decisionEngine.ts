/**
 * Rebalancing decision engine.
 *
 * Evaluated once per symbol per poll cycle:
 * 1. sync both legs' orders (fills reach the ledger here)
 * 2. trim each leg to its active-order cap
 * 3. track how long the legs have been unequal
 * 4. check the total-position bound of the symbol's mode
 * 5. balanced legs: seed both sides; imbalanced: hedge the smaller leg
 */

import type Decimal from "decimal.js";
import type { AccountSnapshot } from "../exchange/types";
import type { AlertService } from "../alerts/alertService";
import type { Logger } from "../logging/logger";
import type { EventLog } from "../logging/fileLogger";
import { noopEventLog } from "../logging/fileLogger";
import { ALERT_COOLDOWNS } from "../config/hedgeParams";
import type { AccountRuntime } from "../execution/accountRuntime";
import type { OrderPlacer } from "../execution/placement";
import { emptyPosition } from "../normalization";
import type { OrderTracker } from "../state/orderTracker";
import type { ManagedOrder, SymbolState } from "../state/symbolState";
import {
  clipOrderNotionalToTotalBound,
  decideEqualSides,
  hedgeOrderNotional,
  perAccountCap,
  requiredHedgeSideGuard,
} from "./sizing";
import { ACCOUNT_LABELS, type AccountLabel } from "./types";

export type AccountSnapshots = Record<AccountLabel, AccountSnapshot>;

export interface DecisionEngineDeps {
  accounts: Record<AccountLabel, AccountRuntime>;
  tracker: OrderTracker;
  placer: OrderPlacer;
  alerts: AlertService;
  logger: Logger;
  eventLog?: EventLog;
  singleOrderDiffThreshold: Decimal;
  stuckHours: number;
  now?: () => number;
}

export class DecisionEngine {
  private deps: DecisionEngineDeps;

  constructor(deps: DecisionEngineDeps) {
    this.deps = deps;
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  async processSymbol(state: SymbolState, snapshots: AccountSnapshots): Promise<void> {
    const cfg = state.config;
    if (!cfg.enabled) return;
    if (this.now() < state.cooldownUntil) return;

    const symbol = cfg.instrument;
    const { tracker, placer, accounts } = this.deps;

    for (const label of ACCOUNT_LABELS) {
      await tracker.syncOrders(state, label, snapshots[label].openOrders.get(symbol) ?? []);
    }

    const positionsA = snapshots.A.positions;
    const positionsB = snapshots.B.positions;
    if (!positionsA || !positionsB) {
      this.deps.logger.warn(`[DECISION] ${symbol} positions unavailable, skipping decision`);
      return;
    }
    const posA = positionsA.get(symbol) ?? emptyPosition();
    const posB = positionsB.get(symbol) ?? emptyPosition();
    const absA = posA.absNotional;
    const absB = posB.absNotional;
    const cap = perAccountCap(absA.sub(absB).abs(), this.deps.singleOrderDiffThreshold);

    for (const label of ACCOUNT_LABELS) {
      await this.enforceAccountOrderCap(state, label, cap);
    }
    this.checkUnhedgedAlert(state, absA, absB);

    const total = absA.add(absB);
    const increaseLimitReached =
      cfg.positionMode === "increase" && total.gte(cfg.maxTotalPosition);
    const decreaseLimitReached =
      cfg.positionMode === "decrease" && total.lte(cfg.minTotalPosition);
    if (increaseLimitReached) {
      this.deps.alerts.notify(
        `GRVT max_total_position exceeded ${symbol}`,
        `mode=increase total=${total.toFixed()} max=${cfg.maxTotalPosition.toFixed()}`,
        `max_total:${symbol}`,
        ALERT_COOLDOWNS.totalBound
      );
    }
    if (decreaseLimitReached) {
      this.deps.alerts.notify(
        `GRVT min_total_position reached ${symbol}`,
        `mode=decrease total=${total.toFixed()} min=${cfg.minTotalPosition.toFixed()}`,
        `min_total:${symbol}`,
        ALERT_COOLDOWNS.totalBound
      );
    }

    if (absA.eq(absB)) {
      if (increaseLimitReached || decreaseLimitReached) return;

      const decision = decideEqualSides(cfg, posA, posB);
      if (decision.mismatch) {
        this.deps.alerts.notify(
          `GRVT decrease mode direction mismatch ${symbol}`,
          `A.size=${posA.size.toFixed()} B.size=${posB.size.toFixed()}, fallback to configured baseline`,
          `decrease_direction_fallback:${symbol}`,
          ALERT_COOLDOWNS.directionMismatch
        );
      }
      if (!decision.sides) return;

      for (const label of ACCOUNT_LABELS) {
        if (tracker.activeOrderCount(state, label) < cap) {
          await placer.placePostOnlyWithRetry(
            state,
            accounts[label],
            decision.sides[label],
            null,
            cfg.orderNotional
          );
        }
      }
      return;
    }

    const smallLabel: AccountLabel = absA.lt(absB) ? "A" : "B";
    const smallPos = smallLabel === "A" ? posA : posB;
    const smallAbs = smallLabel === "A" ? absA : absB;
    const largeAbs = smallLabel === "A" ? absB : absA;

    const direction = requiredHedgeSideGuard(state.ledger, smallLabel, posA, posB);
    if (direction.side === null) return;
    const side = direction.side;

    const activeSmall = tracker.activeOrderCount(state, smallLabel);
    const hedgeOpen = tracker.activeHedgeNotional(state, smallLabel, side);
    const gap = largeAbs.sub(smallAbs.add(hedgeOpen.div(2)));
    if (gap.lte(0)) return;

    const diff = largeAbs.sub(smallAbs);
    // Keep adding to the small leg until it reaches its cap.
    if (diff.lte(cfg.imbalanceLimit) && hedgeOpen.gt(0) && activeSmall >= cap) return;

    const notional = hedgeOrderNotional({
      orderNotional: cfg.orderNotional,
      diff,
      gap,
      singleOrderDiffThreshold: this.deps.singleOrderDiffThreshold,
      smallLegBelowCap: activeSmall < cap,
    });
    if (notional.lte(0)) return;

    const signedSmall = smallPos.signedNotional;
    const otherAbs = total.sub(signedSmall.abs());
    const bound = cfg.positionMode === "increase" ? cfg.maxTotalPosition : cfg.minTotalPosition;
    const clipped = clipOrderNotionalToTotalBound(
      side,
      notional,
      signedSmall,
      otherAbs,
      cfg.positionMode,
      bound
    );
    if (clipped.lte(0)) return;
    if (activeSmall >= cap) return;

    await placer.placePostOnlyWithRetry(
      state,
      accounts[smallLabel],
      side,
      direction.guardPrice,
      clipped
    );
  }

  /**
   * Cancel the oldest active strategy orders of `account` above `maxOrders`.
   */
  async enforceAccountOrderCap(
    state: SymbolState,
    account: AccountLabel,
    maxOrders: number
  ): Promise<void> {
    const active = this.deps.tracker
      .activeStrategyOrders(state)
      .filter((m) => m.accountLabel === account);
    if (active.length <= maxOrders) return;

    const overflow = active.length - maxOrders;
    const toCancel = [...active].sort((a, b) => a.createdAt - b.createdAt).slice(0, overflow);
    for (const managed of toCancel) {
      const ok = await this.cancelManagedOrder(managed);
      const detail = `account=${managed.accountLabel} order_id=${managed.orderId}`;
      if (ok) {
        this.deps.logger.info(
          `[DECISION] ${state.config.instrument} Cancelled extra strategy order due to low diff account cap: ${detail}`
        );
      } else {
        this.deps.logger.warn(
          `[DECISION] ${state.config.instrument} Failed to cancel extra strategy order due to low diff account cap: ${detail}`
        );
      }
    }
  }

  /**
   * Track the unequal-legs period and raise one stuck alert per period.
   */
  checkUnhedgedAlert(state: SymbolState, absA: Decimal, absB: Decimal): void {
    const now = this.now();
    if (absA.eq(absB)) {
      state.unhedgedSince = null;
      state.stuckAlertSent = false;
      return;
    }
    if (state.unhedgedSince === null) {
      state.unhedgedSince = now;
      return;
    }

    const stuckMs = this.deps.stuckHours * 3_600_000;
    if (now - state.unhedgedSince >= stuckMs && !state.stuckAlertSent) {
      state.stuckAlertSent = true;
      const symbol = state.config.instrument;
      this.deps.alerts.notify(
        `GRVT unhedged>${this.deps.stuckHours}h ${symbol}`,
        `abs_a=${absA.toFixed()} abs_b=${absB.toFixed()} since=${new Date(state.unhedgedSince).toISOString()}`,
        `stuck:${symbol}`,
        ALERT_COOLDOWNS.stuck
      );
    }
  }

  private async cancelManagedOrder(managed: ManagedOrder): Promise<boolean> {
    const ok = await this.deps.accounts[managed.accountLabel].cancelOrder(managed.orderId);
    if (ok) {
      this.deps.tracker.close(managed, "low_diff_account_order_cap");
      (this.deps.eventLog ?? noopEventLog).record("ORDER_CANCELLED", {
        instrument: managed.instrument,
        account: managed.accountLabel,
        orderId: managed.orderId,
        reason: "low_diff_account_order_cap",
      });
    }
    return ok;
  }
}
