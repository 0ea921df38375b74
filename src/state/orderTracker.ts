/**
 * Managed-order tracker.
 *
 * Reconciles each account's open-order snapshot against the locally tracked
 * strategy orders of a symbol:
 * - foreign orders (client id outside the strategy namespace) are ignored
 * - unknown strategy orders are adopted; placeholders are promoted in place
 * - fills are fed to the ledger as traded-size deltas
 * - orders that left the open list are resolved by a direct status lookup
 * - closed orders are dropped once they have left the open list
 */

import type { AccountLabel, Side } from "../strategy/types";
import type Decimal from "decimal.js";
import type { OrderView } from "../exchange/types";
import { isTerminalStatus } from "../exchange/types";
import type { AlertService } from "../alerts/alertService";
import type { Logger } from "../logging/logger";
import type { EventLog } from "../logging/fileLogger";
import { noopEventLog } from "../logging/fileLogger";
import { ALERT_COOLDOWNS, HEDGE_PARAMS } from "../config/hedgeParams";
import { ZERO, sumDecimals, toOrderNotional } from "../utils/decimal";
import { isPlaceholderOrderId, isStrategyOrder } from "./orderIds";
import type { CloseReason, ManagedOrder, SymbolState } from "./symbolState";

const CAP_CANCEL_REASON: CloseReason = "low_diff_account_order_cap";

export interface OrderTrackerDeps {
  /** Single-order status lookup; null when the lookup failed */
  lookupOrder: (account: AccountLabel, orderId: string) => Promise<OrderView | null>;
  alerts: AlertService;
  logger: Logger;
  eventLog?: EventLog;
  /** Grace period for still-open partial fills (ms) */
  partialFillTimeoutMs: number;
  now?: () => number;
}

/**
 * Map key of a managed order. Unconfirmed orders are keyed by client id so
 * that two placeholders never share a slot.
 */
export function managedOrderKey(order: Pick<ManagedOrder, "orderId" | "clientOrderId">): string {
  return isPlaceholderOrderId(order.orderId)
    ? `pending:${order.clientOrderId}`
    : order.orderId;
}

export class OrderTracker {
  private deps: OrderTrackerDeps;

  constructor(deps: OrderTrackerDeps) {
    this.deps = deps;
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  private get eventLog(): EventLog {
    return this.deps.eventLog ?? noopEventLog;
  }

  /**
   * Track an order the strategy just submitted.
   */
  register(state: SymbolState, managed: ManagedOrder): void {
    state.managedOrders.set(managedOrderKey(managed), managed);
  }

  /**
   * Reconcile one account's open orders on this symbol.
   */
  async syncOrders(
    state: SymbolState,
    account: AccountLabel,
    liveOrders: readonly OrderView[]
  ): Promise<void> {
    const now = this.now();
    const instrument = state.config.instrument;
    const liveIds = new Set<string>();

    for (const order of liveOrders) {
      if (!order.orderId) continue;
      liveIds.add(order.orderId);

      if (!isStrategyOrder(order.clientOrderId)) {
        if (!state.foreignOrderAlerted) {
          state.foreignOrderAlerted = true;
          this.deps.alerts.notify(
            `GRVT non-strategy order detected ${instrument}`,
            `account=${account} order_id=${order.orderId} preserved and ignored by strategy`,
            `non_strategy:${instrument}:${account}`,
            ALERT_COOLDOWNS.foreignOrder
          );
        }
        continue;
      }

      let managed = state.managedOrders.get(order.orderId);
      if (!managed) {
        managed = this.promotePlaceholder(state, account, order);
      }
      if (!managed) {
        managed = {
          orderId: order.orderId,
          clientOrderId: order.clientOrderId,
          accountLabel: account,
          instrument,
          side: order.side,
          price: order.limitPrice,
          size: order.size,
          notional: toOrderNotional(order.size, order.limitPrice),
          createdAt: now,
          strategyOwned: true,
          lastSeenAt: 0,
          appliedTradedSize: ZERO,
          partialSince: null,
          closed: false,
          closeReason: null,
        };
        state.managedOrders.set(order.orderId, managed);
        this.deps.logger.debug(`[TRACKER] ${instrument} adopted ${account} order ${order.orderId}`);
      }

      managed.lastSeenAt = now;
      managed.closed = false;
      managed.side = order.side;
      managed.price = order.limitPrice;
      managed.size = order.size;
      managed.notional = toOrderNotional(order.size, order.limitPrice);
      this.processFillDelta(state, managed, order);
    }

    for (const managed of [...state.managedOrders.values()]) {
      if (managed.accountLabel !== account) continue;
      // Cap cancellations are closed before the exchange confirms them and
      // may still carry fills, so they are resolved like open orders.
      const awaitingFinal = managed.closed && managed.closeReason === CAP_CANCEL_REASON;
      if (managed.closed && !awaitingFinal) continue;

      if (isPlaceholderOrderId(managed.orderId)) {
        if (now - managed.createdAt > HEDGE_PARAMS.provisionalTimeoutMs) {
          this.close(managed, "PROVISIONAL_TIMEOUT");
        }
        continue;
      }
      if (liveIds.has(managed.orderId)) continue;

      const order = await this.deps.lookupOrder(account, managed.orderId);
      if (!order) {
        // Status unknown; keep the order open and look again next cycle.
        continue;
      }
      this.processFillDelta(state, managed, order);
      if (isTerminalStatus(order.status) && (!managed.closed || managed.closeReason === CAP_CANCEL_REASON)) {
        this.close(managed, order.status);
      }
    }

    this.pruneClosed(state, account, liveIds, now);
  }

  /**
   * Drop closed orders of `account` that are no longer live. Cap
   * cancellations without a final status are kept until they go stale.
   */
  private pruneClosed(
    state: SymbolState,
    account: AccountLabel,
    liveIds: ReadonlySet<string>,
    now: number
  ): void {
    for (const [key, managed] of state.managedOrders) {
      if (managed.accountLabel !== account || !managed.closed) continue;
      if (liveIds.has(managed.orderId)) continue;
      if (managed.closeReason === CAP_CANCEL_REASON) {
        const lastKnown = managed.lastSeenAt > 0 ? managed.lastSeenAt : managed.createdAt;
        if (now - lastKnown <= HEDGE_PARAMS.staleSeenMs) continue;
      }
      state.managedOrders.delete(key);
    }
  }

  /**
   * Apply the unapplied part of an order's traded size to the ledger.
   *
   * Fills on an order that is still open with size left on the book are
   * held back until the partial-fill grace period has passed; the whole
   * accumulated delta is then applied at once.
   */
  processFillDelta(state: SymbolState, managed: ManagedOrder, order: OrderView): void {
    const traded = order.tradedSize;
    if (traded.lte(managed.appliedTradedSize)) return;

    const now = this.now();
    const isPartialOpen =
      order.status === "OPEN" && order.bookSize.gt(0) && traded.lt(managed.size);
    if (isPartialOpen) {
      if (managed.partialSince === null) {
        managed.partialSince = now;
      }
      if (now - managed.partialSince < this.deps.partialFillTimeoutMs) return;
    }

    const delta = traded.sub(managed.appliedTradedSize);
    const fillPrice = order.avgFillPrice;
    if (delta.gt(0) && fillPrice.gt(0)) {
      const fillNotional = toOrderNotional(delta, fillPrice);
      const result = state.ledger.applyFill(
        managed.accountLabel,
        managed.side,
        fillPrice,
        fillNotional,
        now
      );
      this.deps.logger.info(
        `[TRACKER] ${state.config.instrument} fill ${managed.accountLabel} ${managed.side} ` +
          `${fillNotional.toFixed()} USDT @ ${fillPrice.toFixed()} matched=${result.matchedNotional.toFixed()}`
      );
      this.eventLog.record("FILL_APPLIED", {
        instrument: state.config.instrument,
        account: managed.accountLabel,
        orderId: managed.orderId,
        side: managed.side,
        price: fillPrice.toFixed(),
        notional: fillNotional.toFixed(),
        matched: result.matchedNotional.toFixed(),
      });
    }

    managed.appliedTradedSize = traded;
    if (isTerminalStatus(order.status)) {
      this.close(managed, order.status);
    }
  }

  /**
   * Strategy orders that still count against the per-account cap.
   * Orders unseen for too long are treated as gone.
   */
  activeStrategyOrders(state: SymbolState): ManagedOrder[] {
    const now = this.now();
    const result: ManagedOrder[] = [];
    for (const managed of state.managedOrders.values()) {
      if (!managed.strategyOwned || managed.closed) continue;
      if (managed.lastSeenAt > 0 && now - managed.lastSeenAt > HEDGE_PARAMS.staleSeenMs) continue;
      // Freshly placed orders may not be in a snapshot yet.
      if (managed.lastSeenAt <= 0 && now - managed.createdAt > HEDGE_PARAMS.staleUnseenMs) continue;
      result.push(managed);
    }
    return result;
  }

  activeOrderCount(state: SymbolState, account: AccountLabel): number {
    return this.activeStrategyOrders(state).filter((m) => m.accountLabel === account).length;
  }

  /**
   * Notional of open strategy orders on `account` in direction `side`.
   */
  activeHedgeNotional(state: SymbolState, account: AccountLabel, side: Side): Decimal {
    const open = [...state.managedOrders.values()].filter(
      (m) => m.accountLabel === account && m.strategyOwned && !m.closed && m.side === side
    );
    return sumDecimals(open.map((m) => m.notional));
  }

  /**
   * Mark an order closed and record why.
   */
  close(managed: ManagedOrder, reason: NonNullable<ManagedOrder["closeReason"]>): void {
    managed.closed = true;
    managed.closeReason = reason;
    this.eventLog.record("ORDER_CLOSED", {
      instrument: managed.instrument,
      account: managed.accountLabel,
      orderId: managed.orderId,
      reason,
    });
  }

  private promotePlaceholder(
    state: SymbolState,
    account: AccountLabel,
    order: OrderView
  ): ManagedOrder | undefined {
    if (!order.clientOrderId) return undefined;
    for (const [key, candidate] of state.managedOrders) {
      if (candidate.accountLabel !== account) continue;
      if (candidate.clientOrderId !== order.clientOrderId) continue;
      if (!isPlaceholderOrderId(candidate.orderId)) continue;

      state.managedOrders.delete(key);
      candidate.orderId = order.orderId;
      state.managedOrders.set(order.orderId, candidate);
      this.deps.logger.debug(
        `[TRACKER] ${state.config.instrument} promoted ${account} placeholder to ${order.orderId}`
      );
      return candidate;
    }
    return undefined;
  }
}
