/**
 * Post-only order placement.
 *
 * Prices one passive order at the top of the book (never better for the
 * counterparty than the guard price), sizes it from a target notional and
 * submits it. Post-only rejections are retried with fresh pricing; after
 * the retry budget is spent the symbol enters a cooldown.
 */

import { randomInt } from "node:crypto";
import Decimal from "decimal.js";
import type { AccountRuntime } from "./accountRuntime";
import { formatApiError } from "./accountRuntime";
import type { UnsignedOrder } from "../exchange/types";
import type { AlertService } from "../alerts/alertService";
import type { Logger } from "../logging/logger";
import type { EventLog } from "../logging/fileLogger";
import { noopEventLog } from "../logging/fileLogger";
import { ALERT_COOLDOWNS, HEDGE_PARAMS } from "../config/hedgeParams";
import type { OrderTracker } from "../state/orderTracker";
import type { SymbolState } from "../state/symbolState";
import { buildClientOrderId } from "../state/orderIds";
import type { Side } from "../strategy/types";
import { ZERO, quantizePrice, sizeFromNotional, toOrderNotional } from "../utils/decimal";

export interface OrderPlacerDeps {
  tracker: OrderTracker;
  alerts: AlertService;
  logger: Logger;
  eventLog?: EventLog;
  postOnlyMaxRetry: number;
  postOnlyCooldownMs: number;
  orderbookDepth: number;
  /** Log the order instead of submitting it */
  dryRun?: boolean;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const POST_ONLY_MARKERS = ["post", "maker", "would match", "taker"];

/**
 * Whether an exchange error message describes a post-only violation.
 */
export function isPostOnlyRejection(message: string): boolean {
  const msg = message.toLowerCase();
  return POST_ONLY_MARKERS.some((marker) => msg.includes(marker));
}

/**
 * Raw limit price: the same-side best quote, moved to the guard price when
 * the guard is further from the market.
 */
export function passivePrice(
  side: Side,
  bid1: Decimal,
  ask1: Decimal,
  guardPrice: Decimal | null
): Decimal {
  if (side === "sell") {
    return guardPrice === null ? ask1 : Decimal.max(ask1, guardPrice);
  }
  return guardPrice === null ? bid1 : Decimal.min(bid1, guardPrice);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class OrderPlacer {
  private deps: OrderPlacerDeps;

  constructor(deps: OrderPlacerDeps) {
    this.deps = deps;
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  private sleep(ms: number): Promise<void> {
    return (this.deps.sleep ?? defaultSleep)(ms);
  }

  /**
   * Place one post-only order for `notional` USDT on `runtime`'s leg.
   *
   * @returns true when an order was submitted (or logged in dry-run mode)
   */
  async placePostOnlyWithRetry(
    state: SymbolState,
    runtime: AccountRuntime,
    side: Side,
    guardPrice: Decimal | null,
    notional: Decimal
  ): Promise<boolean> {
    const symbol = state.config.instrument;
    const eventLog = this.deps.eventLog ?? noopEventLog;

    const info = await runtime.getInstrument(symbol);
    if (!info) return false;

    const maxRetry = this.deps.postOnlyMaxRetry;
    for (let attempt = 1; attempt <= maxRetry; attempt++) {
      const book = await runtime.fetchBookTop(symbol, this.deps.orderbookDepth);
      if (!book) {
        await this.sleep(HEDGE_PARAMS.postOnlyRetryDelayMs);
        continue;
      }

      const price = quantizePrice(passivePrice(side, book.bid1, book.ask1, guardPrice), info.tickSize, side);
      if (price.lte(0)) continue;

      const size = sizeFromNotional(notional, price, info);
      const orderNotional = size.gt(0) ? toOrderNotional(size, price) : ZERO;
      if (orderNotional.lte(0)) continue;

      const now = this.now();
      const order: UnsignedOrder = {
        subAccountId: runtime.config.accountId,
        instrument: symbol,
        side,
        size,
        limitPrice: price,
        clientOrderId: buildClientOrderId(runtime.label, side),
        postOnly: true,
        reduceOnly: false,
        expirationNs: BigInt(now + HEDGE_PARAMS.orderExpiryMs) * 1_000_000n,
        nonce: randomInt(1, 2 ** 31),
        createTime: new Date(now).toISOString(),
      };

      if (this.deps.dryRun) {
        this.deps.logger.info(
          `[PLACE] [DRY RUN] ${symbol} ${runtime.label} ${side} ${orderNotional.toFixed()} USDT @ ${price.toFixed()}`,
          { size: size.toFixed(), guard: guardPrice?.toFixed() ?? null }
        );
        return true;
      }

      let errorText: string;
      try {
        const result = await runtime.createSignedOrder(order, info);
        if (result.ok) {
          const orderId = result.result.order_id ?? "";
          this.deps.tracker.register(state, {
            orderId,
            clientOrderId: order.clientOrderId,
            accountLabel: runtime.label,
            instrument: symbol,
            side,
            price,
            size,
            notional: orderNotional,
            createdAt: now,
            strategyOwned: true,
            lastSeenAt: 0,
            appliedTradedSize: ZERO,
            partialSince: null,
            closed: false,
            closeReason: null,
          });
          this.deps.logger.info(
            `[PLACE] ${symbol} Placed ${runtime.label} ${side} ${orderNotional.toFixed(4)} USDT @ ${price.toFixed()}`
          );
          eventLog.record("ORDER_PLACED", {
            instrument: symbol,
            account: runtime.label,
            side,
            price: price.toFixed(),
            size: size.toFixed(),
            notional: orderNotional.toFixed(),
            guard: guardPrice?.toFixed() ?? null,
            orderId,
            clientOrderId: order.clientOrderId,
          });
          return true;
        }

        if (isPostOnlyRejection(result.error.message)) {
          this.deps.logger.debug(`[PLACE] ${symbol} post-only reject on attempt ${attempt}/${maxRetry}`);
          await this.sleep(HEDGE_PARAMS.postOnlyRetryDelayMs);
          continue;
        }
        errorText = `create_order_failed ${formatApiError(result.error)}`;
      } catch (error) {
        errorText = `sign_order_failed: ${error instanceof Error ? error.message : String(error)}`;
      }

      this.deps.alerts.notify(
        `GRVT hedge order failed ${symbol}`,
        `account=${runtime.label} side=${side} error=${errorText}`,
        `order_failed:${symbol}:${runtime.label}:${side}`,
        ALERT_COOLDOWNS.orderFailed
      );
      return false;
    }

    state.cooldownUntil = this.now() + this.deps.postOnlyCooldownMs;
    const cooldownSec = Math.round(this.deps.postOnlyCooldownMs / 1000);
    eventLog.record("COOLDOWN", { instrument: symbol, account: runtime.label, side, cooldownSec });
    this.deps.alerts.notify(
      `GRVT hedge cooldown ${symbol}`,
      `post-only failed after ${maxRetry} retries, cooldown ${cooldownSec}s`,
      `cooldown:${symbol}`,
      ALERT_COOLDOWNS.placementCooldown
    );
    return false;
  }
}
