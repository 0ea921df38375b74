/**
 * Fill-matching ledger.
 *
 * Keeps a FIFO queue of unmatched fill lots per instrument. Each lot records
 * which leg created the exposure, on which side and at what price. A fill on
 * one leg consumes opposite-side lots of the other leg (oldest first, price
 * permitting) before any remainder becomes a new lot at the tail.
 *
 * The queue answers two questions for the decision engine:
 * - which leg is expected to close the oldest open exposure
 * - the guard price that hedge must not be worse than
 */

import type Decimal from "decimal.js";
import type { AccountLabel, Side } from "../strategy/types";
import { oppositeSide } from "../strategy/types";
import { ZERO, sumDecimals } from "../utils/decimal";

/**
 * Unmatched notional contributed by one fill (or a bootstrap position).
 */
export interface FillLot {
  sourceAccount: AccountLabel;
  sourceSide: Side;
  price: Decimal;
  /** Decreases as opposing fills consume it; the lot is dropped at 0 */
  remainingNotional: Decimal;
  createdAt: number;
  /** True when seeded from a pre-existing position at startup */
  synthetic: boolean;
}

/**
 * Outcome of applying one fill.
 */
export interface ApplyFillResult {
  matchedNotional: Decimal;
  /** Lot appended for the unmatched remainder, if any */
  createdLot: FillLot | null;
}

/**
 * Whether an opposing fill at `fillPrice` may close `lot`.
 *
 * A sell closes a buy lot only at or above the lot's price; a buy closes
 * a sell lot only at or below it.
 */
export function isPriceAcceptable(fillSide: Side, fillPrice: Decimal, lot: FillLot): boolean {
  return fillSide === "sell" ? fillPrice.gte(lot.price) : fillPrice.lte(lot.price);
}

export class FillLedger {
  private lots: FillLot[] = [];
  private filled: Decimal = ZERO;
  private matched: Decimal = ZERO;

  /**
   * Match a fill against opposing lots, then queue the remainder.
   */
  applyFill(
    sourceAccount: AccountLabel,
    sourceSide: Side,
    fillPrice: Decimal,
    fillNotional: Decimal,
    now: number = Date.now()
  ): ApplyFillResult {
    if (fillNotional.lte(0)) {
      return { matchedNotional: ZERO, createdLot: null };
    }

    const wantedSide = oppositeSide(sourceSide);
    let remaining = fillNotional;
    const survivors: FillLot[] = [];

    for (const lot of this.lots) {
      if (lot.remainingNotional.lte(0)) continue;

      const isCandidate =
        remaining.gt(0) &&
        lot.sourceAccount !== sourceAccount &&
        lot.sourceSide === wantedSide;

      if (!isCandidate || !isPriceAcceptable(sourceSide, fillPrice, lot)) {
        survivors.push(lot);
        continue;
      }

      const take = remaining.lt(lot.remainingNotional) ? remaining : lot.remainingNotional;
      lot.remainingNotional = lot.remainingNotional.sub(take);
      remaining = remaining.sub(take);
      if (lot.remainingNotional.gt(0)) {
        survivors.push(lot);
      }
    }

    this.lots = survivors;
    this.filled = this.filled.add(fillNotional);
    const matchedNotional = fillNotional.sub(remaining);
    // Both the consumed lot notional and the consuming fill notional leave the book.
    this.matched = this.matched.add(matchedNotional.mul(2));

    let createdLot: FillLot | null = null;
    if (remaining.gt(0)) {
      createdLot = {
        sourceAccount,
        sourceSide,
        price: fillPrice,
        remainingNotional: remaining,
        createdAt: now,
        synthetic: false,
      };
      this.lots.push(createdLot);
    }

    return { matchedNotional, createdLot };
  }

  /**
   * Seed a lot for inventory that existed before the engine started.
   * Counted as filled notional so conservation totals stay consistent.
   */
  seedSyntheticLot(
    sourceAccount: AccountLabel,
    sourceSide: Side,
    entryPrice: Decimal,
    notional: Decimal,
    now: number = Date.now()
  ): FillLot | null {
    if (notional.lte(0) || entryPrice.lte(0)) return null;
    const lot: FillLot = {
      sourceAccount,
      sourceSide,
      price: entryPrice,
      remainingNotional: notional,
      createdAt: now,
      synthetic: true,
    };
    this.lots.push(lot);
    this.filled = this.filled.add(notional);
    return lot;
  }

  /**
   * Oldest lot with open notional that `targetAccount` did not create.
   */
  oldestOpposingLot(targetAccount: AccountLabel): FillLot | null {
    for (const lot of this.lots) {
      if (lot.remainingNotional.lte(0)) continue;
      if (lot.sourceAccount === targetAccount) continue;
      return lot;
    }
    return null;
  }

  /** Lots oldest first. */
  getLots(): readonly FillLot[] {
    return this.lots;
  }

  size(): number {
    return this.lots.length;
  }

  openNotional(): Decimal {
    return sumDecimals(this.lots.map((lot) => lot.remainingNotional));
  }

  totalFillNotional(): Decimal {
    return this.filled;
  }

  /**
   * Notional closed by matching, counting both sides of every match, so that
   * openNotional() + totalMatchedNotional() === totalFillNotional().
   */
  totalMatchedNotional(): Decimal {
    return this.matched;
  }
}
