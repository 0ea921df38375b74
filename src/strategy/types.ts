/**
 * Strategy types for the dual maker hedge.
 */

import type Decimal from "decimal.js";

/**
 * Hedge leg identifier. The engine always runs exactly two legs.
 */
export type AccountLabel = "A" | "B";

export const ACCOUNT_LABELS: readonly AccountLabel[] = ["A", "B"];

/**
 * Order direction on a perpetual instrument.
 */
export type Side = "buy" | "sell";

/**
 * Whether the symbol is building up (increase) or unwinding (decrease)
 * its paired exposure.
 */
export type PositionMode = "increase" | "decrease";

/**
 * Immutable per-instrument strategy parameters, loaded once at startup.
 */
export interface SymbolConfig {
  /** Canonical exchange instrument (e.g., "BTC_USDT_Perp") */
  instrument: string;
  enabled: boolean;
  /** Standard notional (USDT) of every seeding order */
  orderNotional: Decimal;
  /** Drift tolerated before the small leg keeps stacking hedge orders */
  imbalanceLimit: Decimal;
  /** Upper bound of absA + absB in increase mode */
  maxTotalPosition: Decimal;
  /** Lower bound of absA + absB in decrease mode */
  minTotalPosition: Decimal;
  /** Side leg A takes when both legs are exactly equal (increase mode) */
  aSideWhenEqual: Side;
  positionMode: PositionMode;
}

/**
 * Side pair for seeding both legs at once.
 */
export type EqualSides = Record<AccountLabel, Side>;

/**
 * Result of picking the hedge direction for the smaller leg.
 */
export type HedgeDirection =
  | { side: Side; guardPrice: Decimal | null }
  | { side: null; guardPrice: null };

export function oppositeSide(side: Side): Side {
  return side === "buy" ? "sell" : "buy";
}
