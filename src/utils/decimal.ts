/**
 * Decimal helpers for price/size/notional arithmetic.
 *
 * Every money value in the engine is a decimal.js Decimal; floats never
 * touch prices, sizes or notionals.
 */

import Decimal from "decimal.js";
import type { Side } from "../strategy/types";

export const ZERO = new Decimal(0);

/** Notionals are truncated to this many decimal places */
const NOTIONAL_DECIMALS = 6;

/**
 * Size constraints of an instrument, as needed for order sizing.
 */
export interface SizeRules {
  /** Minimum order size in base units */
  minSize: Decimal;
  /** Size increment (never finer than the base-decimal quantum) */
  sizeStep: Decimal;
  /** Number of decimals the exchange accepts for the base asset */
  baseDecimals: number;
}

/**
 * Parse a string or number into a finite Decimal, or null.
 */
export function parseDecimal(value: unknown): Decimal | null {
  if (value instanceof Decimal) return value.isFinite() ? value : null;
  if (typeof value !== "string" && typeof value !== "number") return null;
  if (typeof value === "string" && value.trim() === "") return null;
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Parse an arbitrary value into a Decimal, falling back on anything invalid.
 */
export function toDecimal(value: unknown, fallback: Decimal = ZERO): Decimal {
  if (value instanceof Decimal) return value;
  return parseDecimal(value) ?? fallback;
}

/**
 * size × price, truncated to 6 decimals.
 */
export function toOrderNotional(size: Decimal, price: Decimal): Decimal {
  return size.mul(price).toDecimalPlaces(NOTIONAL_DECIMALS, Decimal.ROUND_DOWN);
}

/**
 * Round a price onto the tick grid in the passive direction:
 * up for sells, down for buys. A non-positive tick leaves the price as is.
 */
export function quantizePrice(price: Decimal, tick: Decimal, side: Side): Decimal {
  if (tick.lte(0)) return price;
  const units = price.div(tick);
  const rounded = side === "sell" ? units.ceil() : units.floor();
  return rounded.mul(tick);
}

/**
 * Smallest size increment allowed by the base-asset precision.
 */
export function baseQuantum(baseDecimals: number): Decimal {
  return new Decimal(10).pow(-baseDecimals);
}

/**
 * Convert a target notional into a tradable size.
 *
 * Rounds down to the size step, then to the base-decimal quantum, and
 * raises the result to the instrument minimum.
 */
export function sizeFromNotional(
  notional: Decimal,
  price: Decimal,
  rules: SizeRules
): Decimal {
  if (price.lte(0) || notional.lte(0)) return ZERO;

  const quantum = baseQuantum(rules.baseDecimals);
  const step = rules.sizeStep.gt(quantum) ? rules.sizeStep : quantum;

  const raw = notional.div(price);
  let size = raw.div(step).floor().mul(step);
  size = size.toDecimalPlaces(rules.baseDecimals, Decimal.ROUND_DOWN);

  if (size.lt(rules.minSize)) {
    size = rules.minSize;
  }
  return size;
}

/**
 * Sum a list of decimals.
 */
export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.add(value);
  }
  return total;
}
