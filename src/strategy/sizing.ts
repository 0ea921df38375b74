/**
 * Pure decision helpers for the rebalancing engine.
 */

import Decimal from "decimal.js";
import type { PositionSnapshot } from "../exchange/types";
import type { FillLedger } from "../state/fillLedger";
import { ZERO } from "../utils/decimal";
import { HEDGE_PARAMS } from "../config/hedgeParams";
import type {
  AccountLabel,
  EqualSides,
  HedgeDirection,
  PositionMode,
  Side,
  SymbolConfig,
} from "./types";
import { oppositeSide } from "./types";

/**
 * Outcome of choosing sides for a balanced symbol.
 * `mismatch` is set when decrease mode found both legs on the same side.
 */
export interface EqualSidesDecision {
  sides: EqualSides | null;
  mismatch: boolean;
}

/**
 * Sides for seeding both legs when their absolute notionals are equal.
 *
 * Increase mode uses the configured side for A. Decrease mode unwinds
 * opposite-signed inventory; with nothing to unwind it does nothing, and
 * with same-signed inventory it falls back to the reverse of the configured
 * side and flags a mismatch.
 */
export function decideEqualSides(
  config: SymbolConfig,
  posA: PositionSnapshot,
  posB: PositionSnapshot
): EqualSidesDecision {
  if (config.positionMode === "increase") {
    const a = config.aSideWhenEqual;
    return { sides: { A: a, B: oppositeSide(a) }, mismatch: false };
  }

  if (posA.absNotional.isZero() && posB.absNotional.isZero()) {
    return { sides: null, mismatch: false };
  }
  if (posA.size.gt(0) && posB.size.lt(0)) {
    return { sides: { A: "sell", B: "buy" }, mismatch: false };
  }
  if (posA.size.lt(0) && posB.size.gt(0)) {
    return { sides: { A: "buy", B: "sell" }, mismatch: false };
  }

  const sameSigned = !posA.size.isZero() && !posB.size.isZero() && posA.size.mul(posB.size).gt(0);
  const a = oppositeSide(config.aSideWhenEqual);
  return { sides: { A: a, B: oppositeSide(a) }, mismatch: sameSigned };
}

/**
 * Hedge side and guard price for the smaller leg.
 *
 * The oldest open lot the smaller leg did not create decides: the hedge
 * trades against that lot's side and may not be priced worse than it.
 * Without such a lot the larger leg's direction and entry price are used.
 */
export function requiredHedgeSideGuard(
  ledger: FillLedger,
  targetAccount: AccountLabel,
  posA: PositionSnapshot,
  posB: PositionSnapshot
): HedgeDirection {
  const lot = ledger.oldestOpposingLot(targetAccount);
  if (lot) {
    return { side: oppositeSide(lot.sourceSide), guardPrice: lot.price };
  }

  const larger = posA.absNotional.gte(posB.absNotional) ? posA : posB;
  const guardPrice = larger.entryPrice.gt(0) ? larger.entryPrice : null;
  if (larger.size.gt(0)) return { side: "sell", guardPrice };
  if (larger.size.lt(0)) return { side: "buy", guardPrice };
  return { side: null, guardPrice: null };
}

/**
 * Absolute notional of a leg after an order of `orderNotional` fills.
 */
export function projectAbsNotional(
  signedNotional: Decimal,
  side: Side,
  orderNotional: Decimal
): Decimal {
  const delta = side === "buy" ? orderNotional : orderNotional.neg();
  return signedNotional.add(delta).abs();
}

/**
 * Shrink `orderNotional` until the projected total stays within bounds.
 *
 * Steps down from the full notional in equal decrements; returns the first
 * candidate with `otherAbs + |signed ± candidate|` ≤ bound (increase mode)
 * or ≥ bound (decrease mode), or 0 if none qualifies.
 */
export function clipOrderNotionalToTotalBound(
  side: Side,
  orderNotional: Decimal,
  signedNotional: Decimal,
  otherAbs: Decimal,
  mode: PositionMode,
  boundTotal: Decimal
): Decimal {
  if (orderNotional.lte(0)) return ZERO;

  const steps = HEDGE_PARAMS.boundClipSteps;
  let step = orderNotional.div(steps);
  if (step.lte(0)) step = orderNotional;

  let candidate = orderNotional;
  for (let i = 0; i <= steps; i++) {
    const projected = otherAbs.add(projectAbsNotional(signedNotional, side, candidate));
    const withinBound = mode === "increase" ? projected.lte(boundTotal) : projected.gte(boundTotal);
    if (withinBound) return candidate;

    candidate = candidate.sub(step);
    if (candidate.lte(0)) return ZERO;
  }
  return ZERO;
}

/**
 * Active strategy orders allowed per account: one while the legs are
 * nearly equal, two otherwise.
 */
export function perAccountCap(diff: Decimal, singleOrderDiffThreshold: Decimal): number {
  return diff.lt(singleOrderDiffThreshold) ? 1 : 2;
}

/**
 * Notional for the smaller leg's next hedge order, before bound clipping.
 */
export function hedgeOrderNotional(params: {
  orderNotional: Decimal;
  diff: Decimal;
  gap: Decimal;
  singleOrderDiffThreshold: Decimal;
  smallLegBelowCap: boolean;
}): Decimal {
  if (params.diff.gte(params.singleOrderDiffThreshold) && params.smallLegBelowCap) {
    return params.orderNotional;
  }
  return Decimal.min(params.orderNotional, params.gap.mul(2));
}
