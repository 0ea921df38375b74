/**
 * Client order id scheme.
 *
 * Strategy orders carry a numeric uint64 client id in a reserved high-bit
 * namespace (top nibble 0xE). Bit 59 records the leg (A=0, B=1), bit 58 the
 * side (buy=0, sell=1); the low 58 bits are entropy. Ids written by the
 * earlier textual scheme ("HEDGEV1_...") are still recognized.
 */

import { randomBytes } from "node:crypto";
import { HEDGE_PARAMS } from "../config/hedgeParams";
import type { AccountLabel, Side } from "../strategy/types";

const ENTROPY_MASK = (1n << 58n) - 1n;

/**
 * Generate a strategy-owned client order id.
 */
export function buildClientOrderId(
  account: AccountLabel,
  side: Side,
  entropy: bigint = randomBytes(8).readBigUInt64BE()
): string {
  const accountBit = account === "A" ? 0n : 1n;
  const sideBit = side === "buy" ? 0n : 1n;
  const value =
    HEDGE_PARAMS.orderIdPrefix | (accountBit << 59n) | (sideBit << 58n) | (entropy & ENTROPY_MASK);
  return value.toString();
}

/**
 * Whether a client order id belongs to this strategy.
 */
export function isStrategyOrder(clientOrderId: string): boolean {
  if (clientOrderId.startsWith(`${HEDGE_PARAMS.legacyOrderPrefix}_`)) return true;
  if (!/^\d+$/.test(clientOrderId)) return false;
  return (BigInt(clientOrderId) & HEDGE_PARAMS.orderIdMask) === HEDGE_PARAMS.orderIdPrefix;
}

/**
 * Exchange ids reported before the matching engine assigns a real one.
 */
export function isPlaceholderOrderId(orderId: string): boolean {
  const id = orderId.trim().toLowerCase();
  return id === "" || id === "0" || id === "0x0" || id === "0x00" || id.startsWith("0x00");
}
