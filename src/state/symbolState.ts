/**
 * Per-instrument engine state.
 */

import type Decimal from "decimal.js";
import type { AccountLabel, Side, SymbolConfig } from "../strategy/types";
import { FillLedger } from "./fillLedger";

/**
 * Why a managed order stopped counting as open.
 */
export type CloseReason =
  | "FILLED"
  | "CANCELLED"
  | "REJECTED"
  | "PROVISIONAL_TIMEOUT"
  | "low_diff_account_order_cap";

/**
 * Local view of one strategy order on the exchange.
 */
export interface ManagedOrder {
  /** Exchange id; a placeholder such as "0x00" until confirmed */
  orderId: string;
  clientOrderId: string;
  accountLabel: AccountLabel;
  instrument: string;
  side: Side;
  price: Decimal;
  size: Decimal;
  notional: Decimal;
  createdAt: number;
  strategyOwned: boolean;
  /** Last time the order was in an open-orders snapshot; 0 = never */
  lastSeenAt: number;
  /** Traded size already applied to the ledger; never decreases */
  appliedTradedSize: Decimal;
  /** First time a still-accumulating partial fill was observed */
  partialSince: number | null;
  closed: boolean;
  closeReason: CloseReason | null;
}

export interface SymbolState {
  config: SymbolConfig;
  ledger: FillLedger;
  /** Keyed by managedOrderKey() */
  managedOrders: Map<string, ManagedOrder>;
  /** Placement is suppressed until this time (ms) */
  cooldownUntil: number;
  /** Start of the current unequal-legs period */
  unhedgedSince: number | null;
  stuckAlertSent: boolean;
  foreignOrderAlerted: boolean;
}

export function createSymbolState(config: SymbolConfig): SymbolState {
  return {
    config,
    ledger: new FillLedger(),
    managedOrders: new Map(),
    cooldownUntil: 0,
    unhedgedSince: null,
    stuckAlertSent: false,
    foreignOrderAlerted: false,
  };
}
