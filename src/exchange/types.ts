/**
 * Exchange contracts consumed by the hedge core.
 *
 * The core talks to one ExchangeClient per trading account. Every call
 * resolves to an ApiResult; API errors are values, not exceptions.
 */

import type Decimal from "decimal.js";
import type { Side } from "../strategy/types";
import type {
  GrvtAccountSummaryRaw,
  GrvtAckRaw,
  GrvtInstrumentRaw,
  GrvtOrderRaw,
  GrvtOrderStatus,
  GrvtOrderbookRaw,
  GrvtPositionRaw,
} from "../venues/grvt/types";

/**
 * Typed error outcome of an exchange call.
 * Network failures carry status 0.
 */
export interface ApiError {
  code: number;
  status: number;
  message: string;
}

export type ApiResult<T> =
  | { ok: true; result: T }
  | { ok: false; error: ApiError };

export function apiOk<T>(result: T): ApiResult<T> {
  return { ok: true, result };
}

export function apiErr<T>(code: number, status: number, message: string): ApiResult<T> {
  return { ok: false, error: { code, status, message } };
}

/**
 * Exchange operations for a single trading (sub-)account.
 */
export interface ExchangeClient {
  getPositions(): Promise<ApiResult<GrvtPositionRaw[]>>;
  getOpenOrders(): Promise<ApiResult<GrvtOrderRaw[]>>;
  /** Look up one order, including closed ones */
  getOrder(orderId: string): Promise<ApiResult<GrvtOrderRaw>>;
  getInstrument(instrument: string): Promise<ApiResult<GrvtInstrumentRaw>>;
  getAllInstruments(): Promise<ApiResult<GrvtInstrumentRaw[]>>;
  getOrderBook(instrument: string, depth: number): Promise<ApiResult<GrvtOrderbookRaw>>;
  getAccountSummary(): Promise<ApiResult<GrvtAccountSummaryRaw>>;
  createOrder(order: GrvtOrderRaw): Promise<ApiResult<GrvtOrderRaw>>;
  cancelOrder(orderId: string): Promise<ApiResult<GrvtAckRaw>>;
}

/**
 * Order as built by the strategy, before signing.
 */
export interface UnsignedOrder {
  subAccountId: string;
  instrument: string;
  side: Side;
  size: Decimal;
  limitPrice: Decimal;
  clientOrderId: string;
  postOnly: boolean;
  reduceOnly: boolean;
  /** Unix nanoseconds */
  expirationNs: bigint;
  nonce: number;
  createTime: string;
}

/**
 * Signs orders with an account credential.
 */
export interface OrderSigner {
  readonly address: string;
  signOrder(order: UnsignedOrder, instrument: InstrumentInfo): Promise<GrvtOrderRaw>;
}

// === Normalized views produced by the snapshot layer ===

export type OrderStatus = GrvtOrderStatus;

export type TerminalOrderStatus = "FILLED" | "CANCELLED" | "REJECTED";

const TERMINAL_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set<TerminalOrderStatus>([
  "FILLED",
  "CANCELLED",
  "REJECTED",
]);

export function isTerminalStatus(status: OrderStatus): status is TerminalOrderStatus {
  return TERMINAL_ORDER_STATUSES.has(status);
}

/**
 * Position of one account on one instrument, recomputed every poll.
 */
export interface PositionSnapshot {
  /** Signed size in base units */
  size: Decimal;
  markPrice: Decimal;
  entryPrice: Decimal;
  /** size × markPrice */
  signedNotional: Decimal;
  absNotional: Decimal;
}

/**
 * Normalized single-leg exchange order.
 */
export interface OrderView {
  orderId: string;
  clientOrderId: string;
  instrument: string;
  side: Side;
  limitPrice: Decimal;
  size: Decimal;
  tradedSize: Decimal;
  /** Average fill price, or the limit price when nothing is reported */
  avgFillPrice: Decimal;
  /** Size still resting on the book */
  bookSize: Decimal;
  status: OrderStatus;
  /** Creation time in ms, when reported */
  createTimeMs: number | null;
}

export interface InstrumentInfo {
  instrument: string;
  instrumentHash: string;
  tickSize: Decimal;
  minSize: Decimal;
  sizeStep: Decimal;
  baseDecimals: number;
}

export interface BookTop {
  bid1: Decimal;
  ask1: Decimal;
}

export interface AccountSummary {
  equity: Decimal;
  maintenanceMargin: Decimal;
  availableBalance: Decimal;
}

/**
 * Everything the engine observes about one account in a poll cycle.
 */
export interface AccountSnapshot {
  /** Keyed by instrument */
  /** Null when the positions query failed */
  positions: Map<string, PositionSnapshot> | null;
  /** Open orders keyed by instrument */
  openOrders: Map<string, OrderView[]>;
  summary: AccountSummary | null;
}
