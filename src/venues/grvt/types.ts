/**
 * Type definitions for the GRVT REST API (full/v1 schema).
 *
 * Every field the exchange may omit is declared optional. Callers resolve
 * absence in the snapshot layer instead of probing shapes at run time.
 */

/**
 * Deployment environment of the exchange.
 */
export type GrvtEnv = "prod" | "testnet" | "staging" | "dev";

export const GRVT_ENVS: readonly GrvtEnv[] = ["prod", "testnet", "staging", "dev"];

export function isGrvtEnv(value: string): value is GrvtEnv {
  return (GRVT_ENVS as readonly string[]).includes(value);
}

/**
 * Order lifecycle status as reported in `order.state.status`.
 */
export type GrvtOrderStatus =
  | "PENDING"
  | "OPEN"
  | "FILLED"
  | "REJECTED"
  | "CANCELLED";

export type GrvtTimeInForce =
  | "GOOD_TILL_TIME"
  | "ALL_OR_NONE"
  | "IMMEDIATE_OR_CANCEL"
  | "FILL_OR_KILL";

/**
 * Numeric encoding of time-in-force used in the EIP-712 payload.
 */
export const TIME_IN_FORCE_VALUES: Record<GrvtTimeInForce, number> = {
  GOOD_TILL_TIME: 1,
  ALL_OR_NONE: 2,
  IMMEDIATE_OR_CANCEL: 3,
  FILL_OR_KILL: 4,
};

/**
 * Raw position row from `positions`.
 */
export interface GrvtPositionRaw {
  /** Instrument name (e.g., "BTC_USDT_Perp") */
  instrument: string;
  /** Signed size in base units; negative for shorts */
  size?: string;
  mark_price?: string;
  entry_price?: string;
  notional?: string;
  unrealized_pnl?: string;
}

export interface GrvtOrderLegRaw {
  instrument: string;
  size: string;
  limit_price?: string;
  is_buying_asset: boolean;
}

export interface GrvtSignatureRaw {
  signer: string;
  r: string;
  s: string;
  v: number;
  /** Expiration in unix nanoseconds, as a decimal string */
  expiration: string;
  nonce: number;
}

export interface GrvtOrderMetadataRaw {
  /** Client-assigned correlation id (decimal uint64 string) */
  client_order_id?: string;
  /** Creation time; ISO-8601 or unix nanoseconds */
  create_time?: string;
}

/**
 * Order state block. Array fields hold one entry per leg.
 */
export interface GrvtOrderStateRaw {
  status?: GrvtOrderStatus;
  reject_reason?: string;
  book_size?: string[];
  traded_size?: string[];
  avg_fill_price?: string[];
  update_time?: string;
}

/**
 * Raw order, used for both submission and query responses.
 */
export interface GrvtOrderRaw {
  /** Exchange order id; "0x00" until the matching engine acknowledges it */
  order_id?: string;
  sub_account_id?: string;
  is_market?: boolean;
  time_in_force?: GrvtTimeInForce;
  post_only?: boolean;
  reduce_only?: boolean;
  legs?: GrvtOrderLegRaw[];
  signature?: GrvtSignatureRaw;
  metadata?: GrvtOrderMetadataRaw;
  state?: GrvtOrderStateRaw;
}

/**
 * Raw instrument metadata from `instrument` / `all_instruments`.
 */
export interface GrvtInstrumentRaw {
  instrument: string;
  /** 0x-prefixed asset id used in signatures */
  instrument_hash?: string;
  base?: string;
  quote?: string;
  kind?: string;
  tick_size?: string;
  min_size?: string;
  base_decimals?: number;
}

export interface GrvtOrderbookLevelRaw {
  price: string;
  size: string;
  num_orders?: number;
}

export interface GrvtOrderbookRaw {
  instrument?: string;
  bids?: GrvtOrderbookLevelRaw[];
  asks?: GrvtOrderbookLevelRaw[];
}

export interface GrvtAccountSummaryRaw {
  total_equity?: string;
  maintenance_margin?: string;
  available_balance?: string;
}

export interface GrvtAckRaw {
  ack: boolean;
}

/**
 * Error body returned by the API on non-2xx responses.
 */
export interface GrvtErrorRaw {
  code?: number;
  message?: string;
  status?: number;
}

/**
 * Success envelope: every full/v1 endpoint wraps its payload in `result`.
 */
export interface GrvtResultEnvelope<T> {
  result: T;
}
