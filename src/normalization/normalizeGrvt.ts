/**
 * GRVT response normalization.
 *
 * Converts raw REST payloads into the snapshot views the hedge core works
 * with. Optional fields are resolved here:
 * - mark price falls back to entry price when missing or non-positive
 * - average fill price falls back to the leg's limit price
 * - missing per-leg state arrays read as zero
 * - orders without legs are dropped
 */

import Decimal from "decimal.js";
import type {
  AccountSummary,
  BookTop,
  InstrumentInfo,
  OrderView,
  PositionSnapshot,
} from "../exchange/types";
import type {
  GrvtAccountSummaryRaw,
  GrvtInstrumentRaw,
  GrvtOrderRaw,
  GrvtOrderbookRaw,
  GrvtPositionRaw,
} from "../venues/grvt/types";
import { ZERO, baseQuantum, toDecimal } from "../utils/decimal";

/** Base decimals assumed when instrument metadata omits them */
const DEFAULT_BASE_DECIMALS = 6;

/** Tick assumed when instrument metadata omits it */
const DEFAULT_TICK_SIZE = new Decimal("0.1");

/**
 * Flat position, used for instruments an account does not hold.
 */
export function emptyPosition(): PositionSnapshot {
  return {
    size: ZERO,
    markPrice: ZERO,
    entryPrice: ZERO,
    signedNotional: ZERO,
    absNotional: ZERO,
  };
}

export function toPositionSnapshot(raw: GrvtPositionRaw): PositionSnapshot {
  const size = toDecimal(raw.size);
  const entryPrice = toDecimal(raw.entry_price);
  let markPrice = toDecimal(raw.mark_price);
  if (markPrice.lte(0)) {
    markPrice = entryPrice;
  }
  const signedNotional = size.mul(markPrice);
  return {
    size,
    markPrice,
    entryPrice,
    signedNotional,
    absNotional: signedNotional.abs(),
  };
}

/**
 * Index position rows by instrument.
 */
export function groupPositions(rows: GrvtPositionRaw[]): Map<string, PositionSnapshot> {
  const result = new Map<string, PositionSnapshot>();
  for (const row of rows) {
    if (!row.instrument) continue;
    result.set(row.instrument, toPositionSnapshot(row));
  }
  return result;
}

/**
 * Parse an order create_time (ISO-8601 or unix nanoseconds) into ms.
 */
export function parseCreateTimeMs(value: string | undefined): number | null {
  const text = (value ?? "").trim();
  if (!text) return null;
  if (text.endsWith("Z") || text.includes("T")) {
    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : ms;
  }
  if (!/^\d+$/.test(text)) return null;
  return Number(BigInt(text) / 1_000_000n);
}

/**
 * Normalize a single-leg order. Returns null for orders without legs.
 */
export function toOrderView(raw: GrvtOrderRaw): OrderView | null {
  const leg = raw.legs?.[0];
  if (!leg) return null;

  const limitPrice = toDecimal(leg.limit_price);
  const state = raw.state;
  const avgFill = toDecimal(state?.avg_fill_price?.[0]);

  return {
    orderId: raw.order_id ?? "",
    clientOrderId: raw.metadata?.client_order_id ?? "",
    instrument: leg.instrument,
    side: leg.is_buying_asset ? "buy" : "sell",
    limitPrice,
    size: toDecimal(leg.size),
    tradedSize: toDecimal(state?.traded_size?.[0]),
    avgFillPrice: avgFill.gt(0) ? avgFill : limitPrice,
    bookSize: toDecimal(state?.book_size?.[0]),
    status: state?.status ?? "OPEN",
    createTimeMs: parseCreateTimeMs(raw.metadata?.create_time),
  };
}

/**
 * Normalize open orders and group them by instrument.
 */
export function groupOrdersByInstrument(rows: GrvtOrderRaw[]): Map<string, OrderView[]> {
  const grouped = new Map<string, OrderView[]>();
  for (const row of rows) {
    const view = toOrderView(row);
    if (!view) continue;
    const list = grouped.get(view.instrument);
    if (list) {
      list.push(view);
    } else {
      grouped.set(view.instrument, [view]);
    }
  }
  return grouped;
}

export function toInstrumentInfo(raw: GrvtInstrumentRaw): InstrumentInfo {
  const baseDecimals = raw.base_decimals ?? DEFAULT_BASE_DECIMALS;
  const quantum = baseQuantum(baseDecimals);
  const minSize = toDecimal(raw.min_size);
  const step = minSize.gt(0) ? minSize : quantum;

  return {
    instrument: raw.instrument,
    instrumentHash: raw.instrument_hash ?? "0x0",
    tickSize: toDecimal(raw.tick_size, DEFAULT_TICK_SIZE),
    minSize,
    sizeStep: step.lt(quantum) ? quantum : step,
    baseDecimals,
  };
}

/**
 * Best bid/ask, or null when either side of the book is empty or invalid.
 */
export function toBookTop(raw: GrvtOrderbookRaw): BookTop | null {
  const bid = raw.bids?.[0];
  const ask = raw.asks?.[0];
  if (!bid || !ask) return null;

  const bid1 = toDecimal(bid.price);
  const ask1 = toDecimal(ask.price);
  if (bid1.lte(0) || ask1.lte(0)) return null;

  return { bid1, ask1 };
}

export function toAccountSummary(raw: GrvtAccountSummaryRaw): AccountSummary {
  return {
    equity: toDecimal(raw.total_equity),
    maintenanceMargin: toDecimal(raw.maintenance_margin),
    availableBalance: toDecimal(raw.available_balance),
  };
}
