/**
 * Account runtime: one per hedge leg.
 *
 * Wraps the leg's exchange client with the retry policy every call shares:
 * - auth-class errors rebuild the client (fresh session) and retry once
 * - rate limits, 5xx and network failures back off and retry
 *
 * Also owns the leg's instrument metadata cache and the snapshot queries
 * the engine runs each cycle.
 */

import type { AccountConfig } from "../config/config";
import { ALERT_COOLDOWNS, HEDGE_PARAMS } from "../config/hedgeParams";
import type {
  AccountSummary,
  ApiError,
  ApiResult,
  BookTop,
  ExchangeClient,
  InstrumentInfo,
  OrderSigner,
  OrderView,
  PositionSnapshot,
  UnsignedOrder,
} from "../exchange/types";
import type { GrvtOrderRaw } from "../venues/grvt/types";
import type { AlertService } from "../alerts/alertService";
import type { Logger } from "../logging/logger";
import type { AccountLabel } from "../strategy/types";
import {
  groupOrdersByInstrument,
  groupPositions,
  toAccountSummary,
  toBookTop,
  toInstrumentInfo,
  toOrderView,
} from "../normalization";
import { isPlaceholderOrderId } from "../state/orderIds";

export interface AccountRuntimeDeps {
  label: AccountLabel;
  config: AccountConfig;
  /** Creates a client with a fresh session */
  buildClient: () => ExchangeClient;
  signer: OrderSigner;
  alerts: AlertService;
  logger: Logger;
  /** Retries for transient errors (default: 2) */
  apiMaxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CallOptions {
  /** Retry rate-limit / 5xx / network failures (default: true) */
  retryTransient?: boolean;
}

const CANCEL_GONE_MARKERS = [
  "not found",
  "does not exist",
  "already closed",
  "already canceled",
  "already cancelled",
];

/**
 * HTTP 401, API code 1000, or a message about authentication.
 */
export function isAuthError(error: ApiError): boolean {
  const msg = error.message.toLowerCase();
  return (
    error.status === 401 ||
    error.code === 1000 ||
    msg.includes("authenticate") ||
    msg.includes("unauthorized")
  );
}

/**
 * Rate limits, server errors and network failures (status 0).
 */
export function isTransientError(error: ApiError): boolean {
  return error.status === 0 || error.status === 429 || error.status >= 500;
}

export function formatApiError(error: ApiError): string {
  return `code=${error.code} status=${error.status} msg=${error.message}`;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class AccountRuntime {
  readonly label: AccountLabel;
  readonly config: AccountConfig;
  readonly signer: OrderSigner;
  private deps: AccountRuntimeDeps;
  private client: ExchangeClient;
  private instruments = new Map<string, InstrumentInfo>();

  constructor(deps: AccountRuntimeDeps) {
    this.deps = deps;
    this.label = deps.label;
    this.config = deps.config;
    this.signer = deps.signer;
    this.client = deps.buildClient();
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Run an exchange call under the shared retry policy.
   */
  async call<T>(
    op: (client: ExchangeClient) => Promise<ApiResult<T>>,
    options: CallOptions = {}
  ): Promise<ApiResult<T>> {
    const retryTransient = options.retryTransient ?? true;
    const maxRetries = this.deps.apiMaxRetries ?? 2;
    const sleep = this.deps.sleep ?? defaultSleep;

    let rebuilt = false;
    let attempt = 0;
    for (;;) {
      const result = await op(this.client);
      if (result.ok) return result;

      if (!rebuilt && isAuthError(result.error)) {
        rebuilt = true;
        this.deps.logger.warn(`[ACCOUNT] ${this.name} auth error, rebuilding client`, {
          code: result.error.code,
          status: result.error.status,
        });
        this.client = this.deps.buildClient();
        continue;
      }

      if (retryTransient && attempt < maxRetries && isTransientError(result.error)) {
        const delay = Math.min(
          HEDGE_PARAMS.apiBackoffBaseMs * 2 ** attempt,
          HEDGE_PARAMS.apiBackoffCapMs
        );
        attempt++;
        this.deps.logger.debug(
          `[ACCOUNT] ${this.name} transient error, retry ${attempt}/${maxRetries} in ${delay}ms`,
          { status: result.error.status, message: result.error.message }
        );
        await sleep(delay);
        continue;
      }

      return result;
    }
  }

  /**
   * Instrument metadata, fetched once per symbol and cached.
   */
  async getInstrument(instrument: string): Promise<InstrumentInfo | null> {
    const cached = this.instruments.get(instrument);
    if (cached) return cached;

    const result = await this.call((client) => client.getInstrument(instrument));
    if (!result.ok) {
      this.deps.alerts.notify(
        `GRVT hedge instrument query failed ${instrument}`,
        `account=${this.name} ${formatApiError(result.error)}`,
        `instrument:${this.name}:${instrument}`,
        ALERT_COOLDOWNS.instrumentFailure
      );
      return null;
    }
    const info = toInstrumentInfo(result.result);
    this.instruments.set(instrument, info);
    return info;
  }

  /**
   * Names of all active instruments, used to resolve configured symbols.
   */
  async listInstrumentNames(): Promise<ApiResult<string[]>> {
    const result = await this.call((client) => client.getAllInstruments());
    if (!result.ok) return result;
    return { ok: true, result: result.result.map((raw) => raw.instrument).filter((name) => !!name) };
  }

  /**
   * Positions keyed by instrument; null after an alert when the query fails.
   */
  async queryPositions(): Promise<Map<string, PositionSnapshot> | null> {
    const result = await this.call((client) => client.getPositions());
    if (!result.ok) {
      this.deps.alerts.notify(
        `GRVT hedge positions failed ${this.name}`,
        formatApiError(result.error),
        `positions:${this.name}`,
        ALERT_COOLDOWNS.queryFailure
      );
      return null;
    }
    return groupPositions(result.result);
  }

  /**
   * Open orders grouped by instrument; empty after an alert when the query fails.
   */
  async queryOpenOrders(): Promise<Map<string, OrderView[]>> {
    const result = await this.call((client) => client.getOpenOrders());
    if (!result.ok) {
      this.deps.alerts.notify(
        `GRVT hedge open orders failed ${this.name}`,
        formatApiError(result.error),
        `open_orders:${this.name}`,
        ALERT_COOLDOWNS.queryFailure
      );
      return new Map();
    }
    return groupOrdersByInstrument(result.result);
  }

  async queryAccountSummary(): Promise<AccountSummary | null> {
    const result = await this.call((client) => client.getAccountSummary());
    if (!result.ok) {
      this.deps.alerts.notify(
        `GRVT hedge account summary failed ${this.name}`,
        formatApiError(result.error),
        `summary:${this.name}`,
        ALERT_COOLDOWNS.queryFailure
      );
      return null;
    }
    return toAccountSummary(result.result);
  }

  /**
   * Best bid/ask, or null when the query fails or the book is empty.
   */
  async fetchBookTop(instrument: string, depth: number): Promise<BookTop | null> {
    const result = await this.call((client) => client.getOrderBook(instrument, depth));
    if (!result.ok) {
      this.deps.alerts.notify(
        `GRVT hedge orderbook failed ${instrument}`,
        `account=${this.name} ${formatApiError(result.error)}`,
        `book:${this.name}:${instrument}`,
        ALERT_COOLDOWNS.bookFailure
      );
      return null;
    }
    return toBookTop(result.result);
  }

  /**
   * Single-order status; null when the lookup fails.
   */
  async lookupOrder(orderId: string): Promise<OrderView | null> {
    const result = await this.call((client) => client.getOrder(orderId));
    if (!result.ok) {
      this.deps.logger.debug(`[ACCOUNT] ${this.name} order lookup failed ${orderId}`, {
        code: result.error.code,
        status: result.error.status,
      });
      return null;
    }
    return toOrderView(result.result);
  }

  /**
   * Cancel an order. Placeholder ids, the empty id included, never reach
   * the exchange. Orders that are already gone count as cancelled.
   */
  async cancelOrder(orderId: string): Promise<boolean> {
    if (isPlaceholderOrderId(orderId)) return true;

    const result = await this.call((client) => client.cancelOrder(orderId));
    if (result.ok) return result.result.ack;

    const msg = result.error.message.toLowerCase();
    if (CANCEL_GONE_MARKERS.some((marker) => msg.includes(marker))) {
      return true;
    }
    this.deps.logger.warn(
      `[ACCOUNT] Cancel order failed account=${this.name} order_id=${orderId} ${formatApiError(result.error)}`
    );
    return false;
  }

  /**
   * Sign and submit an order. The order is signed again for every attempt,
   * so a client rebuilt after an auth error submits a fresh signature.
   * Submissions are not retried on transient errors.
   */
  async createSignedOrder(
    order: UnsignedOrder,
    instrument: InstrumentInfo
  ): Promise<ApiResult<GrvtOrderRaw>> {
    return this.call(
      async (client) => client.createOrder(await this.signer.signOrder(order, instrument)),
      { retryTransient: false }
    );
  }
}
