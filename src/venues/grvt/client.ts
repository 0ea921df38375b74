/**
 * GRVT REST client (full/v1 schema).
 *
 * One client per trading sub-account. The session is established lazily on
 * the first authenticated call and renewed when its cookie expires. Every
 * call resolves to an ApiResult; HTTP and network failures become error
 * values, never exceptions.
 */

import type { ApiResult, ExchangeClient } from "../../exchange/types";
import { apiErr, apiOk } from "../../exchange/types";
import { type GrvtSession, isSessionValid, loginWithApiKey } from "./auth";
import { type GrvtEndpoints, getEndpoints } from "./env";
import type {
  GrvtAccountSummaryRaw,
  GrvtAckRaw,
  GrvtEnv,
  GrvtErrorRaw,
  GrvtInstrumentRaw,
  GrvtOrderRaw,
  GrvtOrderbookRaw,
  GrvtPositionRaw,
} from "./types";

export interface GrvtClientOptions {
  env: GrvtEnv;
  apiKey: string;
  /** Trading sub-account id */
  subAccountId: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Override hosts (tests, proxies) */
  endpoints?: Partial<GrvtEndpoints>;
}

const PERPETUAL_KIND = ["PERPETUAL"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toApiError<T>(httpStatus: number, body: unknown): ApiResult<T> {
  const raw: GrvtErrorRaw = isRecord(body)
    ? {
        code: typeof body.code === "number" ? body.code : undefined,
        message: typeof body.message === "string" ? body.message : undefined,
        status: typeof body.status === "number" ? body.status : undefined,
      }
    : {};
  return apiErr(raw.code ?? 0, raw.status ?? httpStatus, raw.message ?? `HTTP ${httpStatus}`);
}

export class GrvtClient implements ExchangeClient {
  private options: GrvtClientOptions;
  private endpoints: GrvtEndpoints;
  private timeout: number;
  private session: GrvtSession | null = null;

  constructor(options: GrvtClientOptions) {
    this.options = options;
    this.endpoints = { ...getEndpoints(options.env), ...options.endpoints };
    this.timeout = options.timeout || 10_000;
  }

  getPositions(): Promise<ApiResult<GrvtPositionRaw[]>> {
    return this.trades("positions", {
      sub_account_id: this.options.subAccountId,
      kind: PERPETUAL_KIND,
    });
  }

  getOpenOrders(): Promise<ApiResult<GrvtOrderRaw[]>> {
    return this.trades("open_orders", {
      sub_account_id: this.options.subAccountId,
      kind: PERPETUAL_KIND,
    });
  }

  getOrder(orderId: string): Promise<ApiResult<GrvtOrderRaw>> {
    return this.trades("order", {
      sub_account_id: this.options.subAccountId,
      order_id: orderId,
    });
  }

  getAccountSummary(): Promise<ApiResult<GrvtAccountSummaryRaw>> {
    return this.trades("aggregated_account_summary", {});
  }

  createOrder(order: GrvtOrderRaw): Promise<ApiResult<GrvtOrderRaw>> {
    return this.trades("create_order", { order });
  }

  cancelOrder(orderId: string): Promise<ApiResult<GrvtAckRaw>> {
    return this.trades("cancel_order", {
      sub_account_id: this.options.subAccountId,
      order_id: orderId,
    });
  }

  getInstrument(instrument: string): Promise<ApiResult<GrvtInstrumentRaw>> {
    return this.marketData("instrument", { instrument });
  }

  getAllInstruments(): Promise<ApiResult<GrvtInstrumentRaw[]>> {
    return this.marketData("all_instruments", { is_active: true });
  }

  getOrderBook(instrument: string, depth: number): Promise<ApiResult<GrvtOrderbookRaw>> {
    return this.marketData("book", { instrument, depth });
  }

  private async trades<T>(path: string, body: object): Promise<ApiResult<T>> {
    const session = await this.ensureSession();
    if (!session.ok) return session;
    return this.post<T>(`${this.endpoints.trades}/full/v1/${path}`, body, {
      Cookie: session.result.cookie,
      "X-Grvt-Account-Id": session.result.accountId,
    });
  }

  private async marketData<T>(path: string, body: object): Promise<ApiResult<T>> {
    return this.post<T>(`${this.endpoints.marketData}/full/v1/${path}`, body, {});
  }

  private async ensureSession(): Promise<ApiResult<GrvtSession>> {
    if (this.session && isSessionValid(this.session)) {
      return apiOk(this.session);
    }
    const login = await loginWithApiKey(this.endpoints.edge, this.options.apiKey, this.timeout);
    this.session = login.ok ? login.result : null;
    return login;
  }

  private async post<T>(
    url: string,
    body: object,
    headers: Record<string, string>
  ): Promise<ApiResult<T>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          ...headers,
        },
        body: JSON.stringify(body),
      });

      const text = await response.text();
      let data: unknown = null;
      if (text) {
        try {
          data = JSON.parse(text);
        } catch {
          data = { message: text };
        }
      }

      if (!response.ok) {
        if (response.status === 401) this.session = null;
        return toApiError(response.status, data);
      }
      if (!isRecord(data) || !("result" in data)) {
        return toApiError(response.status, data);
      }
      // Response shapes follow the published full/v1 schema.
      return apiOk(data.result as T);
    } catch (error) {
      return apiErr(0, 0, `Request failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
