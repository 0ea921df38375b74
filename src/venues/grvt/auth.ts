/**
 * GRVT API-key session login.
 *
 * POST {edge}/auth/api_key/login with the API key returns a `gravity`
 * session cookie and the `X-Grvt-Account-Id` header. Both are attached to
 * every authenticated request.
 */

import type { ApiResult } from "../../exchange/types";
import { apiErr, apiOk } from "../../exchange/types";

export interface GrvtSession {
  /** Cookie header value, e.g. "gravity=abc" */
  cookie: string;
  accountId: string;
  /** Cookie expiry in ms; Infinity when the server sent none */
  expiresAt: number;
}

/** Sessions are refreshed this long before they expire (ms) */
const EXPIRY_MARGIN_MS = 60_000;

export function isSessionValid(session: GrvtSession | null, now: number = Date.now()): boolean {
  return session !== null && session.expiresAt - EXPIRY_MARGIN_MS > now;
}

/**
 * Extract the gravity cookie and its expiry from a Set-Cookie header.
 */
export function parseSessionCookie(
  setCookie: string | null
): { cookie: string; expiresAt: number } | null {
  if (!setCookie) return null;
  const match = /gravity=([^;,\s]+)/.exec(setCookie);
  if (!match) return null;

  const expires = /expires=([^;]+)/i.exec(setCookie);
  const parsed = expires ? Date.parse(expires[1]) : NaN;
  return {
    cookie: `gravity=${match[1]}`,
    expiresAt: Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : parsed,
  };
}

/**
 * Log in with an API key.
 */
export async function loginWithApiKey(
  edgeUrl: string,
  apiKey: string,
  timeout: number = 10_000
): Promise<ApiResult<GrvtSession>> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(`${edgeUrl}/auth/api_key/login`, {
      method: "POST",
      signal: controller.signal,
      headers: {
        "Content-Type": "application/json",
        Cookie: "rm=true;",
      },
      body: JSON.stringify({ api_key: apiKey }),
    });

    if (!response.ok) {
      return apiErr(1000, response.status, `Login failed with HTTP ${response.status}`);
    }

    const parsed = parseSessionCookie(response.headers.get("set-cookie"));
    if (!parsed) {
      return apiErr(1000, 401, "Login response carried no session cookie");
    }

    return apiOk({
      cookie: parsed.cookie,
      accountId: response.headers.get("x-grvt-account-id") ?? "",
      expiresAt: parsed.expiresAt,
    });
  } catch (error) {
    return apiErr(0, 0, `Login request failed: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    clearTimeout(timeoutId);
  }
}
