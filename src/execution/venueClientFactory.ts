/**
 * Venue client factory for the two hedge legs.
 *
 * Builds, per leg, the signer and an AccountRuntime whose client factory
 * creates a GRVT client with a fresh session on every rebuild.
 */

import type { AccountConfig } from "../config/config";
import type { AlertService } from "../alerts/alertService";
import type { Logger } from "../logging/logger";
import type { AccountLabel } from "../strategy/types";
import { GrvtClient } from "../venues/grvt/client";
import { GrvtOrderSigner } from "../venues/grvt/signer";
import { AccountRuntime } from "./accountRuntime";

export type HedgeAccountConfig = AccountConfig & { privateKey: string };

export interface AccountRuntimeFactoryOptions {
  alerts: AlertService;
  logger: Logger;
  apiMaxRetries: number;
  /** Request timeout in milliseconds */
  timeout?: number;
}

export function createAccountRuntime(
  label: AccountLabel,
  account: HedgeAccountConfig,
  options: AccountRuntimeFactoryOptions
): AccountRuntime {
  const signer = new GrvtOrderSigner(account.privateKey, account.env);
  return new AccountRuntime({
    label,
    config: account,
    buildClient: () =>
      new GrvtClient({
        env: account.env,
        apiKey: account.apiKey,
        subAccountId: account.accountId,
        timeout: options.timeout,
      }),
    signer,
    alerts: options.alerts,
    logger: options.logger,
    apiMaxRetries: options.apiMaxRetries,
  });
}

/**
 * Runtimes for leg A (first account) and leg B (second account).
 */
export function createAccountRuntimes(
  accounts: [HedgeAccountConfig, HedgeAccountConfig],
  options: AccountRuntimeFactoryOptions
): Record<AccountLabel, AccountRuntime> {
  const [first, second] = accounts;
  const runtimes = {
    A: createAccountRuntime("A", first, options),
    B: createAccountRuntime("B", second, options),
  };
  options.logger.info(
    `[FACTORY] Hedge legs A=${first.name} (${runtimes.A.signer.address}) B=${second.name} (${runtimes.B.signer.address})`
  );
  return runtimes;
}
