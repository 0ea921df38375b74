/**
 * Fixed parameters of the hedge engine.
 *
 * Values here are not exposed as configuration; tunables with environment
 * overrides live in config.ts and take their defaults from HEDGE_DEFAULTS.
 */

export const HEDGE_PARAMS = {
  /** Placeholder-id orders never confirmed live are closed after this (ms) */
  provisionalTimeoutMs: 60_000,
  /** Orders last seen live longer ago than this no longer count as active (ms) */
  staleSeenMs: 3_600_000,
  /** Orders never seen live no longer count as active after this (ms) */
  staleUnseenMs: 600_000,
  /** Lifetime of a submitted GTT order (ms) */
  orderExpiryMs: 15 * 60_000,
  /** Delay before retrying after a post-only rejection or empty book (ms) */
  postOnlyRetryDelayMs: 200,
  /** First backoff step for transient API errors (ms) */
  apiBackoffBaseMs: 200,
  /** Backoff ceiling for transient API errors (ms) */
  apiBackoffCapMs: 2_000,
  /** Steps of the descending search that clips an order to the total bound */
  boundClipSteps: 50,
  /** Interval between console status tables (ms) */
  statusIntervalMs: 60_000,
  /** Strategy-owned client order ids: high nibble namespace */
  orderIdMask: 0xf000000000000000n,
  orderIdPrefix: 0xe000000000000000n,
  /** Legacy textual client order id prefix */
  legacyOrderPrefix: "HEDGEV1",
} as const;

/**
 * Defaults for tunables that can be overridden from the environment.
 */
export const HEDGE_DEFAULTS = {
  loopIntervalSec: 2,
  postOnlyMaxRetry: 5,
  postOnlyCooldownSec: 300,
  partialFillTimeoutSec: 1800,
  stuckHours: 6,
  mmrAlertThreshold: "0.70",
  orderbookDepth: 10,
  singleOrderDiffThresholdUsdt: "20",
  stopKeepStrategyOrders: 0,
  maxRuntimeSec: 0,
  apiMaxRetries: 2,
  digestUtcOffsetHours: 8,
  symbolsFile: "config/hedge_symbols.json",
} as const;

/**
 * Cooldowns (ms) per alert family.
 */
export const ALERT_COOLDOWNS = {
  queryFailure: 120_000,
  bookFailure: 60_000,
  instrumentFailure: 600_000,
  orderFailed: 120_000,
  placementCooldown: 120_000,
  totalBound: 900_000,
  directionMismatch: 1_800_000,
  foreignOrder: 3_600_000,
  stuck: 3_600_000,
  margin: 1_800_000,
  symbolError: 120_000,
  loopError: 120_000,
} as const;
