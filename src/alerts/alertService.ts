/**
 * Alert dispatch with per-key cooldown.
 *
 * Owns the process-wide alert state (last send time per dedup key and the
 * last day a digest went out). One instance is created at startup and
 * injected wherever alerts are raised.
 */

import type { Logger } from "../logging/logger";
import type { EventLog } from "../logging/fileLogger";
import { noopEventLog } from "../logging/fileLogger";
import type { Notifier } from "./notifier";

export interface AlertServiceDeps {
  notifier: Notifier;
  logger: Logger;
  eventLog?: EventLog;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
  /** UTC offset (hours) that defines the digest calendar day (default: 8) */
  digestUtcOffsetHours?: number;
}

export interface AlertState {
  lastSentByKey: Map<string, number>;
  lastDigestDay: string | null;
}

/**
 * Calendar day (YYYY-MM-DD) of `ts` in a fixed UTC offset.
 */
export function dayKey(ts: number, utcOffsetHours: number): string {
  const shifted = new Date(ts + utcOffsetHours * 3_600_000);
  return shifted.toISOString().substring(0, 10);
}

export class AlertService {
  private deps: AlertServiceDeps;
  private state: AlertState = {
    lastSentByKey: new Map(),
    lastDigestDay: null,
  };

  constructor(deps: AlertServiceDeps) {
    this.deps = deps;
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  /**
   * Raise an alert unless `dedupKey` fired within `cooldownMs`.
   *
   * Logs the alert and hands it to the notifier without waiting for
   * delivery.
   *
   * @returns true if the alert was emitted
   */
  notify(title: string, message: string, dedupKey: string, cooldownMs: number = 300_000): boolean {
    const now = this.now();
    const lastTs = this.state.lastSentByKey.get(dedupKey);
    if (lastTs !== undefined && now - lastTs < cooldownMs) {
      return false;
    }
    this.state.lastSentByKey.set(dedupKey, now);

    this.deps.logger.warn(`${title} | ${message}`);
    (this.deps.eventLog ?? noopEventLog).record("ALERT", { key: dedupKey, title, message });
    this.dispatch(`${title}\n${message}`);
    return true;
  }

  /**
   * Send the daily digest at most once per calendar day. Nothing is sent
   * (and the day is not consumed) when there are no lines.
   *
   * @returns true if a digest was sent
   */
  sendDailyDigest(header: string, lines: string[]): boolean {
    const day = dayKey(this.now(), this.deps.digestUtcOffsetHours ?? 8);
    if (this.state.lastDigestDay === day) return false;
    if (lines.length === 0) return false;

    const body = `${header}\n${lines.join("\n")}`;
    this.state.lastDigestDay = day;
    this.deps.logger.warn(body);
    this.dispatch(body);
    return true;
  }

  /** Read-only view of the alert state. */
  getState(): Readonly<AlertState> {
    return this.state;
  }

  private dispatch(text: string): void {
    this.deps.notifier.send(text).catch((error: unknown) => {
      this.deps.logger.debug(
        `[ALERT] Notification delivery failed: ${error instanceof Error ? error.message : String(error)}`
      );
    });
  }
}
