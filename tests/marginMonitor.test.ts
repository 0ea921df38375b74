import { describe, test, expect } from "vitest";
import Decimal from "decimal.js";
import { checkMarginRatio, marginRatio } from "../src/risk/marginMonitor";
import { makeAlerts } from "./helpers/fakeExchange";

const summary = (equity: string, maintenanceMargin: string) => ({
  equity: new Decimal(equity),
  maintenanceMargin: new Decimal(maintenanceMargin),
  availableBalance: new Decimal(0),
});

describe("marginRatio", () => {
  test("maintenance margin over equity", () => {
    expect(marginRatio(summary("1000", "250"))?.toFixed()).toBe("0.25");
  });

  test("null without positive equity", () => {
    expect(marginRatio(summary("0", "250"))).toBeNull();
  });
});

describe("checkMarginRatio", () => {
  test("alerts at the threshold", () => {
    const { alerts, notifier } = makeAlerts();

    expect(checkMarginRatio(alerts, "Trading_A", summary("1000", "700"), new Decimal("0.7"))).toBe(true);
    expect(notifier.messages).toEqual([
      "GRVT Trading_A MMR ALERT 70.00%\nmaintenance_margin=700 equity=1000 threshold=70.00%",
    ]);
  });

  test("stays quiet below the threshold or without a summary", () => {
    const { alerts, notifier } = makeAlerts();

    expect(checkMarginRatio(alerts, "Trading_A", summary("1000", "699"), new Decimal("0.7"))).toBe(false);
    expect(checkMarginRatio(alerts, "Trading_A", null, new Decimal("0.7"))).toBe(false);
    expect(notifier.messages).toEqual([]);
  });
});
