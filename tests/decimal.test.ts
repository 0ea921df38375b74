import { describe, test, expect } from "vitest";
import Decimal from "decimal.js";
import {
  baseQuantum,
  parseDecimal,
  quantizePrice,
  sizeFromNotional,
  sumDecimals,
  toDecimal,
  toOrderNotional,
} from "../src/utils/decimal";

describe("toDecimal", () => {
  test("parses strings and numbers", () => {
    expect(toDecimal("1.5").toString()).toBe("1.5");
    expect(toDecimal(42).toString()).toBe("42");
  });

  test("falls back on empty, invalid and non-finite input", () => {
    const fallback = new Decimal(3);
    expect(toDecimal("", fallback).toString()).toBe("3");
    expect(toDecimal("abc", fallback).toString()).toBe("3");
    expect(toDecimal(undefined, fallback).toString()).toBe("3");
    expect(toDecimal("Infinity", fallback).toString()).toBe("3");
    expect(toDecimal(null).toString()).toBe("0");
  });
});

describe("parseDecimal", () => {
  test("returns null for anything that is not a finite number", () => {
    expect(parseDecimal("250.5")?.toFixed()).toBe("250.5");
    expect(parseDecimal(-3)?.toFixed()).toBe("-3");
    expect(parseDecimal("5OO")).toBeNull();
    expect(parseDecimal(" ")).toBeNull();
    expect(parseDecimal(Number.NaN)).toBeNull();
    expect(parseDecimal("-Infinity")).toBeNull();
    expect(parseDecimal(true)).toBeNull();
  });
});

describe("toOrderNotional", () => {
  test("truncates to 6 decimals", () => {
    expect(toOrderNotional(new Decimal("0.0123456789"), new Decimal(100)).toFixed()).toBe("1.234567");
  });
});

describe("quantizePrice", () => {
  test("rounds buys down and sells up", () => {
    expect(quantizePrice(new Decimal("100.07"), new Decimal("0.1"), "buy").toFixed()).toBe("100");
    expect(quantizePrice(new Decimal("100.07"), new Decimal("0.1"), "sell").toFixed()).toBe("100.1");
  });

  test("keeps prices already on the grid", () => {
    expect(quantizePrice(new Decimal("100.2"), new Decimal("0.1"), "sell").toFixed()).toBe("100.2");
  });

  test("non-positive tick leaves the price unchanged", () => {
    expect(quantizePrice(new Decimal("100.07"), new Decimal(0), "buy").toFixed()).toBe("100.07");
  });
});

describe("sizeFromNotional", () => {
  const rules = { minSize: new Decimal("0.001"), sizeStep: new Decimal("0.001"), baseDecimals: 9 };

  test("rounds down to the size step", () => {
    expect(sizeFromNotional(new Decimal(1000), new Decimal(30000), rules).toFixed()).toBe("0.033");
  });

  test("raises small sizes to the instrument minimum", () => {
    expect(sizeFromNotional(new Decimal(10), new Decimal(30000), rules).toFixed()).toBe("0.001");
  });

  test("uses the base quantum when the step is finer", () => {
    const coarse = { minSize: new Decimal(0), sizeStep: new Decimal("0.0001"), baseDecimals: 2 };
    expect(sizeFromNotional(new Decimal(100), new Decimal(3), coarse).toFixed()).toBe("33.33");
  });

  test("returns zero for non-positive price or notional", () => {
    expect(sizeFromNotional(new Decimal(100), new Decimal(0), rules).isZero()).toBe(true);
    expect(sizeFromNotional(new Decimal(0), new Decimal(100), rules).isZero()).toBe(true);
  });
});

describe("helpers", () => {
  test("baseQuantum", () => {
    expect(baseQuantum(3).toFixed()).toBe("0.001");
  });

  test("sumDecimals", () => {
    expect(sumDecimals([new Decimal("0.1"), new Decimal("0.2")]).toFixed()).toBe("0.3");
    expect(sumDecimals([]).toFixed()).toBe("0");
  });
});
