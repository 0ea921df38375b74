import { describe, test, expect } from "vitest";
import Decimal from "decimal.js";
import { recoverTypedDataAddress, type Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { GrvtOrderSigner, buildOrderTypedData, splitSignature } from "../src/venues/grvt/signer";
import type { InstrumentInfo, UnsignedOrder } from "../src/exchange/types";

const PRIVATE_KEY: Hex = `0x${"11".repeat(32)}`;

const instrument: InstrumentInfo = {
  instrument: "BTC_USDT_Perp",
  instrumentHash: "0x030501",
  tickSize: new Decimal("0.1"),
  minSize: new Decimal("0.001"),
  sizeStep: new Decimal("0.001"),
  baseDecimals: 9,
};

function makeOrder(overrides: Partial<UnsignedOrder> = {}): UnsignedOrder {
  return {
    subAccountId: "1001",
    instrument: "BTC_USDT_Perp",
    side: "buy",
    size: new Decimal("0.02"),
    limitPrice: new Decimal("50000.5"),
    clientOrderId: "2000000001",
    postOnly: true,
    reduceOnly: false,
    expirationNs: 1_767_600_000_000_000_000n,
    nonce: 424242,
    createTime: "1767585600000000000",
    ...overrides,
  };
}

describe("buildOrderTypedData", () => {
  test("scales size by base decimals and price by 1e9", () => {
    const typed = buildOrderTypedData(makeOrder(), instrument, "testnet");

    expect(typed.domain?.chainId).toBe(326);
    const [leg] = typed.message.legs;
    expect(leg.assetID).toBe(0x030501n);
    expect(leg.contractSize).toBe(20_000_000n);
    expect(leg.limitPrice).toBe(50_000_500_000_000n);
    expect(leg.isBuyingContract).toBe(true);
    expect(typed.message.subAccountID).toBe(1001n);
    expect(typed.message.timeInForce).toBe(1);
    expect(typed.message.postOnly).toBe(true);
  });

  test("sell orders do not buy the contract", () => {
    const typed = buildOrderTypedData(makeOrder({ side: "sell" }), instrument, "prod");
    expect(typed.domain?.chainId).toBe(325);
    expect(typed.message.legs[0].isBuyingContract).toBe(false);
  });
});

test("splitSignature reads r, s and v", () => {
  const signature: Hex = `0x${"ab".repeat(32)}${"cd".repeat(32)}1c`;
  expect(splitSignature(signature)).toEqual({
    r: `0x${"ab".repeat(32)}`,
    s: `0x${"cd".repeat(32)}`,
    v: 28,
  });
});

describe("GrvtOrderSigner", () => {
  test("signature recovers to the signer address", async () => {
    const signer = new GrvtOrderSigner(PRIVATE_KEY, "testnet");
    const order = makeOrder();
    const signed = await signer.signOrder(order, instrument);

    expect(signer.address).toBe(privateKeyToAccount(PRIVATE_KEY).address);
    expect(signed.signature?.signer).toBe(signer.address);
    expect(signed.signature?.nonce).toBe(424242);
    expect(signed.signature?.expiration).toBe("1767600000000000000");
    expect(signed.legs?.[0]).toEqual({
      instrument: "BTC_USDT_Perp",
      size: "0.02",
      limit_price: "50000.5",
      is_buying_asset: true,
    });
    expect(signed.metadata?.client_order_id).toBe("2000000001");

    const sig = signed.signature;
    if (!sig) throw new Error("missing signature");
    const joined: Hex = `0x${sig.r.slice(2)}${sig.s.slice(2)}${sig.v.toString(16).padStart(2, "0")}`;
    const recovered = await recoverTypedDataAddress({
      ...buildOrderTypedData(order, instrument, "testnet"),
      signature: joined,
    });
    expect(recovered).toBe(signer.address);
  });

  test("accepts keys without the 0x prefix", () => {
    const signer = new GrvtOrderSigner("11".repeat(32), "testnet");
    expect(signer.address).toBe(privateKeyToAccount(PRIVATE_KEY).address);
  });

  test("rejects malformed keys", () => {
    expect(() => new GrvtOrderSigner("test-secret", "testnet")).toThrow("Private key must be 32 bytes of hex");
  });
});
