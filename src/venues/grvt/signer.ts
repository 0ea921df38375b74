/**
 * GRVT order signing module.
 *
 * Implements EIP-712 signing for GRVT orders using viem.
 */

import Decimal from "decimal.js";
import type { Hex, PrivateKeyAccount, TypedDataDefinition } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { InstrumentInfo, OrderSigner, UnsignedOrder } from "../../exchange/types";
import { getEndpoints } from "./env";
import { TIME_IN_FORCE_VALUES, type GrvtEnv, type GrvtOrderRaw } from "./types";

/**
 * Limit prices are signed as fixed-point integers with 9 decimals.
 */
const PRICE_MULTIPLIER = new Decimal(1_000_000_000);

/**
 * EIP-712 types for GRVT orders.
 */
export const ORDER_TYPES = {
  Order: [
    { name: "subAccountID", type: "uint64" },
    { name: "isMarket", type: "bool" },
    { name: "timeInForce", type: "uint8" },
    { name: "postOnly", type: "bool" },
    { name: "reduceOnly", type: "bool" },
    { name: "legs", type: "OrderLeg[]" },
    { name: "nonce", type: "uint32" },
    { name: "expiration", type: "int64" },
  ],
  OrderLeg: [
    { name: "assetID", type: "uint256" },
    { name: "contractSize", type: "uint64" },
    { name: "limitPrice", type: "uint64" },
    { name: "isBuyingContract", type: "bool" },
  ],
} as const;

function toScaledInteger(value: Decimal, multiplier: Decimal): bigint {
  return BigInt(value.mul(multiplier).toFixed(0, Decimal.ROUND_DOWN));
}

/**
 * Typed-data payload signed for one single-leg order.
 */
export function buildOrderTypedData(
  order: UnsignedOrder,
  instrument: InstrumentInfo,
  env: GrvtEnv
): TypedDataDefinition<typeof ORDER_TYPES, "Order"> {
  const sizeMultiplier = new Decimal(10).pow(instrument.baseDecimals);
  return {
    domain: {
      name: "GRVT Exchange",
      version: "0",
      chainId: getEndpoints(env).chainId,
    },
    types: ORDER_TYPES,
    primaryType: "Order",
    message: {
      subAccountID: BigInt(order.subAccountId),
      isMarket: false,
      timeInForce: TIME_IN_FORCE_VALUES.GOOD_TILL_TIME,
      postOnly: order.postOnly,
      reduceOnly: order.reduceOnly,
      legs: [
        {
          assetID: BigInt(instrument.instrumentHash),
          contractSize: toScaledInteger(order.size, sizeMultiplier),
          limitPrice: toScaledInteger(order.limitPrice, PRICE_MULTIPLIER),
          isBuyingContract: order.side === "buy",
        },
      ],
      nonce: order.nonce,
      expiration: order.expirationNs,
    },
  };
}

/**
 * Split a 65-byte hex signature into r, s and v.
 */
export function splitSignature(signature: Hex): { r: Hex; s: Hex; v: number } {
  const body = signature.slice(2);
  return {
    r: `0x${body.slice(0, 64)}`,
    s: `0x${body.slice(64, 128)}`,
    v: parseInt(body.slice(128, 130), 16),
  };
}

/**
 * Signs GRVT orders with an account's private key.
 */
export class GrvtOrderSigner implements OrderSigner {
  private account: PrivateKeyAccount;
  private env: GrvtEnv;

  constructor(privateKey: string, env: GrvtEnv) {
    const normalized = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
    if (!/^0x[0-9a-fA-F]{64}$/.test(normalized)) {
      throw new Error("Private key must be 32 bytes of hex");
    }
    this.account = privateKeyToAccount(`0x${normalized.slice(2)}`);
    this.env = env;
  }

  get address(): string {
    return this.account.address;
  }

  async signOrder(order: UnsignedOrder, instrument: InstrumentInfo): Promise<GrvtOrderRaw> {
    const typedData = buildOrderTypedData(order, instrument, this.env);
    const signature = await this.account.signTypedData(typedData);
    const { r, s, v } = splitSignature(signature);

    return {
      sub_account_id: order.subAccountId,
      is_market: false,
      time_in_force: "GOOD_TILL_TIME",
      post_only: order.postOnly,
      reduce_only: order.reduceOnly,
      legs: [
        {
          instrument: order.instrument,
          size: order.size.toFixed(),
          limit_price: order.limitPrice.toFixed(),
          is_buying_asset: order.side === "buy",
        },
      ],
      signature: {
        signer: this.account.address,
        r,
        s,
        v,
        expiration: order.expirationNs.toString(),
        nonce: order.nonce,
      },
      metadata: {
        client_order_id: order.clientOrderId,
        create_time: order.createTime,
      },
    };
  }
}
