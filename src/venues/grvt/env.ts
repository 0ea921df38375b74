/**
 * GRVT deployment endpoints and signing chain ids.
 */

import type { GrvtEnv } from "./types";

export interface GrvtEndpoints {
  /** Session login host */
  edge: string;
  /** Account, order and position endpoints */
  trades: string;
  /** Instruments and order books */
  marketData: string;
  /** EIP-712 domain chain id */
  chainId: number;
}

const ENDPOINTS: Record<GrvtEnv, GrvtEndpoints> = {
  prod: {
    edge: "https://edge.grvt.io",
    trades: "https://trades.grvt.io",
    marketData: "https://market-data.grvt.io",
    chainId: 325,
  },
  testnet: {
    edge: "https://edge.testnet.grvt.io",
    trades: "https://trades.testnet.grvt.io",
    marketData: "https://market-data.testnet.grvt.io",
    chainId: 326,
  },
  staging: {
    edge: "https://edge.staging.gravitymarkets.io",
    trades: "https://trades.staging.gravitymarkets.io",
    marketData: "https://market-data.staging.gravitymarkets.io",
    chainId: 327,
  },
  dev: {
    edge: "https://edge.dev.gravitymarkets.io",
    trades: "https://trades.dev.gravitymarkets.io",
    marketData: "https://market-data.dev.gravitymarkets.io",
    chainId: 327,
  },
};

export function getEndpoints(env: GrvtEnv): GrvtEndpoints {
  return ENDPOINTS[env];
}
